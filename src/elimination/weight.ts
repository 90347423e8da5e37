/**
 * Falloff weight between two samples.
 *
 *   w(d) = (1 - min(d, 2 * rmax) / (2 * rmax)) ^ alpha
 *
 * 1 for coincident points, exactly 0 at and beyond 2 * rmax.
 */

export const DEFAULT_ALPHA = 8

export function falloffWeight(distance: number, rmax: number, alpha = DEFAULT_ALPHA): number {
    const range = 2 * rmax
    const d = Math.min(Math.max(distance, 0), range)
    return Math.pow(1 - d / range, alpha)
}

/** Bind rmax and alpha once for the elimination loop */
export function createWeightFunction(rmax: number, alpha = DEFAULT_ALPHA): (distance: number) => number {
    return (distance) => falloffWeight(distance, rmax, alpha)
}
