/**
 * Radius heuristics — picks the falloff radius from point-set geometry.
 *
 * rmax comes from close-packing N spheres into the bounding volume
 * (or N discs onto the reference surface when one is known).
 * rmin is derived from rmax and the oversampling ratio.
 */

import type { Radii, SamplePoint, Vec3 } from '../types/index.js'
import { InvalidInputError, NumericInstabilityError } from './errors.js'

export const DEFAULT_GAMMA = 1.5
export const DEFAULT_BETA = 0.65

export interface RadiusOptions {
    /** Bounding-box extents along x, y, z */
    extents: Vec3
    /** Candidate count before elimination (M) */
    sampleCount: number
    /** Count after elimination (N) */
    targetSamples: number
    isVolume: boolean
    meshArea?: number
    gamma?: number
    beta?: number
}

/** Axis-aligned bounding-box extents of a point list */
export function computeExtents(points: ReadonlyArray<SamplePoint>): Vec3 {
    let minX = Infinity, maxX = -Infinity
    let minY = Infinity, maxY = -Infinity
    let minZ = Infinity, maxZ = -Infinity
    for (const { position: [x, y, z] } of points) {
        if (x < minX) minX = x
        if (x > maxX) maxX = x
        if (y < minY) minY = y
        if (y > maxY) maxY = y
        if (z < minZ) minZ = z
        if (z > maxZ) maxZ = z
    }
    return [maxX - minX, maxY - minY, maxZ - minZ]
}

/** rmax for random close packing of N samples in a volume */
export function volumeRadius(volume: number, targetSamples: number): number {
    return Math.cbrt(volume / (4 * Math.SQRT2 * targetSamples))
}

/** rmax for hexagonal packing of N samples on a surface */
export function surfaceRadius(area: number, targetSamples: number): number {
    return Math.sqrt(area / (2 * Math.sqrt(3) * targetSamples))
}

/**
 * rmax is the smaller of the volume and surface bounds that apply.
 * A zero extent leaves no volume bound: in surface mode with a reference
 * area the surface bound is used alone, otherwise the input is rejected.
 */
export function computeRadii(options: RadiusOptions): Radii {
    const { extents, sampleCount, isVolume, meshArea } = options
    const gamma = options.gamma ?? DEFAULT_GAMMA
    const beta = options.beta ?? DEFAULT_BETA

    if (sampleCount <= 0) {
        throw new InvalidInputError('point set is empty', 'points', sampleCount)
    }

    // No survivors still needs a finite radius to drive the loop to zero
    const n = Math.max(options.targetSamples, 1)
    const volume = extents[0] * extents[1] * extents[2]
    const useSurface = !isVolume && meshArea !== undefined

    const candidates: number[] = []
    if (volume > 0) candidates.push(volumeRadius(volume, n))
    if (useSurface) candidates.push(surfaceRadius(meshArea, n))

    if (candidates.length === 0) {
        throw new InvalidInputError(
            `bounding box is degenerate (extents ${extents.join(', ')})`,
            'points',
            extents
        )
    }

    const rmax = Math.min(...candidates)
    if (!Number.isFinite(rmax) || rmax <= 0) {
        throw new NumericInstabilityError(`rmax is not a positive finite number (${rmax})`, {
            rmax,
            sampleCount,
            targetSamples: options.targetSamples,
        })
    }

    const ratio = Math.min(n, sampleCount) / sampleCount
    const rmin = rmax * (1 - Math.pow(ratio, gamma)) * beta

    return { rmax, rmin }
}
