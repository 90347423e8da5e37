/**
 * Blue Noise Elimination — Core Types
 *
 * Point, hit and option types shared by the elimination engine
 * and the three.js adapter.
 */

// ============================================================================
// POINTS
// ============================================================================

/** Caller-supplied sample identifier. Unique, not necessarily contiguous. */
export type SampleId = number

export type Vec3 = readonly [number, number, number]

export interface SamplePoint {
    id: SampleId
    position: Vec3
}

/** Candidate input: a list of points or an id → position map */
export type PointSet = ReadonlyArray<SamplePoint> | ReadonlyMap<SampleId, Vec3>

/** Result of a spatial range query */
export interface RangeHit {
    id: SampleId
    position: Vec3
    distance: number
}

// ============================================================================
// HEURISTICS
// ============================================================================

/** Tunable constants of the weight model and the rmin heuristic */
export interface HeuristicOverrides {
    /** Falloff sharpness exponent (default 8) */
    alpha?: number
    /** rmin exponent (default 1.5) */
    gamma?: number
    /** rmin scale (default 0.65) */
    beta?: number
}

export interface Radii {
    /** Falloff radius: pairs farther apart than 2 * rmax do not interact */
    rmax: number
    /** Lower separation bound. Computed and exposed, never enforced. */
    rmin: number
}

// ============================================================================
// ELIMINATION
// ============================================================================

export interface EliminatorOptions extends HeuristicOverrides {
    /** Number of points left after elimination */
    targetSamples: number
    /** Volume distribution (true) or distribution on a 2D surface (false) */
    isVolume: boolean
    /** Reference surface area, used in surface mode only */
    meshArea?: number
}

/** One step of the elimination loop */
export interface EliminationStep {
    id: SampleId
    /** Weight the point carried when it was extracted */
    weight: number
    position: Vec3
}
