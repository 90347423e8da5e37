/**
 * Blue Noise Elimination — Public API
 *
 * Weighted sample elimination: thins an oversampled 3D point set
 * to a blue-noise subset of a target size.
 */

// Core types
export type {
    SampleId,
    Vec3,
    SamplePoint,
    PointSet,
    RangeHit,
    HeuristicOverrides,
    Radii,
    EliminatorOptions,
    EliminationStep,
} from './types/index.js'

// Engine
export { SampleEliminator, eliminate } from './elimination/SampleEliminator.js'

// Building blocks (for custom pipelines)
export { KdTree } from './elimination/KdTree.js'
export { IndexedMaxHeap } from './elimination/IndexedMaxHeap.js'
export { falloffWeight, createWeightFunction, DEFAULT_ALPHA } from './elimination/weight.js'
export {
    computeRadii,
    computeExtents,
    volumeRadius,
    surfaceRadius,
    DEFAULT_GAMMA,
    DEFAULT_BETA,
} from './elimination/radius.js'
export type { RadiusOptions } from './elimination/radius.js'

// Errors
export {
    EliminationError,
    InvalidInputError,
    NumericInstabilityError,
    ERROR_CODES,
} from './elimination/errors.js'
export type { ErrorCode } from './elimination/errors.js'

// three.js integration
export {
    BlueNoiseParticles,
    oversampledCount,
    QUALITY_OVERSAMPLING,
} from './particles/BlueNoiseParticles.js'
export type {
    EmitFrom,
    SampleQuality,
    BlueNoiseConfig,
    BlueNoiseResult,
} from './particles/BlueNoiseParticles.js'
export { computeMeshArea } from './particles/meshArea.js'
