/**
 * SampleEliminator — weighted sample elimination.
 *
 * Thins an oversampled point set to a target count by repeatedly removing
 * the point with the highest summed falloff weight from its neighbours,
 * then subtracting that point's contribution from every neighbour still
 * alive. What remains approximates a blue-noise distribution.
 *
 * Lifecycle (single use):
 *   1. Build — validate, index all points, derive rmax/rmin, seed weights
 *   2. Eliminate — eliminateOne() until currentSamples reaches the target
 *   3. Collect — survivors() / survivorPoints()
 *
 * Points are indexed by their position in the id-sorted input, so heap
 * keys follow id order and equal weights pop the lowest id first.
 */

import type {
    EliminationStep,
    EliminatorOptions,
    PointSet,
    SampleId,
    SamplePoint,
} from '../types/index.js'
import { KdTree } from './KdTree.js'
import { IndexedMaxHeap } from './IndexedMaxHeap.js'
import { computeExtents, computeRadii } from './radius.js'
import { createWeightFunction, DEFAULT_ALPHA } from './weight.js'
import { NumericInstabilityError } from './errors.js'
import { assertMeshArea, assertTargetSamples, normalizePoints } from './validation.js'

export class SampleEliminator {
    readonly rmax: number
    readonly rmin: number
    readonly targetSamples: number

    private readonly points: SamplePoint[]
    private readonly keyOf = new Map<SampleId, number>()
    private readonly tree: KdTree
    private readonly heap: IndexedMaxHeap
    private readonly weight: (distance: number) => number
    private samples: number

    constructor(points: PointSet, options: EliminatorOptions) {
        assertTargetSamples(options.targetSamples)
        // The reference area only matters on a surface
        const meshArea = options.isVolume ? undefined : options.meshArea
        assertMeshArea(meshArea)
        this.points = normalizePoints(points)
        this.targetSamples = options.targetSamples

        const { rmax, rmin } = computeRadii({
            extents: computeExtents(this.points),
            sampleCount: this.points.length,
            targetSamples: options.targetSamples,
            isVolume: options.isVolume,
            meshArea,
            gamma: options.gamma,
            beta: options.beta,
        })
        this.rmax = rmax
        this.rmin = rmin
        this.weight = createWeightFunction(rmax, options.alpha ?? DEFAULT_ALPHA)

        this.tree = new KdTree(this.points)
        this.heap = new IndexedMaxHeap(this.points.length)
        this.points.forEach((p, key) => this.keyOf.set(p.id, key))

        this.points.forEach((p, key) => {
            let total = 0
            for (const hit of this.tree.findRange(p.position, 2 * rmax, p.id)) {
                total += this.weight(hit.distance)
            }
            if (!Number.isFinite(total)) {
                throw new NumericInstabilityError(`initial weight of point ${p.id} is not finite`, {
                    id: p.id,
                    rmax,
                })
            }
            this.heap.push(key, total)
        })

        this.samples = this.points.length
    }

    /** Live point count */
    get currentSamples(): number {
        return this.samples
    }

    get done(): boolean {
        return this.samples <= this.targetSamples || this.heap.size === 0
    }

    /**
     * Remove the current maximum-weight point and update its neighbours.
     * Returns null once the target count is reached.
     */
    eliminateOne(): EliminationStep | null {
        if (this.done) return null

        const weight = this.topWeight()
        const key = this.heap.pop()
        if (key === undefined) return null

        const { id, position } = this.points[key]
        for (const hit of this.tree.findRange(position, 2 * this.rmax, id)) {
            const neighbour = this.keyOf.get(hit.id)
            if (neighbour === undefined) continue
            const current = this.heap.priorityOf(neighbour)
            // Already eliminated
            if (current === undefined) continue
            this.heap.update(neighbour, current - this.weight(hit.distance))
        }

        this.samples--
        return { id, weight, position }
    }

    /** Run the loop to completion and return the survivors */
    eliminate(): SampleId[] {
        let step = this.eliminateOne()
        while (step !== null) step = this.eliminateOne()
        return this.survivors()
    }

    /** Surviving ids in ascending order */
    survivors(): SampleId[] {
        return this.survivorKeys().map(key => this.points[key].id)
    }

    survivorPoints(): SamplePoint[] {
        return this.survivorKeys().map(key => this.points[key])
    }

    isAlive(id: SampleId): boolean {
        const key = this.keyOf.get(id)
        return key !== undefined && this.heap.has(key)
    }

    /** Current summed weight of a live point, undefined once eliminated */
    weightOf(id: SampleId): number | undefined {
        const key = this.keyOf.get(id)
        return key === undefined ? undefined : this.heap.priorityOf(key)
    }

    private topWeight(): number {
        const top = this.heap.peek()
        return top === undefined ? 0 : this.heap.priorityOf(top) ?? 0
    }

    private survivorKeys(): number[] {
        return this.heap.keys().sort((a, b) => a - b)
    }
}

/**
 * Thin `points` down to `targetSamples` and return the surviving ids
 * in ascending order.
 */
export function eliminate(
    points: PointSet,
    targetSamples: number,
    isVolume: boolean,
    meshArea?: number
): SampleId[] {
    return new SampleEliminator(points, { targetSamples, isVolume, meshArea }).eliminate()
}
