/**
 * KdTree — static 3D k-d tree for radius queries.
 *
 * Built once by recursive median split and stored implicitly: the node of
 * a range [lo, hi) is its middle slot, its children are the two halves.
 * Points are never removed; logical removal is the caller's business.
 */

import type { RangeHit, SampleId, SamplePoint, Vec3 } from '../types/index.js'

/** Ranges at or below this size are scanned linearly */
const LEAF_SIZE = 8

export class KdTree {
    private readonly ids: SampleId[]
    private readonly positions: Vec3[]
    /** Flat xyz coordinates in tree order */
    private readonly coords: Float64Array

    constructor(points: ReadonlyArray<SamplePoint>) {
        const order = points.map((_, i) => i)
        this.build(order, points, 0, order.length, 0)

        this.ids = order.map(i => points[i].id)
        this.positions = order.map(i => points[i].position)
        this.coords = new Float64Array(order.length * 3)
        order.forEach((src, dst) => {
            const [x, y, z] = points[src].position
            this.coords[dst * 3] = x
            this.coords[dst * 3 + 1] = y
            this.coords[dst * 3 + 2] = z
        })
    }

    get size(): number {
        return this.ids.length
    }

    /**
     * All points within `radius` (inclusive) of `center`.
     * The point whose id equals `exclude` is left out of the result,
     * coincident points with other ids are kept.
     */
    findRange(center: Vec3, radius: number, exclude?: SampleId): RangeHit[] {
        const hits: RangeHit[] = []
        const r2 = radius * radius
        const [cx, cy, cz] = center

        const visit = (slot: number) => {
            const id = this.ids[slot]
            if (id === exclude) return
            const dx = this.coords[slot * 3] - cx
            const dy = this.coords[slot * 3 + 1] - cy
            const dz = this.coords[slot * 3 + 2] - cz
            const d2 = dx * dx + dy * dy + dz * dz
            if (d2 <= r2) {
                hits.push({ id, position: this.positions[slot], distance: Math.sqrt(d2) })
            }
        }

        // [lo, hi, axis] triples
        const stack: number[] = [0, this.ids.length, 0]
        while (stack.length > 0) {
            const axis = stack.pop() ?? 0
            const hi = stack.pop() ?? 0
            const lo = stack.pop() ?? 0

            if (hi - lo <= LEAF_SIZE) {
                for (let slot = lo; slot < hi; slot++) visit(slot)
                continue
            }

            const mid = (lo + hi) >> 1
            visit(mid)

            const diff = center[axis] - this.coords[mid * 3 + axis]
            const next = (axis + 1) % 3
            // Left half holds coords <= split, right half >= split
            if (diff <= radius) stack.push(lo, mid, next)
            if (diff >= -radius) stack.push(mid + 1, hi, next)
        }

        return hits
    }

    /** Sort `order[lo, hi)` so every subrange's middle slot splits it on its axis */
    private build(
        order: number[],
        points: ReadonlyArray<SamplePoint>,
        lo: number,
        hi: number,
        axis: number
    ): void {
        if (hi - lo <= LEAF_SIZE) return

        const range = order.slice(lo, hi)
        range.sort((a, b) => points[a].position[axis] - points[b].position[axis])
        for (let i = 0; i < range.length; i++) order[lo + i] = range[i]

        const mid = (lo + hi) >> 1
        const next = (axis + 1) % 3
        this.build(order, points, lo, mid, next)
        this.build(order, points, mid + 1, hi, next)
    }
}
