import { describe, it, expect } from 'vitest'
import { KdTree } from '../../src/elimination/KdTree.js'
import type { SamplePoint, Vec3 } from '../../src/types/index.js'

// Simple seeded RNG for reproducibility
function makeRng(seed: number): () => number {
    let t = seed | 0
    return () => {
        t = (t + 0x6D2B79F5) | 0
        let v = t
        v = Math.imul(v ^ (v >>> 15), v | 1)
        v ^= v + Math.imul(v ^ (v >>> 7), v | 61)
        return ((v ^ (v >>> 14)) >>> 0) / 4294967296
    }
}

function randomCloud(count: number, seed: number): SamplePoint[] {
    const rng = makeRng(seed)
    return Array.from({ length: count }, (_, i) => ({
        id: i * 3 + 7,
        position: [rng() * 10, rng() * 10, rng() * 10] as const,
    }))
}

function distance(a: Vec3, b: Vec3): number {
    return Math.hypot(a[0] - b[0], a[1] - b[1], a[2] - b[2])
}

describe('KdTree.findRange', () => {
    it('matches a brute-force scan', () => {
        const points = randomCloud(500, 42)
        const tree = new KdTree(points)
        const rng = makeRng(7)

        for (let q = 0; q < 20; q++) {
            const center: Vec3 = [rng() * 10, rng() * 10, rng() * 10]
            const radius = 0.5 + rng() * 2

            const expected = points
                .filter(p => distance(p.position, center) <= radius)
                .map(p => p.id)
                .sort((a, b) => a - b)
            const actual = tree.findRange(center, radius).map(h => h.id).sort((a, b) => a - b)

            expect(actual).toEqual(expected)
        }
    })

    it('reports the distance and position of each hit', () => {
        const tree = new KdTree([
            { id: 1, position: [0, 0, 0] },
            { id: 2, position: [3, 4, 0] },
        ])
        const hits = tree.findRange([0, 0, 0], 10)
        const far = hits.find(h => h.id === 2)
        expect(far?.distance).toBe(5)
        expect(far?.position).toEqual([3, 4, 0])
    })

    it('includes points exactly on the radius', () => {
        const tree = new KdTree([
            { id: 0, position: [0, 0, 0] },
            { id: 1, position: [1, 0, 0] },
            { id: 2, position: [2, 0, 0] },
        ])
        const ids = tree.findRange([0, 0, 0], 1).map(h => h.id).sort((a, b) => a - b)
        expect(ids).toEqual([0, 1])
    })

    it('excludes the queried point itself', () => {
        const points = randomCloud(100, 3)
        const tree = new KdTree(points)
        const self = points[10]
        const hits = tree.findRange(self.position, 3, self.id)
        expect(hits.some(h => h.id === self.id)).toBe(false)
    })

    it('keeps coincident points with other ids', () => {
        const tree = new KdTree([
            { id: 5, position: [1, 1, 1] },
            { id: 6, position: [1, 1, 1] },
            { id: 9, position: [4, 4, 4] },
        ])
        const hits = tree.findRange([1, 1, 1], 0.5, 5)
        expect(hits).toEqual([{ id: 6, position: [1, 1, 1], distance: 0 }])
    })

    it('finds every point in a large radius', () => {
        const points = randomCloud(200, 11)
        const tree = new KdTree(points)
        expect(tree.size).toBe(200)
        expect(tree.findRange([5, 5, 5], 100)).toHaveLength(200)
    })

    it('handles many duplicate coordinates on the split axis', () => {
        const points: SamplePoint[] = Array.from({ length: 64 }, (_, i) => ({
            id: i,
            position: [1, i % 4, Math.floor(i / 4)] as const,
        }))
        const tree = new KdTree(points)
        const ids = tree.findRange([1, 0, 0], 1).map(h => h.id).sort((a, b) => a - b)
        // (1,0,0), (1,1,0), (1,0,1)
        expect(ids).toEqual([0, 1, 4])
    })
})
