import { describe, it, expect } from 'vitest'
import { IndexedMaxHeap } from '../../src/elimination/IndexedMaxHeap.js'

function drain(heap: IndexedMaxHeap): number[] {
    const order: number[] = []
    let key = heap.pop()
    while (key !== undefined) {
        order.push(key)
        key = heap.pop()
    }
    return order
}

describe('IndexedMaxHeap', () => {
    it('pops keys by descending priority', () => {
        const heap = new IndexedMaxHeap(5)
        heap.push(0, 3)
        heap.push(1, 9)
        heap.push(2, 1)
        heap.push(3, 7)
        heap.push(4, 5)
        expect(drain(heap)).toEqual([1, 3, 4, 0, 2])
    })

    it('breaks ties by lowest key', () => {
        const heap = new IndexedMaxHeap(4)
        heap.push(3, 2)
        heap.push(1, 2)
        heap.push(2, 2)
        heap.push(0, 1)
        expect(drain(heap)).toEqual([1, 2, 3, 0])
    })

    it('reorders after a decrease', () => {
        const heap = new IndexedMaxHeap(3)
        heap.push(0, 10)
        heap.push(1, 8)
        heap.push(2, 6)
        heap.update(0, 4)
        expect(heap.priorityOf(0)).toBe(4)
        expect(drain(heap)).toEqual([1, 2, 0])
    })

    it('reorders after an increase', () => {
        const heap = new IndexedMaxHeap(3)
        heap.push(0, 1)
        heap.push(1, 2)
        heap.push(2, 3)
        heap.update(0, 5)
        expect(heap.peek()).toBe(0)
    })

    it('tracks membership', () => {
        const heap = new IndexedMaxHeap(2)
        heap.push(0, 1)
        heap.push(1, 2)
        expect(heap.has(1)).toBe(true)
        expect(heap.pop()).toBe(1)
        expect(heap.has(1)).toBe(false)
        expect(heap.priorityOf(1)).toBeUndefined()
        expect(heap.size).toBe(1)
        expect(heap.keys()).toEqual([0])
    })

    it('returns undefined when empty', () => {
        const heap = new IndexedMaxHeap(1)
        expect(heap.pop()).toBeUndefined()
        expect(heap.peek()).toBeUndefined()
    })

    it('rejects keys out of range or already present', () => {
        const heap = new IndexedMaxHeap(2)
        heap.push(0, 1)
        expect(() => heap.push(0, 2)).toThrow(RangeError)
        expect(() => heap.push(2, 1)).toThrow(RangeError)
        expect(() => heap.update(1, 1)).toThrow(RangeError)
    })
})
