/**
 * IndexedMaxHeap — binary max-heap over integer keys 0..capacity-1
 * with O(log n) update of any key's priority.
 *
 * Equal priorities pop the lowest key first.
 */

export class IndexedMaxHeap {
    /** heap slot → key */
    private readonly heap: number[] = []
    /** key → heap slot, -1 when absent */
    private readonly slots: Int32Array
    private readonly priorities: Float64Array

    constructor(capacity: number) {
        this.slots = new Int32Array(capacity).fill(-1)
        this.priorities = new Float64Array(capacity)
    }

    get size(): number {
        return this.heap.length
    }

    has(key: number): boolean {
        return key >= 0 && key < this.slots.length && this.slots[key] !== -1
    }

    /** Priority of a key currently in the heap */
    priorityOf(key: number): number | undefined {
        return this.has(key) ? this.priorities[key] : undefined
    }

    push(key: number, priority: number): void {
        if (key < 0 || key >= this.slots.length) {
            throw new RangeError(`IndexedMaxHeap: key ${key} out of range [0, ${this.slots.length})`)
        }
        if (this.has(key)) {
            throw new RangeError(`IndexedMaxHeap: key ${key} already present`)
        }
        this.priorities[key] = priority
        this.heap.push(key)
        this.slots[key] = this.heap.length - 1
        this.bubbleUp(this.heap.length - 1)
    }

    peek(): number | undefined {
        return this.heap[0]
    }

    pop(): number | undefined {
        if (this.heap.length === 0) return undefined
        const top = this.heap[0]
        const tail = this.heap.pop()
        this.slots[top] = -1
        if (tail !== undefined && this.heap.length > 0) {
            this.heap[0] = tail
            this.slots[tail] = 0
            this.bubbleDown(0)
        }
        return top
    }

    /** Set a present key's priority and restore heap order */
    update(key: number, priority: number): void {
        if (!this.has(key)) {
            throw new RangeError(`IndexedMaxHeap: key ${key} not present`)
        }
        const previous = this.priorities[key]
        this.priorities[key] = priority
        const slot = this.slots[key]
        if (priority < previous) {
            this.bubbleDown(slot)
        } else {
            this.bubbleUp(slot)
        }
    }

    /** Keys still in the heap, in heap order */
    keys(): number[] {
        return [...this.heap]
    }

    /** a before b: higher priority, then lower key */
    private before(a: number, b: number): boolean {
        const pa = this.priorities[a]
        const pb = this.priorities[b]
        if (pa !== pb) return pa > pb
        return a < b
    }

    private bubbleUp(index: number): void {
        while (index > 0) {
            const parent = (index - 1) >> 1
            if (!this.before(this.heap[index], this.heap[parent])) break
            this.swap(index, parent)
            index = parent
        }
    }

    private bubbleDown(index: number): void {
        const size = this.heap.length
        while (true) {
            const left = index * 2 + 1
            const right = left + 1
            let best = index
            if (left < size && this.before(this.heap[left], this.heap[best])) best = left
            if (right < size && this.before(this.heap[right], this.heap[best])) best = right
            if (best === index) return
            this.swap(index, best)
            index = best
        }
    }

    private swap(i: number, j: number): void {
        const a = this.heap[i]
        const b = this.heap[j]
        this.heap[i] = b
        this.heap[j] = a
        this.slots[b] = i
        this.slots[a] = j
    }
}
