// services/orchestrator/src/devices/power-supply/channel.ts

import type { SnapshotUpdate } from './types.js'

/**
 * Bounded FIFO between the session's reader and a consumer running on its own
 * schedule. When full, the oldest queued update is discarded and counted.
 */
export class SnapshotChannel<T = SnapshotUpdate> implements AsyncIterable<T> {
    private readonly capacity: number
    private queue: T[] = []
    private waiters: Array<(result: IteratorResult<T, undefined>) => void> = []
    private closed = false
    private droppedCount = 0

    constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new Error('SnapshotChannel capacity must be a positive integer')
        }
        this.capacity = capacity
    }

    public get size(): number {
        return this.queue.length
    }

    /** Updates discarded because the channel was full. */
    public get dropped(): number {
        return this.droppedCount
    }

    public get isClosed(): boolean {
        return this.closed
    }

    /** Returns false once closed. */
    public push(item: T): boolean {
        if (this.closed) return false

        const waiter = this.waiters.shift()
        if (waiter) {
            waiter({ value: item, done: false })
            return true
        }

        if (this.queue.length >= this.capacity) {
            this.queue.shift()
            this.droppedCount += 1
        }
        this.queue.push(item)
        return true
    }

    /** Resolves with the next item; `done` once closed and empty. */
    public next(): Promise<IteratorResult<T, undefined>> {
        const item = this.queue.shift()
        if (item !== undefined) return Promise.resolve({ value: item, done: false })
        if (this.closed) return Promise.resolve({ value: undefined, done: true })
        return new Promise(resolve => this.waiters.push(resolve))
    }

    /** Everything queued right now, without waiting. */
    public drain(): T[] {
        const items = this.queue
        this.queue = []
        return items
    }

    /** Queued items remain readable; pending readers finish. */
    public close(): void {
        if (this.closed) return
        this.closed = true
        for (const waiter of this.waiters) waiter({ value: undefined, done: true })
        this.waiters = []
    }

    public [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
        return {
            next: () => this.next(),
        }
    }
}
