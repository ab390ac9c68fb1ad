import { SnapshotChannel } from '../src/devices/power-supply/channel'

describe('SnapshotChannel', () => {
    test('delivers in FIFO order', async () => {
        const ch = new SnapshotChannel<number>(4)
        ch.push(1)
        ch.push(2)

        expect(await ch.next()).toEqual({ value: 1, done: false })
        expect(await ch.next()).toEqual({ value: 2, done: false })
        expect(ch.size).toBe(0)
    })

    test('drops the oldest item when full', () => {
        const ch = new SnapshotChannel<number>(2)
        ch.push(1)
        ch.push(2)
        ch.push(3)

        expect(ch.dropped).toBe(1)
        expect(ch.drain()).toEqual([2, 3])
        expect(ch.size).toBe(0)
    })

    test('a waiting reader gets the next push directly', async () => {
        const ch = new SnapshotChannel<string>(1)
        const pending = ch.next()

        expect(ch.push('a')).toBe(true)
        expect(await pending).toEqual({ value: 'a', done: false })
        expect(ch.size).toBe(0)
        expect(ch.dropped).toBe(0)
    })

    test('close finishes waiting readers and refuses pushes', async () => {
        const ch = new SnapshotChannel<number>(2)
        const pending = ch.next()

        ch.close()

        expect(await pending).toEqual({ value: undefined, done: true })
        expect(ch.push(1)).toBe(false)
        expect(ch.isClosed).toBe(true)
    })

    test('queued items stay readable after close', async () => {
        const ch = new SnapshotChannel<number>(4)
        ch.push(7)
        ch.push(8)
        ch.close()

        const seen: number[] = []
        for await (const item of ch) seen.push(item)

        expect(seen).toEqual([7, 8])
    })

    test('rejects a capacity that is not a positive integer', () => {
        expect(() => new SnapshotChannel(0)).toThrow('positive integer')
        expect(() => new SnapshotChannel(1.5)).toThrow('positive integer')
    })
})
