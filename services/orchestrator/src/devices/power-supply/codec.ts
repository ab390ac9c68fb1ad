// services/orchestrator/src/devices/power-supply/codec.ts

import {
    CMD_GET,
    FRAME_OVERHEAD,
    FRAME_PREFIX,
    HEADER_INPUT,
    MAX_PAYLOAD,
} from './constants.js'
import { EncodingError } from './errors.js'
import type { FeedResult, Packet } from './types.js'

/* -------------------------------------------------------------------------- */
/*  Encode                                                                    */
/* -------------------------------------------------------------------------- */

export function checksumOf(fieldId: number, payload: ArrayLike<number>): number {
    let sum = fieldId + payload.length
    for (let i = 0; i < payload.length; i++) sum += payload[i]
    return sum & 0xff
}

/**
 * `[header, command, fieldId, length, ...payload, checksum]`
 */
export function encodePacket(
    header: number,
    command: number,
    fieldId: number,
    payload: ArrayLike<number>
): Buffer {
    assertByte('header', header)
    assertByte('command', command)
    assertByte('fieldId', fieldId)

    if (payload.length > MAX_PAYLOAD) {
        throw new EncodingError('payload', payload.length, `length exceeds ${MAX_PAYLOAD} bytes`)
    }
    for (let i = 0; i < payload.length; i++) {
        assertByte(`payload[${i}]`, payload[i])
    }

    const frame = Buffer.alloc(FRAME_OVERHEAD + payload.length)
    frame[0] = header
    frame[1] = command
    frame[2] = fieldId
    frame[3] = payload.length
    for (let i = 0; i < payload.length; i++) frame[FRAME_PREFIX + i] = payload[i]
    frame[frame.length - 1] = checksumOf(fieldId, payload)
    return frame
}

/** Payload is the value as a little-endian IEEE-754 single. */
export function encodeFloatPacket(
    header: number,
    command: number,
    fieldId: number,
    value: number
): Buffer {
    return encodePacket(header, command, fieldId, floatBytes(value))
}

export function floatBytes(value: number): Buffer {
    const bytes = Buffer.alloc(4)
    bytes.writeFloatLE(value, 0)
    return bytes
}

function assertByte(field: string, value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
        throw new EncodingError(field, value, 'must be an integer in 0-255')
    }
}

/* -------------------------------------------------------------------------- */
/*  Decode                                                                    */
/* -------------------------------------------------------------------------- */

interface ScanResult {
    packets: Packet[]
    /** First offset not consumed by the scan. */
    next: number
    dropped: number
}

/**
 * Scan `buf[start, end)` for `F0 A1 id len payload sum` frames.
 *
 * Non-marker bytes are skipped one at a time. The scan stops at the first
 * frame whose declared length runs past `end`; that frame's bytes stay
 * unconsumed. A lone trailing 0xF0 is kept since it may be half a marker.
 */
function scanFrames(buf: Uint8Array, start: number, end: number): ScanResult {
    const packets: Packet[] = []
    let dropped = 0
    let i = start

    while (i < end) {
        if (buf[i] !== HEADER_INPUT) {
            i += 1
            continue
        }
        if (i + 1 >= end) break
        if (buf[i + 1] !== CMD_GET) {
            i += 1
            continue
        }
        if (i + FRAME_PREFIX > end) break

        const fieldId = buf[i + 2]
        const length = buf[i + 3]
        const frameEnd = i + FRAME_OVERHEAD + length
        if (frameEnd > end) break

        const payload = buf.slice(i + FRAME_PREFIX, i + FRAME_PREFIX + length)
        const checksum = buf[frameEnd - 1]
        i = frameEnd

        if (checksum !== checksumOf(fieldId, payload)) {
            dropped += 1
            continue
        }

        packets.push({
            header: HEADER_INPUT,
            command: CMD_GET,
            fieldId,
            length,
            payload,
            checksum,
        })
    }

    return { packets, next: i, dropped }
}

/**
 * Parse `buffer + newBytes`. Pure: neither argument is modified, so the
 * caller may drive it from a poll loop or a long-lived reader alike.
 */
export function feed(buffer: Uint8Array, newBytes: Uint8Array): FeedResult {
    const buf = new Uint8Array(buffer.length + newBytes.length)
    buf.set(buffer, 0)
    buf.set(newBytes, buffer.length)

    const { packets, next, dropped } = scanFrames(buf, 0, buf.length)
    return { packets, remaining: buf.slice(next), dropped }
}

/**
 * Stateful scanner over a growable buffer. Consumed bytes are skipped with a
 * cursor and compacted away only when more room is needed.
 */
export class FrameScanner {
    private buf: Uint8Array
    private start = 0
    private end = 0

    constructor(initialCapacity = 512) {
        this.buf = new Uint8Array(Math.max(16, initialCapacity))
    }

    /** Bytes held back for the next push. */
    public get pending(): number {
        return this.end - this.start
    }

    public push(bytes: Uint8Array): FeedResult {
        this.append(bytes)

        const { packets, next, dropped } = scanFrames(this.buf, this.start, this.end)
        this.start = next
        if (this.start === this.end) {
            this.start = 0
            this.end = 0
        }

        return { packets, remaining: this.buf.slice(this.start, this.end), dropped }
    }

    public reset(): void {
        this.start = 0
        this.end = 0
    }

    private append(bytes: Uint8Array): void {
        if (bytes.length === 0) return

        if (this.end + bytes.length > this.buf.length) {
            const live = this.end - this.start
            const needed = live + bytes.length

            if (needed > this.buf.length) {
                let capacity = this.buf.length
                while (capacity < needed) capacity *= 2
                const grown = new Uint8Array(capacity)
                grown.set(this.buf.subarray(this.start, this.end), 0)
                this.buf = grown
            } else {
                this.buf.copyWithin(0, this.start, this.end)
            }

            this.start = 0
            this.end = live
        }

        this.buf.set(bytes, this.end)
        this.end += bytes.length
    }
}
