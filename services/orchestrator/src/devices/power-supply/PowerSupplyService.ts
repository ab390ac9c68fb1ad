// services/orchestrator/src/devices/power-supply/PowerSupplyService.ts

import { encodePacket, floatBytes, FrameScanner } from './codec.js'
import {
    ALL,
    BRIGHTNESS,
    CMD_BAUD,
    CMD_GET,
    CMD_SESSION,
    CMD_SET,
    CONTROL_FIELD,
    CURRENT_SET,
    FIRMWARE_VERSION,
    HARDWARE_VERSION,
    HEADER_OUTPUT,
    METERING_ENABLE,
    MODEL_NAME,
    OUTPUT_ENABLE,
    VOLTAGE_SET,
    VOLUME,
} from './constants.js'
import {
    ConnectError,
    SessionTimeoutError,
    TransportError,
    ValidationError,
} from './errors.js'
import {
    decodeField,
    fieldName,
    fieldSpec,
    groupFieldIds,
    protectionFieldId,
} from './fields.js'
import type { DeviceTransport } from './transport.js'
import type {
    DeviceKey,
    DeviceSnapshot,
    Packet,
    PowerSupplyConfig,
    PowerSupplyErrorInfo,
    PowerSupplyEvent,
    PowerSupplyEventSink,
    PowerSupplyPhase,
    PowerSupplyStats,
    SnapshotSink,
    SnapshotUpdate,
} from './types.js'
import { baudIndex, errorMessage, sleep } from './utils.js'

interface PowerSupplyServiceDeps {
    events: PowerSupplyEventSink
    transport: DeviceTransport
    /** Receives each frame's newly decoded keys, in decode order. */
    onUpdate?: SnapshotSink
}

interface UpdateWaiter {
    /** Returns true once satisfied. */
    deliver(update: SnapshotUpdate): boolean
    fail(err: Error): void
}

function freshStats(): PowerSupplyStats {
    return {
        bytesReceived: 0,
        framesDecoded: 0,
        framesDropped: 0,
        decodeErrors: 0,
        writes: 0,
        lastFrameAt: null,
        lastErrorAt: null,
    }
}

/**
 * PowerSupplyService
 *
 * One session with one DPS-150. Outbound frames go through a single-writer
 * queue with a settle delay after every write; inbound bytes are framed,
 * decoded and merged into the snapshot either by the reader loop or by
 * explicit poll() calls.
 */
export class PowerSupplyService {
    private readonly config: PowerSupplyConfig
    private readonly deps: PowerSupplyServiceDeps

    private phase: PowerSupplyPhase = 'disconnected'
    private snapshot: DeviceSnapshot = {}
    private stats: PowerSupplyStats = freshStats()
    private readonly scanner = new FrameScanner()

    /** Tail of the write queue; never rejects. */
    private writeChain: Promise<void> = Promise.resolve()

    private readerRunning = false
    private readerDone: Promise<void> | null = null

    private connecting: Promise<void> | null = null
    private disconnecting: Promise<void> | null = null

    private waiters = new Set<UpdateWaiter>()

    constructor(config: PowerSupplyConfig, deps: PowerSupplyServiceDeps) {
        this.config = config
        this.deps = deps
    }

    /* ---------------------------------------------------------------------- */
    /*  Lifecycle                                                             */
    /* ---------------------------------------------------------------------- */

    /**
     * Open, initialise and start streaming. No-op while streaming; a second
     * call during an in-flight connect shares its promise. A call made while
     * disconnecting starts once the disconnect has finished.
     */
    public connect(): Promise<void> {
        if (this.phase === 'streaming') return Promise.resolve()
        if (this.connecting) return this.connecting

        const pending = this.disconnecting
        const run = pending ? pending.then(() => this.runConnect()) : this.runConnect()
        this.connecting = run.finally(() => {
            this.connecting = null
        })
        return this.connecting
    }

    /** Idempotent; never rejects. */
    public disconnect(): Promise<void> {
        if (this.disconnecting) return this.disconnecting

        this.disconnecting = this.runDisconnect().finally(() => {
            this.disconnecting = null
        })
        return this.disconnecting
    }

    public getPhase(): PowerSupplyPhase {
        return this.phase
    }

    public getSnapshot(): DeviceSnapshot {
        return { ...this.snapshot }
    }

    public getStats(): PowerSupplyStats {
        return { ...this.stats }
    }

    /**
     * Resolve with the next decoded value of `key`. The protocol carries no
     * request ids, so this is how a caller pairs a GET with its reply.
     */
    public waitForUpdate<K extends DeviceKey>(
        key: K,
        timeoutMs: number
    ): Promise<NonNullable<SnapshotUpdate[K]>> {
        if (this.phase === 'disconnected' || this.phase === 'disconnecting') {
            return Promise.reject(new TransportError('read', `session is ${this.phase}`))
        }

        return new Promise((resolve, reject) => {
            const waiter: UpdateWaiter = {
                deliver: update => {
                    const value = update[key]
                    if (value === undefined) return false
                    clearTimeout(timer)
                    resolve(value)
                    return true
                },
                fail: err => {
                    clearTimeout(timer)
                    reject(err)
                },
            }

            const timer = setTimeout(() => {
                this.waiters.delete(waiter)
                reject(new SessionTimeoutError(`waitForUpdate(${key})`, timeoutMs))
            }, timeoutMs)

            this.waiters.add(waiter)
        })
    }

    /* ---------------------------------------------------------------------- */
    /*  Commands                                                              */
    /* ---------------------------------------------------------------------- */

    public async setFloatValue(fieldId: number, value: number): Promise<void> {
        if (fieldSpec(fieldId)?.set !== 'float') {
            throw new ValidationError('fieldId', fieldId, 'not a float setpoint')
        }
        if (!Number.isFinite(value)) {
            throw new ValidationError(fieldName(fieldId), value, 'must be a finite number')
        }
        this.requireStreaming()
        await this.send(CMD_SET, fieldId, floatBytes(value))
    }

    public async setByteValue(fieldId: number, value: number): Promise<void> {
        if (fieldSpec(fieldId)?.set !== 'byte') {
            throw new ValidationError('fieldId', fieldId, 'not a byte setpoint')
        }
        if (!Number.isInteger(value) || value < 0 || value > 0xff) {
            throw new ValidationError(fieldName(fieldId), value, 'must be an integer in 0-255')
        }
        this.requireStreaming()
        await this.send(CMD_SET, fieldId, [value])
    }

    public setVoltage(volts: number): Promise<void> {
        return this.setFloatValue(VOLTAGE_SET, volts)
    }

    public setCurrent(amps: number): Promise<void> {
        return this.setFloatValue(CURRENT_SET, amps)
    }

    public enable(): Promise<void> {
        return this.setByteValue(OUTPUT_ENABLE, 1)
    }

    public disable(): Promise<void> {
        return this.setByteValue(OUTPUT_ENABLE, 0)
    }

    public startMetering(): Promise<void> {
        return this.setByteValue(METERING_ENABLE, 1)
    }

    public stopMetering(): Promise<void> {
        return this.setByteValue(METERING_ENABLE, 0)
    }

    public setBrightness(level: number): Promise<void> {
        return this.setByteValue(BRIGHTNESS, level)
    }

    public setVolume(level: number): Promise<void> {
        return this.setByteValue(VOLUME, level)
    }

    public async getAll(): Promise<void> {
        this.requireStreaming()
        await this.send(CMD_GET, ALL, [0])
    }

    public async setProtection(kind: string, value: number): Promise<void> {
        const fieldId = protectionFieldId(kind)
        await this.setFloatValue(fieldId, value)
    }

    /** One SET per component given; both are validated before either is sent. */
    public async setGroup(group: number, values: { voltage?: number; current?: number }): Promise<void> {
        const ids = groupFieldIds(group)
        for (const [name, v] of Object.entries(values)) {
            if (v !== undefined && !Number.isFinite(v)) {
                throw new ValidationError(`group${group}.${name}`, v, 'must be a finite number')
            }
        }

        if (values.voltage !== undefined) await this.setFloatValue(ids.voltage, values.voltage)
        if (values.current !== undefined) await this.setFloatValue(ids.current, values.current)
    }

    /**
     * Single read-then-parse pass for callers that drive the session
     * themselves (reader mode `poll`). Returns the updates it delivered.
     */
    public async poll(): Promise<SnapshotUpdate[]> {
        this.requireStreaming()
        if (this.readerRunning) {
            throw new TransportError('read', 'reader loop is running')
        }

        const { readChunkBytes, readTimeoutMs } = this.config.timing
        let bytes: Uint8Array
        try {
            bytes = await this.deps.transport.read(readChunkBytes, readTimeoutMs)
        } catch (err) {
            if (this.deps.transport.isOpen) this.publishError('read', err, true)
            else this.portLost(err)
            throw err
        }
        return this.ingest(bytes)
    }

    /* ---------------------------------------------------------------------- */
    /*  Connect / disconnect internals                                        */
    /* ---------------------------------------------------------------------- */

    private async runConnect(): Promise<void> {
        let stage: 'connecting' | 'initializing' = 'connecting'
        this.setPhase('connecting')

        this.snapshot = {}
        this.stats = freshStats()
        this.scanner.reset()

        try {
            await this.deps.transport.open()

            if (this.config.flushOnConnect) await this.flushInput()

            stage = 'initializing'
            this.setPhase('initializing')
            await this.initialize()

            if (this.config.readerMode === 'loop') this.startReader()
            this.setPhase('streaming')

            this.publish({
                kind: 'psu-connected',
                at: Date.now(),
                baudRate: this.config.transport.baudRate,
            })
        } catch (err) {
            this.publishError(stage === 'connecting' ? 'open' : 'initialize', err, true)
            await this.teardown()
            this.publish({ kind: 'psu-disconnected', at: Date.now(), reason: 'connect-failed' })
            throw new ConnectError(stage, err)
        }
    }

    /** Fixed order; replies arrive asynchronously through the reader. */
    private async initialize(): Promise<void> {
        await this.send(CMD_SESSION, CONTROL_FIELD, [1])
        await this.send(CMD_BAUD, CONTROL_FIELD, [baudIndex(this.config.transport.baudRate)])
        await this.send(CMD_GET, MODEL_NAME, [0])
        await this.send(CMD_GET, HARDWARE_VERSION, [0])
        await this.send(CMD_GET, FIRMWARE_VERSION, [0])
        await this.send(CMD_GET, ALL, [0])
    }

    /** Nudge the device with one byte and discard whatever is buffered. */
    private async flushInput(): Promise<void> {
        await this.enqueueWrite(Uint8Array.of(0), null)
        const { readChunkBytes, readTimeoutMs } = this.config.timing
        await this.deps.transport.read(readChunkBytes, readTimeoutMs)
    }

    private async runDisconnect(): Promise<void> {
        if (this.connecting) {
            // A failed connect has already rolled back and rejected its own caller.
            await this.connecting.catch(() => undefined)
        }
        if (this.phase === 'disconnected') return

        this.setPhase('disconnecting')

        try {
            await this.send(CMD_SESSION, CONTROL_FIELD, [0])
        } catch (err) {
            this.publishError('write', err, false)
        }

        await this.teardown()
        this.publish({ kind: 'psu-disconnected', at: Date.now(), reason: 'explicit-close' })
    }

    /** The port went away underneath a streaming session. */
    private portLost(cause: unknown): void {
        if (this.disconnecting || this.phase !== 'streaming') return

        this.disconnecting = this.runPortLost(cause).finally(() => {
            this.disconnecting = null
        })
    }

    private async runPortLost(cause: unknown): Promise<void> {
        this.publishError('read', cause, false)
        this.setPhase('disconnecting')
        await this.teardown()
        this.publish({ kind: 'psu-disconnected', at: Date.now(), reason: 'port-lost' })
    }

    /** Stop reading, let queued writes settle, close, forget the session. */
    private async teardown(): Promise<void> {
        await this.stopReader()
        await this.writeChain

        try {
            await this.deps.transport.close()
        } catch (err) {
            this.publishError('close', err, false)
        }

        this.snapshot = {}
        this.scanner.reset()

        const closed = new TransportError('close', 'session disconnected')
        for (const waiter of this.waiters) waiter.fail(closed)
        this.waiters.clear()

        this.setPhase('disconnected')
    }

    /* ---------------------------------------------------------------------- */
    /*  Write queue                                                           */
    /* ---------------------------------------------------------------------- */

    private requireStreaming(): void {
        if (this.phase !== 'streaming') {
            throw new TransportError('write', `session is ${this.phase}`)
        }
    }

    private send(command: number, fieldId: number, payload: ArrayLike<number>): Promise<void> {
        const frame = encodePacket(HEADER_OUTPUT, command, fieldId, payload)
        return this.enqueueWrite(frame, { command, fieldId })
    }

    /**
     * Resolves after the write and its settle delay. A failed write rejects
     * only its own caller; the queue moves on.
     */
    private enqueueWrite(
        bytes: Uint8Array,
        meta: { command: number; fieldId: number } | null
    ): Promise<void> {
        const run = async (): Promise<void> => {
            await this.writeWithRetry(bytes)
            this.stats.writes += 1
            if (meta) {
                this.publish({
                    kind: 'psu-command-sent',
                    at: Date.now(),
                    command: meta.command,
                    fieldId: meta.fieldId,
                    bytes: bytes.length,
                })
            }
            await sleep(this.config.timing.settleDelayMs)
        }

        const result = this.writeChain.then(run)
        this.writeChain = result.catch(() => undefined)
        return result
    }

    private async writeWithRetry(bytes: Uint8Array): Promise<void> {
        const { writeRetries, writeRetryDelayMs } = this.config.timing

        let lastErr: unknown = null
        for (let attempt = 0; attempt <= writeRetries; attempt++) {
            if (attempt > 0) await sleep(writeRetryDelayMs)
            try {
                await this.deps.transport.write(bytes)
                return
            } catch (err) {
                lastErr = err
            }
        }

        this.publishError('write', lastErr, true)
        if (lastErr instanceof TransportError) throw lastErr
        throw new TransportError('write', errorMessage(lastErr), { cause: lastErr })
    }

    /* ---------------------------------------------------------------------- */
    /*  Reader                                                                */
    /* ---------------------------------------------------------------------- */

    private startReader(): void {
        this.readerRunning = true
        this.readerDone = this.readLoop()
    }

    /** The in-flight read finishes within the read timeout. */
    private async stopReader(): Promise<void> {
        this.readerRunning = false
        const done = this.readerDone
        this.readerDone = null
        if (done) await done
    }

    private async readLoop(): Promise<void> {
        const { readIntervalMs, readChunkBytes, readTimeoutMs } = this.config.timing

        while (this.readerRunning) {
            await sleep(readIntervalMs)
            if (!this.readerRunning) break

            let bytes: Uint8Array
            try {
                bytes = await this.deps.transport.read(readChunkBytes, readTimeoutMs)
            } catch (err) {
                if (!this.readerRunning) break
                if (!this.deps.transport.isOpen) {
                    // Detach first: teardown must not wait on this loop.
                    this.readerRunning = false
                    this.readerDone = null
                    this.portLost(err)
                    break
                }
                this.publishError('read', err, true)
                continue
            }

            if (this.readerRunning) this.ingest(bytes)
        }
    }

    private ingest(bytes: Uint8Array): SnapshotUpdate[] {
        if (bytes.length === 0) return []
        this.stats.bytesReceived += bytes.length

        const { packets, dropped } = this.scanner.push(bytes)
        if (dropped > 0) {
            this.stats.framesDropped += dropped
            this.publish({ kind: 'psu-frame-dropped', at: Date.now(), count: dropped })
        }

        const delivered: SnapshotUpdate[] = []
        for (const packet of packets) {
            const update = this.handlePacket(packet)
            if (update) delivered.push(update)
        }
        return delivered
    }

    private handlePacket(packet: Packet): SnapshotUpdate | null {
        const now = Date.now()
        this.stats.framesDecoded += 1
        this.stats.lastFrameAt = now

        const { updates, errors } = decodeField(packet.fieldId, packet.payload)

        for (const err of errors) {
            this.stats.decodeErrors += 1
            this.stats.lastErrorAt = now
            this.publish({
                kind: 'psu-decode-error',
                at: now,
                fieldId: err.fieldId,
                key: err.key,
                message: err.message,
            })
        }

        if (Object.keys(updates).length === 0) return null

        this.snapshot = { ...this.snapshot, ...updates }
        this.publish({ kind: 'psu-snapshot-updated', at: now, fieldId: packet.fieldId, update: updates })

        if (this.deps.onUpdate) {
            try {
                this.deps.onUpdate(updates)
            } catch (err) {
                this.publishError('unknown', err, true)
            }
        }

        for (const waiter of this.waiters) {
            if (waiter.deliver(updates)) this.waiters.delete(waiter)
        }

        return updates
    }

    /* ---------------------------------------------------------------------- */
    /*  Events                                                                */
    /* ---------------------------------------------------------------------- */

    private setPhase(next: PowerSupplyPhase): void {
        const from = this.phase
        if (from === next) return
        this.phase = next
        this.publish({ kind: 'psu-phase-changed', at: Date.now(), from, to: next })
    }

    private publishError(scope: PowerSupplyErrorInfo['scope'], err: unknown, retryable: boolean): void {
        const at = Date.now()
        this.stats.lastErrorAt = at
        this.publish({
            kind: 'recoverable-error',
            at,
            error: { at, scope, message: errorMessage(err), retryable },
        })
    }

    private publish(evt: PowerSupplyEvent): void {
        this.deps.events.publish(evt)
    }
}
