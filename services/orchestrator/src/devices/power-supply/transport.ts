// services/orchestrator/src/devices/power-supply/transport.ts

import { SerialPort } from 'serialport'

import { USB_PRODUCT_ID, USB_VENDOR_ID } from './constants.js'
import { TransportError } from './errors.js'
import type { PowerSupplyTransportConfig } from './types.js'

/* -------------------------------------------------------------------------- */
/*  Contract                                                                  */
/* -------------------------------------------------------------------------- */

/**
 * Byte-stream link to the supply. The session only ever talks to this.
 */
export interface DeviceTransport {
    readonly isOpen: boolean
    open(): Promise<void>
    /** Rejects with TransportError. */
    write(bytes: Uint8Array): Promise<void>
    /** Up to `maxBytes` buffered bytes; empty when nothing arrived within `timeoutMs`. */
    read(maxBytes: number, timeoutMs: number): Promise<Uint8Array>
    close(): Promise<void>
}

/* -------------------------------------------------------------------------- */
/*  serialport adapter                                                        */
/* -------------------------------------------------------------------------- */

type ErrorCallback = (err: Error | null) => void

/** The slice of a serialport stream the adapter uses (real port or SerialPortMock). */
export interface SerialPortLike {
    readonly isOpen: boolean
    open(callback?: ErrorCallback): void
    write(data: Buffer): boolean
    drain(callback?: ErrorCallback): void
    close(callback?: ErrorCallback): void
    on(event: 'data', listener: (chunk: Buffer) => void): unknown
    on(event: 'error', listener: (err: Error) => void): unknown
    on(event: 'close', listener: () => void): unknown
    removeAllListeners(): unknown
}

export interface SerialPortFactoryOptions {
    path: string
    baudRate: number
    rtscts: boolean
}

export type SerialPortFactory = (opts: SerialPortFactoryOptions) => SerialPortLike

export interface SerialPortInfoLike {
    path: string
    manufacturer?: string
    vendorId?: string
    productId?: string
}

export type PortLister = () => Promise<SerialPortInfoLike[]>

const defaultFactory: SerialPortFactory = ({ path, baudRate, rtscts }) =>
    new SerialPort({
        path,
        baudRate,
        rtscts,
        autoOpen: false,
        dataBits: 8,
        parity: 'none',
        stopBits: 1,
    })

const defaultLister: PortLister = () => SerialPort.list()

export interface SerialPortTransportOptions {
    createPort?: SerialPortFactory
    listPorts?: PortLister
}

/**
 * DeviceTransport over the `serialport` package.
 *
 * Incoming `data` events are queued; `read` drains the queue or waits for the
 * next chunk. A port error is surfaced on the next read.
 */
export class SerialPortTransport implements DeviceTransport {
    private readonly config: PowerSupplyTransportConfig
    private readonly createPort: SerialPortFactory
    private readonly listPorts: PortLister

    private port: SerialPortLike | null = null
    private resolvedPath: string | null = null

    private rx: Buffer[] = []
    private rxBytes = 0
    private pendingError: Error | null = null
    private wake: (() => void) | null = null

    constructor(config: PowerSupplyTransportConfig, opts: SerialPortTransportOptions = {}) {
        this.config = config
        this.createPort = opts.createPort ?? defaultFactory
        this.listPorts = opts.listPorts ?? defaultLister
    }

    public get isOpen(): boolean {
        return this.port?.isOpen ?? false
    }

    /** Path actually opened (configured, or discovered by USB id). */
    public get path(): string | null {
        return this.resolvedPath
    }

    public async open(): Promise<void> {
        if (this.port?.isOpen) return

        const path = this.config.path ?? (await findPowerSupplyPort(this.listPorts))
        if (!path) {
            throw new TransportError(
                'open',
                `no port configured and none matches USB ${USB_VENDOR_ID}:${USB_PRODUCT_ID}`
            )
        }

        const port = this.createPort({
            path,
            baudRate: this.config.baudRate,
            rtscts: this.config.rtscts,
        })

        await new Promise<void>((resolve, reject) => {
            port.open(err => {
                if (err) reject(new TransportError('open', `${path}: ${err.message}`, { cause: err }))
                else resolve()
            })
        })

        this.rx = []
        this.rxBytes = 0
        this.pendingError = null

        port.on('data', (chunk: Buffer) => {
            this.rx.push(chunk)
            this.rxBytes += chunk.length
            this.notify()
        })
        port.on('error', (err: Error) => {
            this.pendingError = err
            this.notify()
        })
        port.on('close', () => {
            this.notify()
        })

        this.port = port
        this.resolvedPath = path
    }

    public async write(bytes: Uint8Array): Promise<void> {
        const port = this.port
        if (!port || !port.isOpen) {
            throw new TransportError('write', 'port is not open')
        }

        // Write failures surface as an 'error' event before drain completes.
        port.write(Buffer.from(bytes))
        await new Promise<void>((resolve, reject) => {
            port.drain(err => {
                const failure = err ?? this.pendingError
                this.pendingError = null
                if (failure) reject(new TransportError('write', failure.message, { cause: failure }))
                else resolve()
            })
        })
    }

    public async read(maxBytes: number, timeoutMs: number): Promise<Uint8Array> {
        this.throwIfFailed()

        if (this.rxBytes === 0 && timeoutMs > 0) {
            await new Promise<void>(resolve => {
                const timer = setTimeout(() => {
                    this.wake = null
                    resolve()
                }, timeoutMs)
                this.wake = () => {
                    clearTimeout(timer)
                    this.wake = null
                    resolve()
                }
            })
            this.throwIfFailed()
        }

        return this.take(maxBytes)
    }

    public async close(): Promise<void> {
        const port = this.port
        this.port = null
        this.rx = []
        this.rxBytes = 0
        this.notify()

        if (!port) return
        port.removeAllListeners()
        if (!port.isOpen) return

        await new Promise<void>((resolve, reject) => {
            port.close(err => {
                if (err) reject(new TransportError('close', err.message, { cause: err }))
                else resolve()
            })
        })
    }

    /* ---------------------------------------------------------------------- */
    /*  Internals                                                             */
    /* ---------------------------------------------------------------------- */

    private notify(): void {
        this.wake?.()
    }

    private throwIfFailed(): void {
        const err = this.pendingError
        if (err) {
            this.pendingError = null
            throw new TransportError('read', err.message, { cause: err })
        }
        if (!this.port || !this.port.isOpen) {
            throw new TransportError('read', 'port is not open')
        }
    }

    private take(maxBytes: number): Uint8Array {
        if (this.rxBytes === 0 || maxBytes <= 0) return new Uint8Array(0)

        const all = Buffer.concat(this.rx, this.rxBytes)
        const out = all.subarray(0, Math.min(maxBytes, all.length))
        const rest = all.subarray(out.length)

        this.rx = rest.length > 0 ? [rest] : []
        this.rxBytes = rest.length
        return new Uint8Array(out)
    }
}

/* -------------------------------------------------------------------------- */
/*  Port discovery                                                            */
/* -------------------------------------------------------------------------- */

export interface SerialPortListing {
    path: string
    /** Path, plus description when the OS reports one. */
    title: string
    description: string
    vendorId: string | null
    productId: string | null
}

export async function listSerialPorts(list: PortLister = defaultLister): Promise<SerialPortListing[]> {
    let ports: SerialPortInfoLike[]
    try {
        ports = await list()
    } catch (err) {
        const msg = err instanceof Error ? err.message : String(err)
        throw new TransportError('list', msg, { cause: err })
    }

    return ports.map(p => {
        const description = p.manufacturer?.trim() ?? ''
        return {
            path: p.path,
            title: description ? `${p.path} - ${description}` : p.path,
            description,
            vendorId: p.vendorId?.toLowerCase() ?? null,
            productId: p.productId?.toLowerCase() ?? null,
        }
    })
}

/** First port carrying the supply's AT32 CDC USB identity, or null. */
export async function findPowerSupplyPort(list: PortLister = defaultLister): Promise<string | null> {
    const ports = await listSerialPorts(list)
    const match = ports.find(p => p.vendorId === USB_VENDOR_ID && p.productId === USB_PRODUCT_ID)
    return match?.path ?? null
}
