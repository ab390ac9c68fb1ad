/* -------------------------------------------------------------------------- */
/*  PowerSupplyService                                                        */
/*                                                                            */
/*  Responsibilities:                                                         */
/*  - Own the byte-stream transport for one DPS-150 bench supply              */
/*  - Sequence connect → initialize → stream → disconnect                      */
/*  - Serialize outbound frames with a post-write settle delay                 */
/*  - Frame, checksum and decode inbound telemetry into a merged snapshot      */
/*  - Emit domain events for logging + AppState adapters                       */
/*                                                                            */
/*  Non-responsibilities:                                                     */
/*  - No AppState mutation                                                     */
/*  - No HTTP handling                                                         */
/*  - No thread/context redispatch of updates                                  */
/* -------------------------------------------------------------------------- */

import type { BAUD_RATES, MODES, PROTECTION_STATES } from './constants.js'

/* -------------------------------------------------------------------------- */
/*  Wire model                                                                */
/* -------------------------------------------------------------------------- */

export interface Packet {
    header: number
    command: number
    fieldId: number
    length: number
    payload: Uint8Array
    checksum: number
}

export interface FeedResult {
    packets: Packet[]
    /** Bytes retained for the next call (partial frame, or a lone trailing marker byte). */
    remaining: Uint8Array
    /** Frames consumed but discarded on checksum mismatch. */
    dropped: number
}

export type BaudRate = (typeof BAUD_RATES)[number]

/* -------------------------------------------------------------------------- */
/*  Decoded values                                                            */
/* -------------------------------------------------------------------------- */

export type ProtectionState = (typeof PROTECTION_STATES)[number]
export type Mode = (typeof MODES)[number]

export type ProtectionKind = 'OVP' | 'OCP' | 'OPP' | 'OTP' | 'LVP'
export type GroupNumber = 1 | 2 | 3 | 4 | 5 | 6

export interface DeviceValues {
    inputVoltage: number
    outputVoltage: number
    outputCurrent: number
    outputPower: number
    temperature: number

    setVoltage: number
    setCurrent: number

    group1SetVoltage: number
    group1SetCurrent: number
    group2SetVoltage: number
    group2SetCurrent: number
    group3SetVoltage: number
    group3SetCurrent: number
    group4SetVoltage: number
    group4SetCurrent: number
    group5SetVoltage: number
    group5SetCurrent: number
    group6SetVoltage: number
    group6SetCurrent: number

    overVoltageProtection: number
    overCurrentProtection: number
    overPowerProtection: number
    overTemperatureProtection: number
    lowVoltageProtection: number

    brightness: number
    volume: number
    meteringClosed: boolean

    outputCapacity: number
    outputEnergy: number
    outputClosed: boolean
    protectionState: ProtectionState
    mode: Mode

    modelName: string
    hardwareVersion: string
    firmwareVersion: string

    upperLimitVoltage: number
    upperLimitCurrent: number
}

export type DeviceKey = keyof DeviceValues

/** Keys that carry 32-bit floats on the wire. */
export type FloatKey = {
    [K in DeviceKey]: DeviceValues[K] extends number ? K : never
}[DeviceKey]

/** Only the keys decoded from one frame. */
export type SnapshotUpdate = Partial<DeviceValues>

/** Persistent merge of every update since the session started. */
export type DeviceSnapshot = Partial<DeviceValues>

/** Consumer-supplied handler; invoked with the newly decoded keys, never the whole snapshot. */
export type SnapshotSink = (update: SnapshotUpdate) => void

/* -------------------------------------------------------------------------- */
/*  Session                                                                   */
/* -------------------------------------------------------------------------- */

export type PowerSupplyPhase =
    | 'disconnected'
    | 'connecting'
    | 'initializing'
    | 'streaming'
    | 'disconnecting'

export type ReaderMode = 'loop' | 'poll'

export interface PowerSupplyStats {
    bytesReceived: number
    framesDecoded: number
    framesDropped: number
    decodeErrors: number
    writes: number
    lastFrameAt: number | null
    lastErrorAt: number | null
}

export interface PowerSupplyErrorInfo {
    at: number
    scope: 'open' | 'write' | 'read' | 'close' | 'initialize' | 'decode' | 'unknown'
    message: string
    retryable?: boolean
}

/* -------------------------------------------------------------------------- */
/*  Environment-driven config                                                 */
/* -------------------------------------------------------------------------- */

export interface PowerSupplyTransportConfig {
    /** Serial device path; null means "discover by USB VID/PID". */
    path: string | null
    baudRate: BaudRate
    rtscts: boolean
}

export interface PowerSupplyTimingConfig {
    /** Mandatory pause after each write before the next may begin. */
    settleDelayMs: number
    /** Reader loop sleep between reads. */
    readIntervalMs: number
    /** Upper bound a single read waits for bytes. */
    readTimeoutMs: number
    readChunkBytes: number
    writeRetries: number
    writeRetryDelayMs: number
}

export interface PowerSupplyConfig {
    kind: 'fnirsi.dps150'
    autoConnect: boolean
    readerMode: ReaderMode
    flushOnConnect: boolean
    updateChannelCapacity: number
    transport: PowerSupplyTransportConfig
    timing: PowerSupplyTimingConfig
}

/* -------------------------------------------------------------------------- */
/*  Service -> plugin observability events                                    */
/* -------------------------------------------------------------------------- */

export interface PowerSupplyEventSink {
    publish(evt: PowerSupplyEvent): void
}

export type DisconnectReason = 'explicit-close' | 'connect-failed' | 'port-lost'

export type PowerSupplyEvent =
    | {
        kind: 'psu-phase-changed'
        at: number
        from: PowerSupplyPhase
        to: PowerSupplyPhase
    }
    | {
        kind: 'psu-connected'
        at: number
        baudRate: BaudRate
    }
    | {
        kind: 'psu-disconnected'
        at: number
        reason: DisconnectReason
    }
    | {
        kind: 'psu-command-sent'
        at: number
        command: number
        fieldId: number
        bytes: number
    }
    | {
        kind: 'psu-snapshot-updated'
        at: number
        fieldId: number
        update: SnapshotUpdate
    }
    | {
        kind: 'psu-frame-dropped'
        at: number
        count: number
    }
    | {
        kind: 'psu-decode-error'
        at: number
        fieldId: number
        key: string
        message: string
    }
    | {
        kind: 'recoverable-error'
        at: number
        error: PowerSupplyErrorInfo
    }
