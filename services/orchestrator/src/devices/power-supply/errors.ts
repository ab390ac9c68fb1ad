// services/orchestrator/src/devices/power-supply/errors.ts

/**
 * Error classes for the power-supply engine.
 *
 * Transport and validation errors are thrown to callers. Decode problems and
 * checksum mismatches never are: they drop one unit of data and are reported
 * through decode results and service events.
 */

export class PowerSupplyError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = 'PowerSupplyError'
    }
}

export type TransportOperation = 'open' | 'write' | 'read' | 'close' | 'list'

/**
 * Open/write/read/close failure, or a command issued without a streaming session.
 */
export class TransportError extends PowerSupplyError {
    public operation: TransportOperation

    constructor(operation: TransportOperation, message: string, options?: { cause?: unknown }) {
        super(`Transport ${operation} failed: ${message}`, options)
        this.name = 'TransportError'
        this.operation = operation
    }
}

/**
 * Caller-supplied argument outside the protocol's range. Raised before any I/O.
 */
export class ValidationError extends PowerSupplyError {
    public field: string
    public value: unknown

    constructor(field: string, value: unknown, message: string) {
        super(`Invalid ${field} (${String(value)}): ${message}`)
        this.name = 'ValidationError'
        this.field = field
        this.value = value
    }
}

/**
 * A frame that cannot be put on the wire (payload too long, non-byte values).
 */
export class EncodingError extends ValidationError {
    constructor(field: string, value: unknown, message: string) {
        super(field, value, message)
        this.name = 'EncodingError'
    }
}

/**
 * One field of an otherwise valid frame could not be decoded.
 */
export class DecodeError extends PowerSupplyError {
    public fieldId: number
    public key: string

    constructor(fieldId: number, key: string, message: string) {
        super(`Field ${fieldId} (${key}): ${message}`)
        this.name = 'DecodeError'
        this.fieldId = fieldId
        this.key = key
    }
}

/**
 * Connect or initialise failed; the session has been rolled back to disconnected.
 */
export class ConnectError extends PowerSupplyError {
    public phase: 'connecting' | 'initializing'

    constructor(phase: 'connecting' | 'initializing', cause: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause)
        super(`Connect failed while ${phase}: ${detail}`, { cause })
        this.name = 'ConnectError'
        this.phase = phase
    }
}

export class SessionTimeoutError extends PowerSupplyError {
    public operation: string
    public timeout: number

    constructor(operation: string, timeout: number) {
        super(`Operation "${operation}" timed out after ${timeout}ms`)
        this.name = 'SessionTimeoutError'
        this.operation = operation
        this.timeout = timeout
    }
}
