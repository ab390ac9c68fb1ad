// services/orchestrator/src/devices/power-supply/fields.ts

import * as F from './constants.js'
import { DecodeError, ValidationError } from './errors.js'
import type {
    DeviceValues,
    FloatKey,
    GroupNumber,
    ProtectionKind,
    SnapshotUpdate,
} from './types.js'

/* -------------------------------------------------------------------------- */
/*  Field shapes                                                              */
/* -------------------------------------------------------------------------- */

type FlagKey = 'meteringClosed' | 'outputClosed'
type ByteKey = 'brightness' | 'volume'
type AsciiKey = 'modelName' | 'hardwareVersion' | 'firmwareVersion'

/** Shapes that occupy a fixed number of bytes, usable inside the bulk layout. */
type FixedShape =
    | { kind: 'float'; key: FloatKey }
    | { kind: 'byte'; key: ByteKey }
    /** Boolean that is true when the byte equals `closedWhen`. */
    | { kind: 'flag'; key: FlagKey; closedWhen: number }
    | { kind: 'protection'; key: 'protectionState' }
    | { kind: 'mode'; key: 'mode' }

export type FieldShape =
    | FixedShape
    /** Consecutive floats starting at offset 0. */
    | { kind: 'floats'; keys: readonly FloatKey[] }
    /** Whole payload as ASCII. */
    | { kind: 'ascii'; key: AsciiKey }
    | { kind: 'bulk' }

export interface FieldSpec {
    id: number
    name: string
    shape: FieldShape
    /** Accepted as a SET target, and with which payload. */
    set?: 'float' | 'byte'
}

export interface FieldDecodeResult {
    updates: SnapshotUpdate
    errors: DecodeError[]
}

const float = (key: FloatKey): FixedShape => ({ kind: 'float', key })

const SPECS: FieldSpec[] = [
    { id: F.INPUT_VOLTAGE, name: 'INPUT_VOLTAGE', shape: float('inputVoltage') },
    { id: F.VOLTAGE_SET, name: 'VOLTAGE_SET', shape: float('setVoltage'), set: 'float' },
    { id: F.CURRENT_SET, name: 'CURRENT_SET', shape: float('setCurrent'), set: 'float' },
    {
        id: F.OUTPUT_VIP,
        name: 'OUTPUT_VIP',
        shape: { kind: 'floats', keys: ['outputVoltage', 'outputCurrent', 'outputPower'] },
    },
    { id: F.TEMPERATURE, name: 'TEMPERATURE', shape: float('temperature') },

    { id: F.GROUP1_VOLTAGE_SET, name: 'GROUP1_VOLTAGE_SET', shape: float('group1SetVoltage'), set: 'float' },
    { id: F.GROUP1_CURRENT_SET, name: 'GROUP1_CURRENT_SET', shape: float('group1SetCurrent'), set: 'float' },
    { id: F.GROUP2_VOLTAGE_SET, name: 'GROUP2_VOLTAGE_SET', shape: float('group2SetVoltage'), set: 'float' },
    { id: F.GROUP2_CURRENT_SET, name: 'GROUP2_CURRENT_SET', shape: float('group2SetCurrent'), set: 'float' },
    { id: F.GROUP3_VOLTAGE_SET, name: 'GROUP3_VOLTAGE_SET', shape: float('group3SetVoltage'), set: 'float' },
    { id: F.GROUP3_CURRENT_SET, name: 'GROUP3_CURRENT_SET', shape: float('group3SetCurrent'), set: 'float' },
    { id: F.GROUP4_VOLTAGE_SET, name: 'GROUP4_VOLTAGE_SET', shape: float('group4SetVoltage'), set: 'float' },
    { id: F.GROUP4_CURRENT_SET, name: 'GROUP4_CURRENT_SET', shape: float('group4SetCurrent'), set: 'float' },
    { id: F.GROUP5_VOLTAGE_SET, name: 'GROUP5_VOLTAGE_SET', shape: float('group5SetVoltage'), set: 'float' },
    { id: F.GROUP5_CURRENT_SET, name: 'GROUP5_CURRENT_SET', shape: float('group5SetCurrent'), set: 'float' },
    { id: F.GROUP6_VOLTAGE_SET, name: 'GROUP6_VOLTAGE_SET', shape: float('group6SetVoltage'), set: 'float' },
    { id: F.GROUP6_CURRENT_SET, name: 'GROUP6_CURRENT_SET', shape: float('group6SetCurrent'), set: 'float' },

    { id: F.OVP, name: 'OVP', shape: float('overVoltageProtection'), set: 'float' },
    { id: F.OCP, name: 'OCP', shape: float('overCurrentProtection'), set: 'float' },
    { id: F.OPP, name: 'OPP', shape: float('overPowerProtection'), set: 'float' },
    { id: F.OTP, name: 'OTP', shape: float('overTemperatureProtection'), set: 'float' },
    { id: F.LVP, name: 'LVP', shape: float('lowVoltageProtection'), set: 'float' },

    { id: F.BRIGHTNESS, name: 'BRIGHTNESS', shape: { kind: 'byte', key: 'brightness' }, set: 'byte' },
    { id: F.VOLUME, name: 'VOLUME', shape: { kind: 'byte', key: 'volume' }, set: 'byte' },

    {
        id: F.METERING_ENABLE,
        name: 'METERING_ENABLE',
        shape: { kind: 'flag', key: 'meteringClosed', closedWhen: 0 },
        set: 'byte',
    },
    { id: F.OUTPUT_CAPACITY, name: 'OUTPUT_CAPACITY', shape: float('outputCapacity') },
    { id: F.OUTPUT_ENERGY, name: 'OUTPUT_ENERGY', shape: float('outputEnergy') },
    {
        id: F.OUTPUT_ENABLE,
        name: 'OUTPUT_ENABLE',
        shape: { kind: 'flag', key: 'outputClosed', closedWhen: 1 },
        set: 'byte',
    },
    { id: F.PROTECTION_STATE, name: 'PROTECTION_STATE', shape: { kind: 'protection', key: 'protectionState' } },
    { id: F.MODE, name: 'MODE', shape: { kind: 'mode', key: 'mode' } },

    { id: F.MODEL_NAME, name: 'MODEL_NAME', shape: { kind: 'ascii', key: 'modelName' } },
    { id: F.HARDWARE_VERSION, name: 'HARDWARE_VERSION', shape: { kind: 'ascii', key: 'hardwareVersion' } },
    { id: F.FIRMWARE_VERSION, name: 'FIRMWARE_VERSION', shape: { kind: 'ascii', key: 'firmwareVersion' } },

    { id: F.UPPER_LIMIT_VOLTAGE, name: 'UPPER_LIMIT_VOLTAGE', shape: float('upperLimitVoltage') },
    { id: F.UPPER_LIMIT_CURRENT, name: 'UPPER_LIMIT_CURRENT', shape: float('upperLimitCurrent') },

    { id: F.ALL, name: 'ALL', shape: { kind: 'bulk' } },
]

const REGISTRY: ReadonlyMap<number, FieldSpec> = new Map(SPECS.map(s => [s.id, s]))

/**
 * Byte offsets inside the 119-byte ALL payload. Offset 110 is unused.
 */
const BULK_LAYOUT: ReadonlyArray<{ offset: number; shape: FixedShape }> = [
    { offset: 0, shape: float('inputVoltage') },
    { offset: 4, shape: float('setVoltage') },
    { offset: 8, shape: float('setCurrent') },
    { offset: 12, shape: float('outputVoltage') },
    { offset: 16, shape: float('outputCurrent') },
    { offset: 20, shape: float('outputPower') },
    { offset: 24, shape: float('temperature') },

    { offset: 28, shape: float('group1SetVoltage') },
    { offset: 32, shape: float('group1SetCurrent') },
    { offset: 36, shape: float('group2SetVoltage') },
    { offset: 40, shape: float('group2SetCurrent') },
    { offset: 44, shape: float('group3SetVoltage') },
    { offset: 48, shape: float('group3SetCurrent') },
    { offset: 52, shape: float('group4SetVoltage') },
    { offset: 56, shape: float('group4SetCurrent') },
    { offset: 60, shape: float('group5SetVoltage') },
    { offset: 64, shape: float('group5SetCurrent') },
    { offset: 68, shape: float('group6SetVoltage') },
    { offset: 72, shape: float('group6SetCurrent') },

    { offset: 76, shape: float('overVoltageProtection') },
    { offset: 80, shape: float('overCurrentProtection') },
    { offset: 84, shape: float('overPowerProtection') },
    { offset: 88, shape: float('overTemperatureProtection') },
    { offset: 92, shape: float('lowVoltageProtection') },

    { offset: 96, shape: { kind: 'byte', key: 'brightness' } },
    { offset: 97, shape: { kind: 'byte', key: 'volume' } },
    { offset: 98, shape: { kind: 'flag', key: 'meteringClosed', closedWhen: 0 } },

    { offset: 99, shape: float('outputCapacity') },
    { offset: 103, shape: float('outputEnergy') },

    { offset: 107, shape: { kind: 'flag', key: 'outputClosed', closedWhen: 1 } },
    { offset: 108, shape: { kind: 'protection', key: 'protectionState' } },
    { offset: 109, shape: { kind: 'mode', key: 'mode' } },

    { offset: 111, shape: float('upperLimitVoltage') },
    { offset: 115, shape: float('upperLimitCurrent') },
]

/** Every key the bulk field carries, in payload order. */
export const BULK_KEYS: ReadonlyArray<keyof DeviceValues> = BULK_LAYOUT.map(e => e.shape.key)

/* -------------------------------------------------------------------------- */
/*  Lookups                                                                   */
/* -------------------------------------------------------------------------- */

export function fieldSpec(fieldId: number): FieldSpec | undefined {
    return REGISTRY.get(fieldId)
}

export function fieldName(fieldId: number): string {
    return REGISTRY.get(fieldId)?.name ?? `UNKNOWN(${fieldId})`
}

const GROUP_FIELDS: Record<GroupNumber, { voltage: number; current: number }> = {
    1: { voltage: F.GROUP1_VOLTAGE_SET, current: F.GROUP1_CURRENT_SET },
    2: { voltage: F.GROUP2_VOLTAGE_SET, current: F.GROUP2_CURRENT_SET },
    3: { voltage: F.GROUP3_VOLTAGE_SET, current: F.GROUP3_CURRENT_SET },
    4: { voltage: F.GROUP4_VOLTAGE_SET, current: F.GROUP4_CURRENT_SET },
    5: { voltage: F.GROUP5_VOLTAGE_SET, current: F.GROUP5_CURRENT_SET },
    6: { voltage: F.GROUP6_VOLTAGE_SET, current: F.GROUP6_CURRENT_SET },
}

export function isGroupNumber(n: number): n is GroupNumber {
    return Number.isInteger(n) && n >= 1 && n <= 6
}

export function groupFieldIds(n: number): { voltage: number; current: number } {
    if (!isGroupNumber(n)) {
        throw new ValidationError('group', n, 'must be an integer in 1-6')
    }
    return GROUP_FIELDS[n]
}

const PROTECTION_FIELDS: Record<ProtectionKind, number> = {
    OVP: F.OVP,
    OCP: F.OCP,
    OPP: F.OPP,
    OTP: F.OTP,
    LVP: F.LVP,
}

export function isProtectionKind(kind: string): kind is ProtectionKind {
    return Object.prototype.hasOwnProperty.call(PROTECTION_FIELDS, kind)
}

export function protectionFieldId(kind: string): number {
    if (!isProtectionKind(kind)) {
        throw new ValidationError('protection', kind, 'must be one of OVP, OCP, OPP, OTP, LVP')
    }
    return PROTECTION_FIELDS[kind]
}

/* -------------------------------------------------------------------------- */
/*  Decode                                                                    */
/* -------------------------------------------------------------------------- */

/**
 * Map one frame's payload to snapshot updates. Never throws: a field that
 * cannot be decoded is reported in `errors` and the rest still decode.
 * Unknown field ids produce nothing.
 */
export function decodeField(fieldId: number, payload: Uint8Array): FieldDecodeResult {
    const result: FieldDecodeResult = { updates: {}, errors: [] }
    const spec = REGISTRY.get(fieldId)
    if (!spec) return result

    const shape = spec.shape
    switch (shape.kind) {
        case 'bulk': {
            for (const { offset, shape: entry } of BULK_LAYOUT) {
                decodeFixed(fieldId, entry, payload, offset, result)
            }
            return result
        }
        case 'floats': {
            shape.keys.forEach((key, i) => {
                decodeFixed(fieldId, float(key), payload, i * 4, result)
            })
            return result
        }
        case 'ascii': {
            decodeAscii(fieldId, shape.key, payload, result)
            return result
        }
        default: {
            decodeFixed(fieldId, shape, payload, 0, result)
            return result
        }
    }
}

function decodeFixed(
    fieldId: number,
    shape: FixedShape,
    payload: Uint8Array,
    offset: number,
    out: FieldDecodeResult
): void {
    const width = shape.kind === 'float' ? 4 : 1
    if (offset + width > payload.length) {
        out.errors.push(new DecodeError(fieldId, shape.key, `payload too short (${payload.length} bytes)`))
        return
    }

    switch (shape.kind) {
        case 'float': {
            const view = new DataView(payload.buffer, payload.byteOffset, payload.byteLength)
            out.updates[shape.key] = view.getFloat32(offset, true)
            return
        }
        case 'byte': {
            out.updates[shape.key] = payload[offset]
            return
        }
        case 'flag': {
            out.updates[shape.key] = payload[offset] === shape.closedWhen
            return
        }
        case 'protection': {
            const index = payload[offset]
            if (index >= F.PROTECTION_STATES.length) {
                out.errors.push(new DecodeError(fieldId, shape.key, `unknown protection state index ${index}`))
                return
            }
            out.updates.protectionState = F.PROTECTION_STATES[index]
            return
        }
        case 'mode': {
            const index = payload[offset]
            if (index >= F.MODES.length) {
                out.errors.push(new DecodeError(fieldId, shape.key, `unknown mode ${index}`))
                return
            }
            out.updates.mode = F.MODES[index]
            return
        }
    }
}

function decodeAscii(fieldId: number, key: AsciiKey, payload: Uint8Array, out: FieldDecodeResult): void {
    for (const byte of payload) {
        if (byte > 0x7f) {
            out.errors.push(new DecodeError(fieldId, key, `non-ASCII byte 0x${byte.toString(16)}`))
            return
        }
    }
    // Firmware pads some strings with NULs.
    out.updates[key] = Buffer.from(payload).toString('ascii').replace(/\0+$/, '')
}
