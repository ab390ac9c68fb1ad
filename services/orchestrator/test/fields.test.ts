import { floatBytes } from '../src/devices/power-supply/codec'
import { DecodeError, ValidationError } from '../src/devices/power-supply/errors'
import {
    BULK_KEYS,
    decodeField,
    fieldSpec,
    groupFieldIds,
    protectionFieldId,
} from '../src/devices/power-supply/fields'

function bulkPayload(length = 119): Buffer {
    const buf = Buffer.alloc(length)
    const put = (offset: number, v: number) => {
        if (offset + 4 <= length) buf.writeFloatLE(v, offset)
    }
    put(0, 12.0)      // input voltage
    put(4, 5.0)       // set voltage
    put(8, 1.5)       // set current
    put(12, 5.004)    // output voltage
    put(16, 1.002)    // output current
    put(20, 5.014)    // output power
    put(24, 28.5)     // temperature
    put(28, 3.3)      // group 1 voltage
    put(72, 0.25)     // group 6 current
    put(76, 31.0)     // OVP
    put(92, 4.5)      // LVP
    if (length > 98) {
        buf[96] = 5   // brightness
        buf[97] = 3   // volume
        buf[98] = 0   // metering closed
    }
    put(99, 0.125)    // capacity
    put(103, 0.75)    // energy
    if (length > 109) {
        buf[107] = 1  // output closed
        buf[108] = 6  // REP
        buf[109] = 1  // CV
    }
    put(111, 30.0)
    put(115, 5.1)
    return buf
}

describe('decodeField', () => {
    test('single float field', () => {
        expect(decodeField(192, floatBytes(12))).toEqual({ updates: { inputVoltage: 12 }, errors: [] })
    })

    test('output V/I/P triple', () => {
        const payload = Buffer.concat([floatBytes(5.004), floatBytes(1.002), floatBytes(5.014)])
        const { updates, errors } = decodeField(195, payload)

        expect(errors).toEqual([])
        expect(updates).toEqual({
            outputVoltage: Math.fround(5.004),
            outputCurrent: Math.fround(1.002),
            outputPower: Math.fround(5.014),
        })
    })

    test('switch bytes invert where the device reports "closed"', () => {
        expect(decodeField(216, Uint8Array.of(0)).updates).toEqual({ meteringClosed: true })
        expect(decodeField(216, Uint8Array.of(1)).updates).toEqual({ meteringClosed: false })
        expect(decodeField(219, Uint8Array.of(1)).updates).toEqual({ outputClosed: true })
        expect(decodeField(219, Uint8Array.of(0)).updates).toEqual({ outputClosed: false })
    })

    test('protection state table', () => {
        expect(decodeField(220, Uint8Array.of(0)).updates).toEqual({ protectionState: 'none' })
        expect(decodeField(220, Uint8Array.of(6)).updates).toEqual({ protectionState: 'REP' })

        const { updates, errors } = decodeField(220, Uint8Array.of(7))
        expect(updates).toEqual({})
        expect(errors).toHaveLength(1)
        expect(errors[0]).toBeInstanceOf(DecodeError)
        expect(errors[0].key).toBe('protectionState')
    })

    test('regulation mode', () => {
        expect(decodeField(221, Uint8Array.of(0)).updates).toEqual({ mode: 'CC' })
        expect(decodeField(221, Uint8Array.of(1)).updates).toEqual({ mode: 'CV' })
        expect(decodeField(221, Uint8Array.of(2)).errors[0].key).toBe('mode')
    })

    test('ascii identity strings', () => {
        expect(decodeField(222, Buffer.from('DPS-150', 'ascii')).updates).toEqual({ modelName: 'DPS-150' })
        expect(decodeField(224, Buffer.from('V1.0\0\0', 'latin1')).updates).toEqual({ firmwareVersion: 'V1.0' })

        const bad = decodeField(223, Uint8Array.of(0x56, 0xff))
        expect(bad.updates).toEqual({})
        expect(bad.errors[0].fieldId).toBe(223)
        expect(bad.errors[0].key).toBe('hardwareVersion')
    })

    test('short payload is a decode error, not a throw', () => {
        const { updates, errors } = decodeField(193, Uint8Array.of(1, 2))
        expect(updates).toEqual({})
        expect(errors.map(e => e.key)).toEqual(['setVoltage'])
    })

    test('unknown field ids produce nothing', () => {
        expect(decodeField(225, Uint8Array.of(1, 2, 3, 4))).toEqual({ updates: {}, errors: [] })
    })

    test('bulk frame fills every key', () => {
        const { updates, errors } = decodeField(255, bulkPayload())

        expect(errors).toEqual([])
        expect(Object.keys(updates)).toHaveLength(34)
        expect(Object.keys(updates).sort()).toEqual([...BULK_KEYS].sort())

        expect(updates.inputVoltage).toBe(12)
        expect(updates.outputVoltage).toBe(Math.fround(5.004))
        expect(updates.outputCurrent).toBe(Math.fround(1.002))
        expect(updates.temperature).toBe(28.5)
        expect(updates.group1SetVoltage).toBe(Math.fround(3.3))
        expect(updates.group6SetCurrent).toBe(0.25)
        expect(updates.overVoltageProtection).toBe(31)
        expect(updates.lowVoltageProtection).toBe(4.5)
        expect(updates.brightness).toBe(5)
        expect(updates.volume).toBe(3)
        expect(updates.meteringClosed).toBe(true)
        expect(updates.outputCapacity).toBe(0.125)
        expect(updates.outputEnergy).toBe(0.75)
        expect(updates.outputClosed).toBe(true)
        expect(updates.protectionState).toBe('REP')
        expect(updates.mode).toBe('CV')
        expect(updates.upperLimitVoltage).toBe(30)
        expect(updates.upperLimitCurrent).toBe(Math.fround(5.1))
    })

    test('one bad bulk field does not stop the rest', () => {
        const payload = bulkPayload()
        payload[108] = 9

        const { updates, errors } = decodeField(255, payload)
        expect(errors.map(e => e.key)).toEqual(['protectionState'])
        expect(Object.keys(updates)).toHaveLength(33)
        expect(updates.mode).toBe('CV')
    })

    test('truncated bulk frame decodes the fields it still holds', () => {
        const { updates, errors } = decodeField(255, bulkPayload(100))

        expect(Object.keys(updates)).toHaveLength(27)
        expect(updates.meteringClosed).toBe(true)
        expect(errors.map(e => e.key)).toEqual([
            'outputCapacity',
            'outputEnergy',
            'outputClosed',
            'protectionState',
            'mode',
            'upperLimitVoltage',
            'upperLimitCurrent',
        ])
    })
})

describe('lookups', () => {
    test('set targets', () => {
        expect(fieldSpec(193)?.set).toBe('float')
        expect(fieldSpec(219)?.set).toBe('byte')
        expect(fieldSpec(195)?.set).toBeUndefined()
        expect(fieldSpec(1)).toBeUndefined()
    })

    test('group field ids', () => {
        expect(groupFieldIds(1)).toEqual({ voltage: 197, current: 198 })
        expect(groupFieldIds(6)).toEqual({ voltage: 207, current: 208 })
        expect(() => groupFieldIds(0)).toThrow(ValidationError)
        expect(() => groupFieldIds(7)).toThrow(ValidationError)
        expect(() => groupFieldIds(2.5)).toThrow(ValidationError)
    })

    test('protection field ids', () => {
        expect(protectionFieldId('OVP')).toBe(209)
        expect(protectionFieldId('LVP')).toBe(213)
        expect(() => protectionFieldId('REP')).toThrow(ValidationError)
    })
})
