import { ValidationError } from '../src/devices/power-supply/errors'
import {
    baudIndex,
    buildPowerSupplyConfigFromEnv,
    errorMessage,
    isBaudRate,
} from '../src/devices/power-supply/utils'

describe('buildPowerSupplyConfigFromEnv', () => {
    test('defaults', () => {
        expect(buildPowerSupplyConfigFromEnv({})).toEqual({
            kind: 'fnirsi.dps150',
            autoConnect: true,
            readerMode: 'loop',
            flushOnConnect: false,
            updateChannelCapacity: 256,
            transport: { path: null, baudRate: 115200, rtscts: true },
            timing: {
                settleDelayMs: 50,
                readIntervalMs: 10,
                readTimeoutMs: 100,
                readChunkBytes: 512,
                writeRetries: 2,
                writeRetryDelayMs: 100,
            },
        })
    })

    test('reads overrides', () => {
        const cfg = buildPowerSupplyConfigFromEnv({
            PSU_PORT_PATH: ' /dev/ttyACM0 ',
            PSU_BAUD: '9600',
            PSU_RTSCTS: 'off',
            PSU_AUTO_CONNECT: 'no',
            PSU_READER_MODE: 'POLL',
            PSU_FLUSH_ON_CONNECT: '1',
            PSU_SETTLE_DELAY_MS: '20',
            PSU_WRITE_RETRIES: '5',
        })

        expect(cfg.transport).toEqual({ path: '/dev/ttyACM0', baudRate: 9600, rtscts: false })
        expect(cfg.autoConnect).toBe(false)
        expect(cfg.readerMode).toBe('poll')
        expect(cfg.flushOnConnect).toBe(true)
        expect(cfg.timing.settleDelayMs).toBe(20)
        expect(cfg.timing.writeRetries).toBe(5)
    })

    test('unsupported baud falls back to 115200', () => {
        expect(buildPowerSupplyConfigFromEnv({ PSU_BAUD: '12345' }).transport.baudRate).toBe(115200)
        expect(buildPowerSupplyConfigFromEnv({ PSU_BAUD: 'fast' }).transport.baudRate).toBe(115200)
    })

    test('clamps numeric settings', () => {
        const cfg = buildPowerSupplyConfigFromEnv({
            PSU_SETTLE_DELAY_MS: '-5',
            PSU_READ_INTERVAL_MS: '99999',
            PSU_READ_CHUNK_BYTES: '0',
            PSU_UPDATE_CHANNEL_CAPACITY: '0',
        })

        expect(cfg.timing.settleDelayMs).toBe(0)
        expect(cfg.timing.readIntervalMs).toBe(1000)
        expect(cfg.timing.readChunkBytes).toBe(1)
        expect(cfg.updateChannelCapacity).toBe(1)
    })

    test('blank path means discover; unknown booleans keep the default', () => {
        const cfg = buildPowerSupplyConfigFromEnv({ PSU_PORT_PATH: '   ', PSU_RTSCTS: 'maybe' })
        expect(cfg.transport.path).toBeNull()
        expect(cfg.transport.rtscts).toBe(true)
    })
})

describe('baud helpers', () => {
    test('baudIndex is 1-based', () => {
        expect(baudIndex(9600)).toBe(1)
        expect(baudIndex(19200)).toBe(2)
        expect(baudIndex(38400)).toBe(3)
        expect(baudIndex(57600)).toBe(4)
        expect(baudIndex(115200)).toBe(5)
    })

    test('baudIndex rejects unsupported rates', () => {
        expect(() => baudIndex(4800)).toThrow(ValidationError)
    })

    test('isBaudRate', () => {
        expect(isBaudRate(57600)).toBe(true)
        expect(isBaudRate(57601)).toBe(false)
    })

    test('errorMessage', () => {
        expect(errorMessage(new Error('boom'))).toBe('boom')
        expect(errorMessage(42)).toBe('42')
    })
})
