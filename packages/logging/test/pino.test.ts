import { createLogger } from '../src/pino'
import { makeClientBuffer } from '../src/buffer'
import { LogChannel } from '../src/types'

function restore(name: string, value: string | undefined): void {
    if (value === undefined) delete process.env[name]
    else process.env[name] = value
}

describe('createLogger', () => {
    const saved = { pretty: process.env.PRETTY_LOGS, level: process.env.LOG_LEVEL }

    beforeAll(() => {
        process.env.PRETTY_LOGS = 'false'
        process.env.LOG_LEVEL = 'silent'
    })

    afterAll(() => {
        restore('PRETTY_LOGS', saved.pretty)
        restore('LOG_LEVEL', saved.level)
    })

    test('channel loggers fan out to the client buffer with channel metadata', () => {
        const buf = makeClientBuffer(10)
        const { channel } = createLogger('test', buf)
        const log = channel(LogChannel.power_supply)

        log.info('connected')
        log.warn('frame dropped', { fieldId: 195 })

        const latest = buf.getLatest(10)
        expect(latest.map(l => [l.channel, l.level, l.message])).toEqual([
            ['power-supply', 'info', 'connected'],
            ['power-supply', 'warn', 'frame dropped'],
        ])
        expect(latest[0]?.emoji).toBe('🔋')
        expect(latest[0]?.color).toBe('yellow')
    })

    test('works without a client buffer', () => {
        const { base, channel } = createLogger('test')
        expect(() => channel(LogChannel.app).debug('idle')).not.toThrow()
        expect(base.level).toBe('silent')
    })
})
