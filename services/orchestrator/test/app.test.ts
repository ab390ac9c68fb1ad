import type { FastifyInstance } from 'fastify'

import { buildApp } from '../src/app'
import { floatBytes } from '../src/devices/power-supply/codec'
import { INPUT_VOLTAGE } from '../src/devices/power-supply/constants'
import { FakeTransport, inbound, waitFor } from './helpers/fakeTransport'

function setEnv(name: string, value: string | undefined): void {
    if (value === undefined) delete process.env[name]
    else process.env[name] = value
}

type ReadyBody = { ready: boolean; phase: string; stats: { writes: number } }

const ENV: NodeJS.ProcessEnv = {
    PSU_PORT_PATH: '/dev/ttyTEST0',
    PSU_AUTO_CONNECT: 'true',
    PSU_SETTLE_DELAY_MS: '0',
    PSU_READ_INTERVAL_MS: '1',
    PSU_READ_TIMEOUT_MS: '5',
    PSU_WRITE_RETRIES: '0',
}

describe('orchestrator app', () => {
    const saved = { pretty: process.env.PRETTY_LOGS, level: process.env.LOG_LEVEL }
    let app: FastifyInstance | null = null
    let fake: FakeTransport

    beforeAll(() => {
        process.env.PRETTY_LOGS = 'false'
        process.env.LOG_LEVEL = 'silent'
    })

    afterAll(() => {
        setEnv('PRETTY_LOGS', saved.pretty)
        setEnv('LOG_LEVEL', saved.level)
    })

    beforeEach(() => {
        fake = new FakeTransport()
    })

    afterEach(async () => {
        if (app) await app.close()
        app = null
    })

    function build(env: NodeJS.ProcessEnv = ENV): FastifyInstance {
        app = buildApp({ env, powerSupply: { createTransport: () => fake } })
        return app
    }

    test('GET /health', async () => {
        const res = await build().inject({ method: 'GET', url: '/health' })

        expect(res.statusCode).toBe(200)
        expect(res.json()).toEqual({ status: 'ok' })
    })

    test('connects on ready and reports streaming', async () => {
        const server = build()
        await server.ready()

        const res = await server.inject({ method: 'GET', url: '/ready' })
        const body = res.json<ReadyBody>()

        expect(res.statusCode).toBe(200)
        expect(body.ready).toBe(true)
        expect(body.phase).toBe('streaming')
        expect(body.stats.writes).toBe(6)
        expect(server.appState.getSnapshot().powerSupply.phase).toBe('streaming')
    })

    test('a failed connect leaves the host up', async () => {
        fake.openError = new Error('no device')
        const server = build()
        await server.ready()

        const res = await server.inject({ method: 'GET', url: '/ready' })

        expect(res.statusCode).toBe(200)
        expect(res.json<ReadyBody>()).toMatchObject({ ready: false, phase: 'disconnected' })
        expect(server.appState.getSnapshot().powerSupply.lastError?.scope).toBe('open')
    })

    test('auto-connect can be disabled', async () => {
        const server = build({ ...ENV, PSU_AUTO_CONNECT: 'false' })
        await server.ready()

        expect(server.powerSupply.getPhase()).toBe('disconnected')
        expect(fake.writes).toHaveLength(0)
    })

    test('decoded updates reach the channel and the state slice', async () => {
        const server = build()
        await server.ready()

        fake.emit(inbound(INPUT_VOLTAGE, floatBytes(19.5)))

        expect(await server.powerSupplyUpdates.next()).toEqual({ value: { inputVoltage: 19.5 }, done: false })
        expect(server.appState.getSnapshot().powerSupply.device).toEqual({ inputVoltage: 19.5 })
    })

    test('poll mode pumps reads from the host', async () => {
        const server = build({ ...ENV, PSU_READER_MODE: 'poll' })
        await server.ready()

        fake.emit(inbound(INPUT_VOLTAGE, floatBytes(12.25)))

        await waitFor(() => server.appState.getSnapshot().powerSupply.device.inputVoltage !== undefined)
        expect(server.appState.getSnapshot().powerSupply.device.inputVoltage).toBe(12.25)
    })

    test('closing the app disconnects the supply', async () => {
        const server = build()
        await server.ready()
        await server.close()
        app = null

        expect(fake.closeCalls).toBe(1)
        expect(fake.writes[fake.writes.length - 1]).toEqual([0xf1, 0xc1, 0x00, 0x01, 0x00, 0x01])
        expect(server.powerSupplyUpdates.isClosed).toBe(true)
    })
})
