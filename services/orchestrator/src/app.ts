import Fastify, {
    type FastifyInstance,
    type FastifyServerOptions,
    type FastifyRequest,
    type FastifyReply
} from 'fastify'

import {
    createLogger,
    makeClientBuffer,
    LogChannel,
    type ClientLogBuffer,
} from '@psu-link/logging'

import { AppStateStore } from './core/state.js'
import powerSupplyPlugin, { type PowerSupplyPluginOptions } from './plugins/powerSupply.js'

declare module 'fastify' {
    interface FastifyInstance {
        clientBuf: ClientLogBuffer
        appState: AppStateStore
    }
}

export interface BuildAppOptions {
    fastify?: FastifyServerOptions
    powerSupply?: PowerSupplyPluginOptions
    clientBuf?: ClientLogBuffer
    env?: NodeJS.ProcessEnv
}

export function buildApp(opts: BuildAppOptions = {}): FastifyInstance {
    const env = opts.env ?? process.env

    // ---- Request logging config (env) ----
    const REQUEST_VERBOSE = String(env.REQUEST_VERBOSE ?? 'false').toLowerCase() === 'true'
    const REQUEST_SAMPLE = Math.max(1, Number(env.REQUEST_SAMPLE ?? '1') || 1)
    // --------------------------------------

    const clientBuf = opts.clientBuf ?? makeClientBuffer()
    const { channel } = createLogger('orchestrator', clientBuf)
    const logApp = channel(LogChannel.app)
    const logReq = channel(LogChannel.request)

    const startedAt = new Map<string, number>()
    let reqCounter = 0

    const app = Fastify({ logger: false, ...opts.fastify })
    app.decorate('clientBuf', clientBuf)
    app.decorate('appState', new AppStateStore())

    void app.register(powerSupplyPlugin, { env, ...opts.powerSupply })

    // ---------- Request/Response logging hooks ----------
    app.addHook('onRequest', async (req: FastifyRequest) => {
        const shouldLog = ++reqCounter % REQUEST_SAMPLE === 0
        if (!shouldLog) return

        startedAt.set(req.id, Date.now())
        logReq.info(`${req.method} ${req.url}`)

        if (REQUEST_VERBOSE) {
            logReq.debug('request detail', { id: req.id, ip: req.ip })
        }
    })

    app.addHook('onResponse', async (req: FastifyRequest, reply: FastifyReply) => {
        const start = startedAt.get(req.id)
        if (start === undefined) return
        startedAt.delete(req.id)

        logReq.info(`${req.method} ${req.url} → ${reply.statusCode} (${Date.now() - start} ms)`)
    })
    // ---------------------------------------------------

    // Health / ready
    app.get('/health', async () => ({ status: 'ok' }))

    app.get('/ready', async () => {
        const phase = app.powerSupply.getPhase()
        return {
            ready: phase === 'streaming',
            phase,
            stats: app.powerSupply.getStats(),
        }
    })

    logApp.info('orchestrator app built')
    return app
}
