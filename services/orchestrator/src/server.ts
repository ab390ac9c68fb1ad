import fs from 'node:fs'
import path from 'node:path'
import { config as dotenvConfig } from 'dotenv'
import type { FastifyInstance } from 'fastify'
import { buildApp } from './app.js'
import {
    createLogger,
    LogChannel
} from '@psu-link/logging'
import { buildPowerSupplyConfigFromEnv } from './devices/power-supply/utils.js'

/**
 * Load environment variables with a clear precedence:
 *   1) .env
 *   2) .env.{NODE_ENV}
 *   3) .env.local
 * Later files override earlier ones.
 */
(function loadEnv() {
    const cwd = process.cwd()
    const env = String(process.env.NODE_ENV || 'development')
    const files = [
        path.resolve(cwd, '.env'),
        path.resolve(cwd, `.env.${env}`),
        path.resolve(cwd, '.env.local')
    ]

    for (const file of files) {
        if (fs.existsSync(file)) {
            dotenvConfig({ path: file, override: true })
        }
    }
})()

async function start() {
    const { channel } = createLogger('orchestrator')
    const logOrch = channel(LogChannel.orchestrator)

    const PORT = Number(process.env.API_PORT ?? 3000)
    const HOST = process.env.API_HOST ?? '0.0.0.0'

    let app: FastifyInstance | null = null

    try {
        app = buildApp()
        await app.listen({ port: PORT, host: HOST })

        const env = process.env.NODE_ENV ?? 'development'
        logOrch.info(`listening host=${HOST} port=${PORT} env=${env}`)

        // Env-derived supply config, so the runtime values are on record
        const psu = buildPowerSupplyConfigFromEnv(process.env)
        logOrch.info('power supply config (env-derived)', {
            path: psu.transport.path ?? '(discover)',
            baudRate: psu.transport.baudRate,
            rtscts: psu.transport.rtscts,
            readerMode: psu.readerMode,
            settleDelayMs: psu.timing.settleDelayMs,
        })

        // Graceful shutdown
        const shutdown = async (signal: NodeJS.Signals) => {
            if (!app) process.exit(0)
            try {
                logOrch.info(`received ${signal}, shutting down`)
                await app.close()
                logOrch.info('orchestrator closed')
                process.exit(0)
            } catch (err) {
                logOrch.error('error during shutdown', { err: err instanceof Error ? err.message : String(err) })
                process.exit(1)
            }
        }
        process.on('SIGINT', () => void shutdown('SIGINT'))
        process.on('SIGTERM', () => void shutdown('SIGTERM'))
    } catch (err) {
        logOrch.error(`failed to start err="${err instanceof Error ? err.message : String(err)}"`)
        if (app) {
            await app.close().catch((closeErr: unknown) => {
                logOrch.warn('error closing after failed start', {
                    err: closeErr instanceof Error ? closeErr.message : String(closeErr),
                })
            })
        }
        process.exit(1)
    }
}

void start()
