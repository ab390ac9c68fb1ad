// services/orchestrator/src/devices/power-supply/utils.ts

import { BAUD_RATES } from './constants.js'
import { ValidationError } from './errors.js'
import type { BaudRate, PowerSupplyConfig, ReaderMode } from './types.js'

/* -------------------------------------------------------------------------- */
/*  Env helpers                                                               */
/* -------------------------------------------------------------------------- */

function envString(env: NodeJS.ProcessEnv, name: string): string | null {
    const v = env[name]
    if (v == null) return null
    const t = v.trim()
    return t.length === 0 ? null : t
}

function envInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const raw = env[name]
    if (raw == null || raw === '') return fallback
    const n = Number.parseInt(raw, 10)
    return Number.isFinite(n) ? n : fallback
}

function envBool(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
    const raw = env[name]
    if (raw == null || raw === '') return fallback
    const v = raw.trim().toLowerCase()
    if (v === '1' || v === 'true' || v === 'yes' || v === 'on') return true
    if (v === '0' || v === 'false' || v === 'no' || v === 'off') return false
    return fallback
}

function clampInt(n: number, min: number, max: number): number {
    if (!Number.isFinite(n)) return min
    return Math.max(min, Math.min(max, Math.trunc(n)))
}

/* -------------------------------------------------------------------------- */
/*  Protocol helpers                                                          */
/* -------------------------------------------------------------------------- */

export function isBaudRate(n: number): n is BaudRate {
    return BAUD_RATES.some(rate => rate === n)
}

/** Byte the device expects after CMD_BAUD: 1-based position in BAUD_RATES. */
export function baudIndex(baudRate: number): number {
    const index = BAUD_RATES.findIndex(rate => rate === baudRate)
    if (index < 0) {
        throw new ValidationError('baudRate', baudRate, `must be one of ${BAUD_RATES.join(', ')}`)
    }
    return index + 1
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, Math.max(0, ms)))
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}

/* -------------------------------------------------------------------------- */
/*  Config builder from environment                                           */
/* -------------------------------------------------------------------------- */

/**
 * Build a PowerSupplyConfig from process.env-style input.
 *
 * Expected env vars (see .env.example):
 *   - PSU_PORT_PATH (unset: discover by USB VID/PID)
 *   - PSU_AUTO_CONNECT, PSU_BAUD, PSU_RTSCTS
 *   - PSU_SETTLE_DELAY_MS, PSU_READ_INTERVAL_MS, PSU_READ_TIMEOUT_MS, PSU_READ_CHUNK_BYTES
 *   - PSU_READER_MODE (loop | poll)
 *   - PSU_WRITE_RETRIES, PSU_WRITE_RETRY_DELAY_MS
 *   - PSU_FLUSH_ON_CONNECT
 *   - PSU_UPDATE_CHANNEL_CAPACITY
 */
export function buildPowerSupplyConfigFromEnv(env: NodeJS.ProcessEnv): PowerSupplyConfig {
    const baudRaw = envInt(env, 'PSU_BAUD', 115200)
    const baudRate: BaudRate = isBaudRate(baudRaw) ? baudRaw : 115200

    const readerMode: ReaderMode = envString(env, 'PSU_READER_MODE')?.toLowerCase() === 'poll' ? 'poll' : 'loop'

    return {
        kind: 'fnirsi.dps150',
        autoConnect: envBool(env, 'PSU_AUTO_CONNECT', true),
        readerMode,
        flushOnConnect: envBool(env, 'PSU_FLUSH_ON_CONNECT', false),
        updateChannelCapacity: clampInt(envInt(env, 'PSU_UPDATE_CHANNEL_CAPACITY', 256), 1, 65_536),
        transport: {
            path: envString(env, 'PSU_PORT_PATH'),
            baudRate,
            rtscts: envBool(env, 'PSU_RTSCTS', true),
        },
        timing: {
            settleDelayMs: clampInt(envInt(env, 'PSU_SETTLE_DELAY_MS', 50), 0, 5_000),
            readIntervalMs: clampInt(envInt(env, 'PSU_READ_INTERVAL_MS', 10), 0, 1_000),
            readTimeoutMs: clampInt(envInt(env, 'PSU_READ_TIMEOUT_MS', 100), 0, 10_000),
            readChunkBytes: clampInt(envInt(env, 'PSU_READ_CHUNK_BYTES', 512), 1, 65_536),
            writeRetries: clampInt(envInt(env, 'PSU_WRITE_RETRIES', 2), 0, 20),
            writeRetryDelayMs: clampInt(envInt(env, 'PSU_WRITE_RETRY_DELAY_MS', 100), 0, 10_000),
        },
    }
}
