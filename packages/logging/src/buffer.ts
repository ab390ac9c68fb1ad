// packages/logging/src/buffer.ts

import type { ClientLog, ClientLogBuffer, ClientLogListener } from './types.js'

const DEFAULT_LIMIT = 500

function resolveLimit(raw: number): number {
    return Number.isFinite(raw) && raw >= 1 ? Math.trunc(raw) : DEFAULT_LIMIT
}

/**
 * Bounded in-memory log history for UI clients. The oldest entries fall off
 * once `limit` is reached; subscribers see every entry as it is pushed.
 */
export function makeClientBuffer(
    limit: number = Number(process.env.CLIENT_LOGS_TO_KEEP ?? DEFAULT_LIMIT)
): ClientLogBuffer {
    const max = resolveLimit(limit)
    const entries: ClientLog[] = []
    const listeners = new Set<ClientLogListener>()

    return {
        push(log: ClientLog): void {
            entries.push(log)
            if (entries.length > max) entries.splice(0, entries.length - max)

            for (const listener of [...listeners]) {
                try {
                    listener(log)
                } catch {
                    // A broken subscriber is dropped; logging carries on.
                    listeners.delete(listener)
                }
            }
        },

        getLatest(n: number): ClientLog[] {
            if (n <= 0) return []
            return entries.slice(-n)
        },

        subscribe(listener: ClientLogListener): () => void {
            listeners.add(listener)
            return () => {
                listeners.delete(listener)
            }
        },
    }
}
