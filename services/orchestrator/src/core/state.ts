// services/orchestrator/src/core/state.ts
import { EventEmitter } from 'node:events'
import * as jsonpatch from 'fast-json-patch' // CJS/ESM-safe import
import type {
    DeviceSnapshot,
    PowerSupplyErrorInfo,
    PowerSupplyPhase,
    PowerSupplyStats,
} from '../devices/power-supply/types.js'

/* -------------------------------------------------------------------------- */
/*  Power supply snapshot                                                     */
/* -------------------------------------------------------------------------- */

export type PowerSupplySnapshot = {
    phase: PowerSupplyPhase
    message?: string
    /** Merged device readings; emptied on disconnect. */
    device: DeviceSnapshot
    stats: PowerSupplyStats
    lastError: PowerSupplyErrorInfo | null
}

/* -------------------------------------------------------------------------- */
/*  Full AppState                                                             */
/* -------------------------------------------------------------------------- */

export type AppState = {
    version: number
    meta: { startedAt: string; status: 'booting' | 'ready' | 'error' }
    message: string
    powerSupply: PowerSupplySnapshot
}

/* -------------------------------------------------------------------------- */
/*  Patch event and state internals                                           */
/* -------------------------------------------------------------------------- */

export type PatchEvent = {
    from: number
    to: number
    patch: jsonpatch.Operation[]
}

export interface AppStateEvents {
    patch: [PatchEvent]
    snapshot: [AppState]
}

function clone<T>(v: T): T {
    return JSON.parse(JSON.stringify(v)) as T
}

export function initialPowerSupplySnapshot(): PowerSupplySnapshot {
    return {
        phase: 'disconnected',
        message: undefined,
        device: {},
        stats: {
            bytesReceived: 0,
            framesDecoded: 0,
            framesDropped: 0,
            decodeErrors: 0,
            writes: 0,
            lastFrameAt: null,
            lastErrorAt: null,
        },
        lastError: null,
    }
}

/**
 * Versioned application state. Every change bumps `version` and emits a
 * JSON patch (`patch`) plus a full copy (`snapshot`).
 */
export class AppStateStore {
    public readonly events = new EventEmitter()
    private state: AppState

    constructor(startedAt: string = new Date().toISOString()) {
        this.state = {
            version: 1,
            meta: { startedAt, status: 'ready' },
            message: 'psu-link orchestrator',
            powerSupply: initialPowerSupplySnapshot(),
        }
    }

    public on<E extends keyof AppStateEvents>(
        event: E,
        listener: (...args: AppStateEvents[E]) => void
    ): () => void {
        this.events.on(event, listener)
        return () => {
            this.events.off(event, listener)
        }
    }

    public getSnapshot(): AppState {
        return clone(this.state)
    }

    public set<K extends Exclude<keyof AppState, 'version'>>(key: K, value: AppState[K]): void {
        const prev = clone(this.state)
        const next: AppState = {
            ...this.state,
            [key]: clone(value),
            version: this.state.version + 1,
        }
        this.state = next
        this.emitChanges(prev, next)
    }

    public setMessage(text: string): void {
        this.set('message', text)
    }

    /* ---------------------------------------------------------------------- */
    /*  Power supply update helpers                                           */
    /* ---------------------------------------------------------------------- */

    public updatePowerSupplySnapshot(partial: {
        phase?: PowerSupplySnapshot['phase']
        message?: string
        /** Merged into the current readings. */
        device?: DeviceSnapshot
        /** Replaces the readings outright. */
        resetDevice?: boolean
        stats?: Partial<PowerSupplySnapshot['stats']>
        lastError?: PowerSupplySnapshot['lastError']
    }): void {
        const prev = this.state.powerSupply

        const baseDevice = partial.resetDevice ? {} : prev.device
        const merged: PowerSupplySnapshot = {
            phase: partial.phase ?? prev.phase,
            message: partial.message ?? prev.message,
            device: { ...baseDevice, ...(partial.device ?? {}) },
            stats: { ...prev.stats, ...(partial.stats ?? {}) },
            lastError: partial.lastError !== undefined ? partial.lastError : prev.lastError,
        }

        this.set('powerSupply', merged)
    }

    private emitChanges(prev: AppState, next: AppState): void {
        const ops = jsonpatch.compare(prev, next)
        if (ops.length > 0) {
            this.events.emit('patch', {
                from: prev.version,
                to: next.version,
                patch: ops,
            } satisfies PatchEvent)
        }
        this.events.emit('snapshot', clone(next))
    }
}
