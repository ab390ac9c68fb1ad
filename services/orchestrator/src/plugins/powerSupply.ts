// services/orchestrator/src/plugins/powerSupply.ts

import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'

import {
    createLogger,
    LogChannel,
    type ChannelLogger,
} from '@psu-link/logging'

import { PowerSupplyStateAdapter } from '../adapters/powerSupply.adapter.js'
import { SnapshotChannel } from '../devices/power-supply/channel.js'
import { fieldName } from '../devices/power-supply/fields.js'
import { PowerSupplyService } from '../devices/power-supply/PowerSupplyService.js'
import {
    SerialPortTransport,
    type DeviceTransport,
} from '../devices/power-supply/transport.js'
import type {
    PowerSupplyConfig,
    PowerSupplyEvent,
    PowerSupplyEventSink,
    SnapshotUpdate,
} from '../devices/power-supply/types.js'
import { buildPowerSupplyConfigFromEnv, errorMessage } from '../devices/power-supply/utils.js'

// ---- Fastify decoration ----------------------------------------------------

declare module 'fastify' {
    interface FastifyInstance {
        powerSupply: PowerSupplyService
        powerSupplyUpdates: SnapshotChannel<SnapshotUpdate>
    }
}

export interface PowerSupplyPluginOptions {
    env?: NodeJS.ProcessEnv
    /** Replaces the serialport transport (tests, alternate links). */
    createTransport?: (config: PowerSupplyConfig) => DeviceTransport
}

// ---- Event sink using orchestrator logging ---------------------------------

function hex(n: number): string {
    return `0x${n.toString(16).padStart(2, '0')}`
}

class PowerSupplyLoggerEventSink implements PowerSupplyEventSink {
    private readonly log: ChannelLogger

    constructor(app: FastifyInstance) {
        const { channel } = createLogger('power-supply', app.clientBuf)
        this.log = channel(LogChannel.power_supply)
    }

    publish(evt: PowerSupplyEvent): void {
        switch (evt.kind) {
            case 'psu-phase-changed': {
                this.log.info(`kind=${evt.kind} from=${evt.from} to=${evt.to}`)
                break
            }

            case 'psu-connected': {
                this.log.info(`kind=${evt.kind} baud=${evt.baudRate}`)
                break
            }

            case 'psu-disconnected': {
                this.log.warn(`kind=${evt.kind} reason=${evt.reason}`)
                break
            }

            // Frame-level traffic: debug only
            case 'psu-command-sent': {
                this.log.debug(
                    `kind=${evt.kind} cmd=${hex(evt.command)} field=${fieldName(evt.fieldId)} bytes=${evt.bytes}`
                )
                break
            }

            case 'psu-snapshot-updated': {
                this.log.debug(
                    `kind=${evt.kind} field=${fieldName(evt.fieldId)} keys=${Object.keys(evt.update).join(',')}`
                )
                break
            }

            case 'psu-frame-dropped': {
                this.log.debug(`kind=${evt.kind} count=${evt.count}`)
                break
            }

            case 'psu-decode-error': {
                this.log.warn(`kind=${evt.kind} field=${evt.fieldId} key=${evt.key} error="${evt.message}"`)
                break
            }

            case 'recoverable-error': {
                this.log.warn(
                    `kind=${evt.kind} scope=${evt.error.scope} retryable=${evt.error.retryable ?? false} error="${evt.error.message}"`
                )
                break
            }
        }
    }
}

// ---- Fanout sink: logger + state adapter -----------------------------------

class FanoutPowerSupplyEventSink implements PowerSupplyEventSink {
    private readonly sinks: PowerSupplyEventSink[]
    private readonly onSinkError: (err: unknown) => void

    constructor(onSinkError: (err: unknown) => void, ...sinks: PowerSupplyEventSink[]) {
        this.onSinkError = onSinkError
        this.sinks = sinks
    }

    publish(evt: PowerSupplyEvent): void {
        for (const sink of this.sinks) {
            try {
                sink.publish(evt)
            } catch (err) {
                // One bad consumer must not break the session or the other sinks.
                this.onSinkError(err)
            }
        }
    }
}

// ---- Plugin implementation -------------------------------------------------

const powerSupplyPlugin: FastifyPluginAsync<PowerSupplyPluginOptions> = async (
    app: FastifyInstance,
    opts: PowerSupplyPluginOptions
) => {
    const { channel } = createLogger('power-supply-plugin', app.clientBuf)
    const logPlugin = channel(LogChannel.app)

    // 1) Build config
    const config = buildPowerSupplyConfigFromEnv(opts.env ?? process.env)

    // 2) Transport + update channel
    const transport = opts.createTransport ? opts.createTransport(config) : new SerialPortTransport(config.transport)
    const updates = new SnapshotChannel<SnapshotUpdate>(config.updateChannelCapacity)

    // 3) Sinks; the adapter reads stats back from the service once it exists
    let service: PowerSupplyService | null = null
    const stateAdapter = new PowerSupplyStateAdapter(app.appState, () =>
        service ? service.getStats() : app.appState.getSnapshot().powerSupply.stats
    )

    const events: PowerSupplyEventSink = new FanoutPowerSupplyEventSink(
        err => logPlugin.warn('power supply event sink failed', { err: errorMessage(err) }),
        new PowerSupplyLoggerEventSink(app),
        {
            publish(evt: PowerSupplyEvent): void {
                stateAdapter.handle(evt)
            },
        }
    )

    // 4) Service
    service = new PowerSupplyService(config, {
        events,
        transport,
        onUpdate: update => {
            updates.push(update)
        },
    })
    const psu = service

    app.decorate('powerSupply', psu)
    app.decorate('powerSupplyUpdates', updates)

    // 5) Poll pump when the host drives reads itself
    let pumping: Promise<void> | null = null
    const pump = async (): Promise<void> => {
        while (psu.getPhase() === 'streaming') {
            try {
                await psu.poll()
            } catch (err) {
                // Read failures are already published; only a phase change ends the pump.
                logPlugin.debug('poll pass failed', { err: errorMessage(err) })
            }
            await new Promise<void>(resolve => setTimeout(resolve, config.timing.readIntervalMs))
        }
    }

    // 6) Lifecycle hooks
    app.addHook('onReady', async () => {
        if (!config.autoConnect) {
            logPlugin.info('power supply auto-connect disabled')
            return
        }

        logPlugin.info('connecting power supply', {
            path: config.transport.path ?? '(discover)',
            baudRate: config.transport.baudRate,
            readerMode: config.readerMode,
        })

        try {
            await psu.connect()
        } catch (err) {
            // Host stays up without a device; /ready reports it.
            logPlugin.error('power supply connect failed', { err: errorMessage(err) })
            return
        }

        if (config.readerMode === 'poll') pumping = pump()
    })

    app.addHook('onClose', async () => {
        logPlugin.info('disconnecting power supply')
        await psu.disconnect()
        if (pumping) await pumping
        updates.close()
    })
}

export default fp(powerSupplyPlugin, {
    name: 'power-supply-plugin',
})
