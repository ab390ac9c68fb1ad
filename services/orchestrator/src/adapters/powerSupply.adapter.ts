// services/orchestrator/src/adapters/powerSupply.adapter.ts

import type { AppStateStore } from '../core/state.js'
import type { PowerSupplyEvent, PowerSupplyStats } from '../devices/power-supply/types.js'

/**
 * PowerSupplyStateAdapter
 *
 * Translates PowerSupplyEvents into AppState.powerSupply changes. Stats are
 * pulled from the service on the events that change them, so the slice never
 * drifts from what the session itself reports.
 */
export class PowerSupplyStateAdapter {
    private readonly store: AppStateStore
    private readonly readStats: () => PowerSupplyStats

    constructor(store: AppStateStore, readStats: () => PowerSupplyStats) {
        this.store = store
        this.readStats = readStats
    }

    handle(evt: PowerSupplyEvent): void {
        switch (evt.kind) {
            /* ------------------------------------------------------------------ */
            /*  LIFECYCLE                                                         */
            /* ------------------------------------------------------------------ */

            case 'psu-phase-changed': {
                this.store.updatePowerSupplySnapshot({
                    phase: evt.to,
                    resetDevice: evt.to === 'disconnected',
                })
                return
            }

            case 'psu-connected': {
                this.store.updatePowerSupplySnapshot({
                    message: `Connected @ ${evt.baudRate} baud`,
                    stats: this.readStats(),
                    lastError: null,
                })
                return
            }

            case 'psu-disconnected': {
                this.store.updatePowerSupplySnapshot({
                    message: `Disconnected (${evt.reason})`,
                    stats: this.readStats(),
                })
                return
            }

            /* ------------------------------------------------------------------ */
            /*  TELEMETRY                                                         */
            /* ------------------------------------------------------------------ */

            case 'psu-snapshot-updated': {
                this.store.updatePowerSupplySnapshot({
                    device: evt.update,
                    stats: this.readStats(),
                })
                return
            }

            case 'psu-frame-dropped':
            case 'psu-decode-error': {
                this.store.updatePowerSupplySnapshot({ stats: this.readStats() })
                return
            }

            case 'psu-command-sent': {
                // Write counts ride along with the next telemetry update.
                return
            }

            /* ------------------------------------------------------------------ */
            /*  ERRORS                                                            */
            /* ------------------------------------------------------------------ */

            case 'recoverable-error': {
                this.store.updatePowerSupplySnapshot({
                    message: evt.error.message,
                    lastError: evt.error,
                    stats: this.readStats(),
                })
                return
            }
        }
    }
}
