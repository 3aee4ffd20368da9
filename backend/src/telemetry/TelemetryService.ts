/**
 * Telemetry Service - central service for emitting game telemetry events
 *
 * Wraps ITelemetryClient and enriches every event with the emitting service and a
 * correlation id. Emitters inject this service via DI.
 */
import { isGameEventName, SERVICE_ENGINE, type EventPayloadMap, type GameEventName } from '@waymark/shared'
import { inject, injectable } from 'inversify'
import { randomUUID } from 'node:crypto'
import { TOKENS } from '../di/tokens.js'
import type { ITelemetryClient } from './ITelemetryClient.js'

export interface GameTelemetryOptions {
    serviceOverride?: string
    correlationId?: string | null
}

@injectable()
export class TelemetryService {
    constructor(@inject(TOKENS.TelemetryClient) private readonly client: ITelemetryClient) {}

    /**
     * Track a game event with automatic enrichment
     * @param name - Event name (should be from GAME_EVENT_NAMES)
     */
    trackGameEvent(name: string, properties?: Record<string, unknown>, opts?: GameTelemetryOptions): void {
        const finalProps: Record<string, unknown> = { ...properties }

        if (finalProps.service === undefined) {
            finalProps.service = opts?.serviceOverride || this.inferService()
        }

        // Always attach correlationId; generate if not supplied
        if (finalProps.correlationId === undefined) {
            finalProps.correlationId = opts?.correlationId || randomUUID()
        }

        this.client.trackEvent({ name, properties: finalProps })
    }

    /**
     * Track a registered game event with its typed payload.
     * Names outside the registry are replaced by Telemetry.EventName.Invalid.
     */
    trackGameEventStrict<N extends GameEventName>(name: N, properties: EventPayloadMap[N], opts?: GameTelemetryOptions): void {
        if (!isGameEventName(name)) {
            this.trackGameEvent('Telemetry.EventName.Invalid', { requested: name })
            return
        }
        this.trackGameEvent(name, properties, opts)
    }

    trackException(error: Error, properties?: Record<string, unknown>): void {
        this.client.trackException({ exception: error, properties })
    }

    flush(): Promise<void> {
        return new Promise((resolve) => this.client.flush({ callback: () => resolve() }))
    }

    private inferService(): string {
        return process.env.WAYMARK_SERVICE_NAME || SERVICE_ENGINE
    }
}
