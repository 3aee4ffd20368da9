import { injectable } from 'inversify'
import type { ITelemetryClient } from './ITelemetryClient.js'

/**
 * Null implementation of ITelemetryClient for tests and local play without a connection string.
 */
@injectable()
export class NullTelemetryClient implements ITelemetryClient {
    trackEvent(): void {
        // no-op
    }

    trackException(): void {
        // no-op
    }

    flush(options?: { callback?: (response: string) => void }): void {
        options?.callback?.('')
    }
}
