import type { Contracts } from 'applicationinsights'

/**
 * Telemetry client interface for dependency injection.
 * The subset of the Application Insights TelemetryClient the engine emits through.
 */
export interface ITelemetryClient {
    trackEvent(telemetry: Contracts.EventTelemetry): void

    trackException(telemetry: Contracts.ExceptionTelemetry): void

    /**
     * Flush buffered telemetry (called once when the play loop exits)
     */
    flush(options?: { callback?: (response: string) => void; isAppCrashing?: boolean }): void
}
