/*
 * Application Insights initialization.
 *
 * Uses APPLICATIONINSIGHTS_CONNECTION_STRING. Without it, or under NODE_ENV=test, a
 * NullTelemetryClient is returned and the SDK is never loaded.
 */
import { SERVICE_ENGINE, serviceLabel } from '@waymark/shared'
import type { Env } from '../config/envParsing.js'
import type { ITelemetryClient } from './ITelemetryClient.js'
import { NullTelemetryClient } from './NullTelemetryClient.js'

export async function createTelemetryClient(env: Env = process.env): Promise<ITelemetryClient> {
    const connectionString = env.APPLICATIONINSIGHTS_CONNECTION_STRING?.trim()
    if (env.NODE_ENV === 'test' || !connectionString) {
        return new NullTelemetryClient()
    }

    const appInsightsModule = await import('applicationinsights')
    const appInsights = appInsightsModule.default
    // A terminal session has no requests or dependencies worth auto-collecting.
    appInsights
        .setup(connectionString)
        .setAutoCollectRequests(false)
        .setAutoCollectDependencies(false)
        .setAutoCollectConsole(false)
        .setSendLiveMetrics(false)
        .start()

    const client = appInsights.defaultClient
    client.context.tags[client.context.keys.cloudRole] = serviceLabel(env.WAYMARK_SERVICE_NAME?.trim() || SERVICE_ENGINE)
    return client
}
