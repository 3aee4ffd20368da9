/**
 * Inversify container configuration for the play loop.
 *
 * Reads configuration from the environment, loads the optional story text, selects the
 * telemetry client (Application Insights or null) and the OpenAI client (Azure, public
 * API, or null). Tests pass overrides instead of touching the environment.
 */
import 'reflect-metadata'
import { Container } from 'inversify'
import { loadServiceConfig, registerConfig, registerCoreServices, registerOpenAI, registerTelemetry, type ServiceConfig } from './di/registerServices.js'
import { TOKENS } from './di/tokens.js'
import type { IOpenAIClient } from './services/openAIClient.js'
import { createTelemetryClient } from './telemetry/createTelemetryClient.js'
import type { ITelemetryClient } from './telemetry/ITelemetryClient.js'
import { loadStoryText } from './world/worldLoader.js'

export interface ContainerOverrides {
    config?: ServiceConfig
    storyText?: string
    telemetryClient?: ITelemetryClient
    openAIClient?: IOpenAIClient
}

export const setupContainer = async (container: Container, overrides: ContainerOverrides = {}): Promise<Container> => {
    const config = overrides.config ?? loadServiceConfig()
    const storyText = overrides.storyText ?? (await loadStoryText(config.generation.storyPath))

    registerConfig(container, config, storyText)
    registerTelemetry(container, overrides.telemetryClient ?? (await createTelemetryClient()))

    if (overrides.openAIClient) {
        container.bind<IOpenAIClient>(TOKENS.OpenAIClient).toConstantValue(overrides.openAIClient)
    } else {
        registerOpenAI(container)
    }

    registerCoreServices(container, config.imageCache)
    return container
}
