import type { IRoomImageProvider, IStoryGenerator, IWorldAuthor } from '@waymark/shared'
import type { Container } from 'inversify'

import { getGenerationConfig, type GenerationConfig } from '../config/generationConfig.js'
import { getImageCacheConfig, type ImageCacheConfig } from '../config/imageCacheConfig.js'
import { getOpenAIConfig, type OpenAIConfig } from '../config/openAIConfig.js'
import { FileImageStore, type IImageStore } from '../services/imageStore.js'
import { createOpenAIClient, type IOpenAIClient } from '../services/openAIClient.js'
import { RoomImageService } from '../services/RoomImageService.js'
import { StoryGenerator } from '../services/StoryGenerator.js'
import { WorldSessionFactory } from '../services/WorldSessionFactory.js'
import type { ITelemetryClient } from '../telemetry/ITelemetryClient.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { TOKENS } from './tokens.js'

export interface ServiceConfig {
    generation: GenerationConfig
    openAI: OpenAIConfig
    imageCache: ImageCacheConfig
}

export function loadServiceConfig(env: Readonly<Record<string, string | undefined>> = process.env): ServiceConfig {
    return {
        generation: getGenerationConfig(env),
        openAI: getOpenAIConfig(env),
        imageCache: getImageCacheConfig(env)
    }
}

export function registerConfig(container: Container, config: ServiceConfig, storyText: string): void {
    container.bind<GenerationConfig>(TOKENS.GenerationConfig).toConstantValue(config.generation)
    container.bind<OpenAIConfig>(TOKENS.OpenAIConfig).toConstantValue(config.openAI)
    container.bind<ImageCacheConfig>(TOKENS.ImageCacheConfig).toConstantValue(config.imageCache)
    container.bind<string>(TOKENS.StoryText).toConstantValue(storyText)
}

export function registerTelemetry(container: Container, client: ITelemetryClient): void {
    container.bind<ITelemetryClient>(TOKENS.TelemetryClient).toConstantValue(client)
    // Consistency policy: class-based injection only (no string token binding).
    container.bind<TelemetryService>(TelemetryService).toSelf().inSingletonScope()
}

export function registerOpenAI(container: Container): void {
    container
        .bind<IOpenAIClient>(TOKENS.OpenAIClient)
        .toDynamicValue((context) => {
            const openAI = context.container.get<OpenAIConfig>(TOKENS.OpenAIConfig)
            const generation = context.container.get<GenerationConfig>(TOKENS.GenerationConfig)
            return createOpenAIClient(openAI, generation.model, generation.timeoutMs)
        })
        .inSingletonScope()
}

export function registerCoreServices(container: Container, imageCache: ImageCacheConfig): void {
    container.bind<IStoryGenerator>(TOKENS.StoryGenerator).to(StoryGenerator).inSingletonScope()
    // Same instance: one generator serves play and authoring.
    container.bind<IWorldAuthor>(TOKENS.WorldAuthor).toService(TOKENS.StoryGenerator)
    container.bind<IImageStore>(TOKENS.ImageStore).toConstantValue(new FileImageStore(imageCache.cacheDir))

    // Without a binding the session reports images as unavailable.
    if (imageCache.enabled) {
        container.bind<IRoomImageProvider>(TOKENS.RoomImageProvider).to(RoomImageService).inSingletonScope()
    }

    container.bind(WorldSessionFactory).toSelf().inSingletonScope()
}
