/**
 * Centralized Inversify tokens (string identifiers).
 *
 * Keeping them in one place reduces drift and typos across the container config
 * and @inject decorators. Concrete services (TelemetryService, WorldSessionFactory)
 * are bound by class instead.
 */
export const TOKENS = {
    // Config
    GenerationConfig: 'GenerationConfig',
    OpenAIConfig: 'OpenAIConfig',
    ImageCacheConfig: 'ImageCacheConfig',
    StoryText: 'StoryText',

    // Core
    TelemetryClient: 'ITelemetryClient',

    // Services
    OpenAIClient: 'IOpenAIClient',
    StoryGenerator: 'IStoryGenerator',
    WorldAuthor: 'IWorldAuthor',
    ImageStore: 'IImageStore',
    RoomImageProvider: 'IRoomImageProvider'
} as const
