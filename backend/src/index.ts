export * from './config/envParsing.js'
export * from './config/generationConfig.js'
export * from './config/imageCacheConfig.js'
export * from './config/openAIConfig.js'
export * from './di/registerServices.js'
export * from './di/tokens.js'
export * from './inversify.config.js'
export * from './prompts/storyPrompts.js'
export * from './services/imageStore.js'
export * from './services/openAIClient.js'
export * from './services/RoomImageService.js'
export * from './services/StoryGenerator.js'
export * from './services/WorldSession.js'
export * from './services/WorldSessionFactory.js'
export * from './telemetry/createTelemetryClient.js'
export * from './telemetry/ITelemetryClient.js'
export * from './telemetry/NullTelemetryClient.js'
export * from './telemetry/TelemetryService.js'
export * from './world/worldAuthoring.js'
export * from './world/worldLoader.js'
export * from './cli/commands.js'
export * from './cli/render.js'
