// Root barrel – grouped re-exports of the domain core. No I/O lives in this package.

export * from './canonRoute.js'
export * from './direction/index.js'
export * from './domainModels.js'
export * from './exceptions/index.js'
export * from './gridLayout.js'
export * from './mapGeometry.js'
export * from './roomGraph.js'
export * from './serviceConstants.js'
export * from './telemetryEvents.js'
export * from './types/storyGenerator.js'
export * from './utils/contentHash.js'
export * from './variables.js'
export * from './worldDefinition.js'
