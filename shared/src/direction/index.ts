export { normalizeDirection, type DirectionNormalizationResult } from './directionNormalizer.js'
