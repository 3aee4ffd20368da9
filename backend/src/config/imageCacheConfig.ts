/**
 * Room Image Cache Config
 *
 * Environment variables:
 * - WAYMARK_IMAGE_CACHE_DIR: directory for content-addressed room images (default room_images)
 * - WAYMARK_IMAGE_GENERATION: true/false, enables model-generated room images (default false)
 */
import { parseBoolean, readString, type Env } from './envParsing.js'

export interface ImageCacheConfig {
    cacheDir: string
    enabled: boolean
}

export const DEFAULT_IMAGE_CACHE_DIR = 'room_images'

export function getImageCacheConfig(env: Env = process.env): ImageCacheConfig {
    return {
        cacheDir: readString(env.WAYMARK_IMAGE_CACHE_DIR) ?? DEFAULT_IMAGE_CACHE_DIR,
        enabled: parseBoolean(env.WAYMARK_IMAGE_GENERATION) ?? false
    }
}
