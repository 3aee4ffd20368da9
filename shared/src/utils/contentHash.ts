/**
 * Content hash utilities for cached room artifacts
 *
 * Provides deterministic SHA256 hashing so an unchanged room maps to the same cache entry
 */

import { createHash } from 'crypto'
import type { RoomSeed } from '../domainModels.js'

/**
 * Compute SHA256 hash of content
 * @returns Hex-encoded SHA256 hash
 */
export function computeContentHash(content: string): string {
    return createHash('sha256').update(content, 'utf8').digest('hex')
}

/**
 * Cache key for a room illustration: hash of name, description and image prompt concatenated.
 * Editing any of the three yields a new key (and a new image).
 */
export function computeRoomImageHash(room: Pick<RoomSeed, 'name' | 'description' | 'imagePrompt'>): string {
    return computeContentHash(`${room.name}${room.description}${room.imagePrompt}`)
}
