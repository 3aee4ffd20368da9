/**
 * Story Generation Config
 *
 * Environment variables:
 * - WAYMARK_GENERATION_TIMEOUT_MS: per-request timeout (default 30000)
 * - WAYMARK_GENERATION_MAX_ATTEMPTS: attempts per generation, including the first (default 3)
 * - WAYMARK_GENERATION_RETRY_DELAY_MS: initial backoff, doubled after each failed attempt (default 1000)
 * - WAYMARK_MODEL: chat model for events and actions (default gpt-4o-mini)
 * - WAYMARK_TEMPERATURE: sampling temperature, 0-2 (default 0.7)
 * - WAYMARK_STORY_PATH: optional text file with the source story given to every prompt
 */
import { parseFiniteNumber, parseNonNegativeInt, parsePositiveInt, readString, type Env } from './envParsing.js'

export interface GenerationConfig {
    timeoutMs: number
    maxAttempts: number
    retryDelayMs: number
    model: string
    temperature: number
    storyPath?: string
}

export const DEFAULT_GENERATION_CONFIG: Readonly<Omit<GenerationConfig, 'storyPath'>> = {
    timeoutMs: 30_000,
    maxAttempts: 3,
    retryDelayMs: 1000,
    model: 'gpt-4o-mini',
    temperature: 0.7
}

function parseTemperature(value: string | undefined): number | null {
    const parsed = parseFiniteNumber(value)
    return parsed !== null && parsed >= 0 && parsed <= 2 ? parsed : null
}

export function getGenerationConfig(env: Env = process.env): GenerationConfig {
    return {
        timeoutMs: parsePositiveInt(env.WAYMARK_GENERATION_TIMEOUT_MS) ?? DEFAULT_GENERATION_CONFIG.timeoutMs,
        maxAttempts: parsePositiveInt(env.WAYMARK_GENERATION_MAX_ATTEMPTS) ?? DEFAULT_GENERATION_CONFIG.maxAttempts,
        retryDelayMs: parseNonNegativeInt(env.WAYMARK_GENERATION_RETRY_DELAY_MS) ?? DEFAULT_GENERATION_CONFIG.retryDelayMs,
        model: readString(env.WAYMARK_MODEL) ?? DEFAULT_GENERATION_CONFIG.model,
        temperature: parseTemperature(env.WAYMARK_TEMPERATURE) ?? DEFAULT_GENERATION_CONFIG.temperature,
        storyPath: readString(env.WAYMARK_STORY_PATH)
    }
}
