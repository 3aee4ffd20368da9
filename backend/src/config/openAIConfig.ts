/**
 * OpenAI Config
 *
 * Azure OpenAI wins when an endpoint is configured (Managed Identity / az login via
 * DefaultAzureCredential); otherwise the public API is used with OPENAI_API_KEY.
 *
 * Environment variables:
 * - AZURE_OPENAI_ENDPOINT: Azure OpenAI resource endpoint
 * - AZURE_OPENAI_MODEL: deployment name; overrides WAYMARK_MODEL for chat requests
 * - AZURE_OPENAI_API_VERSION: API version (default: 2024-10-21)
 * - OPENAI_API_KEY: key for the public OpenAI API
 * - WAYMARK_IMAGE_MODEL: image model (default: dall-e-3)
 */
import { readString, type Env } from './envParsing.js'

export type OpenAIProvider = 'azure' | 'openai' | 'none'

export interface OpenAIConfig {
    provider: OpenAIProvider
    endpoint?: string
    deployment?: string
    apiVersion: string
    apiKey?: string
    imageModel: string
}

export const DEFAULT_AZURE_OPENAI_API_VERSION = '2024-10-21'
export const DEFAULT_IMAGE_MODEL = 'dall-e-3'

export function getOpenAIConfig(env: Env = process.env): OpenAIConfig {
    const endpoint = readString(env.AZURE_OPENAI_ENDPOINT)
    const apiKey = readString(env.OPENAI_API_KEY)

    return {
        provider: endpoint ? 'azure' : apiKey ? 'openai' : 'none',
        endpoint,
        deployment: readString(env.AZURE_OPENAI_MODEL),
        apiVersion: readString(env.AZURE_OPENAI_API_VERSION) ?? DEFAULT_AZURE_OPENAI_API_VERSION,
        apiKey,
        imageModel: readString(env.WAYMARK_IMAGE_MODEL) ?? DEFAULT_IMAGE_MODEL
    }
}
