/**
 * OpenAI Client Service
 *
 * Chat completions and image generation behind IOpenAIClient, against either Azure OpenAI
 * (DefaultAzureCredential) or the public OpenAI API (API key).
 *
 * Every call is bounded by a timeout and may be cancelled by the caller's AbortSignal.
 * Calls never throw: failures come back as diagnostics with a bounded outcome.
 */

import { DefaultAzureCredential, getBearerTokenProvider } from '@azure/identity'
import type { GenerationFailureReason } from '@waymark/shared'
import { injectable } from 'inversify'
import OpenAI, { AzureOpenAI } from 'openai'
import type { OpenAIConfig } from '../config/openAIConfig.js'

export interface OpenAIGenerateOptions {
    prompt: string
    systemPrompt?: string
    /** Ask for a JSON object response (response_format: json_object). */
    json?: boolean
    maxTokens?: number
    temperature?: number
    timeoutMs?: number
    signal?: AbortSignal
}

export type OpenAIGenerateOutcome = 'success' | 'timeout' | 'cancelled' | 'error' | 'empty'

export interface OpenAIGenerateDiagnostics {
    outcome: OpenAIGenerateOutcome
    httpStatus?: number
    errorCode?: string
    errorType?: string
    errorName?: string
    // Not for dashboards; available for exception/debug only.
    errorMessage?: string
}

export interface OpenAIGenerateResult {
    content: string
}

export interface OpenAIGenerateWithDiagnosticsResult {
    result: OpenAIGenerateResult | null
    diagnostics: OpenAIGenerateDiagnostics
}

export interface OpenAIImageOptions {
    prompt: string
    timeoutMs?: number
    signal?: AbortSignal
}

export interface OpenAIImageWithDiagnosticsResult {
    result: { bytes: Uint8Array } | null
    diagnostics: OpenAIGenerateDiagnostics
}

/** Failure reason a generator reports for an unsuccessful call. */
export function toGenerationFailureReason(diagnostics: OpenAIGenerateDiagnostics): GenerationFailureReason {
    switch (diagnostics.outcome) {
        case 'timeout':
        case 'cancelled':
        case 'empty':
            return diagnostics.outcome
        default:
            return diagnostics.errorCode === 'not-configured' ? 'not-configured' : 'error'
    }
}

/**
 * OpenAI client interface for testability
 */
export interface IOpenAIClient {
    /**
     * Generate text with bounded timeout
     * @throws Never - failures are reported through diagnostics
     */
    generateWithDiagnostics(options: OpenAIGenerateOptions): Promise<OpenAIGenerateWithDiagnosticsResult>

    /**
     * Generate one 1024x1024 image and return its bytes
     * @throws Never - failures are reported through diagnostics
     */
    generateImage(options: OpenAIImageOptions): Promise<OpenAIImageWithDiagnosticsResult>
}

// The slice of the SDK this client calls. The real SDK is adapted onto it in createOpenAIClient.
export type ChatMessage = { role: 'system'; content: string } | { role: 'user'; content: string }

export interface ChatCompletionRequest {
    model: string
    messages: ChatMessage[]
    max_tokens?: number
    temperature?: number
    response_format?: { type: 'json_object' } | { type: 'text' }
}

export interface ChatCompletionResponse {
    choices: Array<{ message?: { content?: string | null } | null }>
}

export interface ImageGenerateRequest {
    model: string
    prompt: string
    size?: '1024x1024'
    quality?: 'standard' | 'hd'
    n?: number
}

export interface ImageGenerateResponse {
    data?: Array<{ url?: string; b64_json?: string }>
}

export interface OpenAISdkPort {
    chat: { completions: { create(body: ChatCompletionRequest, options?: { signal?: AbortSignal }): Promise<ChatCompletionResponse> } }
    images: { generate(body: ImageGenerateRequest, options?: { signal?: AbortSignal }): Promise<ImageGenerateResponse> }
}

export type FetchLike = (
    url: string,
    init?: { signal?: AbortSignal }
) => Promise<{ ok: boolean; status: number; arrayBuffer(): Promise<ArrayBuffer> }>

export interface OpenAIClientOptions {
    model: string
    imageModel: string
    /** Used when a call gives no timeoutMs. Default: 30000. */
    defaultTimeoutMs?: number
    /** Downloads generated image URLs. Default: global fetch. */
    fetchImpl?: FetchLike
}

const DEFAULT_TIMEOUT_MS = 30_000
const DEFAULT_MAX_TOKENS = 500
const DEFAULT_TEMPERATURE = 0.7

const NOT_CONFIGURED: OpenAIGenerateDiagnostics = {
    outcome: 'error',
    errorName: 'NullOpenAIClient',
    errorCode: 'not-configured'
}

/**
 * No-op OpenAI client (used when neither Azure OpenAI nor an API key is configured).
 */
@injectable()
export class NullOpenAIClient implements IOpenAIClient {
    async generateWithDiagnostics(): Promise<OpenAIGenerateWithDiagnosticsResult> {
        return { result: null, diagnostics: NOT_CONFIGURED }
    }

    async generateImage(): Promise<OpenAIImageWithDiagnosticsResult> {
        return { result: null, diagnostics: NOT_CONFIGURED }
    }
}

interface Deadline {
    signal: AbortSignal
    timedOut(): boolean
    cancelled(): boolean
    dispose(): void
}

// One controller per call: aborted by the timer (timeout) or by the caller's signal (cancelled).
function createDeadline(timeoutMs: number, external?: AbortSignal): Deadline {
    const controller = new AbortController()
    let timedOut = false
    let cancelled = false

    const onAbort = () => {
        cancelled = true
        controller.abort()
    }
    if (external?.aborted) {
        onAbort()
    } else {
        external?.addEventListener('abort', onAbort, { once: true })
    }
    const handle = setTimeout(() => {
        timedOut = true
        controller.abort()
    }, timeoutMs)

    return {
        signal: controller.signal,
        timedOut: () => timedOut,
        cancelled: () => cancelled,
        dispose() {
            clearTimeout(handle)
            external?.removeEventListener('abort', onAbort)
        }
    }
}

/**
 * OpenAI client implementation over an SDK instance (Azure or public).
 */
export class OpenAIClient implements IOpenAIClient {
    private readonly fetchImpl: FetchLike
    private readonly defaultTimeoutMs: number

    constructor(
        private readonly sdk: OpenAISdkPort,
        private readonly options: OpenAIClientOptions
    ) {
        if (!options.model) {
            throw new Error('A chat model is required')
        }
        this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init))
        this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS
    }

    async generateWithDiagnostics(options: OpenAIGenerateOptions): Promise<OpenAIGenerateWithDiagnosticsResult> {
        const { prompt, systemPrompt, json = false, maxTokens = DEFAULT_MAX_TOKENS, temperature = DEFAULT_TEMPERATURE } = options
        const deadline = createDeadline(options.timeoutMs ?? this.defaultTimeoutMs, options.signal)

        try {
            if (deadline.cancelled()) {
                return { result: null, diagnostics: { outcome: 'cancelled' } }
            }

            const messages: ChatMessage[] = systemPrompt
                ? [
                      { role: 'system', content: systemPrompt },
                      { role: 'user', content: prompt }
                  ]
                : [{ role: 'user', content: prompt }]

            const body: ChatCompletionRequest = { model: this.options.model, messages, max_tokens: maxTokens, temperature }
            if (json) {
                body.response_format = { type: 'json_object' }
            }

            const response = await this.sdk.chat.completions.create(body, { signal: deadline.signal })

            const content = (response.choices[0]?.message?.content ?? '').trim()
            if (!content) {
                return { result: null, diagnostics: { outcome: 'empty' } }
            }

            return { result: { content }, diagnostics: { outcome: 'success' } }
        } catch (error) {
            return { result: null, diagnostics: this.classifyFailure(error, deadline) }
        } finally {
            deadline.dispose()
        }
    }

    async generateImage(options: OpenAIImageOptions): Promise<OpenAIImageWithDiagnosticsResult> {
        const deadline = createDeadline(options.timeoutMs ?? this.defaultTimeoutMs, options.signal)

        try {
            if (deadline.cancelled()) {
                return { result: null, diagnostics: { outcome: 'cancelled' } }
            }

            const response = await this.sdk.images.generate(
                {
                    model: this.options.imageModel,
                    prompt: options.prompt,
                    size: '1024x1024',
                    quality: 'standard',
                    n: 1
                },
                { signal: deadline.signal }
            )

            const image = response.data?.[0]
            if (image?.b64_json) {
                return { result: { bytes: Buffer.from(image.b64_json, 'base64') }, diagnostics: { outcome: 'success' } }
            }
            if (!image?.url) {
                return { result: null, diagnostics: { outcome: 'empty' } }
            }

            const download = await this.fetchImpl(image.url, { signal: deadline.signal })
            if (!download.ok) {
                return {
                    result: null,
                    diagnostics: { outcome: 'error', httpStatus: download.status, errorCode: 'image-download-failed' }
                }
            }
            const bytes = new Uint8Array(await download.arrayBuffer())
            if (bytes.byteLength === 0) {
                return { result: null, diagnostics: { outcome: 'empty' } }
            }
            return { result: { bytes }, diagnostics: { outcome: 'success' } }
        } catch (error) {
            return { result: null, diagnostics: this.classifyFailure(error, deadline) }
        } finally {
            deadline.dispose()
        }
    }

    private classifyFailure(error: unknown, deadline: Deadline): OpenAIGenerateDiagnostics {
        const diag = extractDiagnostics(error)

        if (deadline.cancelled()) {
            return { outcome: 'cancelled', errorName: diag.errorName }
        }
        if (deadline.timedOut() || diag.errorName === 'AbortError') {
            return { outcome: 'timeout', errorName: diag.errorName, errorCode: diag.errorCode, httpStatus: diag.httpStatus }
        }
        return { outcome: 'error', ...diag }
    }
}

// Bounded set of diagnostics from OpenAI/Azure SDK errors; request IDs stay out to keep cardinality low.
function extractDiagnostics(error: unknown): Omit<OpenAIGenerateDiagnostics, 'outcome'> {
    if (typeof error !== 'object' || error === null) {
        return { errorMessage: String(error) }
    }

    const errorName = error instanceof Error ? error.name : 'name' in error && typeof error.name === 'string' ? error.name : undefined
    const errorMessage =
        error instanceof Error ? error.message : 'message' in error && typeof error.message === 'string' ? error.message : undefined
    const httpStatus = 'status' in error && typeof error.status === 'number' && Number.isFinite(error.status) ? error.status : undefined
    const errorCode = 'code' in error && typeof error.code === 'string' ? error.code : undefined
    const errorType = 'type' in error && typeof error.type === 'string' ? error.type : undefined

    return { httpStatus, errorCode, errorType, errorName, errorMessage }
}

function toPort(sdk: OpenAI): OpenAISdkPort {
    return {
        chat: { completions: { create: (body, options) => sdk.chat.completions.create(body, options) } },
        images: { generate: (body, options) => sdk.images.generate(body, options) }
    }
}

/**
 * Select the client from configuration: Azure OpenAI with DefaultAzureCredential when an
 * endpoint is set, the public API with an API key, otherwise the no-op client.
 */
export function createOpenAIClient(config: OpenAIConfig, chatModel: string, defaultTimeoutMs?: number): IOpenAIClient {
    if (config.provider === 'azure' && config.endpoint) {
        // System-assigned MI in hosted environments, az login locally
        const credential = new DefaultAzureCredential()
        const azureADTokenProvider = getBearerTokenProvider(credential, 'https://cognitiveservices.azure.com/.default')
        const deployment = config.deployment ?? chatModel
        const sdk = new AzureOpenAI({
            endpoint: config.endpoint,
            azureADTokenProvider,
            deployment,
            apiVersion: config.apiVersion
        })
        return new OpenAIClient(toPort(sdk), { model: deployment, imageModel: config.imageModel, defaultTimeoutMs })
    }

    if (config.provider === 'openai' && config.apiKey) {
        const sdk = new OpenAI({ apiKey: config.apiKey })
        return new OpenAIClient(toPort(sdk), { model: chatModel, imageModel: config.imageModel, defaultTimeoutMs })
    }

    return new NullOpenAIClient()
}
