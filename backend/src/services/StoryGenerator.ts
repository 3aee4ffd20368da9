/**
 * Story Generator
 *
 * Model-backed IStoryGenerator: improvised events for rooms visited off the canon route,
 * and action sets for the current room. As IWorldAuthor it also writes the canon events and
 * initial variables a sketched-out world file lacks.
 *
 * Features:
 * - Exponential backoff retry (maxAttempts, starting at retryDelayMs)
 * - No retry after cancellation, a missing client, or a malformed action response
 * - JSON action responses validated with zod; changed variables parsed as `name: value` lines
 * - Telemetry: Story.Event.Generated, Story.Actions.Generated, Story.CanonEvent.Generated,
 *   Story.Variables.Generated, Generation.Failed
 */

import {
    GenerationFailedException,
    parseVariables,
    type Action,
    type GenerationFailureReason,
    type GenerationOptions,
    type IStoryGenerator,
    type IWorldAuthor,
    type Room,
    type StoryEvent,
    type VariableSnapshot
} from '@waymark/shared'
import { inject, injectable } from 'inversify'
import { z } from 'zod'
import type { GenerationConfig } from '../config/generationConfig.js'
import { TOKENS } from '../di/tokens.js'
import {
    buildActionsPrompt,
    buildCanonEventPrompt,
    buildNonCanonEventPrompt,
    buildVariablesPrompt,
    STORY_SYSTEM_PROMPT
} from '../prompts/storyPrompts.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { toGenerationFailureReason, type IOpenAIClient, type OpenAIGenerateOptions } from './openAIClient.js'

/** ~100 words plus headroom */
const EVENT_MAX_TOKENS = 300

const ACTIONS_MAX_TOKENS = 800

const VARIABLES_MAX_TOKENS = 400

export type GenerationOperation = 'event' | 'actions' | 'canon-event' | 'variables'

export const ActionsResponseSchema = z.object({
    actions: z.array(
        z.object({
            action_description: z.string().trim().min(1),
            changed_variables: z.array(z.string()).default([])
        })
    )
})

export const VariablesResponseSchema = z.object({
    variables: z.array(z.string())
})

const CODE_FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/

function parseJsonResponse<T extends z.ZodTypeAny>(content: string, schema: T, label: string): z.infer<T> {
    const text = content.trim().replace(CODE_FENCE, '$1')

    let json: unknown
    try {
        json = JSON.parse(text)
    } catch (error) {
        throw new GenerationFailedException(`${label} response is not valid JSON`, 'invalid-response', { cause: error })
    }

    const parsed = schema.safeParse(json)
    if (!parsed.success) {
        const detail = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
        throw new GenerationFailedException(`${label} response has the wrong shape: ${detail}`, 'invalid-response')
    }
    return parsed.data
}

/**
 * Parse a model's action response into domain actions.
 * @throws GenerationFailedException with reason 'invalid-response'
 */
export function parseActionsResponse(content: string): Action[] {
    const { actions } = parseJsonResponse(content, ActionsResponseSchema, 'Action')

    try {
        return actions.map((action) => ({
            description: action.action_description,
            changedVariables: parseVariables(action.changed_variables)
        }))
    } catch (error) {
        throw new GenerationFailedException('Action response has a malformed variable line', 'invalid-response', { cause: error })
    }
}

/**
 * Parse a model's variable response into trimmed `name: value` lines, each of which parses.
 * @throws GenerationFailedException with reason 'invalid-response', or 'empty' for no lines
 */
export function parseVariablesResponse(content: string): string[] {
    const { variables } = parseJsonResponse(content, VariablesResponseSchema, 'Variable')
    const lines = variables.map((line) => line.trim()).filter(Boolean)

    try {
        parseVariables(lines)
    } catch (error) {
        throw new GenerationFailedException('Variable response has a malformed variable line', 'invalid-response', { cause: error })
    }
    if (lines.length === 0) {
        throw new GenerationFailedException('Variable response lists no variables', 'empty')
    }
    return lines
}

const NO_RETRY: ReadonlySet<GenerationFailureReason> = new Set(['cancelled', 'not-configured', 'invalid-response'])

@injectable()
export class StoryGenerator implements IStoryGenerator, IWorldAuthor {
    constructor(
        @inject(TOKENS.OpenAIClient) private readonly client: IOpenAIClient,
        @inject(TOKENS.GenerationConfig) private readonly config: GenerationConfig,
        @inject(TOKENS.StoryText) private readonly story: string,
        @inject(TelemetryService) private readonly telemetry: TelemetryService
    ) {}

    async generateNonCanonEvent(room: Room, seenEvents: readonly string[], options?: GenerationOptions): Promise<string> {
        const started = Date.now()
        const prompt = buildNonCanonEventPrompt({ story: this.story, room, seenEvents })

        const { content, attempts } = await this.withRetry('event', room.name, options?.signal, (attempt) =>
            this.complete({ prompt, maxTokens: EVENT_MAX_TOKENS }, attempt, options?.signal)
        )

        this.telemetry.trackGameEventStrict('Story.Event.Generated', { room: room.name, attempts, latencyMs: Date.now() - started })
        return content
    }

    async generateActions(room: Room, event: StoryEvent, variables: VariableSnapshot, options?: GenerationOptions): Promise<Action[]> {
        const started = Date.now()
        const prompt = buildActionsPrompt({ story: this.story, room, event, variables })

        const { content: actions, attempts } = await this.withRetry('actions', room.name, options?.signal, async (attempt) => {
            const text = await this.complete({ prompt, json: true, maxTokens: ACTIONS_MAX_TOKENS }, attempt, options?.signal)
            return parseActionsResponse(text)
        })

        this.telemetry.trackGameEventStrict('Story.Actions.Generated', {
            room: room.name,
            actionCount: actions.length,
            attempts,
            latencyMs: Date.now() - started
        })
        return actions
    }

    async generateCanonEvent(room: Pick<Room, 'name' | 'description'>, options?: GenerationOptions): Promise<string> {
        const started = Date.now()
        const prompt = buildCanonEventPrompt({ story: this.story, room })

        const { content, attempts } = await this.withRetry('canon-event', room.name, options?.signal, (attempt) =>
            this.complete({ prompt, maxTokens: EVENT_MAX_TOKENS }, attempt, options?.signal)
        )

        this.telemetry.trackGameEventStrict('Story.CanonEvent.Generated', { room: room.name, attempts, latencyMs: Date.now() - started })
        return content
    }

    async generateVariables(options?: GenerationOptions): Promise<string[]> {
        const started = Date.now()
        const prompt = buildVariablesPrompt({ story: this.story })

        const { content: lines, attempts } = await this.withRetry('variables', undefined, options?.signal, async (attempt) => {
            const text = await this.complete({ prompt, json: true, maxTokens: VARIABLES_MAX_TOKENS }, attempt, options?.signal)
            return parseVariablesResponse(text)
        })

        this.telemetry.trackGameEventStrict('Story.Variables.Generated', {
            variableCount: lines.length,
            attempts,
            latencyMs: Date.now() - started
        })
        return lines
    }

    private async complete(
        request: Pick<OpenAIGenerateOptions, 'prompt' | 'json' | 'maxTokens'>,
        attempt: number,
        signal?: AbortSignal
    ): Promise<string> {
        const { result, diagnostics } = await this.client.generateWithDiagnostics({
            ...request,
            systemPrompt: STORY_SYSTEM_PROMPT,
            temperature: this.config.temperature,
            timeoutMs: this.config.timeoutMs,
            signal
        })
        if (result) return result.content

        const reason = toGenerationFailureReason(diagnostics)
        const detail = diagnostics.errorMessage ? `: ${diagnostics.errorMessage}` : ''
        throw new GenerationFailedException(`Generation attempt ${attempt} failed (${reason})${detail}`, reason)
    }

    private async withRetry<T>(
        operation: GenerationOperation,
        roomName: string | undefined,
        signal: AbortSignal | undefined,
        run: (attempt: number) => Promise<T>
    ): Promise<{ content: T; attempts: number }> {
        let lastFailure: GenerationFailedException | undefined

        for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
            if (signal?.aborted) {
                lastFailure = new GenerationFailedException('Generation was cancelled', 'cancelled')
                break
            }
            try {
                return { content: await run(attempt), attempts: attempt }
            } catch (error) {
                if (!(error instanceof GenerationFailedException)) throw error
                lastFailure = error
                if (NO_RETRY.has(error.reason)) break
            }

            // Exponential backoff before retry
            if (attempt < this.config.maxAttempts) {
                await this.sleep(this.config.retryDelayMs * Math.pow(2, attempt - 1), signal)
            }
        }

        const failure = lastFailure ?? new GenerationFailedException('Generation was not attempted', 'error')
        this.telemetry.trackGameEventStrict('Generation.Failed', {
            operation,
            reason: failure.reason,
            ...(roomName === undefined ? {} : { room: roomName })
        })
        throw failure
    }

    /**
     * Sleep utility for exponential backoff. Ends early when the signal aborts; the next
     * loop iteration then reports the cancellation.
     */
    private sleep(ms: number, signal?: AbortSignal): Promise<void> {
        return new Promise((resolve) => {
            if (signal?.aborted) return resolve()
            const onAbort = () => {
                clearTimeout(timer)
                resolve()
            }
            const timer = setTimeout(() => {
                signal?.removeEventListener('abort', onAbort)
                resolve()
            }, ms)
            signal?.addEventListener('abort', onAbort, { once: true })
        })
    }
}
