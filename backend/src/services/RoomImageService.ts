/**
 * Room Image Service
 *
 * Illustrations are cached by content hash (name + description + image prompt), so an
 * unchanged room is generated once and reused across sessions. Editing any of the three
 * produces a new file; old files are left in place.
 */
import {
    computeRoomImageHash,
    GenerationFailedException,
    type GenerationFailureReason,
    type GenerationOptions,
    type IRoomImageProvider,
    type Room
} from '@waymark/shared'
import { inject, injectable } from 'inversify'
import type { GenerationConfig } from '../config/generationConfig.js'
import { TOKENS } from '../di/tokens.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import type { IImageStore } from './imageStore.js'
import { toGenerationFailureReason, type IOpenAIClient } from './openAIClient.js'

@injectable()
export class RoomImageService implements IRoomImageProvider {
    constructor(
        @inject(TOKENS.OpenAIClient) private readonly client: IOpenAIClient,
        @inject(TOKENS.ImageStore) private readonly store: IImageStore,
        @inject(TOKENS.GenerationConfig) private readonly config: GenerationConfig,
        @inject(TelemetryService) private readonly telemetry: TelemetryService
    ) {}

    async ensureImage(room: Room, options?: GenerationOptions): Promise<string> {
        const hash = computeRoomImageHash(room)
        const fileName = `${hash}.png`

        const cached = await this.store.find(fileName)
        if (cached) {
            this.telemetry.trackGameEventStrict('Room.Image.CacheHit', { room: room.name, hash })
            return cached
        }

        const { result, diagnostics } = await this.client.generateImage({
            prompt: room.imagePrompt || room.description,
            timeoutMs: this.config.timeoutMs,
            signal: options?.signal
        })
        if (!result) {
            const reason = toGenerationFailureReason(diagnostics)
            throw this.fail(room, reason, `Image generation for "${room.name}" failed (${reason})`)
        }

        let path: string
        try {
            path = await this.store.save(fileName, result.bytes)
        } catch (error) {
            throw this.fail(room, 'error', `Could not store the image for "${room.name}"`, error)
        }

        this.telemetry.trackGameEventStrict('Room.Image.Generated', { room: room.name, hash, bytes: result.bytes.byteLength })
        return path
    }

    private fail(room: Room, reason: GenerationFailureReason, message: string, cause?: unknown): GenerationFailedException {
        this.telemetry.trackGameEventStrict('Room.Image.Failed', { room: room.name, reason })
        return new GenerationFailedException(message, reason, cause === undefined ? undefined : { cause })
    }
}
