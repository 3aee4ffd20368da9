import type { IRoomImageProvider, IStoryGenerator } from '@waymark/shared'
import { inject, injectable, optional } from 'inversify'
import { TOKENS } from '../di/tokens.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import type { LoadedWorld } from '../world/worldLoader.js'
import { WorldSession } from './WorldSession.js'

/**
 * Builds sessions over a loaded world with the container's generator, telemetry and
 * (when image generation is enabled) room image provider.
 */
@injectable()
export class WorldSessionFactory {
    constructor(
        @inject(TOKENS.StoryGenerator) private readonly generator: IStoryGenerator,
        @inject(TelemetryService) private readonly telemetry: TelemetryService,
        @inject(TOKENS.RoomImageProvider) @optional() private readonly imageProvider?: IRoomImageProvider
    ) {}

    create(world: LoadedWorld): WorldSession {
        this.telemetry.trackGameEventStrict('World.Loaded', {
            roomCount: world.graph.size,
            connectionCount: world.definition.connections.length,
            variableCount: world.variables.size,
            referenceLength: world.referenceOrder.length
        })
        return new WorldSession(world, {
            generator: this.generator,
            telemetry: this.telemetry,
            imageProvider: this.imageProvider ?? null
        })
    }
}
