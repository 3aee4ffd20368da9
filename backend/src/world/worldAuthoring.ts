/**
 * World authoring: completes a sketched-out world file so it can be played.
 *
 * Rooms without a canon event get one written by the model, and a world with no variables
 * gets an initial set. Authored content is never overwritten. The rooms, connections,
 * reference order and existing variables are checked with the session-start rules before
 * any model call is made.
 */
import {
    validateDraftWorldDefinition,
    WorldConfigurationException,
    type DraftWorldDefinition,
    type GenerationOptions,
    type IWorldAuthor,
    type WorldDefinition
} from '@waymark/shared'
import { writeFile } from 'node:fs/promises'
import type { TelemetryService } from '../telemetry/TelemetryService.js'
import { buildWorld, readWorldFile, unwrapWorldEnvelope } from './worldLoader.js'

export interface AuthoringSummary {
    world: WorldDefinition
    /** Rooms whose canon event was generated, in file order. */
    generatedEvents: string[]
    generatedVariables: boolean
}

export interface AuthorWorldFileOptions extends GenerationOptions {
    /** Where to write the completed world; defaults to the input file. */
    outputPath?: string
}

/**
 * Fill in missing canon events and, when the list is empty, the initial variables.
 * Generation failures propagate as GenerationFailedException; nothing is partially kept.
 */
export async function completeWorldDefinition(
    draft: DraftWorldDefinition,
    author: IWorldAuthor,
    options?: GenerationOptions
): Promise<AuthoringSummary> {
    const generatedEvents: string[] = []
    const rooms: WorldDefinition['rooms'] = []

    for (const room of draft.rooms) {
        const authored = room.canon_event
        if (authored !== undefined && authored.trim() !== '') {
            rooms.push({ ...room, canon_event: authored })
            continue
        }
        const canonEvent = await author.generateCanonEvent({ name: room.name, description: room.description }, options)
        rooms.push({ ...room, canon_event: canonEvent })
        generatedEvents.push(room.name)
    }

    const generatedVariables = draft.variables.length === 0
    const variables = generatedVariables ? await author.generateVariables(options) : [...draft.variables]

    return {
        world: { ...draft, rooms, variables },
        generatedEvents,
        generatedVariables
    }
}

/**
 * Read a world file, complete it, and write it back as `{ "world": ... }`.
 * @throws WorldConfigurationException when the file or the sketched world is unusable, and
 * VariableParseException for a malformed authored variable line
 */
export async function authorWorldFile(
    inputPath: string,
    author: IWorldAuthor,
    telemetry: TelemetryService,
    options: AuthorWorldFileOptions = {}
): Promise<AuthoringSummary> {
    const validation = validateDraftWorldDefinition(unwrapWorldEnvelope(await readWorldFile(inputPath)))
    if (!validation.success) {
        throw new WorldConfigurationException(`World definition is invalid: ${validation.errors.join('; ')}`, 'invalid-world', inputPath)
    }

    const draft = validation.world
    buildWorld({ ...draft, rooms: draft.rooms.map((room) => ({ ...room, canon_event: room.canon_event ?? '' })) })

    const summary = await completeWorldDefinition(draft, author, { signal: options.signal })

    await writeFile(options.outputPath ?? inputPath, `${JSON.stringify({ world: summary.world }, null, 4)}\n`, 'utf8')

    telemetry.trackGameEventStrict('World.Authored', {
        roomCount: summary.world.rooms.length,
        generatedEvents: summary.generatedEvents.length,
        generatedVariables: summary.generatedVariables
    })
    return summary
}
