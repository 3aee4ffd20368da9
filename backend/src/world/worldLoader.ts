/**
 * World loading: validates an authored world definition and builds the room graph,
 * reference order and variable store a session starts from.
 *
 * Accepted file shapes:
 * - { "world": { rooms, connections, ... } }
 * - { "world": "<the same object as a JSON string>" }
 * - { rooms, connections, ... }
 *
 * Every inconsistency is a WorldConfigurationException raised here, before any session
 * exists. Connections are added one-way, exactly as listed.
 */
import {
    RoomGraph,
    validateWorldDefinition,
    VariableStore,
    WorldConfigurationException,
    type WorldDefinition
} from '@waymark/shared'
import { readFile } from 'node:fs/promises'

export interface LoadedWorld {
    graph: RoomGraph
    referenceOrder: string[]
    variables: VariableStore
    definition: WorldDefinition
}

function parseJson(text: string, source: string): unknown {
    try {
        return JSON.parse(text)
    } catch (error) {
        throw new WorldConfigurationException(`${source} is not valid JSON`, 'invalid-world', source, { cause: error })
    }
}

/** Strip the optional `world` envelope, decoding it when it holds a JSON string. */
export function unwrapWorldEnvelope(data: unknown): unknown {
    if (typeof data !== 'object' || data === null || !('world' in data)) return data
    const inner = data.world
    return typeof inner === 'string' ? parseJson(inner, 'Embedded world') : inner
}

export function buildWorld(data: unknown): LoadedWorld {
    const validation = validateWorldDefinition(unwrapWorldEnvelope(data))
    if (!validation.success) {
        throw new WorldConfigurationException(`World definition is invalid: ${validation.errors.join('; ')}`, 'invalid-world')
    }
    const definition = validation.world

    if (definition.rooms.length === 0) {
        throw new WorldConfigurationException('World definition has no rooms', 'empty-world')
    }

    const graph = new RoomGraph()
    for (const room of definition.rooms) {
        graph.addRoom({
            name: room.name,
            description: room.description,
            imagePrompt: room.image_prompt,
            canonEvent: room.canon_event
        })
    }

    for (const { room1, room2, direction } of definition.connections) {
        if (!graph.connect(room1, room2, direction)) {
            const missing = graph.hasRoom(room1) ? room2 : room1
            throw new WorldConfigurationException(
                `Connection ${room1} -> ${room2} (${direction}) names unknown room "${missing}"`,
                'missing-room',
                missing
            )
        }
    }

    for (const name of definition.original_room_visit_order) {
        if (!graph.hasRoom(name)) {
            throw new WorldConfigurationException(`Reference visit order names unknown room "${name}"`, 'unknown-reference-room', name)
        }
    }

    return {
        graph,
        referenceOrder: [...definition.original_room_visit_order],
        variables: VariableStore.fromLines(definition.variables),
        definition
    }
}

/** Parsed JSON of a world file, envelope included. */
export async function readWorldFile(path: string): Promise<unknown> {
    let text: string
    try {
        text = await readFile(path, 'utf8')
    } catch (error) {
        throw new WorldConfigurationException(`Cannot read world file ${path}`, 'world-file-unreadable', path, { cause: error })
    }
    return parseJson(text, path)
}

export async function loadWorldFile(path: string): Promise<LoadedWorld> {
    return buildWorld(await readWorldFile(path))
}

/**
 * Source story given to the generator prompts. No path means no story context.
 */
export async function loadStoryText(path: string | undefined): Promise<string> {
    if (!path) return ''
    try {
        return await readFile(path, 'utf8')
    } catch (error) {
        throw new WorldConfigurationException(`Cannot read story file ${path}`, 'world-file-unreadable', path, { cause: error })
    }
}
