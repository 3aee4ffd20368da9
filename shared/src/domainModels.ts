/**
 * Core domain model types for the Waymark room graph.
 *
 * Rooms live in an arena owned by the RoomGraph and are keyed by their unique name.
 * Connections are one-way name references: wiring A -north-> B says nothing about B -south-> A.
 * Story variables are a fixed set of typed values created at world load and mutated only by actions.
 */

// --- Direction & movement ----------------------------------------------------

/** Cardinal directions, in the order every traversal iterates them. */
export const DIRECTIONS = ['north', 'south', 'east', 'west'] as const

export type Direction = (typeof DIRECTIONS)[number]

export function isDirection(value: string): value is Direction {
    return (DIRECTIONS as readonly string[]).includes(value)
}

/** Map of directions to their opposites for explicit two-way wiring */
const OPPOSITE_DIRECTIONS: Readonly<Record<Direction, Direction>> = {
    north: 'south',
    south: 'north',
    east: 'west',
    west: 'east'
} as const

export function getOppositeDirection(direction: Direction): Direction {
    return OPPOSITE_DIRECTIONS[direction]
}

// --- Room --------------------------------------------------------------------

/** Always exactly four entries; `null` means no exit that way. Values are room names. */
export type RoomConnections = Record<Direction, string | null>

export interface Room {
    readonly name: string
    readonly description: string
    /** Prompt used to request an illustration of the room. */
    readonly imagePrompt: string
    /** Event text shown while the player is still on the canon route. */
    readonly canonEvent: string
    /** Cached illustration path, once one has been produced. */
    imagePath?: string
    readonly connections: RoomConnections
}

/** Room data as supplied by a world definition, before the graph takes ownership. */
export type RoomSeed = Pick<Room, 'name' | 'description' | 'imagePrompt' | 'canonEvent'>

export function emptyConnections(): RoomConnections {
    return { north: null, south: null, east: null, west: null }
}

// --- Story state -------------------------------------------------------------

/** Narrative event active in the current room. */
export interface StoryEvent {
    readonly text: string
    readonly isCanon: boolean
}

export type VariableValue = number | boolean | string

export type VariableSnapshot = Readonly<Record<string, VariableValue>>

/**
 * A player-facing action proposed by the story generator.
 * Only names already tracked by the variable store take effect when applied.
 */
export interface Action {
    readonly description: string
    readonly changedVariables: Readonly<Record<string, VariableValue>>
}
