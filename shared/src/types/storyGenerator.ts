import type { Action, Room, StoryEvent, VariableSnapshot } from '../domainModels.js'

export interface GenerationOptions {
    /** Cancels the in-flight request; the call then rejects with reason 'cancelled'. */
    signal?: AbortSignal
}

/**
 * External generator of non-canon events and action sets.
 *
 * Implementations reject with GenerationFailedException on timeout, cancellation,
 * empty or malformed output. They never mutate the arguments.
 */
export interface IStoryGenerator {
    /** Improvised event for a room visited off the canon route. */
    generateNonCanonEvent(room: Room, seenEvents: readonly string[], options?: GenerationOptions): Promise<string>

    /** Fresh action set for the room and its active event; replaces the previous set entirely. */
    generateActions(room: Room, event: StoryEvent, variables: VariableSnapshot, options?: GenerationOptions): Promise<Action[]>
}

/**
 * Fills in what a sketched-out world lacks before it can be played. Used when authoring a
 * world file, never during play.
 */
export interface IWorldAuthor {
    /** The event that happens in the room on the story's own route. */
    generateCanonEvent(room: Pick<Room, 'name' | 'description'>, options?: GenerationOptions): Promise<string>

    /** Initial `name: value` lines for the story variables; every line parses. */
    generateVariables(options?: GenerationOptions): Promise<string[]>
}

/**
 * Produces (or reuses) an illustration for a room, content-addressed by its name,
 * description and image prompt.
 * @returns path of the image file
 */
export interface IRoomImageProvider {
    ensureImage(room: Room, options?: GenerationOptions): Promise<string>
}
