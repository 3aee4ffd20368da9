/**
 * Domain exceptions for world construction, variable parsing and story generation.
 *
 * Navigation into a direction with no exit and actions naming unknown variables are
 * NOT exceptions; they are silent no-ops handled by the graph and the variable store.
 */

/**
 * Base class for all Waymark domain exceptions.
 */
export abstract class StoryException extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = this.constructor.name
        Error.captureStackTrace(this, this.constructor)
    }
}

export type WorldConfigurationErrorCode =
    | 'invalid-world'
    | 'empty-world'
    | 'duplicate-room'
    | 'missing-room'
    | 'unknown-reference-room'
    | 'world-file-unreadable'

/**
 * The world definition cannot produce a consistent session.
 * Raised at construction time; a session never starts from a world that threw this.
 */
export class WorldConfigurationException extends StoryException {
    constructor(
        message: string,
        public readonly code: WorldConfigurationErrorCode,
        public readonly subject?: string,
        options?: { cause?: unknown }
    ) {
        super(message, options)
    }
}

/**
 * A `name: value` variable line could not be parsed.
 */
export class VariableParseException extends StoryException {
    constructor(
        message: string,
        public readonly line: string,
        public readonly lineNumber: number
    ) {
        super(message)
    }
}

export type GenerationFailureReason = 'timeout' | 'cancelled' | 'error' | 'empty' | 'invalid-response' | 'not-configured'

/**
 * An external generator call (event, actions or image) did not produce a usable result.
 * Callers recover locally: session state stays as it was before the call.
 */
export class GenerationFailedException extends StoryException {
    constructor(
        message: string,
        public readonly reason: GenerationFailureReason,
        options?: { cause?: unknown }
    ) {
        super(message, options)
    }
}
