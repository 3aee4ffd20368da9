// Canonical game telemetry event names (Domain.[Subject].Action) with 2-3 PascalCase segments.
//
// NO INLINE LITERALS: emitters reference names from this registry; TelemetryService.trackGameEventStrict
// rejects anything else as Telemetry.EventName.Invalid.

export const GAME_EVENT_NAMES = [
    // Session lifecycle
    'World.Loaded',
    'Session.Started',
    // Navigation
    'Navigation.Move.Success',
    'Navigation.Move.Blocked',
    // Story state
    'Story.Canon.Diverged',
    'Story.Event.Generated',
    'Story.Actions.Generated',
    'Story.Action.Taken',
    'Story.Variable.Updated',
    // Generator failures (event, actions or image); session state is left unchanged
    'Generation.Failed',
    'Session.Busy.Rejected',
    // Room illustrations
    'Room.Image.CacheHit',
    'Room.Image.Generated',
    'Room.Image.Failed',
    // World authoring
    'Story.CanonEvent.Generated',
    'Story.Variables.Generated',
    'World.Authored',
    // Internal / fallback diagnostics
    'Telemetry.EventName.Invalid'
] as const

export type GameEventName = (typeof GAME_EVENT_NAMES)[number]

export function isGameEventName(name: string): name is GameEventName {
    return (GAME_EVENT_NAMES as readonly string[]).includes(name)
}

export interface EventPayloadMap {
    'World.Loaded': { roomCount: number; connectionCount: number; variableCount: number; referenceLength: number }
    'Session.Started': { room: string; actionCount: number; latencyMs: number }
    'Navigation.Move.Success': { from: string; to: string; direction: string; isCanon: boolean; latencyMs: number }
    'Navigation.Move.Blocked': { from: string; direction: string }
    'Story.Canon.Diverged': { room: string; divergenceIndex: number }
    'Story.Event.Generated': { room: string; attempts: number; latencyMs: number }
    'Story.Actions.Generated': { room: string; actionCount: number; attempts: number; latencyMs: number }
    'Story.Action.Taken': { room: string; changedCount: number; actionable: boolean }
    'Story.Variable.Updated': { name: string; previous: string; next: string }
    'Generation.Failed': { operation: string; reason: string; room?: string }
    'Session.Busy.Rejected': { operation: string }
    'Room.Image.CacheHit': { room: string; hash: string }
    'Room.Image.Generated': { room: string; hash: string; bytes: number }
    'Room.Image.Failed': { room: string; reason: string }
    'Story.CanonEvent.Generated': { room: string; attempts: number; latencyMs: number }
    'Story.Variables.Generated': { variableCount: number; attempts: number; latencyMs: number }
    'World.Authored': { roomCount: number; generatedEvents: number; generatedVariables: boolean }
    'Telemetry.EventName.Invalid': { requested: string }
}

// Regex used to keep registry entries well-formed (duplicated in tests)
export const TELEMETRY_NAME_REGEX = /^[A-Z][A-Za-z]+(\.[A-Z][A-Za-z]+){1,2}$/
