/**
 * World Session
 *
 * The mutation API a UI drives: move, take an action, load a room image. Each operation
 * computes its result tentatively and commits only after every generator call succeeded,
 * so a failed, cancelled or timed-out generation leaves the session exactly as it was.
 *
 * State machine: uninitialized → ready ⇄ busy. One operation runs at a time; a call made
 * while another is pending returns { status: 'busy' } immediately.
 */
import {
    CanonRouteTracker,
    computeGridLayout,
    GenerationFailedException,
    WorldConfigurationException,
    type Action,
    type Direction,
    type GenerationFailureReason,
    type GridLayout,
    type IRoomImageProvider,
    type IStoryGenerator,
    type Room,
    type RoomGraph,
    type RoomGraphView,
    type StoryEvent,
    type VariableChange,
    type VariableSnapshot,
    type VariableStore
} from '@waymark/shared'
import type { TelemetryService } from '../telemetry/TelemetryService.js'
import type { LoadedWorld } from '../world/worldLoader.js'

export type SessionStatus = 'uninitialized' | 'ready' | 'busy'

export type SessionOperation = 'start' | 'move' | 'action' | 'image'

export interface GenerationFailure {
    operation: SessionOperation
    reason: GenerationFailureReason
    message: string
}

export interface OperationOptions {
    signal?: AbortSignal
}

export type BusyOutcome = { status: 'busy' }
export type FailedOutcome = { status: 'generation-failed'; failure: GenerationFailure }

export type StartOutcome = { status: 'ready'; actions: readonly Action[] } | FailedOutcome | BusyOutcome

export type MoveOutcome =
    | { status: 'moved'; room: Room; event: StoryEvent; actions: readonly Action[] }
    | { status: 'blocked'; direction: Direction }
    | FailedOutcome
    | BusyOutcome

export type ActionOutcome = { status: 'applied'; changes: VariableChange[]; actions: readonly Action[] } | FailedOutcome | BusyOutcome

export type ImageOutcome = { status: 'loaded'; path: string } | { status: 'unavailable' } | FailedOutcome | BusyOutcome

export interface WorldSessionDependencies {
    generator: IStoryGenerator
    telemetry: TelemetryService
    imageProvider?: IRoomImageProvider | null
}

type Generated<T> = { ok: true; value: T } | { ok: false; outcome: FailedOutcome }

export class WorldSession {
    private state: SessionStatus = 'uninitialized'
    private started = false
    private event: StoryEvent
    private readonly seen: string[]
    private currentActions: Action[] = []
    private variableStore: VariableStore
    private readonly graph: RoomGraph
    private readonly canon: CanonRouteTracker
    private readonly generator: IStoryGenerator
    private readonly telemetry: TelemetryService
    private readonly imageProvider: IRoomImageProvider | null

    constructor(world: LoadedWorld, deps: WorldSessionDependencies) {
        // Position and history are per session; the loaded world stays at its start room.
        this.graph = world.graph.clone()
        const start = this.graph.currentRoom
        if (!start) {
            throw new WorldConfigurationException('A session needs at least one room', 'empty-world')
        }

        this.canon = new CanonRouteTracker(world.referenceOrder)
        this.variableStore = world.variables.clone()
        this.event = { text: start.canonEvent, isCanon: true }
        this.seen = [start.canonEvent]
        this.generator = deps.generator
        this.telemetry = deps.telemetry
        this.imageProvider = deps.imageProvider ?? null
    }

    get status(): SessionStatus {
        return this.state
    }

    get currentRoom(): Room {
        return this.requireCurrentRoom()
    }

    get currentEvent(): StoryEvent {
        return this.event
    }

    get visitedRooms(): readonly string[] {
        return this.graph.visitedRooms
    }

    get seenEvents(): readonly string[] {
        return [...this.seen]
    }

    get variables(): VariableSnapshot {
        return this.variableStore.snapshot()
    }

    get actions(): readonly Action[] {
        return [...this.currentActions]
    }

    get referenceOrder(): readonly string[] {
        return this.canon.referenceOrder
    }

    get isOnCanon(): boolean {
        return this.canon.isOnCanon(this.graph.visitedRooms)
    }

    get rooms(): RoomGraphView {
        return this.graph
    }

    get canGenerateImages(): boolean {
        return this.imageProvider !== null
    }

    availableDirections(): Direction[] {
        return this.graph.availableDirections()
    }

    isActionable(action: Action): boolean {
        return this.variableStore.isActionable(action)
    }

    /** Grid layout rooted at the current room. */
    layout(): GridLayout {
        return computeGridLayout(this.graph)
    }

    /**
     * Generate the first action set for the start room (or regenerate it for the current
     * room after a failure). The active event is unchanged.
     */
    async start(options?: OperationOptions): Promise<StartOutcome> {
        return this.exclusive<StartOutcome>('start', async () => {
            const started = Date.now()
            const room = this.requireCurrentRoom()
            const generated = await this.generate('start', options, (signal) =>
                this.generator.generateActions(room, this.event, this.variableStore.snapshot(), { signal })
            )
            if (!generated.ok) return generated.outcome

            this.currentActions = generated.value
            this.started = true
            this.telemetry.trackGameEventStrict('Session.Started', {
                room: room.name,
                actionCount: generated.value.length,
                latencyMs: Date.now() - started
            })
            return { status: 'ready', actions: this.actions }
        })
    }

    async move(direction: Direction, options?: OperationOptions): Promise<MoveOutcome> {
        return this.exclusive<MoveOutcome>('move', async () => {
            const from = this.requireCurrentRoom()
            const target = this.graph.neighbour(direction)
            if (!target) {
                this.telemetry.trackGameEventStrict('Navigation.Move.Blocked', { from: from.name, direction })
                return { status: 'blocked', direction }
            }
            return this.enter(from, target, direction, options)
        })
    }

    /**
     * Resolve the event and actions for `target` against the tentative history, then
     * commit the move, the event, the seen event and the actions together.
     */
    private async enter(from: Room, target: Room, direction: Direction, options?: OperationOptions): Promise<MoveOutcome> {
        const started = Date.now()
        const wasOnCanon = this.isOnCanon
        const tentativeHistory = [...this.graph.visitedRooms, target.name]
        const isCanon = this.canon.isOnCanon(tentativeHistory)

        const seenSoFar = [...this.seen]
        const resolved: Generated<StoryEvent> = isCanon
            ? { ok: true, value: { text: target.canonEvent, isCanon: true } }
            : await this.generate('move', options, async (signal) => ({
                  text: await this.generator.generateNonCanonEvent(target, seenSoFar, { signal }),
                  isCanon: false
              }))
        if (!resolved.ok) return resolved.outcome
        const event = resolved.value

        const generatedActions = await this.generate('move', options, (signal) =>
            this.generator.generateActions(target, event, this.variableStore.snapshot(), { signal })
        )
        if (!generatedActions.ok) return generatedActions.outcome

        // Commit
        this.graph.move(direction)
        this.event = event
        this.seen.push(event.text)
        this.currentActions = generatedActions.value
        this.started = true

        if (wasOnCanon && !isCanon) {
            this.telemetry.trackGameEventStrict('Story.Canon.Diverged', {
                room: target.name,
                divergenceIndex: this.canon.divergenceIndex(this.graph.visitedRooms) ?? tentativeHistory.length - 1
            })
        }
        this.telemetry.trackGameEventStrict('Navigation.Move.Success', {
            from: from.name,
            to: target.name,
            direction,
            isCanon,
            latencyMs: Date.now() - started
        })

        return { status: 'moved', room: target, event, actions: this.actions }
    }

    /**
     * Apply an action's variable changes and regenerate the action set for the same room
     * and event. Variables and actions change together or not at all.
     */
    async takeAction(action: Action, options?: OperationOptions): Promise<ActionOutcome> {
        return this.exclusive<ActionOutcome>('action', async () => {
            const room = this.requireCurrentRoom()
            const actionable = this.variableStore.isActionable(action)
            const next = this.variableStore.clone()
            const changes = next.apply(action)

            const generated = await this.generate('action', options, (signal) =>
                this.generator.generateActions(room, this.event, next.snapshot(), { signal })
            )
            if (!generated.ok) return generated.outcome

            this.variableStore = next
            this.currentActions = generated.value
            this.started = true

            this.telemetry.trackGameEventStrict('Story.Action.Taken', { room: room.name, changedCount: changes.length, actionable })
            for (const change of changes) {
                this.telemetry.trackGameEventStrict('Story.Variable.Updated', {
                    name: change.name,
                    previous: String(change.previous),
                    next: String(change.next)
                })
            }

            return { status: 'applied', changes, actions: this.actions }
        })
    }

    /** Fetch (or reuse) the current room's illustration and record its path on the room. */
    async loadRoomImage(options?: OperationOptions): Promise<ImageOutcome> {
        const provider = this.imageProvider
        if (!provider) return { status: 'unavailable' }

        return this.exclusive<ImageOutcome>('image', async () => {
            const room = this.requireCurrentRoom()
            const generated = await this.generate('image', options, (signal) => provider.ensureImage(room, { signal }))
            if (!generated.ok) return generated.outcome

            this.graph.setRoomImage(room.name, generated.value)
            return { status: 'loaded', path: generated.value }
        })
    }

    private async exclusive<T>(operation: SessionOperation, run: () => Promise<T>): Promise<T | BusyOutcome> {
        if (this.state === 'busy') {
            this.telemetry.trackGameEventStrict('Session.Busy.Rejected', { operation })
            return { status: 'busy' }
        }

        this.state = 'busy'
        try {
            return await run()
        } finally {
            this.state = this.started ? 'ready' : 'uninitialized'
        }
    }

    private async generate<T>(
        operation: SessionOperation,
        options: OperationOptions | undefined,
        call: (signal: AbortSignal | undefined) => Promise<T>
    ): Promise<Generated<T>> {
        const signal = options?.signal
        try {
            if (signal?.aborted) {
                throw new GenerationFailedException('Operation was cancelled', 'cancelled')
            }
            const value = await call(signal)
            // A generator that ignores the signal must not commit a cancelled operation.
            if (signal?.aborted) {
                throw new GenerationFailedException('Operation was cancelled', 'cancelled')
            }
            return { ok: true, value }
        } catch (error) {
            return { ok: false, outcome: { status: 'generation-failed', failure: this.toFailure(operation, error) } }
        }
    }

    private toFailure(operation: SessionOperation, error: unknown): GenerationFailure {
        if (error instanceof GenerationFailedException) {
            return { operation, reason: error.reason, message: error.message }
        }

        const exception = error instanceof Error ? error : new Error(String(error))
        this.telemetry.trackException(exception, { operation })
        return { operation, reason: 'error', message: exception.message }
    }

    private requireCurrentRoom(): Room {
        const room = this.graph.currentRoom
        if (!room) {
            throw new WorldConfigurationException('A session needs at least one room', 'empty-world')
        }
        return room
    }
}
