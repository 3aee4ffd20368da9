import {
    DIRECTIONS,
    emptyConnections,
    getOppositeDirection,
    type Direction,
    type Room,
    type RoomSeed
} from './domainModels.js'
import { WorldConfigurationException } from './exceptions/index.js'

/**
 * Read-only view of a room graph, enough for layout and rendering.
 */
export interface RoomGraphView {
    readonly currentRoom: Room | null
    getRoom(name: string): Room | undefined
}

/**
 * Arena of rooms keyed by name, plus the player's position and visitation history.
 *
 * Invariants:
 * - every non-null connection names a room in this graph
 * - the current room, once set, is a member of the graph
 * - history only grows; it starts with the first room added
 */
export class RoomGraph implements RoomGraphView {
    private readonly rooms = new Map<string, Room>()
    private readonly history: string[] = []
    private currentName: string | null = null

    /**
     * Take ownership of a room. The first room added becomes the current (start) room.
     * @throws WorldConfigurationException on a duplicate name; room data is never merged.
     */
    addRoom(seed: RoomSeed): Room {
        if (this.rooms.has(seed.name)) {
            throw new WorldConfigurationException(`Duplicate room name: ${seed.name}`, 'duplicate-room', seed.name)
        }
        const room: Room = {
            name: seed.name,
            description: seed.description,
            imagePrompt: seed.imagePrompt,
            canonEvent: seed.canonEvent,
            connections: emptyConnections()
        }
        this.rooms.set(room.name, room)

        if (this.currentName === null) {
            this.currentName = room.name
            this.history.push(room.name)
        }
        return room
    }

    /**
     * Wire `from -direction-> to`. The reverse exit is NOT created.
     * @returns false (and no change) when either room is unknown
     */
    connect(from: string, to: string, direction: Direction): boolean {
        const origin = this.rooms.get(from)
        if (!origin || !this.rooms.has(to)) return false
        origin.connections[direction] = to
        return true
    }

    /**
     * Wire both `a -direction-> b` and `b -opposite-> a`. Never used implicitly.
     */
    connectBoth(a: string, b: string, direction: Direction): boolean {
        if (!this.rooms.has(a) || !this.rooms.has(b)) return false
        this.connect(a, b, direction)
        this.connect(b, a, getOppositeDirection(direction))
        return true
    }

    /**
     * Follow the current room's exit. A missing exit is a no-op, not an error.
     * @returns the new current room, or null when the direction is disabled
     */
    move(direction: Direction): Room | null {
        const next = this.neighbour(direction)
        if (!next) return null
        this.currentName = next.name
        this.history.push(next.name)
        return next
    }

    /** Room reached from the current room in `direction`, without moving. */
    neighbour(direction: Direction): Room | null {
        const current = this.currentRoom
        if (!current) return null
        const target = current.connections[direction]
        return target === null ? null : (this.rooms.get(target) ?? null)
    }

    /** Directions with an exit from the current room, in canonical order. */
    availableDirections(): Direction[] {
        return DIRECTIONS.filter((d) => this.neighbour(d) !== null)
    }

    setRoomImage(name: string, imagePath: string): boolean {
        const room = this.rooms.get(name)
        if (!room) return false
        room.imagePath = imagePath
        return true
    }

    /**
     * Copy of the rooms and their connections (and cached image paths), positioned at the
     * start room with a fresh history. Each play session walks its own copy.
     */
    clone(): RoomGraph {
        const copy = new RoomGraph()
        for (const room of this.rooms.values()) {
            const added = copy.addRoom(room)
            Object.assign(added.connections, room.connections)
            if (room.imagePath !== undefined) added.imagePath = room.imagePath
        }
        return copy
    }

    getRoom(name: string): Room | undefined {
        return this.rooms.get(name)
    }

    hasRoom(name: string): boolean {
        return this.rooms.has(name)
    }

    get size(): number {
        return this.rooms.size
    }

    get currentRoom(): Room | null {
        return this.currentName === null ? null : (this.rooms.get(this.currentName) ?? null)
    }

    get visitedRooms(): readonly string[] {
        return this.history
    }
}
