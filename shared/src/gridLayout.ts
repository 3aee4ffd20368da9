/**
 * gridLayout – integer grid placement for the room map.
 *
 * BFS from a root room (the current room by default), assigning each newly reached room
 * its parent's cell plus the offset of the exit direction used. First assignment wins:
 * a room reached again through another path keeps its original cell, so graphs whose
 * cycles don't close geometrically may overlap. That is accepted, not corrected.
 */
import { DIRECTIONS, type Direction } from './domainModels.js'
import type { RoomGraphView } from './roomGraph.js'

export interface GridPoint {
    x: number
    y: number
}

export interface GridBounds {
    minX: number
    maxX: number
    minY: number
    maxY: number
}

export interface GridLayout {
    /** Name of the room placed at (0, 0), or null for an empty layout. */
    root: string | null
    /** Room name → grid cell, in BFS discovery order. */
    positions: ReadonlyMap<string, GridPoint>
    /** Extents of all placed rooms; null when nothing was placed. */
    bounds: GridBounds | null
}

/** Direction → grid offset where north is (0, -1). */
export const DIRECTION_OFFSETS: Readonly<Record<Direction, GridPoint>> = {
    north: { x: 0, y: -1 },
    south: { x: 0, y: 1 },
    east: { x: 1, y: 0 },
    west: { x: -1, y: 0 }
}

/** A new layout with nothing placed. */
export function emptyLayout(): GridLayout {
    return { root: null, positions: new Map(), bounds: null }
}

/**
 * Place every room reachable from `rootName` (default: the current room).
 * Deterministic for a fixed graph and root.
 */
export function computeGridLayout(graph: RoomGraphView, rootName?: string): GridLayout {
    const root = rootName === undefined ? graph.currentRoom : graph.getRoom(rootName)
    if (!root) return emptyLayout()

    const positions = new Map<string, GridPoint>([[root.name, { x: 0, y: 0 }]])
    const bounds: GridBounds = { minX: 0, maxX: 0, minY: 0, maxY: 0 }
    const queue: Array<{ name: string; x: number; y: number }> = [{ name: root.name, x: 0, y: 0 }]

    for (let head = 0; head < queue.length; head++) {
        const { name, x, y } = queue[head]
        const room = graph.getRoom(name)
        if (!room) continue

        for (const direction of DIRECTIONS) {
            const target = room.connections[direction]
            if (target === null || positions.has(target) || !graph.getRoom(target)) continue

            const offset = DIRECTION_OFFSETS[direction]
            const cell = { x: x + offset.x, y: y + offset.y }
            positions.set(target, cell)
            queue.push({ name: target, ...cell })

            bounds.minX = Math.min(bounds.minX, cell.x)
            bounds.maxX = Math.max(bounds.maxX, cell.x)
            bounds.minY = Math.min(bounds.minY, cell.y)
            bounds.maxY = Math.max(bounds.maxY, cell.y)
        }
    }

    return { root: root.name, positions, bounds }
}
