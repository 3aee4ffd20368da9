/**
 * Pixel geometry for drawing a grid layout: one square cell per room and a short door
 * tick on the cell edge for every exit whose target is on the map.
 *
 * Pure data; renderers (canvas, SVG, terminal) only draw what this returns.
 */
import { DIRECTIONS, type Direction } from './domainModels.js'
import type { GridLayout } from './gridLayout.js'
import type { RoomGraphView } from './roomGraph.js'

export interface MapGeometryOptions {
    /** Side of a room cell in pixels. Default: 100. */
    cellSize?: number
    /** Padding around the grid in pixels. Default: 20. */
    margin?: number
    /** Cell outline width; added once to each canvas dimension. Default: 2. */
    borderWidth?: number
    /** Length of a door tick in pixels. Default: 20. */
    doorLength?: number
}

export const DEFAULT_MAP_GEOMETRY: Required<MapGeometryOptions> = {
    cellSize: 100,
    margin: 20,
    borderWidth: 2,
    doorLength: 20
}

export interface MapCell {
    name: string
    /** Top-left corner in canvas pixels. */
    x: number
    y: number
    size: number
    isCurrent: boolean
}

export interface DoorSegment {
    room: string
    direction: Direction
    x1: number
    y1: number
    x2: number
    y2: number
}

export interface MapGeometry {
    width: number
    height: number
    cells: MapCell[]
    doors: DoorSegment[]
}

/**
 * Compute a canvas exactly fitting `layout`, with cells in layout order and doors in
 * cell order then canonical direction order.
 */
export function computeMapGeometry(layout: GridLayout, graph: RoomGraphView, options?: MapGeometryOptions): MapGeometry {
    const { cellSize, margin, borderWidth, doorLength } = { ...DEFAULT_MAP_GEOMETRY, ...options }
    const bounds = layout.bounds
    const cols = bounds ? bounds.maxX - bounds.minX + 1 : 0
    const rows = bounds ? bounds.maxY - bounds.minY + 1 : 0

    const geometry: MapGeometry = {
        width: cols * cellSize + 2 * margin + borderWidth,
        height: rows * cellSize + 2 * margin + borderWidth,
        cells: [],
        doors: []
    }
    if (!bounds) return geometry

    const currentName = graph.currentRoom?.name
    const half = cellSize / 2
    const halfDoor = doorLength / 2

    for (const [name, point] of layout.positions) {
        const x = (point.x - bounds.minX) * cellSize + margin
        const y = (point.y - bounds.minY) * cellSize + margin
        geometry.cells.push({ name, x, y, size: cellSize, isCurrent: name === currentName })

        const room = graph.getRoom(name)
        if (!room) continue
        for (const direction of DIRECTIONS) {
            const target = room.connections[direction]
            if (target === null || !layout.positions.has(target)) continue

            switch (direction) {
                case 'north':
                    geometry.doors.push({ room: name, direction, x1: x + half - halfDoor, y1: y, x2: x + half + halfDoor, y2: y })
                    break
                case 'south':
                    geometry.doors.push({
                        room: name,
                        direction,
                        x1: x + half - halfDoor,
                        y1: y + cellSize,
                        x2: x + half + halfDoor,
                        y2: y + cellSize
                    })
                    break
                case 'east':
                    geometry.doors.push({
                        room: name,
                        direction,
                        x1: x + cellSize,
                        y1: y + half - halfDoor,
                        x2: x + cellSize,
                        y2: y + half + halfDoor
                    })
                    break
                case 'west':
                    geometry.doors.push({ room: name, direction, x1: x, y1: y + half - halfDoor, x2: x, y2: y + half + halfDoor })
                    break
            }
        }
    }

    return geometry
}
