/**
 * Text rendering for the terminal commands: one turn (room, event, variables, actions,
 * exits), an ASCII map drawn from the grid layout, and the authoring summary.
 */
import type { Direction, GridLayout, RoomGraphView } from '@waymark/shared'
import type { GenerationFailure, WorldSession } from '../services/WorldSession.js'
import type { AuthoringSummary } from '../world/worldAuthoring.js'

export type TurnView = Pick<
    WorldSession,
    'currentRoom' | 'currentEvent' | 'variables' | 'actions' | 'isActionable' | 'availableDirections'
>

const MAP_LABELS = '123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ'

export function renderTurn(view: TurnView): string {
    const room = view.currentRoom
    const event = view.currentEvent
    const lines = [`== ${room.name} ==`, room.description, '', `${event.isCanon ? 'Canon' : 'Non-Canon'} Event: ${event.text}`, '']

    const variables = Object.entries(view.variables)
    if (variables.length) {
        lines.push('Variables:', ...variables.map(([name, value]) => `  - ${name}: ${String(value)}`))
    } else {
        lines.push('Variables: (none)')
    }
    lines.push('')

    if (view.actions.length) {
        // `!` marks actions that change no tracked variable
        lines.push('Actions:', ...view.actions.map((action, i) => `  ${i + 1}. ${view.isActionable(action) ? '' : '! '}${action.description}`))
    } else {
        lines.push('Actions: (none, type "retry")')
    }
    lines.push('')

    const exits = view.availableDirections()
    lines.push(`Exits: ${exits.length ? exits.join(', ') : 'none'}`)
    if (room.imagePath) {
        lines.push(`Image: ${room.imagePath}`)
    }
    return lines.join('\n')
}

function isLinked(graph: RoomGraphView, a: string | undefined, b: string | undefined, forward: Direction, back: Direction): boolean {
    if (a === undefined || b === undefined) return false
    return graph.getRoom(a)?.connections[forward] === b || graph.getRoom(b)?.connections[back] === a
}

/**
 * Rooms as `[n]` cells (the current room as `<n>`), linked by `-` and `|` where either
 * room has an exit toward the other, followed by a legend in layout order.
 */
export function renderAsciiMap(layout: GridLayout, graph: RoomGraphView): string {
    if (!layout.bounds) return '(empty map)'
    const { minX, maxX, minY, maxY } = layout.bounds
    const current = graph.currentRoom?.name

    const labels = new Map<string, string>()
    const cells = new Map<string, string>()
    let index = 0
    for (const [name, point] of layout.positions) {
        labels.set(name, MAP_LABELS.charAt(index++) || '?')
        cells.set(`${point.x},${point.y}`, name)
    }

    const lines: string[] = []
    for (let y = minY; y <= maxY; y++) {
        let row = ''
        let below = ''
        for (let x = minX; x <= maxX; x++) {
            const name = cells.get(`${x},${y}`)
            const label = name === undefined ? undefined : labels.get(name)
            row += label === undefined ? '   ' : name === current ? `<${label}>` : `[${label}]`
            below += isLinked(graph, name, cells.get(`${x},${y + 1}`), 'south', 'north') ? ' | ' : '   '
            if (x < maxX) {
                row += isLinked(graph, name, cells.get(`${x + 1},${y}`), 'east', 'west') ? '-' : ' '
                below += ' '
            }
        }
        lines.push(row.trimEnd())
        if (y < maxY) lines.push(below.trimEnd())
    }

    const legend = [...labels].map(([name, label]) => `${label} ${name}${name === current ? ' (here)' : ''}`)
    return [...lines, '', ...legend].join('\n')
}

export function renderFailure(failure: GenerationFailure): string {
    return `Generation failed (${failure.reason}): ${failure.message}\nNothing changed. Type "retry" to try again.`
}

export function renderAuthoringSummary(summary: AuthoringSummary, outputPath: string): string {
    const lines = [`Wrote ${outputPath}`]
    lines.push(
        summary.generatedEvents.length
            ? `Canon events written for: ${summary.generatedEvents.join(', ')}`
            : 'Every room already had a canon event.'
    )
    if (summary.generatedVariables) {
        lines.push('Variables written:', ...summary.world.variables.map((line) => `  - ${line}`))
    } else {
        lines.push('Variables kept as authored.')
    }
    return lines.join('\n')
}
