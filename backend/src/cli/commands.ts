import { normalizeDirection, type Direction } from '@waymark/shared'

export type PlayCommand =
    | { kind: 'move'; direction: Direction }
    | { kind: 'action'; index: number }
    | { kind: 'map' }
    | { kind: 'image' }
    | { kind: 'retry' }
    | { kind: 'help' }
    | { kind: 'quit' }
    | { kind: 'unknown'; message: string }

export const HELP_TEXT = [
    'Commands:',
    '  north | south | east | west (or n, s, e, w)  move',
    '  <number>                                      take that action',
    '  map                                           show the map',
    '  image                                         fetch the room illustration',
    '  retry                                         repeat the last failed step',
    '  quit                                          leave'
].join('\n')

/** Action numbers are 1-based on input and 0-based in the result. */
export function parseCommand(line: string): PlayCommand {
    const value = line.trim().toLowerCase()

    switch (value) {
        case 'quit':
        case 'exit':
            return { kind: 'quit' }
        case 'map':
            return { kind: 'map' }
        case 'image':
            return { kind: 'image' }
        case 'retry':
            return { kind: 'retry' }
        case 'help':
        case '?':
            return { kind: 'help' }
    }

    if (/^\d+$/.test(value)) {
        const number = Number.parseInt(value, 10)
        return number >= 1 ? { kind: 'action', index: number - 1 } : { kind: 'unknown', message: 'Actions are numbered from 1.' }
    }

    const direction = normalizeDirection(line)
    return direction.status === 'ok'
        ? { kind: 'move', direction: direction.canonical }
        : { kind: 'unknown', message: direction.clarification }
}
