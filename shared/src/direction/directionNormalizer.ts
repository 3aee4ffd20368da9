import { DIRECTIONS, isDirection, type Direction } from '../domainModels.js'

/**
 * Direction Normalizer
 *
 * Resolves player input to a canonical Direction: exact names, single-letter shortcuts,
 * then typo tolerance (edit distance ≤1, only when exactly one direction qualifies).
 *
 * Never throws; anything unresolved comes back as { status: 'unknown' } with a clarification.
 */

export type DirectionNormalizationResult =
    | { status: 'ok'; canonical: Direction }
    | { status: 'unknown'; clarification: string }

const DIRECTION_SHORTCUTS: Readonly<Record<string, Direction>> = {
    n: 'north',
    s: 'south',
    e: 'east',
    w: 'west'
}

/**
 * Levenshtein edit distance (dynamic programming, single rolling row).
 */
function editDistance(a: string, b: string): number {
    if (a.length === 0) return b.length
    if (b.length === 0) return a.length

    let previous = Array.from({ length: a.length + 1 }, (_, j) => j)
    for (let i = 1; i <= b.length; i++) {
        const row = [i]
        for (let j = 1; j <= a.length; j++) {
            const cost = b.charAt(i - 1) === a.charAt(j - 1) ? 0 : 1
            row[j] = Math.min(previous[j - 1] + cost, row[j - 1] + 1, previous[j] + 1)
        }
        previous = row
    }
    return previous[a.length]
}

function findTypoMatch(input: string): Direction | undefined {
    const candidates = DIRECTIONS.filter((dir) => editDistance(input, dir) <= 1)
    return candidates.length === 1 ? candidates[0] : undefined
}

export function normalizeDirection(input: string): DirectionNormalizationResult {
    const value = input.trim().toLowerCase()
    if (!value) {
        return { status: 'unknown', clarification: 'Which way? Try north, south, east or west.' }
    }

    if (isDirection(value)) return { status: 'ok', canonical: value }

    const shortcut = DIRECTION_SHORTCUTS[value]
    if (shortcut) return { status: 'ok', canonical: shortcut }

    // Single letters are shortcuts or nothing; typo matching them would guess.
    if (value.length > 2) {
        const typo = findTypoMatch(value)
        if (typo) return { status: 'ok', canonical: typo }
    }

    return { status: 'unknown', clarification: `"${input.trim()}" is not a direction. Try north, south, east or west.` }
}
