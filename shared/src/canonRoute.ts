/**
 * Canon route tracking.
 *
 * The player is on canon while their visitation history agrees with the reference order
 * over the length both share. Always recomputed from scratch: the answer depends only on
 * (history, reference), never on call order.
 */

/**
 * True iff `history` and `reference` agree element-wise on their first
 * min(history.length, reference.length) entries.
 */
export function isOnCanonRoute(history: readonly string[], reference: readonly string[]): boolean {
    return findDivergenceIndex(history, reference) === null
}

/**
 * First index within the shared prefix where history leaves the reference, or null.
 */
export function findDivergenceIndex(history: readonly string[], reference: readonly string[]): number | null {
    const n = Math.min(history.length, reference.length)
    for (let i = 0; i < n; i++) {
        if (history[i] !== reference[i]) return i
    }
    return null
}

export class CanonRouteTracker {
    private readonly reference: readonly string[]

    constructor(referenceOrder: readonly string[]) {
        this.reference = Object.freeze([...referenceOrder])
    }

    get referenceOrder(): readonly string[] {
        return this.reference
    }

    isOnCanon(history: readonly string[]): boolean {
        return isOnCanonRoute(history, this.reference)
    }

    divergenceIndex(history: readonly string[]): number | null {
        return findDivergenceIndex(history, this.reference)
    }
}
