/**
 * Story variables: the `name: value` line parser and the typed store actions mutate.
 *
 * The tracked set of names is fixed when the store is created. Actions can change values
 * of existing names; names the store does not already track are ignored.
 */
import type { Action, VariableSnapshot, VariableValue } from './domainModels.js'
import { VariableParseException } from './exceptions/index.js'

const INTEGER_PATTERN = /^[+-]?\d+$/
const SURROUNDING_QUOTES = /^"+|"+$/g

/**
 * Type a raw value: integer literal → number, true/false (any case) → boolean, else string.
 * @throws VariableParseException for an integer literal outside the safe integer range
 */
export function parseVariableValue(raw: string, line = raw, lineNumber = 1): VariableValue {
    const value = raw.trim().replace(SURROUNDING_QUOTES, '').trim()

    if (INTEGER_PATTERN.test(value)) {
        const parsed = Number.parseInt(value, 10)
        if (!Number.isSafeInteger(parsed)) {
            throw new VariableParseException(`Variable line ${lineNumber} has an integer outside the safe range: ${value}`, line, lineNumber)
        }
        return parsed
    }

    const lowered = value.toLowerCase()
    if (lowered === 'true') return true
    if (lowered === 'false') return false
    return value
}

/**
 * Parse `key : value` lines into a typed record. Blank lines are skipped; the split is on
 * the first `:` so values may contain colons. Later duplicates overwrite earlier ones.
 *
 * @param lines - line array, or a single newline-separated string
 * @throws VariableParseException for a line with no `:`, an empty key or an unsafe integer
 */
export function parseVariables(lines: string | readonly string[]): Record<string, VariableValue> {
    const list = typeof lines === 'string' ? lines.split(/\r?\n/) : lines
    // Map, not an object literal: names such as __proto__ are ordinary variables
    const result = new Map<string, VariableValue>()

    list.forEach((line, index) => {
        if (!line.trim()) return

        const separator = line.indexOf(':')
        if (separator === -1) {
            throw new VariableParseException(`Variable line ${index + 1} has no ':' separator`, line, index + 1)
        }
        const key = line.slice(0, separator).trim()
        if (!key) {
            throw new VariableParseException(`Variable line ${index + 1} has an empty name`, line, index + 1)
        }
        result.set(key, parseVariableValue(line.slice(separator + 1), line, index + 1))
    })

    return Object.fromEntries(result)
}

export interface VariableChange {
    name: string
    previous: VariableValue
    next: VariableValue
}

export class VariableStore {
    private readonly values: Map<string, VariableValue>

    constructor(initial: Readonly<Record<string, VariableValue>> = {}) {
        this.values = new Map(Object.entries(initial))
    }

    static fromLines(lines: string | readonly string[]): VariableStore {
        return new VariableStore(parseVariables(lines))
    }

    get(name: string): VariableValue | undefined {
        return this.values.get(name)
    }

    has(name: string): boolean {
        return this.values.has(name)
    }

    get names(): string[] {
        return [...this.values.keys()]
    }

    get size(): number {
        return this.values.size
    }

    /** Overwrite an existing variable. Unknown names are left absent. */
    update(name: string, value: VariableValue): boolean {
        if (!this.values.has(name)) return false
        this.values.set(name, value)
        return true
    }

    /**
     * Apply an action's proposed values to the variables that already exist.
     * @returns the changes made, in the action's key order
     */
    apply(action: Action): VariableChange[] {
        const changes: VariableChange[] = []
        for (const [name, next] of Object.entries(action.changedVariables)) {
            const previous = this.values.get(name)
            if (previous === undefined) continue
            this.values.set(name, next)
            changes.push({ name, previous, next })
        }
        return changes
    }

    /** True iff at least one variable the action names is tracked. UI affordance only. */
    isActionable(action: Action): boolean {
        return Object.keys(action.changedVariables).some((name) => this.values.has(name))
    }

    snapshot(): VariableSnapshot {
        return Object.fromEntries(this.values)
    }

    clone(): VariableStore {
        return new VariableStore(this.snapshot())
    }
}
