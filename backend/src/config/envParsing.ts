/**
 * Small parsers shared by the getXConfig() readers. Each returns null for a missing,
 * blank or malformed value so callers can fall back to their default with `??`.
 */

export type Env = Readonly<Record<string, string | undefined>>

export function parseNonNegativeInt(value: string | undefined): number | null {
    if (value === undefined) return null
    const trimmed = value.trim()
    if (!/^\d+$/.test(trimmed)) return null
    const parsed = Number.parseInt(trimmed, 10)
    return Number.isSafeInteger(parsed) ? parsed : null
}

export function parsePositiveInt(value: string | undefined): number | null {
    const parsed = parseNonNegativeInt(value)
    return parsed !== null && parsed > 0 ? parsed : null
}

export function parseFiniteNumber(value: string | undefined): number | null {
    if (value === undefined) return null
    const trimmed = value.trim()
    if (!trimmed) return null
    const parsed = Number(trimmed)
    return Number.isFinite(parsed) ? parsed : null
}

export function parseBoolean(value: string | undefined): boolean | null {
    const normalized = value?.trim().toLowerCase()
    if (normalized === 'true' || normalized === '1') return true
    if (normalized === 'false' || normalized === '0') return false
    return null
}

/** Trimmed value, or undefined when unset or blank. */
export function readString(value: string | undefined): string | undefined {
    const trimmed = value?.trim()
    return trimmed ? trimmed : undefined
}
