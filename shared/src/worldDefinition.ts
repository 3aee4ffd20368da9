/**
 * World definition schema (Zod validation)
 *
 * Shape of the authored world file consumed at session start. Field names follow the
 * generated data files (snake_case) so existing worlds load unchanged.
 */
import { z } from 'zod'
import { DIRECTIONS } from './domainModels.js'

export const RoomDefinitionSchema = z.object({
    name: z.string().min(1),
    description: z.string(),
    image_prompt: z.string().default(''),
    canon_event: z.string()
})
export type RoomDefinition = z.infer<typeof RoomDefinitionSchema>

export const ConnectionDefinitionSchema = z.object({
    room1: z.string().min(1),
    room2: z.string().min(1),
    direction: z.enum(DIRECTIONS)
})
export type ConnectionDefinition = z.infer<typeof ConnectionDefinitionSchema>

export const WorldDefinitionSchema = z.object({
    rooms: z.array(RoomDefinitionSchema),
    connections: z.array(ConnectionDefinitionSchema).default([]),
    original_room_visit_order: z.array(z.string()).default([]),
    variables: z.array(z.string()).default([])
})
export type WorldDefinition = z.infer<typeof WorldDefinitionSchema>
/** Input form, before defaults are applied. */
export type WorldDefinitionInput = z.input<typeof WorldDefinitionSchema>

/**
 * A world as it is first sketched out: rooms may lack a canon event, and the variable list
 * may be empty. Authoring fills both in before the world can be played.
 */
export const DraftRoomDefinitionSchema = RoomDefinitionSchema.extend({
    canon_event: z.string().optional()
})
export type DraftRoomDefinition = z.infer<typeof DraftRoomDefinitionSchema>

export const DraftWorldDefinitionSchema = WorldDefinitionSchema.extend({
    rooms: z.array(DraftRoomDefinitionSchema)
})
export type DraftWorldDefinition = z.infer<typeof DraftWorldDefinitionSchema>

export type ValidationResult<T> = { success: true; world: T } | { success: false; errors: string[] }
export type WorldValidationResult = ValidationResult<WorldDefinition>

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
}

/**
 * Validate an unknown value as a world definition.
 * Error strings are `path: message`, e.g. `rooms.0.name: String must contain at least 1 character(s)`.
 */
export function validateWorldDefinition(data: unknown): WorldValidationResult {
    const parsed = WorldDefinitionSchema.safeParse(data)
    return parsed.success ? { success: true, world: parsed.data } : { success: false, errors: formatIssues(parsed.error) }
}

export function validateDraftWorldDefinition(data: unknown): ValidationResult<DraftWorldDefinition> {
    const parsed = DraftWorldDefinitionSchema.safeParse(data)
    return parsed.success ? { success: true, world: parsed.data } : { success: false, errors: formatIssues(parsed.error) }
}
