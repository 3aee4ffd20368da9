import type { WorldDefinitionInput } from '@waymark/shared'
import { TelemetryService } from '../../src/telemetry/TelemetryService.js'
import { buildWorld, type LoadedWorld } from '../../src/world/worldLoader.js'
import { MockTelemetryClient } from '../mocks/MockTelemetryClient.js'

/**
 * Four rooms around a courtyard. Every connection is listed both ways except the
 * library, which has no way back. Canon route: Gate → Courtyard → Library.
 */
export const TEST_WORLD: WorldDefinitionInput = {
    rooms: [
        { name: 'Gate', description: 'An iron gate in a high wall.', image_prompt: 'iron gate at dusk', canon_event: 'The gate creaks open.' },
        { name: 'Courtyard', description: 'A square of worn flagstones.', image_prompt: 'empty courtyard', canon_event: 'The fountain runs dry.' },
        { name: 'Library', description: 'Shelves climb into the dark.', image_prompt: '', canon_event: 'A book falls from a high shelf.' },
        { name: 'Garden', description: 'A walled garden gone to seed.', image_prompt: 'overgrown garden', canon_event: 'A gardener hums nearby.' }
    ],
    connections: [
        { room1: 'Gate', room2: 'Courtyard', direction: 'north' },
        { room1: 'Courtyard', room2: 'Gate', direction: 'south' },
        { room1: 'Courtyard', room2: 'Library', direction: 'east' },
        { room1: 'Courtyard', room2: 'Garden', direction: 'west' },
        { room1: 'Garden', room2: 'Courtyard', direction: 'east' }
    ],
    original_room_visit_order: ['Gate', 'Courtyard', 'Library'],
    variables: ['has_key: false', 'coins: 3', 'mood: calm']
}

export function createTestWorld(overrides: Partial<WorldDefinitionInput> = {}): LoadedWorld {
    return buildWorld({ ...TEST_WORLD, ...overrides })
}

export function createTestTelemetry(): { client: MockTelemetryClient; telemetry: TelemetryService } {
    const client = new MockTelemetryClient()
    return { client, telemetry: new TelemetryService(client) }
}
