/**
 * StoryGenerator: retry policy, response parsing and telemetry for play and authoring,
 * against a scripted OpenAI client. Retry delay is 0 so backoff costs nothing here.
 */
import 'reflect-metadata'
import { emptyConnections, GenerationFailedException, type Room } from '@waymark/shared'
import assert from 'node:assert'
import { describe, test } from 'node:test'
import type { GenerationConfig } from '../../src/config/generationConfig.js'
import { STORY_SYSTEM_PROMPT } from '../../src/prompts/storyPrompts.js'
import { parseActionsResponse, parseVariablesResponse, StoryGenerator } from '../../src/services/StoryGenerator.js'
import { createTestTelemetry } from '../helpers/testWorld.js'
import { FakeOpenAIClient, textFailure, textResult } from '../mocks/FakeOpenAIClient.js'

const config: GenerationConfig = {
    timeoutMs: 1000,
    maxAttempts: 3,
    retryDelayMs: 0,
    model: 'test-model',
    temperature: 0.5
}

const garden: Room = {
    name: 'Garden',
    description: 'A walled garden gone to seed.',
    imagePrompt: 'overgrown garden',
    canonEvent: 'A gardener hums nearby.',
    connections: emptyConnections()
}

function setup(client: FakeOpenAIClient, overrides: Partial<GenerationConfig> = {}) {
    const { client: telemetryClient, telemetry } = createTestTelemetry()
    const generator = new StoryGenerator(client, { ...config, ...overrides }, 'Once upon a time.', telemetry)
    return { generator, telemetryClient }
}

describe('parseActionsResponse', () => {
    test('maps actions and types variable values', () => {
        const actions = parseActionsResponse(
            '```json\n{"actions": [{"action_description": " Open the gate ", "changed_variables": ["gate_open: true", "coins: 2"]}]}\n```'
        )
        assert.deepStrictEqual(actions, [{ description: 'Open the gate', changedVariables: { gate_open: true, coins: 2 } }])
    })

    test('changed_variables is optional', () => {
        assert.deepStrictEqual(parseActionsResponse('{"actions": [{"action_description": "Wait"}]}'), [
            { description: 'Wait', changedVariables: {} }
        ])
    })

    const invalid: Array<[string, string]> = [
        ['not JSON', 'The gate opens.'],
        ['missing actions', '{"choices": []}'],
        ['blank description', '{"actions": [{"action_description": "  "}]}'],
        ['variable line without a colon', '{"actions": [{"action_description": "Wait", "changed_variables": ["coins"]}]}']
    ]
    for (const [label, content] of invalid) {
        test(`rejects ${label}`, () => {
            assert.throws(
                () => parseActionsResponse(content),
                (error: unknown) => error instanceof GenerationFailedException && error.reason === 'invalid-response'
            )
        })
    }
})

describe('StoryGenerator.generateNonCanonEvent', () => {
    test('returns the model text and records one attempt', async () => {
        const client = new FakeOpenAIClient([textResult('A crow lands on the wall.')])
        const { generator, telemetryClient } = setup(client)

        const text = await generator.generateNonCanonEvent(garden, ['The gate creaks open.'])

        assert.strictEqual(text, 'A crow lands on the wall.')
        assert.strictEqual(client.textCalls.length, 1)
        const [call] = client.textCalls
        assert.strictEqual(call.systemPrompt, STORY_SYSTEM_PROMPT)
        assert.strictEqual(call.temperature, 0.5)
        assert.strictEqual(call.timeoutMs, 1000)
        assert.strictEqual(call.maxTokens, 300)
        assert.strictEqual(call.json, undefined)
        assert.ok(call.prompt.includes('Story:\nOnce upon a time.'))
        assert.ok(call.prompt.includes('- The gate creaks open.'))
        assert.deepStrictEqual(telemetryClient.eventNames(), ['Story.Event.Generated'])
        assert.strictEqual(telemetryClient.propertiesOf('Story.Event.Generated')?.attempts, 1)
    })

    test('retries failed attempts until one succeeds', async () => {
        const client = new FakeOpenAIClient([
            textFailure({ outcome: 'timeout' }),
            textFailure({ outcome: 'error', httpStatus: 500 }),
            textResult('A crow lands on the wall.')
        ])
        const { generator, telemetryClient } = setup(client)

        assert.strictEqual(await generator.generateNonCanonEvent(garden, []), 'A crow lands on the wall.')
        assert.strictEqual(client.textCalls.length, 3)
        assert.strictEqual(telemetryClient.propertiesOf('Story.Event.Generated')?.attempts, 3)
    })

    test('gives up after maxAttempts with the last reason', async () => {
        const client = new FakeOpenAIClient([
            textFailure({ outcome: 'timeout' }),
            textFailure({ outcome: 'timeout' }),
            textFailure({ outcome: 'timeout' })
        ])
        const { generator, telemetryClient } = setup(client)

        await assert.rejects(generator.generateNonCanonEvent(garden, []), {
            name: 'GenerationFailedException',
            reason: 'timeout',
            message: 'Generation attempt 3 failed (timeout)'
        })
        assert.strictEqual(client.textCalls.length, 3)
        assert.deepStrictEqual(telemetryClient.eventNames(), ['Generation.Failed'])
        assert.strictEqual(telemetryClient.propertiesOf('Generation.Failed')?.operation, 'event')
        assert.strictEqual(telemetryClient.propertiesOf('Generation.Failed')?.reason, 'timeout')
        assert.strictEqual(telemetryClient.propertiesOf('Generation.Failed')?.room, 'Garden')
    })

    test('includes the provider message in the failure', async () => {
        const client = new FakeOpenAIClient([textFailure({ outcome: 'error', errorMessage: 'rate limited' })])
        const { generator } = setup(client, { maxAttempts: 1 })

        await assert.rejects(generator.generateNonCanonEvent(garden, []), {
            reason: 'error',
            message: 'Generation attempt 1 failed (error): rate limited'
        })
    })

    test('does not retry when no client is configured', async () => {
        const client = new FakeOpenAIClient([textFailure({ outcome: 'error', errorCode: 'not-configured' })])
        const { generator } = setup(client)

        await assert.rejects(generator.generateNonCanonEvent(garden, []), { reason: 'not-configured' })
        assert.strictEqual(client.textCalls.length, 1)
    })

    test('an aborted signal fails as cancelled without calling the model', async () => {
        const client = new FakeOpenAIClient([textResult('unused')])
        const { generator, telemetryClient } = setup(client)

        await assert.rejects(generator.generateNonCanonEvent(garden, [], { signal: AbortSignal.abort() }), { reason: 'cancelled' })
        assert.strictEqual(client.textCalls.length, 0)
        assert.strictEqual(telemetryClient.propertiesOf('Generation.Failed')?.reason, 'cancelled')
    })

    test('cancelling during the backoff wait ends it early', async () => {
        const controller = new AbortController()
        const client = new FakeOpenAIClient([textFailure({ outcome: 'timeout' }), textResult('unused')])
        const scripted = client.generateWithDiagnostics.bind(client)
        client.generateWithDiagnostics = async (options) => {
            const outcome = await scripted(options)
            setTimeout(() => controller.abort(), 5)
            return outcome
        }
        const { generator, telemetryClient } = setup(client, { retryDelayMs: 60_000 })
        const started = Date.now()

        await assert.rejects(generator.generateNonCanonEvent(garden, [], { signal: controller.signal }), {
            reason: 'cancelled',
            message: 'Generation was cancelled'
        })
        assert.ok(Date.now() - started < 5_000)
        assert.strictEqual(client.textCalls.length, 1)
        assert.strictEqual(telemetryClient.propertiesOf('Generation.Failed')?.reason, 'cancelled')
    })
})

describe('StoryGenerator.generateActions', () => {
    test('requests JSON and parses the action set', async () => {
        const client = new FakeOpenAIClient([
            textResult(
                JSON.stringify({
                    actions: [
                        { action_description: 'Pull the weeds', changed_variables: ['mood: busy'] },
                        { action_description: 'Sit on the bench', changed_variables: [] }
                    ]
                })
            )
        ])
        const { generator, telemetryClient } = setup(client)

        const actions = await generator.generateActions(garden, { text: 'A gardener hums nearby.', isCanon: true }, { mood: 'calm' })

        assert.deepStrictEqual(actions, [
            { description: 'Pull the weeds', changedVariables: { mood: 'busy' } },
            { description: 'Sit on the bench', changedVariables: {} }
        ])
        assert.strictEqual(client.textCalls[0].json, true)
        assert.strictEqual(client.textCalls[0].maxTokens, 800)
        assert.ok(client.textCalls[0].prompt.endsWith('Current variables:\nmood: calm'))
        assert.strictEqual(telemetryClient.propertiesOf('Story.Actions.Generated')?.actionCount, 2)
    })

    test('a malformed response is not retried', async () => {
        const client = new FakeOpenAIClient([textResult('Sure! Here are some actions.'), textResult('{"actions": []}')])
        const { generator, telemetryClient } = setup(client)

        await assert.rejects(generator.generateActions(garden, { text: 'x', isCanon: false }, {}), { reason: 'invalid-response' })
        assert.strictEqual(client.textCalls.length, 1)
        assert.strictEqual(telemetryClient.propertiesOf('Generation.Failed')?.operation, 'actions')
    })

    test('unexpected errors propagate unchanged', async () => {
        const failure = new TypeError('socket closed')
        const client = new FakeOpenAIClient()
        client.generateWithDiagnostics = async () => {
            throw failure
        }
        const { generator, telemetryClient } = setup(client)

        await assert.rejects(generator.generateActions(garden, { text: 'x', isCanon: true }, {}), (error: unknown) => error === failure)
        assert.deepStrictEqual(telemetryClient.eventNames(), [])
    })
})

describe('parseVariablesResponse', () => {
    test('returns trimmed non-blank lines', () => {
        assert.deepStrictEqual(parseVariablesResponse('{"variables": [" coins: 5 ", "", "has_map: false"]}'), ['coins: 5', 'has_map: false'])
    })

    const invalid: Array<[string, string]> = [
        ['not JSON', 'coins: 5'],
        ['missing variables', '{"vars": []}'],
        ['a line without a colon', '{"variables": ["coins"]}'],
        ['an unsafe integer', '{"variables": ["gold: 12345678901234567890"]}']
    ]
    for (const [label, content] of invalid) {
        test(`rejects ${label}`, () => {
            assert.throws(
                () => parseVariablesResponse(content),
                (error: unknown) => error instanceof GenerationFailedException && error.reason === 'invalid-response'
            )
        })
    }

    test('an empty list is an empty response', () => {
        assert.throws(
            () => parseVariablesResponse('{"variables": ["  "]}'),
            (error: unknown) => error instanceof GenerationFailedException && error.reason === 'empty'
        )
    })
})

describe('StoryGenerator authoring', () => {
    test('generateCanonEvent asks about the room and reports the attempt', async () => {
        const client = new FakeOpenAIClient([textResult('The gardener buries a box under the roses.')])
        const { generator, telemetryClient } = setup(client)

        const text = await generator.generateCanonEvent({ name: 'Garden', description: 'A walled garden gone to seed.' })

        assert.strictEqual(text, 'The gardener buries a box under the roses.')
        assert.strictEqual(client.textCalls[0].maxTokens, 300)
        assert.ok(client.textCalls[0].prompt.startsWith('What event in the story happens in this room?'))
        assert.ok(client.textCalls[0].prompt.endsWith('Room:\nGarden\nA walled garden gone to seed.'))
        assert.deepStrictEqual(telemetryClient.eventNames(), ['Story.CanonEvent.Generated'])
        assert.strictEqual(telemetryClient.propertiesOf('Story.CanonEvent.Generated')?.room, 'Garden')
    })

    test('generateVariables retries an empty list and returns the lines', async () => {
        const client = new FakeOpenAIClient([textResult('{"variables": []}'), textResult('{"variables": ["coins: 5", "has_map: false"]}')])
        const { generator, telemetryClient } = setup(client)

        assert.deepStrictEqual(await generator.generateVariables(), ['coins: 5', 'has_map: false'])
        assert.strictEqual(client.textCalls.length, 2)
        assert.strictEqual(client.textCalls[0].json, true)
        assert.strictEqual(client.textCalls[0].maxTokens, 400)
        assert.strictEqual(telemetryClient.propertiesOf('Story.Variables.Generated')?.variableCount, 2)
        assert.strictEqual(telemetryClient.propertiesOf('Story.Variables.Generated')?.attempts, 2)
    })

    test('a failed variables request is reported without a room', async () => {
        const client = new FakeOpenAIClient([textResult('{"variables": ["coins"]}')])
        const { generator, telemetryClient } = setup(client)

        await assert.rejects(generator.generateVariables(), { reason: 'invalid-response' })
        assert.strictEqual(client.textCalls.length, 1)
        const failed = telemetryClient.propertiesOf('Generation.Failed')
        assert.strictEqual(failed?.operation, 'variables')
        assert.strictEqual(failed?.room, undefined)
    })
})
