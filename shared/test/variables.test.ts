import assert from 'node:assert/strict'
import { describe, test } from 'node:test'
import { VariableParseException } from '../src/exceptions/index.js'
import { parseVariables, parseVariableValue, VariableStore } from '../src/variables.js'

describe('parseVariableValue', () => {
    const cases: Array<[string, string | number | boolean]> = [
        ['5', 5],
        [' -12 ', -12],
        ['+3', 3],
        ['true', true],
        ['True', true],
        ['FALSE', false],
        ['"quoted"', 'quoted'],
        ['" 7 "', 7],
        ['3.5', '3.5'],
        ['key', 'key'],
        ['', '']
    ]
    for (const [raw, expected] of cases) {
        test(`'${raw}' -> ${JSON.stringify(expected)}`, () => {
            assert.equal(parseVariableValue(raw), expected)
        })
    }

    test('an integer beyond the safe range is rejected rather than kept as text', () => {
        assert.throws(
            () => parseVariableValue('99999999999999999999'),
            (err: unknown) => err instanceof VariableParseException && err.line === '99999999999999999999' && err.lineNumber === 1
        )
    })
})

describe('parseVariables', () => {
    test('integers', () => {
        assert.deepEqual(parseVariables(['a: 1', 'b: 2']), { a: 1, b: 2 })
    })

    test('booleans', () => {
        assert.deepEqual(parseVariables(['a: true', 'b: False']), { a: true, b: false })
    })

    test('mixed types', () => {
        assert.deepEqual(parseVariables(['health: 5', 'has_key: true', 'name: Ada']), { health: 5, has_key: true, name: 'Ada' })
    })

    test('blank lines and surrounding whitespace are ignored', () => {
        assert.deepEqual(parseVariables(['', '  a :  1  ', '   ', 'b:two']), { a: 1, b: 'two' })
    })

    test('accepts a newline-separated string', () => {
        assert.deepEqual(parseVariables('a: 1\r\nb: true\n'), { a: 1, b: true })
    })

    test('splits on the first colon only', () => {
        assert.deepEqual(parseVariables(['time: 12:30']), { time: '12:30' })
    })

    test('later duplicates overwrite earlier ones', () => {
        assert.deepEqual(parseVariables(['a: 1', 'a: 2']), { a: 2 })
    })

    test('a line without a colon is rejected with its line number', () => {
        assert.throws(
            () => parseVariables(['a: 1', '', 'broken']),
            (err: unknown) => err instanceof VariableParseException && err.lineNumber === 3 && err.line === 'broken'
        )
    })

    test('an unsafe integer is rejected with its line', () => {
        assert.throws(
            () => parseVariables(['coins: 3', 'gold: 12345678901234567890']),
            (err: unknown) => err instanceof VariableParseException && err.lineNumber === 2 && err.line === 'gold: 12345678901234567890'
        )
    })

    test('the largest safe integer stays a number', () => {
        assert.deepEqual(parseVariables(['gold: 9007199254740991']), { gold: 9007199254740991 })
    })

    test('__proto__ is kept as an ordinary variable', () => {
        const parsed = parseVariables(['__proto__: 5', 'hp: 1'])
        assert.deepEqual(Object.keys(parsed), ['__proto__', 'hp'])
        assert.equal(Object.getOwnPropertyDescriptor(parsed, '__proto__')?.value, 5)
        assert.equal(VariableStore.fromLines(['__proto__: 5']).get('__proto__'), 5)
    })

    test('an empty name is rejected', () => {
        assert.throws(
            () => parseVariables([': 5']),
            (err: unknown) => err instanceof VariableParseException && err.lineNumber === 1
        )
    })
})

describe('VariableStore', () => {
    test('apply changes only tracked variables and reports them', () => {
        const store = VariableStore.fromLines(['health: 5', 'has_key: false'])
        const changes = store.apply({ description: 'Drink', changedVariables: { health: 6, mana: 3 } })

        assert.deepEqual(changes, [{ name: 'health', previous: 5, next: 6 }])
        assert.deepEqual(store.snapshot(), { health: 6, has_key: false })
        assert.equal(store.has('mana'), false)
    })

    test('isActionable needs at least one tracked name', () => {
        const store = new VariableStore({ health: 5 })
        assert.equal(store.isActionable({ description: 'x', changedVariables: { health: 1 } }), true)
        assert.equal(store.isActionable({ description: 'x', changedVariables: { mana: 1 } }), false)
        assert.equal(store.isActionable({ description: 'x', changedVariables: {} }), false)
    })

    test('an empty store makes no action actionable', () => {
        const store = new VariableStore()
        assert.equal(store.size, 0)
        assert.equal(store.isActionable({ description: 'x', changedVariables: { anything: true } }), false)
        assert.deepEqual(store.apply({ description: 'x', changedVariables: { anything: true } }), [])
    })

    test('update leaves unknown names absent', () => {
        const store = new VariableStore({ a: 1 })
        assert.equal(store.update('a', 'two'), true)
        assert.equal(store.update('b', 3), false)
        assert.deepEqual(store.names, ['a'])
        assert.equal(store.get('a'), 'two')
    })

    test('clone is independent of the original', () => {
        const store = new VariableStore({ a: 1 })
        const copy = store.clone()
        copy.update('a', 2)
        assert.equal(store.get('a'), 1)
        assert.equal(copy.get('a'), 2)
    })
})
