import assert from 'node:assert/strict'
import { describe, test } from 'node:test'
import type { RoomSeed } from '../src/domainModels.js'
import { WorldConfigurationException } from '../src/exceptions/index.js'
import { RoomGraph } from '../src/roomGraph.js'

function seed(name: string): RoomSeed {
    return { name, description: `${name} description`, imagePrompt: `${name} prompt`, canonEvent: `${name} event` }
}

function graphOf(...names: string[]): RoomGraph {
    const graph = new RoomGraph()
    for (const name of names) graph.addRoom(seed(name))
    return graph
}

describe('RoomGraph.addRoom', () => {
    test('first room becomes current and is recorded in history', () => {
        const graph = graphOf('Hangar', 'Bridge')
        assert.equal(graph.currentRoom?.name, 'Hangar')
        assert.deepEqual(graph.visitedRooms, ['Hangar'])
        assert.equal(graph.size, 2)
    })

    test('new rooms have exactly four empty connections', () => {
        const room = new RoomGraph().addRoom(seed('Hangar'))
        assert.deepEqual(room.connections, { north: null, south: null, east: null, west: null })
    })

    test('empty graph has no current room', () => {
        const graph = new RoomGraph()
        assert.equal(graph.currentRoom, null)
        assert.deepEqual(graph.visitedRooms, [])
    })

    test('duplicate name is a configuration error and keeps the original room', () => {
        const graph = graphOf('Hangar')
        assert.throws(
            () => graph.addRoom({ ...seed('Hangar'), description: 'other' }),
            (err: unknown) => err instanceof WorldConfigurationException && err.code === 'duplicate-room' && err.subject === 'Hangar'
        )
        assert.equal(graph.getRoom('Hangar')?.description, 'Hangar description')
    })
})

describe('RoomGraph.connect', () => {
    test('connection is one-way', () => {
        const graph = graphOf('A', 'B')
        assert.equal(graph.connect('A', 'B', 'north'), true)
        assert.equal(graph.getRoom('A')?.connections.north, 'B')
        assert.equal(graph.getRoom('B')?.connections.south, null)
    })

    test('unknown room names are a no-op', () => {
        const graph = graphOf('A')
        assert.equal(graph.connect('A', 'Missing', 'east'), false)
        assert.equal(graph.connect('Missing', 'A', 'east'), false)
        assert.deepEqual(graph.getRoom('A')?.connections, { north: null, south: null, east: null, west: null })
    })

    test('connectBoth wires the opposite direction explicitly', () => {
        const graph = graphOf('A', 'B')
        assert.equal(graph.connectBoth('A', 'B', 'east'), true)
        assert.equal(graph.getRoom('A')?.connections.east, 'B')
        assert.equal(graph.getRoom('B')?.connections.west, 'A')
    })

    test('connectBoth with an unknown room changes nothing', () => {
        const graph = graphOf('A')
        assert.equal(graph.connectBoth('A', 'Missing', 'east'), false)
        assert.equal(graph.getRoom('A')?.connections.east, null)
    })
})

describe('RoomGraph.move', () => {
    test('follows an exit and appends history', () => {
        const graph = graphOf('A', 'B', 'C')
        graph.connect('A', 'B', 'north')
        graph.connect('B', 'C', 'east')

        assert.equal(graph.move('north')?.name, 'B')
        assert.equal(graph.move('east')?.name, 'C')
        assert.equal(graph.currentRoom?.name, 'C')
        assert.deepEqual(graph.visitedRooms, ['A', 'B', 'C'])
    })

    test('missing exit is a no-op', () => {
        const graph = graphOf('A', 'B')
        graph.connect('A', 'B', 'north')
        graph.move('north')

        // No south exit back from B: one-way data is expected
        assert.equal(graph.move('south'), null)
        assert.equal(graph.currentRoom?.name, 'B')
        assert.deepEqual(graph.visitedRooms, ['A', 'B'])
    })

    test('revisits are recorded', () => {
        const graph = graphOf('A', 'B')
        graph.connectBoth('A', 'B', 'west')
        graph.move('west')
        graph.move('east')
        assert.deepEqual(graph.visitedRooms, ['A', 'B', 'A'])
    })

    test('availableDirections lists exits in canonical order', () => {
        const graph = graphOf('A', 'B', 'C')
        graph.connect('A', 'C', 'west')
        graph.connect('A', 'B', 'north')
        assert.deepEqual(graph.availableDirections(), ['north', 'west'])
        assert.equal(graph.neighbour('west')?.name, 'C')
        assert.equal(graph.neighbour('south'), null)
    })
})

test('setRoomImage records the cached path', () => {
    const graph = graphOf('A')
    assert.equal(graph.setRoomImage('A', 'room_images/abc.png'), true)
    assert.equal(graph.getRoom('A')?.imagePath, 'room_images/abc.png')
    assert.equal(graph.setRoomImage('Missing', 'x.png'), false)
})

describe('RoomGraph.clone', () => {
    test('starts at the first room with a fresh history', () => {
        const graph = graphOf('A', 'B')
        graph.connect('A', 'B', 'north')
        graph.move('north')

        const copy = graph.clone()

        assert.equal(copy.currentRoom?.name, 'A')
        assert.deepEqual(copy.visitedRooms, ['A'])
        assert.equal(copy.size, 2)
        assert.equal(copy.getRoom('A')?.connections.north, 'B')
        assert.equal(copy.getRoom('B')?.canonEvent, 'B event')
    })

    test('moves and images on the copy leave the original alone', () => {
        const graph = graphOf('A', 'B')
        graph.connect('A', 'B', 'east')
        graph.setRoomImage('A', 'room_images/a.png')

        const copy = graph.clone()
        copy.move('east')
        copy.connect('B', 'A', 'west')
        copy.setRoomImage('B', 'room_images/b.png')

        assert.equal(copy.getRoom('A')?.imagePath, 'room_images/a.png')
        assert.equal(graph.currentRoom?.name, 'A')
        assert.deepEqual(graph.visitedRooms, ['A'])
        assert.equal(graph.getRoom('B')?.connections.west, null)
        assert.equal(graph.getRoom('B')?.imagePath, undefined)
    })

    test('an empty graph clones to an empty graph', () => {
        const copy = new RoomGraph().clone()
        assert.equal(copy.size, 0)
        assert.equal(copy.currentRoom, null)
    })
})
