import assert from 'node:assert/strict'
import test from 'node:test'
import { computeContentHash, computeRoomImageHash } from '../src/utils/contentHash.js'

test('computeContentHash: known sha256 digests', () => {
    assert.equal(computeContentHash(''), 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855')
    assert.equal(computeContentHash('abc'), 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad')
})

test('computeRoomImageHash: hashes name, description and prompt concatenated', () => {
    const room = { name: 'a', description: 'b', imagePrompt: 'c' }
    assert.equal(computeRoomImageHash(room), computeContentHash('abc'))
})

test('computeRoomImageHash: any field change yields a new key', () => {
    const base = { name: 'Dock', description: 'Wet planks.', imagePrompt: 'fog' }
    const hash = computeRoomImageHash(base)
    assert.equal(computeRoomImageHash({ ...base }), hash)
    assert.notEqual(computeRoomImageHash({ ...base, description: 'Dry planks.' }), hash)
    assert.notEqual(computeRoomImageHash({ ...base, imagePrompt: 'sun' }), hash)
    assert.match(hash, /^[0-9a-f]{64}$/)
})
