import assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { CircularBuffer } from '../src/circularBuffer'

describe('CircularBuffer', () => {
  it('rejects a non-positive or fractional capacity', () => {
    assert.throws(() => new CircularBuffer<number>(0), RangeError)
    assert.throws(() => new CircularBuffer<number>(1.5), RangeError)
  })

  it('prepends and evicts the oldest items from the tail', () => {
    const buffer = new CircularBuffer<string>(3, ['b', 'a'])
    assert.deepEqual(buffer.pushFront('c'), [])
    assert.deepEqual(buffer.getAll(), ['c', 'b', 'a'])
    assert.equal(buffer.isFull(), true)

    assert.deepEqual(buffer.pushFront('d'), ['a'])
    assert.deepEqual(buffer.getAll(), ['d', 'c', 'b'])
    assert.equal(buffer.size(), 3)
    assert.equal(buffer.capacity(), 3)
  })

  it('truncates initial items to capacity', () => {
    const buffer = new CircularBuffer<number>(2, [5, 4, 3])
    assert.deepEqual(buffer.getAll(), [5, 4])
  })

  it('returns the first N items without complaining about odd counts', () => {
    const buffer = new CircularBuffer<number>(5, [3, 2, 1])
    assert.deepEqual(buffer.getFirst(2), [3, 2])
    assert.deepEqual(buffer.getFirst(10), [3, 2, 1])
    assert.deepEqual(buffer.getFirst(0), [])
    assert.deepEqual(buffer.getFirst(-4), [])
    assert.deepEqual(buffer.getFirst(1.8), [3])
  })

  it('hands out copies', () => {
    const buffer = new CircularBuffer<number>(3, [1])
    const snapshot = buffer.getAll()
    snapshot.push(99)
    assert.deepEqual(buffer.getAll(), [1])
    buffer.clear()
    assert.equal(buffer.size(), 0)
  })
})
