import assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import {
  choice,
  clamp,
  createSeededRandom,
  exponential,
  normal,
  randomInt,
  roundTo,
  uniform,
  weightedChoice,
} from '../src/random'
import { STATUS_RESAMPLE_WEIGHTS } from '../src/constants'
import { sequenceRandom } from './testUtils'

describe('random sources', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = createSeededRandom(42)
    const b = createSeededRandom(42)
    const drawsA = Array.from({ length: 8 }, () => a.next())
    const drawsB = Array.from({ length: 8 }, () => b.next())
    assert.deepEqual(drawsA, drawsB)
  })

  it('diverges for different seeds', () => {
    const a = createSeededRandom(1)
    const b = createSeededRandom(2)
    const drawsA = Array.from({ length: 4 }, () => a.next())
    const drawsB = Array.from({ length: 4 }, () => b.next())
    assert.notDeepEqual(drawsA, drawsB)
  })

  it('stays inside [0, 1)', () => {
    const rng = createSeededRandom(7)
    for (let i = 0; i < 1000; i += 1) {
      const value = rng.next()
      assert.ok(value >= 0 && value < 1, `draw ${value} out of range`)
    }
  })
})

describe('draw helpers', () => {
  it('maps uniform draws onto the range', () => {
    assert.equal(uniform(sequenceRandom([0]), 20, 80), 20)
    assert.equal(uniform(sequenceRandom([0.5]), 20, 80), 50)
  })

  it('keeps randomInt below the exclusive bound', () => {
    assert.equal(randomInt(sequenceRandom([0]), 1, 21), 1)
    assert.equal(randomInt(sequenceRandom([0.999]), 1, 21), 20)
  })

  it('picks choice() entries uniformly by index', () => {
    assert.equal(choice(sequenceRandom([0.5]), ['a', 'b', 'c', 'd']), 'c')
    assert.equal(choice(sequenceRandom([0.1]), ['a', 'b', 'c', 'd']), 'a')
    assert.throws(() => choice(sequenceRandom([0.1]), []), RangeError)
  })

  it('walks the cumulative weights in weightedChoice()', () => {
    assert.equal(weightedChoice(sequenceRandom([0.69]), STATUS_RESAMPLE_WEIGHTS), 'normal')
    assert.equal(weightedChoice(sequenceRandom([0.75]), STATUS_RESAMPLE_WEIGHTS), 'warning')
    assert.equal(weightedChoice(sequenceRandom([0.97]), STATUS_RESAMPLE_WEIGHTS), 'critical')
    assert.throws(() => weightedChoice(sequenceRandom([0.5]), [['x', 0]]), RangeError)
  })

  it('draws normal values through Box-Muller', () => {
    const value = normal(sequenceRandom([0.5, 0]), 10, 2)
    assert.ok(Math.abs(value - (10 + 2 * Math.sqrt(2 * Math.LN2))) < 1e-12)
  })

  it('draws exponential values with the given scale', () => {
    const value = exponential(sequenceRandom([1 - Math.exp(-1)]), 0.1)
    assert.ok(Math.abs(value - 0.1) < 1e-12)
  })

  it('rounds and clamps', () => {
    assert.equal(roundTo(25.4567, 2), 25.46)
    assert.equal(roundTo(99.25, 1), 99.3)
    assert.equal(clamp(120, 0, 100), 100)
    assert.equal(clamp(-3, 0, 100), 0)
    assert.equal(clamp(42, 0, 100), 42)
  })
})
