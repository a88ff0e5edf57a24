import assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { TtlCache } from '../src/ttlCache'
import { fixedClock } from './testUtils'

describe('TtlCache', () => {
  it('reuses the payload until the TTL elapses, then recomputes once', () => {
    const clock = fixedClock('2024-03-01T12:00:00.000Z')
    const cache = new TtlCache<{ run: number }>(1000, clock.now)
    let runs = 0
    const compute = () => {
      runs += 1
      return { run: runs }
    }

    const first = cache.getOrCompute(compute)
    clock.advance(999)
    const second = cache.getOrCompute(compute)
    assert.equal(second, first)
    assert.equal(runs, 1)

    clock.advance(1)
    const third = cache.getOrCompute(compute)
    assert.notEqual(third, first)
    assert.deepEqual(third, { run: 2 })
    assert.equal(runs, 2)
  })

  it('reports hits and misses', () => {
    const clock = fixedClock('2024-03-01T12:00:00.000Z')
    const cache = new TtlCache<number>(500, clock.now)
    const outcomes: string[] = []
    const hooks = { onHit: () => outcomes.push('hit'), onMiss: () => outcomes.push('miss') }

    cache.getOrCompute(() => 1, hooks)
    cache.getOrCompute(() => 2, hooks)
    clock.advance(500)
    cache.getOrCompute(() => 3, hooks)
    assert.deepEqual(outcomes, ['miss', 'hit', 'miss'])
  })

  it('describes its state', () => {
    const clock = fixedClock('2024-03-01T12:00:00.000Z')
    const cache = new TtlCache<string>(1000, clock.now)
    assert.deepEqual(cache.state(), { fresh: false, computed_at: null, age_ms: null })

    cache.getOrCompute(() => 'payload')
    clock.advance(500)
    assert.deepEqual(cache.state(), { fresh: true, computed_at: '2024-03-01T12:00:00.000Z', age_ms: 500 })

    clock.advance(500)
    assert.equal(cache.state().fresh, false)
  })

  it('rejects a negative TTL', () => {
    assert.throws(() => new TtlCache<number>(-1), RangeError)
  })
})
