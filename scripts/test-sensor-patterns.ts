import assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { SENSOR_KINDS, SENSOR_PATTERNS } from '../src/constants'
import { createSeededRandom } from '../src/random'
import { buildAnalytics, generateSensorPattern } from '../src/sensorPatterns'
import { sequenceRandom } from './testUtils'

const NOW = new Date('2024-05-10T09:30:00.000Z')

describe('generateSensorPattern', () => {
  it('adds Gaussian noise around the daily sine', () => {
    const values = generateSensorPattern('temperature', SENSOR_PATTERNS.temperature, sequenceRandom([0.5]))
    assert.equal(values.length, 24)
    assert.equal(values[0], 21.65)
  })

  it('boosts power by 30% of the amplitude for indices 8 to 18', () => {
    const spec = SENSOR_PATTERNS.power
    const power = generateSensorPattern('power', spec, sequenceRandom([0.5]))
    const plain = generateSensorPattern('temperature', spec, sequenceRandom([0.5]))
    power.forEach((value, index) => {
      const diff = value - plain[index]
      if (index >= 8 && index <= 18) {
        assert.ok(Math.abs(diff - 90) < 0.02, `index ${index} diff ${diff}`)
      } else {
        assert.equal(diff, 0)
      }
    })
  })

  it('floors vibration and power at zero', () => {
    const vibration = generateSensorPattern('vibration', { base: -5, amplitude: 0.1, frequency: 0.2 }, sequenceRandom([0.5]))
    const power = generateSensorPattern('power', { base: -5000, amplitude: 300, frequency: 0.08 }, sequenceRandom([0.5]))
    assert.ok(vibration.every((value) => value === 0))
    assert.ok(power.every((value) => value === 0))
  })

  it('clamps humidity to 0-100', () => {
    const high = generateSensorPattern('humidity', { base: 150, amplitude: 15, frequency: 0.12 }, sequenceRandom([0.5]))
    const low = generateSensorPattern('humidity', { base: -50, amplitude: 15, frequency: 0.12 }, sequenceRandom([0.5]))
    assert.ok(high.every((value) => value === 100))
    assert.ok(low.every((value) => value === 0))
  })

  it('adds exponential spikes to vibration when the spike roll hits', () => {
    const spec = { base: 0.25, amplitude: 0.1, frequency: 0.2 }
    // normal() consumes two draws, the spike roll one, the spike itself one
    const spiked = generateSensorPattern('vibration', spec, sequenceRandom([0.5, 0.5, 0.01, 1 - Math.exp(-10)]))
    const calm = generateSensorPattern('vibration', spec, sequenceRandom([0.5, 0.5, 0.9]))
    assert.ok(spiked[0] - calm[0] > 0.9, `spike ${spiked[0]} vs ${calm[0]}`)
  })
})

describe('buildAnalytics', () => {
  it('returns five kinds with 24 labels and values each', () => {
    const analytics = buildAnalytics(createSeededRandom(3), NOW)
    assert.deepEqual(Object.keys(analytics), ['temperature', 'pressure', 'vibration', 'power', 'humidity'])
    for (const kind of SENSOR_KINDS) {
      const series = analytics[kind]
      assert.ok(series, `missing ${kind}`)
      assert.equal(series.labels.length, 24)
      assert.equal(series.values.length, 24)
    }
    assert.deepEqual(analytics.pressure?.threshold, { min: 980, max: 1040 })
    assert.equal(analytics.humidity?.unit, '%RH')
  })

  it('reproduces identical output for a fixed seed and clock', () => {
    const first = buildAnalytics(createSeededRandom(99), NOW)
    const second = buildAnalytics(createSeededRandom(99), NOW)
    assert.deepEqual(first, second)
  })

  it('keeps bounded kinds in range across seeds', () => {
    for (let seed = 1; seed <= 25; seed += 1) {
      const analytics = buildAnalytics(createSeededRandom(seed), NOW)
      assert.ok(analytics.humidity?.values.every((value) => value >= 0 && value <= 100))
      assert.ok(analytics.vibration?.values.every((value) => value >= 0))
      assert.ok(analytics.power?.values.every((value) => value >= 0))
    }
  })
})
