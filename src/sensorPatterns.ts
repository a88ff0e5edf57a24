import { SENSOR_KINDS, SENSOR_PATTERNS, TREND_POINTS, type SensorPatternSpec } from './constants'
import { clamp, exponential, normal, roundTo, type RandomSource } from './random'
import { hourlyLabels } from './sampleData'
import type { AnalyticsData, SensorKind } from './types'

const VIBRATION_SPIKE_PROBABILITY = 0.05
const VIBRATION_SPIKE_SCALE = 0.1
const POWER_WORKING_HOURS: readonly [number, number] = [8, 18]
const POWER_WORKING_BOOST = 0.3

/**
 * One day of hourly readings for a sensor kind: a sine around the base,
 * Gaussian noise at a tenth of the amplitude, and per-kind adjustments.
 */
export function generateSensorPattern(
  kind: SensorKind,
  spec: Pick<SensorPatternSpec, 'base' | 'amplitude' | 'frequency'>,
  rng: RandomSource,
): number[] {
  const { base, amplitude, frequency } = spec
  const values: number[] = []

  for (let i = 0; i < TREND_POINTS; i += 1) {
    let dailyPattern = amplitude * Math.sin(((2 * Math.PI * i) / TREND_POINTS) * frequency)
    let noise = normal(rng, 0, amplitude * 0.1)

    if (kind === 'vibration') {
      if (rng.next() < VIBRATION_SPIKE_PROBABILITY) {
        noise += exponential(rng, VIBRATION_SPIKE_SCALE)
      }
    } else if (kind === 'power') {
      if (i >= POWER_WORKING_HOURS[0] && i <= POWER_WORKING_HOURS[1]) {
        dailyPattern += amplitude * POWER_WORKING_BOOST
      }
    }

    let value = base + dailyPattern + noise
    if (kind === 'vibration' || kind === 'power') {
      value = Math.max(0, value)
    } else if (kind === 'humidity') {
      value = clamp(value, 0, 100)
    }

    values.push(roundTo(value, 2))
  }

  return values
}

export function buildAnalytics(rng: RandomSource, now: Date): AnalyticsData {
  const labels = hourlyLabels(now)
  const analytics: AnalyticsData = {}

  for (const kind of SENSOR_KINDS) {
    const spec = SENSOR_PATTERNS[kind]
    analytics[kind] = {
      labels: [...labels],
      values: generateSensorPattern(kind, spec, rng),
      unit: spec.unit,
      threshold: { ...spec.threshold },
    }
  }

  return analytics
}
