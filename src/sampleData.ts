import { randomUUID } from 'node:crypto'
import {
  DEVICE_TYPE_SPECS,
  DEVICE_TYPES,
  EFFICIENCY_RANGE,
  HEALTH_BANDS,
  SEEDED_ALERT_TEMPLATES,
  SITE_LOCATIONS,
  STATUS_CHANGE_PROBABILITY,
  STATUS_RESAMPLE_WEIGHTS,
  SYSTEM_ALERT_TEMPLATES,
  TREND_POINTS,
  VALUE_JITTER_RATIO,
} from './constants'
import { choice, clamp, randomInt, roundTo, uniform, weightedChoice, type RandomSource } from './random'
import type { Alert, Device, DeviceStatus, PerformanceTrend } from './types'

const HOUR = 60 * 60 * 1000
const DAY = 24 * HOUR
const MINUTE = 60 * 1000

export type IdFactory = () => string

export const defaultIdFactory: IdFactory = () => randomUUID()

export function formatDeviceId(index: number): string {
  return `DEVICE_${String(index).padStart(3, '0')}`
}

/** `HH:MM` in local time. */
export function formatHourLabel(date: Date): string {
  const hours = String(date.getHours()).padStart(2, '0')
  const minutes = String(date.getMinutes()).padStart(2, '0')
  return `${hours}:${minutes}`
}

/** Labels for the last `points` hours, oldest first and `now` last. */
export function hourlyLabels(now: Date, points = TREND_POINTS): string[] {
  const labels: string[] = []
  for (let i = points - 1; i >= 0; i -= 1) {
    labels.push(formatHourLabel(new Date(now.getTime() - i * HOUR)))
  }
  return labels
}

export function drawHealthScore(rng: RandomSource, status: DeviceStatus): number {
  const [min, max] = HEALTH_BANDS[status]
  return uniform(rng, min, max)
}

export function isHealthInBand(status: DeviceStatus, healthScore: number): boolean {
  const [min, max] = HEALTH_BANDS[status]
  return healthScore >= min && healthScore <= max
}

function drawInitialStatus(rng: RandomSource): DeviceStatus {
  const roll = rng.next()
  if (roll > 0.15) return 'normal'
  if (roll > 0.05) return 'warning'
  return 'critical'
}

export function generateSampleDevices(rng: RandomSource, count: number, now: Date): Device[] {
  const devices: Device[] = []
  const nowMs = now.getTime()

  for (let i = 1; i <= count; i += 1) {
    const type = choice(rng, DEVICE_TYPES)
    const spec = DEVICE_TYPE_SPECS[type]
    const status = drawInitialStatus(rng)
    const healthScore = drawHealthScore(rng, status)
    const [minValue, maxValue] = spec.initialRange
    const value = uniform(rng, minValue, maxValue)
    const location = choice(rng, SITE_LOCATIONS)
    const [minEfficiency, maxEfficiency] = EFFICIENCY_RANGE

    devices.push({
      id: formatDeviceId(i),
      name: `${spec.label} ${i}`,
      type,
      location,
      status,
      value: roundTo(value, 2),
      unit: spec.unit,
      health_score: healthScore,
      efficiency_score: uniform(rng, minEfficiency, maxEfficiency),
      last_maintenance: new Date(nowMs - randomInt(rng, 1, 90) * DAY).toISOString(),
      installation_date: new Date(nowMs - randomInt(rng, 100, 1000) * DAY).toISOString(),
      firmware_version: `${randomInt(rng, 1, 5)}.${randomInt(rng, 0, 9)}.${randomInt(rng, 0, 9)}`,
      timestamp: now.toISOString(),
    })
  }

  return devices
}

function sortNewestFirst(alerts: Alert[]): Alert[] {
  return alerts.sort((a, b) => Date.parse(b.timestamp) - Date.parse(a.timestamp))
}

export function generateSampleAlerts(
  rng: RandomSource,
  count: number,
  deviceCount: number,
  now: Date,
  createId: IdFactory = defaultIdFactory,
): Alert[] {
  const alerts: Alert[] = []
  const nowMs = now.getTime()

  for (let i = 0; i < count; i += 1) {
    const template = choice(rng, SEEDED_ALERT_TEMPLATES)
    const deviceId = formatDeviceId(randomInt(rng, 1, deviceCount + 1))
    const minutesAgo = randomInt(rng, 1, 1440)
    const acknowledged = choice(rng, [true, false])
    const resolved = rng.next() > 0.7 ? choice(rng, [true, false]) : false

    alerts.push({
      id: createId(),
      title: template.title,
      message: `${template.message} - ${deviceId}`,
      severity: template.severity,
      category: template.category,
      device_id: deviceId,
      timestamp: new Date(nowMs - minutesAgo * MINUTE).toISOString(),
      acknowledged,
      resolved,
    })
  }

  return sortNewestFirst(alerts)
}

export function createSystemAlert(
  rng: RandomSource,
  deviceCount: number,
  now: Date,
  createId: IdFactory = defaultIdFactory,
): Alert {
  const [title, severity] = choice(rng, SYSTEM_ALERT_TEMPLATES)
  const deviceId = formatDeviceId(randomInt(rng, 1, deviceCount + 1))
  return {
    id: createId(),
    title,
    message: `${title} detected on ${deviceId}`,
    severity,
    category: 'system',
    device_id: deviceId,
    timestamp: now.toISOString(),
    acknowledged: false,
    resolved: false,
  }
}

/**
 * Applies one round of value jitter to a device, in place.
 * The value moves by up to ±10% of itself and never drops below zero; with a
 * small probability the status is redrawn and health_score follows its band.
 */
export function jitterDevice(device: Device, rng: RandomSource, now: Date): void {
  const variation = uniform(rng, -VALUE_JITTER_RATIO, VALUE_JITTER_RATIO) * device.value
  device.value = roundTo(Math.max(0, device.value + variation), 2)
  device.timestamp = now.toISOString()

  if (rng.next() < STATUS_CHANGE_PROBABILITY) {
    device.status = weightedChoice(rng, STATUS_RESAMPLE_WEIGHTS)
    device.health_score = drawHealthScore(rng, device.status)
  }
}

export function shiftBaseline(hour: number): number {
  if (hour >= 8 && hour <= 16) return 90
  return 85
}

export function generatePerformanceTrend(rng: RandomSource, now: Date): PerformanceTrend {
  const labels: string[] = []
  const healthScores: number[] = []
  const efficiencyScores: number[] = []

  for (let i = 0; i < TREND_POINTS; i += 1) {
    const point = new Date(now.getTime() - (TREND_POINTS - 1 - i) * HOUR)
    labels.push(formatHourLabel(point))

    const baseHealth = shiftBaseline(point.getHours())
    const health = baseHealth + uniform(rng, -5, 5)
    healthScores.push(roundTo(clamp(health, 0, 100), 1))

    const efficiency = baseHealth - 5 + uniform(rng, -8, 8)
    efficiencyScores.push(roundTo(clamp(efficiency, 0, 100), 1))
  }

  return { labels, health_scores: healthScores, efficiency_scores: efficiencyScores }
}

export function estimateEnergyUsage(rng: RandomSource, now: Date): number {
  const hourFactor = Math.sin((2 * Math.PI * now.getHours()) / 24) * 300
  return 1200 + hourFactor + uniform(rng, -50, 50)
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0
  return values.reduce((sum, value) => sum + value, 0) / values.length
}
