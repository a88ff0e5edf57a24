import assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { DEVICE_TYPE_SPECS, SITE_LOCATIONS } from '../src/constants'
import { createSeededRandom } from '../src/random'
import {
  createSystemAlert,
  estimateEnergyUsage,
  formatDeviceId,
  formatHourLabel,
  generatePerformanceTrend,
  generateSampleAlerts,
  generateSampleDevices,
  hourlyLabels,
  isHealthInBand,
  jitterDevice,
  mean,
  shiftBaseline,
} from '../src/sampleData'
import type { Device } from '../src/types'
import { counterIds, isSortedNewestFirst, sequenceRandom } from './testUtils'

const NOW = new Date('2024-05-10T09:30:00.000Z')
const MINUTE = 60 * 1000

function device(overrides: Partial<Device> = {}): Device {
  return {
    id: 'DEVICE_001',
    name: 'Temperature Sensor 1',
    type: 'temperature',
    location: 'Warehouse A',
    status: 'normal',
    value: 25,
    unit: '°C',
    health_score: 0.9,
    efficiency_score: 0.85,
    last_maintenance: '2024-04-01T00:00:00.000Z',
    installation_date: '2022-01-01T00:00:00.000Z',
    firmware_version: '2.3.4',
    timestamp: '2024-05-10T09:00:00.000Z',
    ...overrides,
  }
}

describe('generateSampleDevices', () => {
  const devices = generateSampleDevices(createSeededRandom(7), 20, NOW)

  it('creates sequentially numbered devices', () => {
    assert.equal(devices.length, 20)
    assert.equal(devices[0].id, 'DEVICE_001')
    assert.equal(devices[19].id, 'DEVICE_020')
    devices.forEach((item, index) => {
      assert.equal(item.name, `${DEVICE_TYPE_SPECS[item.type].label} ${index + 1}`)
    })
  })

  it('keeps every field inside its domain', () => {
    for (const item of devices) {
      const spec = DEVICE_TYPE_SPECS[item.type]
      assert.equal(item.unit, spec.unit)
      assert.ok(item.value >= spec.initialRange[0] && item.value <= spec.initialRange[1], `${item.id} value ${item.value}`)
      assert.ok(isHealthInBand(item.status, item.health_score), `${item.id} health ${item.health_score}`)
      assert.ok(item.efficiency_score >= 0.7 && item.efficiency_score <= 1)
      assert.ok(SITE_LOCATIONS.includes(item.location))
      assert.match(item.firmware_version, /^[1-4]\.[0-8]\.[0-8]$/)
      assert.equal(item.timestamp, NOW.toISOString())
      assert.ok(Date.parse(item.last_maintenance) < NOW.getTime())
      assert.ok(Date.parse(item.installation_date) < Date.parse(item.last_maintenance))
    }
  })
})

describe('generateSampleAlerts', () => {
  const alerts = generateSampleAlerts(createSeededRandom(11), 15, 20, NOW, counterIds())

  it('returns the requested count newest first', () => {
    assert.equal(alerts.length, 15)
    assert.ok(isSortedNewestFirst(alerts.map((alert) => alert.timestamp)))
  })

  it('references existing device ids and stays within the last day', () => {
    for (const alert of alerts) {
      assert.match(alert.device_id, /^DEVICE_0(0[1-9]|1[0-9]|20)$/)
      assert.ok(alert.message.endsWith(` - ${alert.device_id}`))
      const age = NOW.getTime() - Date.parse(alert.timestamp)
      assert.ok(age >= MINUTE && age <= 1439 * MINUTE, `age ${age}`)
    }
  })
})

describe('createSystemAlert', () => {
  it('builds an unacknowledged system alert from a uniformly chosen pair', () => {
    const alert = createSystemAlert(sequenceRandom([0.5, 0]), 20, NOW, counterIds('new'))
    assert.deepEqual(alert, {
      id: 'new-1',
      title: 'Connection Timeout',
      message: 'Connection Timeout detected on DEVICE_001',
      severity: 'critical',
      category: 'system',
      device_id: 'DEVICE_001',
      timestamp: NOW.toISOString(),
      acknowledged: false,
      resolved: false,
    })
  })
})

describe('jitterDevice', () => {
  it('moves the value by at most ten percent and stamps the time', () => {
    const target = device()
    jitterDevice(target, sequenceRandom([0, 0.5]), NOW)
    assert.equal(target.value, 22.5)
    assert.equal(target.status, 'normal')
    assert.equal(target.health_score, 0.9)
    assert.equal(target.timestamp, NOW.toISOString())
  })

  it('redraws status and health together when the status roll hits', () => {
    const target = device()
    jitterDevice(target, sequenceRandom([0.75, 0.01, 0.8, 0.5]), NOW)
    assert.equal(target.value, 26.25)
    assert.equal(target.status, 'warning')
    assert.ok(Math.abs(target.health_score - 0.65) < 1e-9)
  })

  it('never drops below zero', () => {
    const target = device({ value: 0 })
    jitterDevice(target, sequenceRandom([0, 0.5]), NOW)
    assert.equal(target.value, 0)
  })
})

describe('performance trend', () => {
  it('uses the day-shift baseline from 08:00 to 16:00', () => {
    assert.equal(shiftBaseline(8), 90)
    assert.equal(shiftBaseline(16), 90)
    assert.equal(shiftBaseline(17), 85)
    assert.equal(shiftBaseline(0), 85)
    assert.equal(shiftBaseline(7), 85)
  })

  it('produces 24 hourly points ending at now', () => {
    const trend = generatePerformanceTrend(sequenceRandom([0]), NOW)
    assert.equal(trend.labels.length, 24)
    assert.equal(trend.health_scores.length, 24)
    assert.equal(trend.efficiency_scores.length, 24)
    assert.equal(trend.labels[23], formatHourLabel(NOW))

    trend.labels.forEach((_label, index) => {
      const hour = new Date(NOW.getTime() - (23 - index) * 60 * MINUTE).getHours()
      const base = shiftBaseline(hour)
      assert.equal(trend.health_scores[index], base - 5)
      assert.equal(trend.efficiency_scores[index], base - 13)
    })
  })
})

describe('labels and helpers', () => {
  it('formats ids and hour labels', () => {
    assert.equal(formatDeviceId(7), 'DEVICE_007')
    assert.equal(formatDeviceId(120), 'DEVICE_120')
    assert.equal(formatHourLabel(new Date(2024, 0, 15, 4, 5)), '04:05')
  })

  it('lists the last 24 hours oldest first', () => {
    const labels = hourlyLabels(new Date(2024, 0, 15, 10, 30))
    assert.equal(labels.length, 24)
    assert.equal(labels[0], '11:30')
    assert.equal(labels[23], '10:30')
  })

  it('follows the daily sine for energy usage', () => {
    const sixAm = new Date(2024, 0, 15, 6, 0)
    assert.equal(estimateEnergyUsage(sequenceRandom([0.5]), sixAm), 1500)
  })

  it('averages to zero on empty input', () => {
    assert.equal(mean([]), 0)
    assert.equal(mean([1, 2, 3]), 2)
  })
})
