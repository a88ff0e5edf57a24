import assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { TelemetryStore, type TelemetryStoreOptions } from '../src/telemetryStore'
import { isHealthInBand } from '../src/sampleData'
import { isErrorPayload, type Alert, type Device, type DeviceStatus } from '../src/types'
import { counterIds, fixedClock, isSortedNewestFirst, sequenceRandom, silentLogger, throwingRandom } from './testUtils'

const START = '2024-05-10T09:30:00.000Z'
const TTL = 2 * 60 * 1000
const STATUSES: DeviceStatus[] = ['normal', 'warning', 'critical']

function makeStore(overrides: TelemetryStoreOptions = {}) {
  const clock = fixedClock(START)
  const store = new TelemetryStore({
    seed: 1234,
    clock: clock.now,
    createId: counterIds(),
    logger: silentLogger(),
    ...overrides,
  })
  return { store, clock }
}

function device(id: string, overrides: Partial<Device> = {}): Device {
  return {
    id,
    name: `Temperature Sensor ${id}`,
    type: 'temperature',
    location: 'Quality Control',
    status: 'normal',
    value: 25,
    unit: '°C',
    health_score: 0.9,
    efficiency_score: 0.9,
    last_maintenance: '2024-04-01T00:00:00.000Z',
    installation_date: '2022-01-01T00:00:00.000Z',
    firmware_version: '1.0.0',
    timestamp: '2024-05-10T09:00:00.000Z',
    ...overrides,
  }
}

function alert(id: string, timestamp: string): Alert {
  return {
    id,
    title: 'High Temperature Alert',
    message: 'Temperature sensor reading above normal threshold - DEVICE_001',
    severity: 'warning',
    category: 'environmental',
    device_id: 'DEVICE_001',
    timestamp,
    acknowledged: false,
    resolved: false,
  }
}

describe('TelemetryStore.getDevices', () => {
  it('keeps value, status and health band valid across repeated reads', () => {
    const { store } = makeStore()
    for (let round = 0; round < 50; round += 1) {
      for (const item of store.getDevices()) {
        assert.ok(item.value >= 0, `${item.id} value ${item.value}`)
        assert.ok(STATUSES.includes(item.status))
        assert.ok(isHealthInBand(item.status, item.health_score), `${item.id} ${item.status} ${item.health_score}`)
      }
    }
  })

  it('mutates the shared list in place and stamps the read time', () => {
    const { store, clock } = makeStore()
    const first = store.getDevices()
    const before = first.map((item) => item.value)
    clock.advance(5_000)
    const second = store.getDevices()
    assert.equal(second, first)
    assert.equal(second.length, 20)
    assert.ok(second.every((item) => item.timestamp === '2024-05-10T09:30:05.000Z'))
    assert.notDeepEqual(second.map((item) => item.value), before)
  })

  it('keeps a 25.0 normal device within ±10% and mostly normal', () => {
    let stillNormal = 0
    const trials = 200
    for (let seed = 1; seed <= trials; seed += 1) {
      const { store } = makeStore({ seed, devices: [device('DEVICE_001')], alerts: [] })
      const [result] = store.getDevices()
      assert.ok(result.value >= 22.5 && result.value <= 27.5, `seed ${seed} value ${result.value}`)
      if (result.status === 'normal') stillNormal += 1
    }
    assert.ok(stillNormal / trials >= 0.95, `only ${stillNormal}/${trials} stayed normal`)
  })
})

describe('TelemetryStore.getAlerts', () => {
  it('returns exactly the five most recent alerts', () => {
    const { store } = makeStore({ newAlertProbability: 0 })
    const all = store.getAlerts(100)
    assert.equal(all.length, 15)
    assert.ok(isSortedNewestFirst(all.map((item) => item.timestamp)))

    const latest = store.getAlerts(5)
    assert.deepEqual(latest, all.slice(0, 5))
  })

  it('handles zero, oversized and negative limits without failing', () => {
    const { store } = makeStore({ newAlertProbability: 0 })
    assert.deepEqual(store.getAlerts(0), [])
    assert.equal(store.getAlerts(1000).length, 15)
    assert.deepEqual(store.getAlerts(-3), [])
  })

  it('prepends synthetic alerts and never exceeds the cap', () => {
    const { store, clock } = makeStore({ newAlertProbability: 1 })
    for (let round = 0; round < 60; round += 1) {
      clock.advance(1_000)
      const alerts = store.getAlerts(100)
      assert.ok(alerts.length <= 50, `round ${round} length ${alerts.length}`)
      assert.ok(isSortedNewestFirst(alerts.map((item) => item.timestamp)))
      assert.equal(alerts[0].category, 'system')
      assert.equal(alerts[0].timestamp, new Date(clock.now()).toISOString())
      assert.equal(alerts[0].acknowledged, false)
      assert.equal(alerts[0].resolved, false)
    }
    assert.equal(store.getAlerts(100).length, 50)
  })

  it('stays newest first when the clock steps backwards', () => {
    const { store, clock } = makeStore({ newAlertProbability: 1 })
    const [first] = store.getAlerts(1)
    assert.equal(first.timestamp, START)

    clock.advance(-60_000)
    const alerts = store.getAlerts(100)
    assert.ok(isSortedNewestFirst(alerts.map((item) => item.timestamp)))
    assert.deepEqual(
      alerts.slice(0, 2).map((item) => item.timestamp),
      [START, START],
    )
  })

  it('sorts injected alerts newest first', () => {
    const { store } = makeStore({
      newAlertProbability: 0,
      alerts: [
        alert('old', '2024-05-09T08:00:00.000Z'),
        alert('new', '2024-05-10T08:00:00.000Z'),
        alert('mid', '2024-05-09T20:00:00.000Z'),
      ],
    })
    assert.deepEqual(
      store.getAlerts(10).map((item) => item.id),
      ['new', 'mid', 'old'],
    )
  })

  it('reports the alert count when it changes', () => {
    const counts: number[] = []
    const { store } = makeStore({ newAlertProbability: 1, alertCapacity: 16, onAlertsChanged: (count) => counts.push(count) })
    store.getAlerts(1)
    store.getAlerts(1)
    assert.deepEqual(counts, [15, 16, 16])
  })
})

describe('TelemetryStore.getDashboardData', () => {
  it('serves the cached snapshot inside the TTL and recomputes once after it', () => {
    const outcomes: string[] = []
    const { store, clock } = makeStore({ onCacheLookup: (outcome) => outcomes.push(outcome) })

    const first = store.getDashboardData()
    clock.advance(TTL - 1)
    const second = store.getDashboardData()
    assert.equal(second, first)

    clock.advance(1)
    const third = store.getDashboardData()
    const fourth = store.getDashboardData()
    assert.notEqual(third, first)
    assert.equal(fourth, third)
    assert.deepEqual(outcomes, ['miss', 'hit', 'miss', 'hit'])
  })

  it('jitters devices as a side effect of recomputing', () => {
    const devices = [device('DEVICE_001'), device('DEVICE_002', { value: 40 })]
    const { store, clock } = makeStore({ devices, alerts: [] })
    clock.advance(1_000)
    store.getDashboardData()
    assert.ok(devices.every((item) => item.timestamp === '2024-05-10T09:30:01.000Z'))
  })

  it('aggregates health, efficiency and status counts', () => {
    const devices = [
      device('DEVICE_001', { status: 'normal', health_score: 0.9, efficiency_score: 0.9 }),
      device('DEVICE_002', { status: 'warning', health_score: 0.6, efficiency_score: 0.8 }),
      device('DEVICE_003', { status: 'critical', health_score: 0.3, efficiency_score: 0.7 }),
    ]
    const { store, clock } = makeStore({ devices, alerts: [], random: sequenceRandom([0.5]) })
    const payload = store.getDashboardData()
    assert.ok(!isErrorPayload(payload))

    const hour = new Date(clock.now()).getHours()
    assert.equal(payload.timestamp, START)
    assert.equal(payload.system_health, 60)
    assert.equal(payload.efficiency, 80)
    assert.equal(payload.total_devices, 3)
    assert.equal(payload.active_devices, 1)
    assert.equal(payload.warning_devices, 1)
    assert.equal(payload.critical_devices, 1)
    assert.deepEqual(payload.status_distribution, { normal: 1, warning: 1, critical: 1 })
    assert.equal(payload.energy_usage, Math.round((1200 + Math.sin((2 * Math.PI * hour) / 24) * 300) * 10) / 10)
    assert.equal(payload.uptime_percent, 99.2)
    assert.equal(payload.response_time_ms, 125)
    assert.equal(payload.performance_data.labels.length, 24)
    assert.deepEqual(
      devices.map((item) => item.value),
      [25, 25, 25],
    )
  })

  it('returns and caches an error payload when aggregation fails', () => {
    const { store, clock } = makeStore({ devices: [device('DEVICE_001')], alerts: [], random: throwingRandom })
    const payload = store.getDashboardData()
    assert.deepEqual(payload, { error: 'entropy exhausted', timestamp: START })
    clock.advance(1_000)
    assert.equal(store.getDashboardData(), payload)
  })

  it('exposes the cache state', () => {
    const { store, clock } = makeStore()
    assert.deepEqual(store.getCacheState(), { fresh: false, computed_at: null, age_ms: null })
    store.getDashboardData()
    clock.advance(10_000)
    assert.deepEqual(store.getCacheState(), { fresh: true, computed_at: START, age_ms: 10_000 })
  })
})

describe('TelemetryStore.getAnalyticsData', () => {
  it('does not touch device state', () => {
    const devices = [device('DEVICE_001')]
    const { store } = makeStore({ devices, alerts: [] })
    const before = JSON.stringify(devices)
    const analytics = store.getAnalyticsData()
    assert.equal(Object.keys(analytics).length, 5)
    assert.equal(JSON.stringify(devices), before)
  })

  it('reproduces identical output for the same seed and clock', () => {
    const a = makeStore({ seed: 2024 }).store.getAnalyticsData()
    const b = makeStore({ seed: 2024 }).store.getAnalyticsData()
    assert.deepEqual(a, b)
  })

  it('returns an empty map when generation fails', () => {
    const { store } = makeStore({ devices: [], alerts: [], random: throwingRandom })
    assert.deepEqual(store.getAnalyticsData(), {})
  })
})

describe('TelemetryStore.getSystemStatus', () => {
  it('stays in range and counts devices as connections', () => {
    const { store } = makeStore({ deviceCount: 12 })
    for (let round = 0; round < 25; round += 1) {
      const status = store.getSystemStatus()
      assert.ok(status.cpu_usage >= 20 && status.cpu_usage <= 80)
      assert.ok(status.memory_usage >= 40 && status.memory_usage <= 75)
      assert.ok(status.disk_usage >= 45 && status.disk_usage <= 85)
      assert.ok(status.network_latency >= 10 && status.network_latency <= 50)
      assert.ok(status.uptime_hours >= 100 && status.uptime_hours <= 500)
      assert.equal(status.active_connections, store.getDeviceCount())
      assert.equal(status.active_connections, 12)
    }
  })

  it('reports fixed service states and a backup six hours ago', () => {
    const { store } = makeStore()
    const status = store.getSystemStatus()
    assert.equal(status.database_status, 'connected')
    assert.equal(status.ai_modules_status, 'operational')
    assert.equal(status.last_backup, '2024-05-10T03:30:00.000Z')
    assert.equal(status.timestamp, START)
  })
})
