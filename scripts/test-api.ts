import assert from 'node:assert/strict'
import { after, before, describe, it } from 'node:test'
import { createApp, type AppConfig } from '../src/app'
import { createMetrics } from '../src/metrics'
import { TelemetryStore } from '../src/telemetryStore'
import type { StatusSnapshot } from '../src/types'
import { counterIds, silentLogger, startServer } from './testUtils'

const baseConfig: AppConfig = {
  debug: false,
  version: '9.9.9',
  allowedOrigins: [],
  rateLimit: { windowMs: 60_000, max: 1_000 },
}

class FaultyStore extends TelemetryStore {
  override getSystemStatus(): StatusSnapshot {
    throw new Error('sensor bus offline')
  }
}

async function getJson(url: string, init?: Parameters<typeof fetch>[1]): Promise<{ status: number; body: unknown }> {
  const response = await fetch(url, init)
  return { status: response.status, body: await response.json() }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

describe('HTTP API', () => {
  let baseUrl = ''
  let close: () => Promise<void> = async () => undefined

  before(async () => {
    const logger = silentLogger()
    const metrics = createMetrics({ collectDefaults: false })
    const store = new TelemetryStore({
      seed: 99,
      newAlertProbability: 0,
      createId: counterIds(),
      logger,
      onCacheLookup: (outcome) => metrics.recordCacheLookup(outcome),
      onAlertsChanged: (count) => metrics.setAlertCount(count),
    })
    const server = await startServer(createApp({ store, config: baseConfig, metrics, logger, httpLogging: false }))
    baseUrl = server.baseUrl
    close = server.close
  })

  after(async () => {
    await close()
  })

  it('reports health with the configured version', async () => {
    const { status, body } = await getJson(`${baseUrl}/health`)
    assert.equal(status, 200)
    assert.ok(isRecord(body))
    assert.equal(body.status, 'healthy')
    assert.equal(body.version, '9.9.9')
    assert.equal(typeof body.timestamp, 'string')
  })

  it('lists all twenty devices', async () => {
    const { status, body } = await getJson(`${baseUrl}/api/devices`)
    assert.equal(status, 200)
    assert.ok(Array.isArray(body))
    assert.equal(body.length, 20)
    const [first] = body
    assert.ok(isRecord(first))
    assert.equal(first.id, 'DEVICE_001')
  })

  it('limits alerts to ten by default and honours ?limit', async () => {
    const byDefault = await getJson(`${baseUrl}/api/alerts`)
    assert.equal(byDefault.status, 200)
    assert.ok(Array.isArray(byDefault.body))
    assert.equal(byDefault.body.length, 10)

    const three = await getJson(`${baseUrl}/api/alerts?limit=3`)
    assert.ok(Array.isArray(three.body))
    assert.deepEqual(three.body, byDefault.body.slice(0, 3))

    const garbage = await getJson(`${baseUrl}/api/alerts?limit=abc`)
    assert.ok(Array.isArray(garbage.body))
    assert.equal(garbage.body.length, 10)
  })

  it('rejects a negative alert limit', async () => {
    const { status, body } = await getJson(`${baseUrl}/api/alerts?limit=-1`)
    assert.equal(status, 400)
    assert.deepEqual(body, { error: 'limit must be a non-negative integer' })
  })

  it('serves the same dashboard snapshot while cached', async () => {
    const first = await getJson(`${baseUrl}/api/dashboard_data`)
    const second = await getJson(`${baseUrl}/api/dashboard_data`)
    assert.equal(first.status, 200)
    assert.ok(isRecord(first.body))
    assert.equal(first.body.total_devices, 20)
    assert.deepEqual(second.body, first.body)
  })

  it('returns a series for each sensor kind', async () => {
    const { status, body } = await getJson(`${baseUrl}/api/analytics`)
    assert.equal(status, 200)
    assert.ok(isRecord(body))
    assert.deepEqual(Object.keys(body), ['temperature', 'pressure', 'vibration', 'power', 'humidity'])
  })

  it('reports system status', async () => {
    const { status, body } = await getJson(`${baseUrl}/api/system_status`)
    assert.equal(status, 200)
    assert.ok(isRecord(body))
    assert.equal(body.active_connections, 20)
    assert.equal(body.database_status, 'connected')
  })

  it('answers unknown routes with 404', async () => {
    const { status, body } = await getJson(`${baseUrl}/api/nope`)
    assert.equal(status, 404)
    assert.deepEqual(body, { error: 'Endpoint not found' })
  })

  it('exposes cache and alert metrics', async () => {
    const response = await fetch(`${baseUrl}/metrics`)
    assert.equal(response.status, 200)
    const text = await response.text()
    const lines = text.split('\n')
    assert.ok(lines.includes('dashboard_cache_lookups_total{outcome="miss"} 1'))
    assert.ok(lines.includes('dashboard_cache_lookups_total{outcome="hit"} 1'))
    assert.ok(lines.includes('dashboard_alerts 15'))
    assert.ok(lines.some((line) => line.startsWith('dashboard_http_requests_total{')))
  })
})

describe('HTTP API failures', () => {
  it('maps a store fault to 500 with its message', async () => {
    const store = new FaultyStore({ seed: 5, logger: silentLogger() })
    const server = await startServer(createApp({ store, config: baseConfig, logger: silentLogger(), httpLogging: false }))
    try {
      const { status, body } = await getJson(`${server.baseUrl}/api/system_status`)
      assert.equal(status, 500)
      assert.deepEqual(body, { error: 'sensor bus offline' })
    } finally {
      await server.close()
    }
  })

  it('does not serve /metrics when metrics are disabled', async () => {
    const store = new TelemetryStore({ seed: 5, logger: silentLogger() })
    const server = await startServer(createApp({ store, config: baseConfig, logger: silentLogger(), httpLogging: false }))
    try {
      const { status, body } = await getJson(`${server.baseUrl}/metrics`)
      assert.equal(status, 404)
      assert.deepEqual(body, { error: 'Endpoint not found' })
    } finally {
      await server.close()
    }
  })

  it('rejects origins outside the allowlist', async () => {
    const store = new TelemetryStore({ seed: 5, logger: silentLogger() })
    const config: AppConfig = { ...baseConfig, allowedOrigins: ['http://localhost:3000'] }
    const server = await startServer(createApp({ store, config, logger: silentLogger(), httpLogging: false }))
    try {
      const allowed = await getJson(`${server.baseUrl}/health`, { headers: { Origin: 'http://localhost:3000' } })
      assert.equal(allowed.status, 200)
      const rejected = await getJson(`${server.baseUrl}/health`, { headers: { Origin: 'http://evil.test' } })
      assert.equal(rejected.status, 403)
      assert.deepEqual(rejected.body, { error: 'Origin not allowed by CORS policy' })
    } finally {
      await server.close()
    }
  })

  it('rate limits past the configured maximum', async () => {
    const store = new TelemetryStore({ seed: 5, logger: silentLogger() })
    const config: AppConfig = { ...baseConfig, rateLimit: { windowMs: 60_000, max: 2 } }
    const server = await startServer(createApp({ store, config, logger: silentLogger(), httpLogging: false }))
    try {
      assert.equal((await getJson(`${server.baseUrl}/health`)).status, 200)
      assert.equal((await getJson(`${server.baseUrl}/health`)).status, 200)
      const limited = await getJson(`${server.baseUrl}/health`)
      assert.equal(limited.status, 429)
      assert.deepEqual(limited.body, { error: 'Too many requests, please try again later.' })
    } finally {
      await server.close()
    }
  })
})
