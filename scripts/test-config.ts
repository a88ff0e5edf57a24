import assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { loadServerConfig, loadStoreConfig, parseBooleanEnv, parseIntegerEnv, parseNumberEnv } from '../src/config'
import { validateEnv } from '../src/validateEnv'

describe('loadServerConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    assert.deepEqual(loadServerConfig({}), {
      host: '0.0.0.0',
      port: 5000,
      debug: false,
      version: '2.0.0',
      allowedOrigins: [],
      rateLimit: { windowMs: 900_000, max: 300 },
      metricsEnabled: true,
      store: {
        deviceCount: 20,
        alertCapacity: 50,
        initialAlertCount: 15,
        cacheTtlMs: 120_000,
        newAlertProbability: 0.1,
        seed: null,
      },
    })
  })

  it('reads overrides and splits the origin allowlist', () => {
    const config = loadServerConfig({
      HOST: ' 127.0.0.1 ',
      PORT: '8080',
      DASHBOARD_DEBUG: 'yes',
      APP_VERSION: '3.1.0',
      ALLOWED_ORIGINS: 'http://localhost:3000, https://dash.example.com,,',
      PROMETHEUS_METRICS: 'off',
    })
    assert.equal(config.host, '127.0.0.1')
    assert.equal(config.port, 8080)
    assert.equal(config.debug, true)
    assert.equal(config.version, '3.1.0')
    assert.deepEqual(config.allowedOrigins, ['http://localhost:3000', 'https://dash.example.com'])
    assert.equal(config.metricsEnabled, false)
  })

  it('clamps out-of-range numbers and ignores garbage', () => {
    const config = loadServerConfig({ PORT: '70000', RATE_LIMIT_WINDOW_MS: '10', RATE_LIMIT_MAX: 'lots' })
    assert.equal(config.port, 65535)
    assert.equal(config.rateLimit.windowMs, 1_000)
    assert.equal(config.rateLimit.max, 300)
  })
})

describe('loadStoreConfig', () => {
  it('caps the initial alert count at the capacity', () => {
    const config = loadStoreConfig({ ALERT_CAPACITY: '8', INITIAL_ALERT_COUNT: '12' })
    assert.equal(config.alertCapacity, 8)
    assert.equal(config.initialAlertCount, 8)
  })

  it('keeps the probability within 0..1 and parses the seed', () => {
    const config = loadStoreConfig({ NEW_ALERT_PROBABILITY: '3', DASHBOARD_SEED: '42', DEVICE_COUNT: '0' })
    assert.equal(config.newAlertProbability, 1)
    assert.equal(config.seed, 42)
    assert.equal(config.deviceCount, 1)
  })

  it('leaves the seed unset for non-numeric input', () => {
    assert.equal(loadStoreConfig({ DASHBOARD_SEED: 'random' }).seed, null)
  })
})

describe('env parsing helpers', () => {
  it('accepts the usual boolean spellings', () => {
    assert.equal(parseBooleanEnv({ FLAG: 'TRUE' }, 'FLAG', false), true)
    assert.equal(parseBooleanEnv({ FLAG: '0' }, 'FLAG', true), false)
    assert.equal(parseBooleanEnv({ FLAG: 'maybe' }, 'FLAG', true), true)
    assert.equal(parseBooleanEnv({}, 'FLAG', false), false)
  })

  it('parses numbers with optional bounds', () => {
    assert.equal(parseNumberEnv({ RATIO: '0.25' }, 'RATIO', 0.5), 0.25)
    assert.equal(parseNumberEnv({ RATIO: '-2' }, 'RATIO', 0.5, { min: 0 }), 0)
    assert.equal(parseIntegerEnv({ COUNT: '12abc' }, 'COUNT', 3), 12)
    assert.equal(parseIntegerEnv({ COUNT: '' }, 'COUNT', 3), 3)
  })
})

describe('validateEnv', () => {
  it('passes an empty environment without warnings', () => {
    assert.deepEqual(validateEnv({}), { valid: true, errors: [], warnings: [] })
  })

  it('reports a non-numeric port', () => {
    const result = validateEnv({ PORT: 'abc' })
    assert.equal(result.valid, false)
    assert.deepEqual(result.errors, ['❌ PORT must be an integer in 0-65535, got: abc'])
  })

  it('rejects a probability outside 0..1 and a malformed origin', () => {
    const result = validateEnv({ NEW_ALERT_PROBABILITY: '1.5', ALLOWED_ORIGINS: 'not a url' })
    assert.equal(result.valid, false)
    assert.equal(result.errors.length, 2)
    assert.ok(result.errors[0].startsWith('❌ ALLOWED_ORIGINS entry is not a valid URL: not a url.'))
    assert.equal(result.errors[1], '❌ NEW_ALERT_PROBABILITY must be between 0 and 1, got: 1.5')
  })

  it('warns about a fixed seed and an oversized initial alert count', () => {
    const result = validateEnv({ DASHBOARD_SEED: '7', ALERT_CAPACITY: '5', INITIAL_ALERT_COUNT: '9' })
    assert.equal(result.valid, true)
    assert.deepEqual(result.warnings, [
      '⚠️  INITIAL_ALERT_COUNT (9) exceeds ALERT_CAPACITY (5); it will be capped',
      'ℹ️  DASHBOARD_SEED is set. Sample data is deterministic for this process.',
    ])
  })

  it('treats a blank alert capacity as unset', () => {
    assert.deepEqual(validateEnv({ ALERT_CAPACITY: '', INITIAL_ALERT_COUNT: ' ' }), {
      valid: true,
      errors: [],
      warnings: [],
    })
  })

  it('warns when production runs without an origin allowlist', () => {
    const result = validateEnv({ NODE_ENV: 'production' })
    assert.deepEqual(result.warnings, ['⚠️  ALLOWED_ORIGINS not configured. CORS will accept every origin.'])
  })
})
