import {
  DEFAULT_ALERT_CAPACITY,
  DEFAULT_CACHE_TTL_MS,
  DEFAULT_DEVICE_COUNT,
  DEFAULT_INITIAL_ALERT_COUNT,
  DEFAULT_NEW_ALERT_PROBABILITY,
} from './constants'

interface RateLimitConfig {
  windowMs: number
  max: number
}

export interface StoreConfig {
  deviceCount: number
  alertCapacity: number
  initialAlertCount: number
  cacheTtlMs: number
  newAlertProbability: number
  /** Fixed seed for reproducible sample data; null draws from Math.random. */
  seed: number | null
}

export interface ServerConfig {
  host: string
  port: number
  debug: boolean
  version: string
  allowedOrigins: string[]
  rateLimit: RateLimitConfig
  metricsEnabled: boolean
  store: StoreConfig
}

type Env = NodeJS.ProcessEnv

function getEnv(env: Env, key: string): string {
  const value = env[key]
  return typeof value === 'string' ? value.trim() : ''
}

export function parseBooleanEnv(env: Env, key: string, defaultValue: boolean): boolean {
  const raw = getEnv(env, key)
  if (!raw) return defaultValue
  if (['1', 'true', 'yes', 'on'].includes(raw.toLowerCase())) return true
  if (['0', 'false', 'no', 'off'].includes(raw.toLowerCase())) return false
  return defaultValue
}

export function parseNumberEnv(
  env: Env,
  key: string,
  defaultValue: number,
  options?: { min?: number; max?: number },
): number {
  const raw = getEnv(env, key)
  const parsed = raw ? Number(raw) : Number.NaN
  if (!Number.isFinite(parsed)) return defaultValue
  let value = parsed
  if (typeof options?.min === 'number') value = Math.max(options.min, value)
  if (typeof options?.max === 'number') value = Math.min(options.max, value)
  return value
}

export function parseIntegerEnv(
  env: Env,
  key: string,
  defaultValue: number,
  options?: { min?: number; max?: number },
): number {
  const raw = getEnv(env, key)
  const parsed = raw ? Number.parseInt(raw, 10) : Number.NaN
  if (!Number.isFinite(parsed)) return defaultValue
  let value = parsed
  if (typeof options?.min === 'number') value = Math.max(options.min, value)
  if (typeof options?.max === 'number') value = Math.min(options.max, value)
  return value
}

function parseOrigins(raw: string): string[] {
  return raw
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0)
}

export function loadStoreConfig(env: Env = process.env): StoreConfig {
  const rawSeed = getEnv(env, 'DASHBOARD_SEED')
  const seed = rawSeed ? Number.parseInt(rawSeed, 10) : Number.NaN
  const alertCapacity = parseIntegerEnv(env, 'ALERT_CAPACITY', DEFAULT_ALERT_CAPACITY, { min: 1, max: 1000 })

  return {
    deviceCount: parseIntegerEnv(env, 'DEVICE_COUNT', DEFAULT_DEVICE_COUNT, { min: 1, max: 999 }),
    alertCapacity,
    initialAlertCount: parseIntegerEnv(env, 'INITIAL_ALERT_COUNT', DEFAULT_INITIAL_ALERT_COUNT, {
      min: 0,
      max: alertCapacity,
    }),
    cacheTtlMs: parseIntegerEnv(env, 'DASHBOARD_CACHE_TTL_MS', DEFAULT_CACHE_TTL_MS, { min: 0 }),
    newAlertProbability: parseNumberEnv(env, 'NEW_ALERT_PROBABILITY', DEFAULT_NEW_ALERT_PROBABILITY, {
      min: 0,
      max: 1,
    }),
    seed: Number.isFinite(seed) ? seed : null,
  }
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  return {
    host: getEnv(env, 'HOST') || '0.0.0.0',
    port: parseIntegerEnv(env, 'PORT', 5000, { min: 0, max: 65535 }),
    debug: parseBooleanEnv(env, 'DASHBOARD_DEBUG', false),
    version: getEnv(env, 'APP_VERSION') || '2.0.0',
    allowedOrigins: parseOrigins(getEnv(env, 'ALLOWED_ORIGINS')),
    rateLimit: {
      windowMs: parseIntegerEnv(env, 'RATE_LIMIT_WINDOW_MS', 900_000, { min: 1_000 }),
      max: parseIntegerEnv(env, 'RATE_LIMIT_MAX', 300, { min: 1 }),
    },
    metricsEnabled: parseBooleanEnv(env, 'PROMETHEUS_METRICS', true),
    store: loadStoreConfig(env),
  }
}
