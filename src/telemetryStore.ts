import { CircularBuffer } from './circularBuffer'
import {
  DEFAULT_ALERT_CAPACITY,
  DEFAULT_CACHE_TTL_MS,
  DEFAULT_DEVICE_COUNT,
  DEFAULT_INITIAL_ALERT_COUNT,
  DEFAULT_NEW_ALERT_PROBABILITY,
} from './constants'
import { logger as rootLogger, type Logger } from './logger'
import type { CacheOutcome } from './metrics'
import { createSeededRandom, mathRandom, roundTo, uniform, type RandomSource } from './random'
import {
  createSystemAlert,
  defaultIdFactory,
  estimateEnergyUsage,
  generatePerformanceTrend,
  generateSampleAlerts,
  generateSampleDevices,
  jitterDevice,
  mean,
  type IdFactory,
} from './sampleData'
import { buildAnalytics } from './sensorPatterns'
import { TtlCache, type Clock } from './ttlCache'
import type {
  Alert,
  AnalyticsData,
  CacheState,
  DashboardPayload,
  DashboardSnapshot,
  Device,
  StatusSnapshot,
} from './types'
import { safeSync } from './validators'

const HOUR = 60 * 60 * 1000

export interface TelemetryStoreOptions {
  deviceCount?: number
  alertCapacity?: number
  initialAlertCount?: number
  cacheTtlMs?: number
  newAlertProbability?: number
  /** Seeds every random draw; ignored when `random` is given. */
  seed?: number | null
  random?: RandomSource
  clock?: Clock
  createId?: IdFactory
  logger?: Logger
  onCacheLookup?: (outcome: CacheOutcome) => void
  onAlertsChanged?: (count: number) => void
  /** Replaces the generated sample devices, e.g. to start from known values. */
  devices?: Device[]
  /** Replaces the generated sample alerts; sorted newest first on load. */
  alerts?: Alert[]
}

/**
 * In-memory owner of the sample devices, the alert feed and the dashboard cache.
 *
 * Reads are not idempotent: `getDevices()` and a dashboard recomputation jitter
 * every device value, and `getAlerts()` may prepend a synthetic alert. Every
 * method is synchronous, so on Node's event loop each call runs to completion
 * without interleaving with another request.
 */
export class TelemetryStore {
  private readonly devices: Device[]
  private readonly alerts: CircularBuffer<Alert>
  private readonly dashboardCache: TtlCache<DashboardPayload>
  private readonly rng: RandomSource
  private readonly clock: Clock
  private readonly createId: IdFactory
  private readonly log: Logger
  private readonly newAlertProbability: number
  private readonly onCacheLookup: ((outcome: CacheOutcome) => void) | undefined
  private readonly onAlertsChanged: ((count: number) => void) | undefined

  constructor(options: TelemetryStoreOptions = {}) {
    this.rng =
      options.random ??
      (typeof options.seed === 'number' ? createSeededRandom(options.seed) : mathRandom)
    this.clock = options.clock ?? Date.now
    this.createId = options.createId ?? defaultIdFactory
    this.log = (options.logger ?? rootLogger).child('store')
    this.newAlertProbability = options.newAlertProbability ?? DEFAULT_NEW_ALERT_PROBABILITY
    this.onCacheLookup = options.onCacheLookup
    this.onAlertsChanged = options.onAlertsChanged

    const now = this.now()
    const deviceCount = options.deviceCount ?? DEFAULT_DEVICE_COUNT
    this.devices = options.devices ?? generateSampleDevices(this.rng, deviceCount, now)

    const initialAlerts =
      options.alerts ??
      generateSampleAlerts(
        this.rng,
        options.initialAlertCount ?? DEFAULT_INITIAL_ALERT_COUNT,
        this.devices.length,
        now,
        this.createId,
      )
    const sortedAlerts = [...initialAlerts].sort((a, b) => Date.parse(b.timestamp) - Date.parse(a.timestamp))
    this.alerts = new CircularBuffer(options.alertCapacity ?? DEFAULT_ALERT_CAPACITY, sortedAlerts)

    this.dashboardCache = new TtlCache(options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS, this.clock)

    this.onAlertsChanged?.(this.alerts.size())
    this.log.info(`Sample data initialized: ${this.devices.length} devices, ${this.alerts.size()} alerts`)
  }

  private now(): Date {
    return new Date(this.clock())
  }

  /** Jitters every device value in place and stamps the update time. */
  refreshDevices(): void {
    const now = this.now()
    for (const device of this.devices) {
      jitterDevice(device, this.rng, now)
    }
  }

  /** Side effect: mutates every device before returning the list. */
  getDevices(): Device[] {
    this.refreshDevices()
    return this.devices
  }

  getDeviceCount(): number {
    return this.devices.length
  }

  /**
   * Side effect: with `newAlertProbability` a synthetic system alert is
   * prepended and the feed truncated to capacity before slicing.
   */
  getAlerts(limit: number): Alert[] {
    if (this.rng.next() < this.newAlertProbability) {
      this.addRandomAlert()
    }
    return this.alerts.getFirst(limit)
  }

  private addRandomAlert(): void {
    // Never stamp before the current head, even if the clock stepped back
    const head = this.alerts.getFirst(1).at(0)
    const stamp = head ? new Date(Math.max(this.clock(), Date.parse(head.timestamp))) : this.now()
    const alert = createSystemAlert(this.rng, this.devices.length, stamp, this.createId)
    const evicted = this.alerts.pushFront(alert)
    this.log.debug(`New alert "${alert.title}" on ${alert.device_id}`, {
      severity: alert.severity,
      evicted: evicted.length || undefined,
    })
    this.onAlertsChanged?.(this.alerts.size())
  }

  getDashboardData(): DashboardPayload {
    return this.dashboardCache.getOrCompute(() => this.computeDashboard(), {
      onHit: () => this.onCacheLookup?.('hit'),
      onMiss: () => this.onCacheLookup?.('miss'),
    })
  }

  getCacheState(): CacheState {
    return this.dashboardCache.state()
  }

  private computeDashboard(): DashboardPayload {
    const result = safeSync(() => this.aggregate(), 'Error fetching dashboard data', this.log)
    if (!result.ok) {
      return { error: result.message, timestamp: this.now().toISOString() }
    }
    return result.value
  }

  private aggregate(): DashboardSnapshot {
    this.refreshDevices()
    const now = this.now()

    const normalCount = this.devices.filter((device) => device.status === 'normal').length
    const warningCount = this.devices.filter((device) => device.status === 'warning').length
    const criticalCount = this.devices.filter((device) => device.status === 'critical').length

    const avgHealth = mean(this.devices.map((device) => device.health_score)) * 100
    const avgEfficiency = mean(this.devices.map((device) => device.efficiency_score)) * 100
    const energyUsage = estimateEnergyUsage(this.rng, now)
    const performanceData = generatePerformanceTrend(this.rng, now)

    return {
      timestamp: now.toISOString(),
      system_health: roundTo(avgHealth, 1),
      active_devices: normalCount,
      total_devices: this.devices.length,
      warning_devices: warningCount,
      critical_devices: criticalCount,
      efficiency: roundTo(avgEfficiency, 1),
      energy_usage: roundTo(energyUsage, 1),
      performance_data: performanceData,
      status_distribution: {
        normal: normalCount,
        warning: warningCount,
        critical: criticalCount,
      },
      uptime_percent: roundTo(uniform(this.rng, 98.5, 99.9), 2),
      response_time_ms: roundTo(uniform(this.rng, 50, 200), 1),
    }
  }

  /** Independent of device and alert state. */
  getAnalyticsData(): AnalyticsData {
    const result = safeSync(() => buildAnalytics(this.rng, this.now()), 'Error generating analytics data', this.log)
    return result.ok ? result.value : {}
  }

  getSystemStatus(): StatusSnapshot {
    const now = this.now()
    return {
      timestamp: now.toISOString(),
      cpu_usage: roundTo(uniform(this.rng, 20, 80), 1),
      memory_usage: roundTo(uniform(this.rng, 40, 75), 1),
      disk_usage: roundTo(uniform(this.rng, 45, 85), 1),
      network_latency: roundTo(uniform(this.rng, 10, 50), 1),
      active_connections: this.devices.length,
      database_status: 'connected',
      ai_modules_status: 'operational',
      last_backup: new Date(now.getTime() - 6 * HOUR).toISOString(),
      uptime_hours: roundTo(uniform(this.rng, 100, 500), 1),
    }
  }
}
