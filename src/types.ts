export type DeviceType = 'temperature' | 'pressure' | 'vibration' | 'humidity' | 'flow'

export type SiteLocation =
  | 'Production Line 1'
  | 'Production Line 2'
  | 'Quality Control'
  | 'Warehouse A'
  | 'Warehouse B'
  | 'Maintenance Shop'

export type DeviceStatus = 'normal' | 'warning' | 'critical'

export type AlertSeverity = 'info' | 'warning' | 'critical'

export type AlertCategory =
  | 'environmental'
  | 'safety'
  | 'maintenance'
  | 'connectivity'
  | 'performance'
  | 'system'

export interface Device {
  id: string
  name: string
  type: DeviceType
  location: SiteLocation
  status: DeviceStatus
  value: number
  unit: string
  health_score: number
  efficiency_score: number
  last_maintenance: string
  installation_date: string
  firmware_version: string
  timestamp: string
}

export interface Alert {
  id: string
  title: string
  message: string
  severity: AlertSeverity
  category: AlertCategory
  /** Weak reference to a device id; the device may not exist. */
  device_id: string
  timestamp: string
  acknowledged: boolean
  resolved: boolean
}

export interface PerformanceTrend {
  labels: string[]
  health_scores: number[]
  efficiency_scores: number[]
}

export interface DashboardSnapshot {
  timestamp: string
  system_health: number
  active_devices: number
  total_devices: number
  warning_devices: number
  critical_devices: number
  efficiency: number
  energy_usage: number
  performance_data: PerformanceTrend
  status_distribution: Record<DeviceStatus, number>
  uptime_percent: number
  response_time_ms: number
}

/** Returned in place of a payload when a computation fails inside the store. */
export interface ErrorPayload {
  error: string
  timestamp: string
}

export type DashboardPayload = DashboardSnapshot | ErrorPayload

export type SensorKind = 'temperature' | 'pressure' | 'vibration' | 'power' | 'humidity'

export interface Threshold {
  min: number
  max: number
}

export interface SensorSeries {
  labels: string[]
  values: number[]
  unit: string
  threshold: Threshold
}

export type AnalyticsData = Partial<Record<SensorKind, SensorSeries>>

export interface StatusSnapshot {
  timestamp: string
  cpu_usage: number
  memory_usage: number
  disk_usage: number
  network_latency: number
  active_connections: number
  database_status: 'connected'
  ai_modules_status: 'operational'
  last_backup: string
  uptime_hours: number
}

export interface HealthPayload {
  status: 'healthy'
  timestamp: string
  version: string
}

export interface CacheState {
  fresh: boolean
  computed_at: string | null
  age_ms: number | null
}

/**
 * Result 类型 / Result type
 * 成功时带 value，失败时带错误码和可读信息
 */
export type Result<T, E = string> =
  | { ok: true; value: T }
  | { ok: false; error: E; message: string }

export function isErrorPayload(payload: DashboardPayload): payload is ErrorPayload {
  return 'error' in payload
}
