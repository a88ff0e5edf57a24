import type {
  AlertCategory,
  AlertSeverity,
  DeviceStatus,
  DeviceType,
  SensorKind,
  SiteLocation,
  Threshold,
} from './types'

export const DEFAULT_DEVICE_COUNT = 20
export const DEFAULT_ALERT_CAPACITY = 50
export const DEFAULT_INITIAL_ALERT_COUNT = 15
export const DEFAULT_CACHE_TTL_MS = 2 * 60 * 1000
export const DEFAULT_NEW_ALERT_PROBABILITY = 0.1
export const DEFAULT_ALERT_LIMIT = 10

export const STATUS_CHANGE_PROBABILITY = 0.05
export const VALUE_JITTER_RATIO = 0.1
export const TREND_POINTS = 24

export interface DeviceTypeSpec {
  label: string
  unit: string
  initialRange: readonly [number, number]
}

export const DEVICE_TYPE_SPECS: Record<DeviceType, DeviceTypeSpec> = {
  temperature: { label: 'Temperature Sensor', unit: '°C', initialRange: [18, 35] },
  pressure: { label: 'Pressure Sensor', unit: 'hPa', initialRange: [900, 1100] },
  vibration: { label: 'Vibration Sensor', unit: 'mm/s', initialRange: [0.1, 0.5] },
  humidity: { label: 'Humidity Sensor', unit: '%RH', initialRange: [35, 75] },
  flow: { label: 'Flow Meter', unit: 'L/min', initialRange: [10, 50] },
}

export const DEVICE_TYPES: readonly DeviceType[] = ['temperature', 'pressure', 'vibration', 'humidity', 'flow']

export const SITE_LOCATIONS: readonly SiteLocation[] = [
  'Production Line 1',
  'Production Line 2',
  'Quality Control',
  'Warehouse A',
  'Warehouse B',
  'Maintenance Shop',
]

/** health_score band that each status must stay inside. */
export const HEALTH_BANDS: Record<DeviceStatus, readonly [number, number]> = {
  normal: [0.8, 1.0],
  warning: [0.5, 0.8],
  critical: [0.1, 0.5],
}

export const STATUS_RESAMPLE_WEIGHTS: ReadonlyArray<readonly [DeviceStatus, number]> = [
  ['normal', 0.7],
  ['warning', 0.25],
  ['critical', 0.05],
]

export const EFFICIENCY_RANGE: readonly [number, number] = [0.7, 1.0]

export interface SeededAlertTemplate {
  title: string
  message: string
  severity: AlertSeverity
  category: AlertCategory
}

export const SEEDED_ALERT_TEMPLATES: readonly SeededAlertTemplate[] = [
  {
    title: 'High Temperature Alert',
    message: 'Temperature sensor reading above normal threshold',
    severity: 'warning',
    category: 'environmental',
  },
  {
    title: 'Pressure Anomaly Detected',
    message: 'Unusual pressure readings detected on production line',
    severity: 'critical',
    category: 'safety',
  },
  {
    title: 'Vibration Level Elevated',
    message: 'Machine vibration levels exceeding normal parameters',
    severity: 'warning',
    category: 'maintenance',
  },
  {
    title: 'Device Communication Lost',
    message: 'Lost communication with sensor device',
    severity: 'critical',
    category: 'connectivity',
  },
  {
    title: 'Efficiency Drop Detected',
    message: 'System efficiency has dropped below optimal levels',
    severity: 'info',
    category: 'performance',
  },
]

// Picked uniformly; the pairs carry no weighting.
export const SYSTEM_ALERT_TEMPLATES: ReadonlyArray<readonly [string, AlertSeverity]> = [
  ['Sensor Reading Anomaly', 'warning'],
  ['System Performance Alert', 'info'],
  ['Connection Timeout', 'critical'],
  ['Maintenance Required', 'warning'],
]

export interface SensorPatternSpec {
  base: number
  amplitude: number
  frequency: number
  unit: string
  threshold: Threshold
}

export const SENSOR_PATTERNS: Record<SensorKind, SensorPatternSpec> = {
  temperature: { base: 22, amplitude: 3, frequency: 0.1, unit: '°C', threshold: { min: 18, max: 28 } },
  pressure: { base: 1013, amplitude: 20, frequency: 0.05, unit: 'hPa', threshold: { min: 980, max: 1040 } },
  vibration: { base: 0.25, amplitude: 0.1, frequency: 0.2, unit: 'mm/s', threshold: { min: 0, max: 0.5 } },
  power: { base: 1200, amplitude: 300, frequency: 0.08, unit: 'W', threshold: { min: 800, max: 1800 } },
  humidity: { base: 55, amplitude: 15, frequency: 0.12, unit: '%RH', threshold: { min: 40, max: 70 } },
}

export const SENSOR_KINDS: readonly SensorKind[] = ['temperature', 'pressure', 'vibration', 'power', 'humidity']
