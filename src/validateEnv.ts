/**
 * 环境变量验证模块 / Environment Variable Validation Module
 *
 * 在服务器启动前验证所有环境变量
 * Validate environment variables before the server starts
 */

import { logger } from './logger'

export interface ValidationResult {
  valid: boolean
  errors: string[]
  warnings: string[]
}

function checkInteger(
  env: NodeJS.ProcessEnv,
  key: string,
  range: { min: number; max: number },
  errors: string[],
): void {
  const raw = env[key]
  if (raw === undefined || raw.trim().length === 0) return
  const parsed = Number(raw.trim())
  if (!Number.isInteger(parsed) || parsed < range.min || parsed > range.max) {
    errors.push(`❌ ${key} must be an integer in ${range.min}-${range.max}, got: ${raw}`)
  }
}

const BOOLEAN_VALUES = ['true', 'false', '1', '0', 'yes', 'no', 'on', 'off']

/**
 * 验证环境变量 / Validate environment variables
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const errors: string[] = []
  const warnings: string[] = []

  // ===== 服务器 / Server =====
  checkInteger(env, 'PORT', { min: 0, max: 65535 }, errors)

  const HOST = env.HOST
  if (HOST !== undefined && HOST.trim().length === 0) {
    errors.push('❌ HOST must not be empty when set')
  }

  for (const key of ['DASHBOARD_DEBUG', 'PROMETHEUS_METRICS']) {
    const raw = env[key]
    if (raw !== undefined && raw.trim().length > 0 && !BOOLEAN_VALUES.includes(raw.trim().toLowerCase())) {
      errors.push(`❌ ${key} must be true/false, got: ${raw}`)
    }
  }

  const LOG_LEVEL = env.LOG_LEVEL
  if (LOG_LEVEL && !['debug', 'info', 'warn', 'error'].includes(LOG_LEVEL.trim().toLowerCase())) {
    warnings.push(`⚠️  LOG_LEVEL (${LOG_LEVEL}) is not one of debug/info/warn/error; falling back to the default`)
  }

  const ALLOWED_ORIGINS = env.ALLOWED_ORIGINS
  if (ALLOWED_ORIGINS && ALLOWED_ORIGINS.trim().length > 0) {
    for (const origin of ALLOWED_ORIGINS.split(',').map((item) => item.trim()).filter(Boolean)) {
      try {
        new URL(origin)
      } catch (error) {
        errors.push(
          `❌ ALLOWED_ORIGINS entry is not a valid URL: ${origin}. Error: ${
            error instanceof Error ? error.message : String(error)
          }`,
        )
      }
    }
  } else if (env.NODE_ENV === 'production') {
    warnings.push('⚠️  ALLOWED_ORIGINS not configured. CORS will accept every origin.')
  }

  checkInteger(env, 'RATE_LIMIT_WINDOW_MS', { min: 1_000, max: 86_400_000 }, errors)
  checkInteger(env, 'RATE_LIMIT_MAX', { min: 1, max: 1_000_000 }, errors)

  // ===== 样本数据 / Sample data =====
  checkInteger(env, 'DEVICE_COUNT', { min: 1, max: 999 }, errors)
  checkInteger(env, 'ALERT_CAPACITY', { min: 1, max: 1000 }, errors)
  checkInteger(env, 'INITIAL_ALERT_COUNT', { min: 0, max: 1000 }, errors)
  checkInteger(env, 'DASHBOARD_CACHE_TTL_MS', { min: 0, max: 86_400_000 }, errors)

  const capacity = Number(env.ALERT_CAPACITY?.trim() || '50')
  const initial = Number(env.INITIAL_ALERT_COUNT?.trim() || '15')
  if (Number.isInteger(capacity) && Number.isInteger(initial) && initial > capacity) {
    warnings.push(`⚠️  INITIAL_ALERT_COUNT (${initial}) exceeds ALERT_CAPACITY (${capacity}); it will be capped`)
  }

  const NEW_ALERT_PROBABILITY = env.NEW_ALERT_PROBABILITY
  if (NEW_ALERT_PROBABILITY !== undefined && NEW_ALERT_PROBABILITY.trim().length > 0) {
    const probability = Number(NEW_ALERT_PROBABILITY)
    if (!Number.isFinite(probability) || probability < 0 || probability > 1) {
      errors.push(`❌ NEW_ALERT_PROBABILITY must be between 0 and 1, got: ${NEW_ALERT_PROBABILITY}`)
    }
  }

  const DASHBOARD_SEED = env.DASHBOARD_SEED
  if (DASHBOARD_SEED !== undefined && DASHBOARD_SEED.trim().length > 0) {
    if (!Number.isInteger(Number(DASHBOARD_SEED))) {
      errors.push(`❌ DASHBOARD_SEED must be an integer, got: ${DASHBOARD_SEED}`)
    } else {
      warnings.push('ℹ️  DASHBOARD_SEED is set. Sample data is deterministic for this process.')
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  }
}

/**
 * 打印验证结果 / Print validation results
 */
export function printValidationResult(result: ValidationResult): void {
  for (const error of result.errors) {
    logger.error(`[env] ${error}`)
  }
  for (const warning of result.warnings) {
    logger.warn(`[env] ${warning}`)
  }

  if (result.valid && result.warnings.length === 0) {
    logger.info('[env] ✅ All environment variables are valid')
  } else if (result.valid) {
    logger.info('[env] ✅ Environment variables are valid (with warnings)')
  } else {
    logger.error('[env] ❌ Environment validation FAILED. Please check the environment and fix the errors above.')
  }
}

/**
 * 验证并在失败时退出 / Validate and exit on failure
 */
export function validateEnvOrExit(env: NodeJS.ProcessEnv = process.env): void {
  const result = validateEnv(env)
  printValidationResult(result)

  if (!result.valid) {
    logger.error('[env] Server startup aborted due to configuration errors.')
    process.exit(1)
  }
}
