/**
 * 输入验证和错误处理工具
 * Input validation and error handling utilities
 */

import { DEFAULT_ALERT_LIMIT } from './constants'
import type { Logger } from './logger'
import type { Result } from './types'

/**
 * 验证 alerts 的 limit 查询参数
 * Validates the `limit` query parameter of /api/alerts
 *
 * 缺失或不是整数时回退到默认值；负数被拒绝
 * Absent or non-integer input falls back to the default; negative input is rejected
 *
 * @example
 * const result = validateAlertLimit(req.query.limit)
 * if (!result.ok) {
 *   res.status(400).json({ error: result.message })
 * }
 */
export function validateAlertLimit(raw: unknown, fallback: number = DEFAULT_ALERT_LIMIT): Result<number> {
  if (raw === undefined) {
    return { ok: true, value: fallback }
  }
  if (typeof raw !== 'string') {
    return { ok: true, value: fallback }
  }

  const trimmed = raw.trim()
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return { ok: true, value: fallback }
  }

  const parsed = Number.parseInt(trimmed, 10)
  if (parsed < 0) {
    return {
      ok: false,
      error: 'NEGATIVE_LIMIT',
      message: 'limit must be a non-negative integer',
    }
  }

  return { ok: true, value: parsed }
}

/**
 * 同步执行并把异常转换为 Result
 * Runs a synchronous computation and turns a thrown error into a Result
 *
 * @param context - 错误上下文信息 / Error context
 */
export function safeSync<T>(fn: () => T, context: string, log?: Logger): Result<T> {
  try {
    const value = fn()
    return { ok: true, value }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    log?.error(`${context}: ${message}`)
    return {
      ok: false,
      error: 'EXECUTION_ERROR',
      message,
    }
  }
}
