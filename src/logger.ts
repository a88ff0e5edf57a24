import type { RequestHandler } from 'express'
import morgan from 'morgan'
import chalk from 'chalk'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = (env.LOG_LEVEL ?? '').trim().toLowerCase()
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error') {
    return raw
  }
  const debugFlag = (env.DASHBOARD_DEBUG ?? '').trim().toLowerCase()
  if (['1', 'true', 'yes', 'on'].includes(debugFlag)) return 'debug'
  return env.NODE_ENV === 'production' ? 'info' : 'debug'
}

type LogMeta = Record<string, unknown> | string | unknown[] | Error

export type LogSink = (level: LogLevel, line: string) => void

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line)
  } else if (level === 'warn') {
    console.warn(line)
  } else if (level === 'info') {
    console.info(line)
  } else {
    console.debug(line)
  }
}

function formatValue(value: unknown): string {
  if (value instanceof Error) return value.stack ?? value.message
  return typeof value === 'object' ? JSON.stringify(value) : String(value)
}

export function formatMeta(meta?: LogMeta): string {
  if (!meta) return ''
  try {
    if (meta instanceof Error) {
      return ` ${meta.message}`
    }
    if (Array.isArray(meta)) {
      return meta.length ? ` ${meta.map(formatValue).join(' ')}` : ''
    }
    if (typeof meta === 'string') {
      return meta.length ? ` ${meta}` : ''
    }
    const fragments = Object.entries(meta)
      .filter(([, value]) => value !== undefined && value !== null && value !== '')
      .map(([key, value]) => `${key}=${formatValue(value)}`)
    return fragments.length ? ` ${fragments.join(' ')}` : ''
  } catch {
    return ' [unserializable meta]'
  }
}

export interface Logger {
  debug(message: string, ...meta: LogMeta[]): void
  info(message: string, ...meta: LogMeta[]): void
  warn(message: string, ...meta: LogMeta[]): void
  error(message: string, ...meta: LogMeta[]): void
  child(scope: string): Logger
}

export interface LoggerOptions {
  level?: LogLevel
  scope?: string
  sink?: LogSink
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const activeLevel = options.level ?? resolveLogLevel()
  const sink = options.sink ?? consoleSink
  const prefix = options.scope ? `[${options.scope}] ` : ''

  const log = (logLevel: LogLevel, message: string, meta: LogMeta[]) => {
    if (LEVEL_PRIORITY[logLevel] < LEVEL_PRIORITY[activeLevel]) {
      return
    }
    const timestamp = new Date().toISOString()
    const suffix = meta.length ? formatMeta(meta.length === 1 ? meta[0] : meta) : ''
    sink(logLevel, `[${timestamp}] [${logLevel.toUpperCase()}] ${prefix}${message}${suffix}`)
  }

  return {
    debug(message, ...meta) {
      log('debug', message, meta)
    },
    info(message, ...meta) {
      log('info', message, meta)
    },
    warn(message, ...meta) {
      log('warn', message, meta)
    },
    error(message, ...meta) {
      log('error', message, meta)
    },
    child(scope) {
      return createLogger({
        level: activeLevel,
        sink,
        scope: options.scope ? `${options.scope}:${scope}` : scope,
      })
    },
  }
}

export const logger = createLogger()

function colorStatus(status: string | undefined): string {
  const statusNumber = Number(status)
  if (statusNumber >= 500) return chalk.red(status ?? '')
  if (statusNumber >= 400) return chalk.yellow(status ?? '')
  if (statusNumber >= 200) return chalk.green(status ?? '')
  return chalk.cyan(status ?? '')
}

export function createHttpLogger(target: Logger = logger): RequestHandler {
  return morgan((tokens, req, res) => {
    const method = tokens.method(req, res)
    const url = tokens.url(req, res)
    const status = tokens.status(req, res)
    const responseTime = tokens['response-time'](req, res)
    const length = tokens.res(req, res, 'content-length') || '0'

    target.info(
      `[http] ${chalk.blue(method ?? '')} ${url} ${colorStatus(status)} - ${responseTime}ms size=${length}`,
    )
    return null
  })
}
