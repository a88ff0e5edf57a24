import cors from 'cors'
import express from 'express'
import helmet from 'helmet'
import rateLimit from 'express-rate-limit'
import type { ServerConfig } from './config'
import { createHttpLogger, logger as rootLogger, type Logger } from './logger'
import type { DashboardMetrics } from './metrics'
import { createTelemetryRouter } from './routes/telemetryRoutes'
import type { TelemetryStore } from './telemetryStore'
import type { HealthPayload } from './types'

export type AppConfig = Pick<ServerConfig, 'debug' | 'version' | 'allowedOrigins' | 'rateLimit'>

export interface AppDependencies {
  store: TelemetryStore
  config: AppConfig
  metrics?: DashboardMetrics | null
  logger?: Logger
  /** Per-request access lines; off in tests. */
  httpLogging?: boolean
}

export function createApp(deps: AppDependencies): express.Express {
  const { store, config } = deps
  const log = deps.logger ?? rootLogger
  const metrics = deps.metrics ?? null

  const app = express()
  app.disable('x-powered-by')

  app.use(
    cors({
      origin: (origin, callback) => {
        // No allowlist: every origin, as in development
        if (!origin || config.allowedOrigins.length === 0) {
          callback(null, true)
          return
        }
        const allowed = config.allowedOrigins.includes(origin)
        if (!allowed) {
          log.warn(`[CORS] Rejected origin: ${origin} (not in allowlist)`)
        }
        callback(allowed ? null : new Error('Origin not allowed'), allowed)
      },
    }),
  )
  app.use(helmet())
  app.use(
    rateLimit({
      windowMs: config.rateLimit.windowMs,
      limit: config.rateLimit.max,
      message: { error: 'Too many requests, please try again later.' },
      standardHeaders: true,
      legacyHeaders: false,
    }),
  )
  if (deps.httpLogging ?? true) {
    app.use(createHttpLogger(log))
  }
  if (metrics) {
    app.use(metrics.httpMiddleware())
  }

  app.get('/health', (_req, res) => {
    const payload: HealthPayload = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: config.version,
    }
    res.json(payload)
  })

  if (metrics) {
    app.get('/metrics', async (_req, res, next) => {
      try {
        res.set('Content-Type', metrics.registry.contentType)
        res.send(await metrics.registry.metrics())
      } catch (error) {
        next(error)
      }
    })
  }

  app.use('/api', createTelemetryRouter(store, log.child('api')))

  app.use((_req, res) => {
    res.status(404).json({ error: 'Endpoint not found' })
  })

  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err.message === 'Origin not allowed') {
      res.status(403).json({ error: 'Origin not allowed by CORS policy' })
      return
    }

    log.error('[error] Unhandled error in route:', err)
    res.status(500).json({
      error: 'Internal server error',
      ...(config.debug && { detail: err.message }),
    })
  })

  return app
}
