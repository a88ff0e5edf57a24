import { validateEnvOrExit } from './validateEnv'
import { loadServerConfig } from './config'
import { createApp } from './app'
import { logger } from './logger'
import { createMetrics } from './metrics'
import { TelemetryStore } from './telemetryStore'

validateEnvOrExit()

const config = loadServerConfig()
const metrics = config.metricsEnabled ? createMetrics() : null

const store = new TelemetryStore({
  ...config.store,
  logger,
  onCacheLookup: metrics ? (outcome) => metrics.recordCacheLookup(outcome) : undefined,
  onAlertsChanged: metrics ? (count) => metrics.setAlertCount(count) : undefined,
})

const app = createApp({ store, config, metrics, logger })

const server = app.listen(config.port, config.host, () => {
  logger.info(`Telemetry dashboard backend listening on http://${config.host}:${config.port}`)
  if (config.allowedOrigins.length > 0) {
    logger.info(`CORS origins: ${config.allowedOrigins.join(', ')}`)
  } else {
    logger.info('CORS: allowing all origins')
  }
  logger.info(`[rate-limit] ${config.rateLimit.max} requests per ${config.rateLimit.windowMs / 1000}s`)
  logger.info(`[metrics] ${metrics ? 'Prometheus metrics at /metrics' : 'Disabled via PROMETHEUS_METRICS'}`)
  logger.info(`[store] Dashboard cache TTL ${config.store.cacheTtlMs}ms${config.store.seed === null ? '' : `, seed ${config.store.seed}`}`)
})

process.on('unhandledRejection', (reason) => {
  logger.error('[fatal] Unhandled Rejection:', reason instanceof Error ? reason : String(reason))
})

process.on('uncaughtException', (error) => {
  logger.error('[fatal] Uncaught Exception:', error)
  process.exit(1)
})

function shutdown(signal: NodeJS.Signals): void {
  logger.info(`[shutdown] ${signal} received, shutting down gracefully...`)
  server.close((error) => {
    if (error) {
      logger.error('[shutdown] Failed to close server:', error)
      process.exit(1)
    }
    process.exit(0)
  })
}

process.on('SIGTERM', shutdown)
process.on('SIGINT', shutdown)
