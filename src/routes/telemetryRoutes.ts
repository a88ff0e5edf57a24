import { Router, type Response } from 'express'
import type { Logger } from '../logger'
import type { TelemetryStore } from '../telemetryStore'
import { validateAlertLimit } from '../validators'

function sendRouteError(res: Response, log: Logger, label: string, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error)
  log.error(`${label} error: ${message}`)
  res.status(500).json({ error: message })
}

/** JSON API over the store, mounted under /api. */
export function createTelemetryRouter(store: TelemetryStore, log: Logger): Router {
  const router = Router()

  router.get('/dashboard_data', (_req, res) => {
    try {
      res.json(store.getDashboardData())
    } catch (error) {
      sendRouteError(res, log, 'Dashboard data', error)
    }
  })

  router.get('/devices', (_req, res) => {
    try {
      res.json(store.getDevices())
    } catch (error) {
      sendRouteError(res, log, 'Devices data', error)
    }
  })

  router.get('/alerts', (req, res) => {
    const limit = validateAlertLimit(req.query.limit)
    if (!limit.ok) {
      log.warn('Rejected alerts query', { reason: limit.error, limit: req.query.limit })
      res.status(400).json({ error: limit.message })
      return
    }
    try {
      res.json(store.getAlerts(limit.value))
    } catch (error) {
      sendRouteError(res, log, 'Alerts data', error)
    }
  })

  router.get('/analytics', (_req, res) => {
    try {
      res.json(store.getAnalyticsData())
    } catch (error) {
      sendRouteError(res, log, 'Analytics data', error)
    }
  })

  router.get('/system_status', (_req, res) => {
    try {
      res.json(store.getSystemStatus())
    } catch (error) {
      sendRouteError(res, log, 'System status', error)
    }
  })

  return router
}
