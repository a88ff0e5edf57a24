import type { RequestHandler } from 'express'
import promClient from 'prom-client'

export type CacheOutcome = 'hit' | 'miss'

export interface DashboardMetrics {
  registry: promClient.Registry
  recordCacheLookup(outcome: CacheOutcome): void
  setAlertCount(count: number): void
  httpMiddleware(): RequestHandler
}

/**
 * Each call builds its own registry so several apps (tests) can coexist in
 * one process without colliding in the global registry.
 */
export function createMetrics(options: { collectDefaults?: boolean } = {}): DashboardMetrics {
  const registry = new promClient.Registry()
  if (options.collectDefaults ?? true) {
    promClient.collectDefaultMetrics({ register: registry })
  }

  const httpRequests = new promClient.Counter({
    name: 'dashboard_http_requests_total',
    help: 'HTTP requests served, by method, route and status code',
    labelNames: ['method', 'route', 'status'] as const,
    registers: [registry],
  })

  const cacheLookups = new promClient.Counter({
    name: 'dashboard_cache_lookups_total',
    help: 'Dashboard cache lookups, by outcome',
    labelNames: ['outcome'] as const,
    registers: [registry],
  })

  const alertCount = new promClient.Gauge({
    name: 'dashboard_alerts',
    help: 'Alerts currently held in memory',
    registers: [registry],
  })

  return {
    registry,
    recordCacheLookup(outcome) {
      cacheLookups.inc({ outcome })
    },
    setAlertCount(count) {
      alertCount.set(count)
    },
    httpMiddleware() {
      return (req, res, next) => {
        res.on('finish', () => {
          const route = typeof req.route?.path === 'string' ? `${req.baseUrl}${req.route.path}` : 'unmatched'
          httpRequests.inc({ method: req.method, route, status: String(res.statusCode) })
        })
        next()
      }
    },
  }
}
