import assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { createLogger, formatMeta, resolveLogLevel, type LogLevel } from '../src/logger'

function collectingLogger(level: LogLevel, scope?: string) {
  const lines: Array<{ level: LogLevel; line: string }> = []
  const log = createLogger({ level, scope, sink: (lineLevel, line) => lines.push({ level: lineLevel, line }) })
  return { log, lines }
}

describe('createLogger', () => {
  it('drops lines below the active level', () => {
    const { log, lines } = collectingLogger('warn')
    log.debug('noise')
    log.info('still noise')
    log.warn('careful')
    log.error('broken')
    assert.deepEqual(
      lines.map((entry) => entry.level),
      ['warn', 'error'],
    )
  })

  it('formats timestamp, level, scope and meta', () => {
    const { log, lines } = collectingLogger('debug', 'store')
    log.info('Cache refreshed', { devices: 20 })
    assert.equal(lines.length, 1)
    assert.match(lines[0].line, /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[INFO\] \[store\] Cache refreshed devices=20$/)
  })

  it('nests child scopes', () => {
    const { log, lines } = collectingLogger('debug', 'app')
    log.child('api').warn('slow')
    assert.ok(lines[0].line.endsWith('[WARN] [app:api] slow'))
  })
})

describe('formatMeta', () => {
  it('handles each meta shape', () => {
    assert.equal(formatMeta(), '')
    assert.equal(formatMeta(new Error('boom')), ' boom')
    assert.equal(formatMeta('extra'), ' extra')
    assert.equal(formatMeta(''), '')
    assert.equal(formatMeta(['a', { b: 1 }]), ' a {"b":1}')
    assert.equal(formatMeta({ a: 1, skip: undefined, empty: '', none: null, tag: 'x' }), ' a=1 tag=x')
  })
})

describe('resolveLogLevel', () => {
  it('prefers LOG_LEVEL, then the debug flag, then NODE_ENV', () => {
    assert.equal(resolveLogLevel({ LOG_LEVEL: 'WARN', DASHBOARD_DEBUG: 'true' }), 'warn')
    assert.equal(resolveLogLevel({ DASHBOARD_DEBUG: 'on', NODE_ENV: 'production' }), 'debug')
    assert.equal(resolveLogLevel({ NODE_ENV: 'production' }), 'info')
    assert.equal(resolveLogLevel({}), 'debug')
    assert.equal(resolveLogLevel({ LOG_LEVEL: 'verbose', NODE_ENV: 'production' }), 'info')
  })
})
