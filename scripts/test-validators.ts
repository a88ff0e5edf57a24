import assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { createLogger } from '../src/logger'
import { safeSync, validateAlertLimit } from '../src/validators'

describe('validateAlertLimit', () => {
  it('defaults to 10 when absent', () => {
    assert.deepEqual(validateAlertLimit(undefined), { ok: true, value: 10 })
  })

  it('parses integer strings, including padded ones and zero', () => {
    assert.deepEqual(validateAlertLimit('5'), { ok: true, value: 5 })
    assert.deepEqual(validateAlertLimit(' 7 '), { ok: true, value: 7 })
    assert.deepEqual(validateAlertLimit('0'), { ok: true, value: 0 })
  })

  it('falls back for non-integer input', () => {
    assert.deepEqual(validateAlertLimit('abc'), { ok: true, value: 10 })
    assert.deepEqual(validateAlertLimit('2.5'), { ok: true, value: 10 })
    assert.deepEqual(validateAlertLimit(['1', '2']), { ok: true, value: 10 })
    assert.deepEqual(validateAlertLimit('', 4), { ok: true, value: 4 })
  })

  it('rejects negative limits', () => {
    assert.deepEqual(validateAlertLimit('-3'), {
      ok: false,
      error: 'NEGATIVE_LIMIT',
      message: 'limit must be a non-negative integer',
    })
  })
})

describe('safeSync', () => {
  it('wraps a returned value', () => {
    assert.deepEqual(
      safeSync(() => 21 * 2, 'multiply'),
      { ok: true, value: 42 },
    )
  })

  it('turns a throw into an error result and logs the context', () => {
    const lines: string[] = []
    const log = createLogger({ level: 'debug', sink: (_level, line) => lines.push(line) })
    const result = safeSync(
      () => {
        throw new Error('disk full')
      },
      'Saving snapshot',
      log,
    )
    assert.deepEqual(result, { ok: false, error: 'EXECUTION_ERROR', message: 'disk full' })
    assert.equal(lines.length, 1)
    assert.ok(lines[0].endsWith('[ERROR] Saving snapshot: disk full'))
  })

  it('stringifies non-Error throws', () => {
    const result = safeSync(() => {
      throw 'plain string'
    }, 'Parsing')
    assert.deepEqual(result, { ok: false, error: 'EXECUTION_ERROR', message: 'plain string' })
  })
})
