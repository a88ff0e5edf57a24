import type { CacheState } from './types'

export type Clock = () => number

interface CacheEntry<T> {
  computedAt: number
  payload: T
}

/**
 * Single-slot cache with a time-to-live.
 *
 * An entry is fresh while `now - computedAt < ttlMs`. There is no explicit
 * invalidation; a stale entry is replaced (never merged) on the next read.
 */
export class TtlCache<T> {
  private entry: CacheEntry<T> | null = null

  constructor(
    private readonly ttlMs: number,
    private readonly clock: Clock = Date.now,
  ) {
    if (!Number.isFinite(ttlMs) || ttlMs < 0) {
      throw new RangeError(`ttlMs must be a non-negative number, got: ${ttlMs}`)
    }
  }

  isFresh(): boolean {
    if (!this.entry) return false
    return this.clock() - this.entry.computedAt < this.ttlMs
  }

  /**
   * Returns the cached payload when fresh, otherwise runs `compute` once and
   * stores its result. `onMiss` / `onHit` are called for metrics.
   */
  getOrCompute(compute: () => T, hooks: { onHit?: () => void; onMiss?: () => void } = {}): T {
    if (this.entry && this.isFresh()) {
      hooks.onHit?.()
      return this.entry.payload
    }
    hooks.onMiss?.()
    const computedAt = this.clock()
    const payload = compute()
    this.entry = { computedAt, payload }
    return payload
  }

  state(): CacheState {
    if (!this.entry) {
      return { fresh: false, computed_at: null, age_ms: null }
    }
    return {
      fresh: this.isFresh(),
      computed_at: new Date(this.entry.computedAt).toISOString(),
      age_ms: this.clock() - this.entry.computedAt,
    }
  }
}
