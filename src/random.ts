/**
 * Random draws used by the sample generators.
 * Every generator takes a RandomSource so tests can pin the sequence with a seed.
 */

export interface RandomSource {
  /** Uniform draw in [0, 1). */
  next(): number
}

export const mathRandom: RandomSource = {
  next: () => Math.random(),
}

/** Seeded PRNG (Mulberry32) for deterministic output. */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed | 0
  return {
    next() {
      state = (state + 0x6d2b79f5) | 0
      let t = Math.imul(state ^ (state >>> 15), 1 | state)
      t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296
    },
  }
}

export function uniform(rng: RandomSource, min: number, max: number): number {
  return min + rng.next() * (max - min)
}

/** Integer in [min, maxExclusive). */
export function randomInt(rng: RandomSource, min: number, maxExclusive: number): number {
  return min + Math.floor(rng.next() * (maxExclusive - min))
}

export function choice<T>(rng: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new RangeError('choice() needs at least one item')
  }
  const index = Math.min(items.length - 1, Math.floor(rng.next() * items.length))
  return items[index]
}

export function weightedChoice<T>(rng: RandomSource, weights: ReadonlyArray<readonly [T, number]>): T {
  const total = weights.reduce((sum, [, weight]) => sum + weight, 0)
  if (weights.length === 0 || total <= 0) {
    throw new RangeError('weightedChoice() needs a positive total weight')
  }
  let threshold = rng.next() * total
  for (const [item, weight] of weights) {
    threshold -= weight
    if (threshold < 0) return item
  }
  return weights[weights.length - 1][0]
}

// Box-Muller; 1 - u keeps the log argument in (0, 1].
export function normal(rng: RandomSource, mean: number, stdDev: number): number {
  const u1 = 1 - rng.next()
  const u2 = rng.next()
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2)
  return mean + z * stdDev
}

export function exponential(rng: RandomSource, scale: number): number {
  return -Math.log(1 - rng.next()) * scale
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits
  return Math.round(value * factor) / factor
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value))
}
