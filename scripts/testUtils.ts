import { once } from 'node:events'
import type { Server } from 'node:http'
import type { Express } from 'express'
import { createLogger, type Logger } from '../src/logger'
import type { RandomSource } from '../src/random'

/** Replays the given draws in order, wrapping around at the end. */
export function sequenceRandom(values: number[]): RandomSource {
  let index = 0
  return {
    next() {
      const value = values[index % values.length]
      index += 1
      return value
    },
  }
}

export const throwingRandom: RandomSource = {
  next() {
    throw new Error('entropy exhausted')
  },
}

export function fixedClock(iso: string) {
  let current = Date.parse(iso)
  return {
    now: () => current,
    advance(ms: number) {
      current += ms
    },
  }
}

export function counterIds(prefix = 'alert'): () => string {
  let counter = 0
  return () => {
    counter += 1
    return `${prefix}-${counter}`
  }
}

export function silentLogger(): Logger {
  return createLogger({ level: 'error', sink: () => undefined })
}

export function isSortedNewestFirst(timestamps: string[]): boolean {
  for (let i = 1; i < timestamps.length; i += 1) {
    if (Date.parse(timestamps[i - 1]) < Date.parse(timestamps[i])) return false
  }
  return true
}

export async function startServer(app: Express): Promise<{ baseUrl: string; close: () => Promise<void> }> {
  const server: Server = app.listen(0, '127.0.0.1')
  await once(server, 'listening')
  const address = server.address()
  if (!address || typeof address === 'string') {
    throw new Error('Server did not bind to a TCP port')
  }
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections()
        server.close((error) => (error ? reject(error) : resolve()))
      }),
  }
}
