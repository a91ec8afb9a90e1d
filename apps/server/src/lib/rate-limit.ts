/**
 * In-memory fixed-window rate limiter middleware for Hono.
 *
 * Each middleware instance keeps its own counters, so separate route
 * groups are throttled independently. Expired windows are pruned as
 * new clients arrive.
 */

import type { Context, Next } from 'hono'

export interface RateLimitConfig {
  /** Time window in milliseconds. */
  windowMs: number
  /** Maximum requests per window per key. */
  max: number
  /** Custom key extractor. Defaults to the first X-Forwarded-For address. */
  keyFn?: (c: Context) => string
  /** Clock, for tests. */
  now?: () => number
}

interface Window {
  count: number
  resetAt: number
}

const PRUNE_THRESHOLD = 10_000

function clientKey(c: Context): string {
  return c.req.header('x-forwarded-for')?.split(',')[0]?.trim() || 'unknown'
}

export function rateLimit(config: RateLimitConfig) {
  const windows = new Map<string, Window>()
  const now = config.now ?? Date.now
  const keyFn = config.keyFn ?? clientKey

  function prune(at: number): void {
    for (const [key, window] of windows) {
      if (at >= window.resetAt) windows.delete(key)
    }
  }

  return async (c: Context, next: Next): Promise<Response | void> => {
    const key = keyFn(c)
    const at = now()
    const window = windows.get(key)

    if (!window || at >= window.resetAt) {
      if (!window && windows.size >= PRUNE_THRESHOLD) prune(at)
      windows.set(key, { count: 1, resetAt: at + config.windowMs })
      return next()
    }

    if (window.count >= config.max) {
      c.header('Retry-After', String(Math.ceil((window.resetAt - at) / 1000)))
      return c.json({ error: 'Too many requests. Please try again later.' }, 429)
    }

    window.count++
    return next()
  }
}
