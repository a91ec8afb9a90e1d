import { Hono } from 'hono'
import { cors } from 'hono/cors'
import type { PricingLimits } from '@option-pricer/config'
import { mapError } from './lib/errors'
import { securityHeaders } from './lib/security-headers'
import { requestLogger, log, type LogSink } from './lib/request-logger'
import { rateLimit } from './lib/rate-limit'
import { pricingRoutes } from './routes/pricing'
import { formRoutes } from './routes/form'

export const API_INFO = Object.freeze({ name: 'Option Pricer API', version: '0.1.0' })

export interface AppOptions {
  limits: PricingLimits
  corsOrigins: string[]
  production: boolean
  /** Pricing requests per client per minute. */
  pricingRateLimit?: number
  /** Log destination; defaults to stdout / stderr. */
  logSink?: LogSink
}

export function createApp(options: AppOptions) {
  const app = new Hono()

  // ---------------------------------------------------------------------------
  // Global error handling
  // ---------------------------------------------------------------------------

  app.onError((err, c) => {
    const { status, body } = mapError(err)
    if (status >= 500) {
      log('error', {
        method: c.req.method,
        path: c.req.path,
        error: err.message,
        stack: options.production ? undefined : err.stack,
      }, options.logSink)
    }
    return c.json(body, status)
  })

  app.notFound((c) => c.json({ error: 'Not found.' }, 404))

  // ---------------------------------------------------------------------------
  // Middleware stack (order matters)
  // ---------------------------------------------------------------------------

  // 1. Request logging (first so it captures total duration)
  app.use('*', requestLogger(options.logSink))

  // 2. CORS for the JSON API
  app.use(
    '/api/*',
    cors({
      origin: options.corsOrigins,
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type'],
      maxAge: 86400,
    }),
  )

  // 3. Security headers
  app.use('*', securityHeaders({ production: options.production }))

  // 4. Rate limiting, applied by the pricing routes themselves
  const throttle = rateLimit({ windowMs: 60_000, max: options.pricingRateLimit ?? 30 })

  // ---------------------------------------------------------------------------
  // Health check and info (unthrottled)
  // ---------------------------------------------------------------------------

  app.get('/health', (c) => c.json({ status: 'healthy' }))
  app.get('/api', (c) => c.json(API_INFO))

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------

  app.route('/api/price', pricingRoutes({ limits: options.limits, throttle }))
  app.route('/', formRoutes({ limits: options.limits, throttle }))

  return app
}
