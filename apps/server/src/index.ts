import { serve } from '@hono/node-server'
import { env } from './lib/env'
import { log } from './lib/request-logger'
import { createApp } from './app'

const app = createApp({
  limits: env.LIMITS,
  corsOrigins: env.CORS_ORIGINS,
  production: env.NODE_ENV === 'production',
})

// ---------------------------------------------------------------------------
// Server start + graceful shutdown
// ---------------------------------------------------------------------------

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  log('info', {
    event: 'server_started',
    port: info.port,
    env: env.NODE_ENV,
    limits: env.LIMITS,
  })
})

function shutdown(signal: string) {
  log('info', { event: 'shutdown', signal })

  server.close(() => process.exit(0))
  setTimeout(() => process.exit(1), 10_000).unref()
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
