/**
 * Structured JSON-line logging.
 *
 * `requestLogger()` emits one line per request with:
 * - timestamp, level, HTTP method, path, response status, duration in ms
 *
 * Error lines go to stderr, everything else to stdout.
 */

import type { Context, Next } from 'hono'

export type LogLevel = 'info' | 'warn' | 'error'

export type LogSink = (line: string, level: LogLevel) => void

const processSink: LogSink = (line, level) => {
  if (level === 'error') process.stderr.write(line)
  else process.stdout.write(line)
}

export function log(
  level: LogLevel,
  fields: Record<string, unknown>,
  sink: LogSink = processSink,
): void {
  sink(JSON.stringify({ ts: new Date().toISOString(), level, ...fields }) + '\n', level)
}

function levelFor(status: number): LogLevel {
  if (status >= 500) return 'error'
  if (status >= 400) return 'warn'
  return 'info'
}

export function requestLogger(sink: LogSink = processSink) {
  return async (c: Context, next: Next): Promise<void> => {
    const start = performance.now()
    await next()
    const ms = Number((performance.now() - start).toFixed(1))

    log(levelFor(c.res.status), {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      ms,
    }, sink)
  }
}
