/**
 * Security headers middleware.
 *
 * Sets standard security headers on every response:
 * - X-Content-Type-Options: prevents MIME-type sniffing
 * - X-Frame-Options: prevents clickjacking
 * - Content-Security-Policy: the pricing form needs only its own inline style
 * - HSTS: enforces HTTPS in production
 */

import type { Context, Next } from 'hono'

export interface SecurityHeaderOptions {
  /** Adds Strict-Transport-Security when set. */
  production: boolean
}

const CONTENT_SECURITY_POLICY = [
  "default-src 'none'",
  "style-src 'unsafe-inline'",
  "form-action 'self'",
  "frame-ancestors 'none'",
  "base-uri 'none'",
].join('; ')

export function securityHeaders(options: SecurityHeaderOptions) {
  return async (c: Context, next: Next): Promise<void> => {
    await next()
    c.header('X-Content-Type-Options', 'nosniff')
    c.header('X-Frame-Options', 'DENY')
    c.header('Referrer-Policy', 'no-referrer')
    c.header('Content-Security-Policy', CONTENT_SECURITY_POLICY)
    if (options.production) {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains')
    }
  }
}
