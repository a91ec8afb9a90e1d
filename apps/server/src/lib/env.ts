/**
 * Environment variable validation — fail-fast on startup.
 *
 * Import this module from the server entry point only; tests build the
 * app with explicit options instead.
 */

import { resolveLimits, type PricingLimits } from '@option-pricer/config'

function optional(key: string, fallback: string): string {
  const val = process.env[key]
  return val === undefined || val.trim() === '' ? fallback : val
}

function port(raw: string): number {
  const value = Number(raw)
  if (!Number.isInteger(value) || value < 1 || value > 65_535) {
    throw new Error(
      `Invalid PORT="${raw}": expected an integer between 1 and 65535. ` +
      `Fix it in .env or your deployment configuration.`,
    )
  }
  return value
}

export interface ServerEnv {
  PORT: number
  NODE_ENV: string
  CORS_ORIGINS: string[]
  LIMITS: PricingLimits
}

export const env: Readonly<ServerEnv> = Object.freeze({
  PORT: port(optional('PORT', '8000')),
  NODE_ENV: optional('NODE_ENV', 'development'),
  CORS_ORIGINS: optional('CORS_ORIGINS', 'http://localhost:3000')
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin !== ''),
  LIMITS: resolveLimits(),
})
