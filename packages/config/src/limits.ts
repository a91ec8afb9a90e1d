import { z } from 'zod'

/** Per-request work bounds enforced by the adapters. */
export interface PricingLimits {
  /** Monte Carlo paths per request */
  maxPaths: number
  /** GBM sub-steps per path */
  maxSteps: number
  /** Simulated steps per request (paths × steps) */
  maxPathSteps: number
  /** Binomial tree periods (work grows with periods²) */
  maxPeriods: number
  /** Payoff expression length in characters */
  maxPayoffLength: number
}

export type LimitKey = keyof PricingLimits

/** All limit keys for iteration. */
export const LIMIT_KEYS: LimitKey[] = ['maxPaths', 'maxSteps', 'maxPathSteps', 'maxPeriods', 'maxPayoffLength']

/** Environment variable behind each limit. */
export const LIMIT_ENV_KEYS: Record<LimitKey, string> = {
  maxPaths: 'PRICER_MAX_PATHS',
  maxSteps: 'PRICER_MAX_STEPS',
  maxPathSteps: 'PRICER_MAX_PATH_STEPS',
  maxPeriods: 'PRICER_MAX_PERIODS',
  maxPayoffLength: 'PRICER_MAX_PAYOFF_LENGTH',
}

export const DEFAULT_LIMITS: Readonly<PricingLimits> = Object.freeze({
  maxPaths: 1_000_000,
  maxSteps: 1_000,
  maxPathSteps: 10_000_000,
  maxPeriods: 5_000,
  maxPayoffLength: 500,
})

const limitValue = z.coerce.number().int().positive()

/**
 * Resolve limits: environment override > default.
 *
 * A variable that is set but not a positive integer throws; blank
 * counts as unset.
 */
export function resolveLimits(
  env: Record<string, string | undefined> = process.env,
): PricingLimits {
  const resolved: PricingLimits = { ...DEFAULT_LIMITS }

  for (const key of LIMIT_KEYS) {
    const envKey = LIMIT_ENV_KEYS[key]
    const raw = env[envKey]
    if (raw === undefined || raw.trim() === '') continue

    const parsed = limitValue.safeParse(raw)
    if (!parsed.success) {
      throw new Error(
        `Invalid ${envKey}="${raw}": expected a positive integer. ` +
        `Fix it in .env or your deployment configuration.`,
      )
    }
    resolved[key] = parsed.data
  }

  return resolved
}
