// Shared configuration: pricing defaults for blank inputs and per-request
// work limits resolved from the environment.

export {
  MONTE_CARLO_DEFAULTS,
  BINOMIAL_DEFAULTS,
  PAYOFF_EXAMPLES,
  type MonteCarloDefaults,
  type BinomialDefaults,
} from './pricing'

export {
  resolveLimits,
  DEFAULT_LIMITS,
  LIMIT_KEYS,
  LIMIT_ENV_KEYS,
  type PricingLimits,
  type LimitKey,
} from './limits'
