/**
 * Monte Carlo Option Pricing
 *
 * Simulates the terminal underlying price under risk-neutral geometric
 * Brownian motion with continuous dividend yield q:
 *
 *   S_T = S₀ · exp((r - q - σ²/2)T + σ√T Z),   Z ~ N(0,1)
 *
 * evaluates the payoff at each S_T, and discounts the sample mean by e^{-rT}.
 * The standard error is the sample standard deviation over √N.
 *
 * References:
 * - Glasserman (2003). "Monte Carlo Methods in Financial Engineering"
 */

import type { MonteCarloParams, MonteCarloResult, Payoff } from './types'
import { InvalidParameterError } from './errors'
import { PayoffExpression } from './payoff-expression'
import { Rng } from './random'
import { requireCount, requireFinite, requireNonNegative, requirePositive } from './validation'

/**
 * Price an option whose payoff is given as an expression over the
 * terminal price, e.g. `max(s - 100, 0)`.
 *
 * The expression is parsed before any path is simulated.
 *
 * @throws InvalidParameterError on malformed parameters
 * @throws PayoffParseError when the expression is rejected
 * @throws PayoffEvaluationError when the payoff fails on any path
 */
export function priceMonteCarlo(
  params: MonteCarloParams,
  payoff: string | PayoffExpression,
): MonteCarloResult {
  validateMonteCarloParams(params)
  const expression = typeof payoff === 'string' ? PayoffExpression.parse(payoff) : payoff
  return monteCarloPrice(params, (terminalPrice) => expression.evaluate(terminalPrice))
}

/**
 * Monte Carlo pricing with a caller-supplied payoff function.
 *
 * @param params - Market and simulation parameters
 * @param payoffFn - Maps one terminal price to a cash payoff
 */
export function monteCarloPrice(params: MonteCarloParams, payoffFn: Payoff): MonteCarloResult {
  validateMonteCarloParams(params)

  const { spot, rate, volatility, maturity, dividend, paths, seed } = params
  const steps = params.steps ?? 1
  const rng = new Rng(seed)

  // Exact log-normal step: no discretization error for any step count
  const dt = maturity / steps
  const drift = (rate - dividend - 0.5 * volatility * volatility) * dt
  const diffusion = volatility * Math.sqrt(dt)
  const discount = Math.exp(-rate * maturity)

  const discounted = new Float64Array(paths)
  for (let p = 0; p < paths; p++) {
    let price = spot
    for (let t = 0; t < steps; t++) {
      price *= Math.exp(drift + diffusion * rng.normal())
    }
    discounted[p] = discount * payoffFn(price)
  }

  return summarize(discounted)
}

/** Sample mean and standard error of the discounted payoffs. */
function summarize(values: Float64Array): MonteCarloResult {
  const n = values.length

  let sum = 0
  for (let i = 0; i < n; i++) sum += values[i]!
  const mean = sum / n

  let sumSq = 0
  for (let i = 0; i < n; i++) sumSq += (values[i]! - mean) ** 2
  const standardError = n > 1 ? Math.sqrt(sumSq / (n * (n - 1))) : Number.NaN

  return { price: mean, standardError, paths: n }
}

function validateMonteCarloParams(params: MonteCarloParams): void {
  requireCount('paths', params.paths)
  requirePositive('maturity', params.maturity)
  requireNonNegative('volatility', params.volatility)
  requirePositive('spot', params.spot)
  requireFinite('rate', params.rate)
  requireNonNegative('dividend', params.dividend)
  if (params.steps !== undefined) requireCount('steps', params.steps)
  if (params.seed !== undefined && !Number.isSafeInteger(params.seed)) {
    throw new InvalidParameterError('seed', `seed must be an integer, got ${params.seed}`)
  }
}
