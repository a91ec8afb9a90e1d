import {
  BinomialPricer,
  InvalidParameterError,
  blackScholesPrice,
  crrFactors,
  priceMonteCarlo,
} from '@option-pricer/pricing-engine'
import type { MonteCarloResult, TreeFactors } from '@option-pricer/pricing-engine'
import { BINOMIAL_DEFAULTS } from '@option-pricer/config'
import type { PricingLimits } from '@option-pricer/config'
import type { BinomialRequest, MonteCarloRequest } from './schemas/index'

export interface BinomialQuote {
  price: number
  up: number
  down: number
  /** Risk-neutral up-move probability */
  probability: number
  /** European Black-Scholes price, present when volatility was given */
  blackScholes?: number
}

function enforceLimit(field: string, value: number, max: number, unit: string): void {
  if (value > max) {
    throw new InvalidParameterError(field, `${field} must not exceed ${max} ${unit}, got ${value}`)
  }
}

/** Price a validated Monte Carlo request within the configured work limits. */
export function quoteMonteCarlo(request: MonteCarloRequest, limits: PricingLimits): MonteCarloResult {
  enforceLimit('paths', request.paths, limits.maxPaths, 'paths')
  enforceLimit('steps', request.steps, limits.maxSteps, 'steps')
  const pathSteps = request.paths * request.steps
  if (pathSteps > limits.maxPathSteps) {
    throw new InvalidParameterError(
      'paths',
      `paths × steps must not exceed ${limits.maxPathSteps}, got ${request.paths} × ${request.steps} = ${pathSteps}`,
    )
  }
  enforceLimit('payoff', request.payoff.length, limits.maxPayoffLength, 'characters')

  return priceMonteCarlo(
    {
      spot: request.spot,
      rate: request.rate,
      volatility: request.volatility,
      maturity: request.maturity,
      dividend: request.dividend,
      paths: request.paths,
      steps: request.steps,
      seed: request.seed,
    },
    request.payoff,
  )
}

/**
 * Tree factors for a binomial request: explicit up/down first, then CRR
 * factors from volatility, then the configured defaults.
 */
export function resolveTreeFactors(request: BinomialRequest): TreeFactors {
  if (request.up !== undefined && request.down !== undefined) {
    return { up: request.up, down: request.down }
  }
  if (request.volatility !== undefined) {
    return crrFactors(request.volatility, request.maturity, request.periods)
  }
  return { up: BINOMIAL_DEFAULTS.up, down: BINOMIAL_DEFAULTS.down }
}

/** Price a validated binomial request within the configured work limits. */
export function quoteBinomial(request: BinomialRequest, limits: PricingLimits): BinomialQuote {
  enforceLimit('periods', request.periods, limits.maxPeriods, 'periods')

  const { up, down } = resolveTreeFactors(request)
  const pricer = new BinomialPricer({
    spot: request.spot,
    strike: request.strike,
    rate: request.rate,
    up,
    down,
    periods: request.periods,
    maturity: request.maturity,
    optionType: request.optionType,
    american: request.american,
  })

  const quote: BinomialQuote = { price: pricer.price(), up, down, probability: pricer.probability }
  if (request.volatility !== undefined) {
    quote.blackScholes = blackScholesPrice(
      request.spot,
      request.strike,
      request.maturity,
      request.rate,
      request.volatility,
      request.optionType,
    )
  }
  return quote
}
