import { z } from 'zod'
import { MONTE_CARLO_DEFAULTS, BINOMIAL_DEFAULTS } from '@option-pricer/config'
import {
  numberField,
  integerField,
  optionalIntegerField,
  optionalNumberField,
  flagField,
} from './fields'

// Schemas check presence and type only; the engines own the domain rules
// (positivity, arbitrage bounds) and report them as InvalidParameterError.

export const monteCarloRequestSchema = z.object({
  spot: numberField(MONTE_CARLO_DEFAULTS.spot, 'Spot'),
  rate: numberField(MONTE_CARLO_DEFAULTS.rate, 'Rate'),
  volatility: numberField(MONTE_CARLO_DEFAULTS.volatility, 'Volatility'),
  maturity: numberField(MONTE_CARLO_DEFAULTS.maturity, 'Maturity'),
  dividend: numberField(MONTE_CARLO_DEFAULTS.dividend, 'Dividend'),
  paths: integerField(MONTE_CARLO_DEFAULTS.paths, 'Paths'),
  steps: integerField(MONTE_CARLO_DEFAULTS.steps, 'Steps'),
  seed: optionalIntegerField('Seed'),
  payoff: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() !== '' ? value : undefined),
    z.string().default(MONTE_CARLO_DEFAULTS.payoff),
  ),
})

export const binomialRequestSchema = z
  .object({
    spot: numberField(BINOMIAL_DEFAULTS.spot, 'Spot'),
    strike: numberField(BINOMIAL_DEFAULTS.strike, 'Strike'),
    rate: numberField(BINOMIAL_DEFAULTS.rate, 'Rate'),
    up: optionalNumberField('Up factor'),
    down: optionalNumberField('Down factor'),
    volatility: optionalNumberField('Volatility'),
    periods: integerField(BINOMIAL_DEFAULTS.periods, 'Periods'),
    maturity: numberField(BINOMIAL_DEFAULTS.maturity, 'Maturity'),
    optionType: z.preprocess(
      (value) => (value === '' || value === null ? undefined : value),
      z.enum(['call', 'put']).default(BINOMIAL_DEFAULTS.optionType),
    ),
    american: flagField(),
  })
  .refine((data) => (data.up === undefined) === (data.down === undefined), {
    message: 'Give both up and down factors, or neither',
    path: ['down'],
  })

export type MonteCarloRequest = z.infer<typeof monteCarloRequestSchema>
export type BinomialRequest = z.infer<typeof binomialRequestSchema>
