/**
 * Default pricing inputs, used wherever a caller leaves a field blank
 * (HTML form, JSON body, CLI prompt).
 */

export interface MonteCarloDefaults {
  spot: number
  rate: number
  volatility: number
  maturity: number
  dividend: number
  paths: number
  steps: number
  payoff: string
}

export interface BinomialDefaults {
  spot: number
  strike: number
  rate: number
  up: number
  down: number
  periods: number
  maturity: number
  optionType: 'call' | 'put'
  american: boolean
}

export const MONTE_CARLO_DEFAULTS: Readonly<MonteCarloDefaults> = Object.freeze({
  spot: 100,
  rate: 0.05,
  volatility: 0.2,
  maturity: 1,
  dividend: 0,
  paths: 20_000,
  steps: 1,
  payoff: 'max(s - 100, 0)',
})

export const BINOMIAL_DEFAULTS: Readonly<BinomialDefaults> = Object.freeze({
  spot: 100,
  strike: 100,
  rate: 0.05,
  up: 1.1,
  down: 0.9,
  periods: 3,
  maturity: 1,
  optionType: 'call',
  american: false,
})

/** Example payoffs shown next to the payoff input. */
export const PAYOFF_EXAMPLES: readonly string[] = [
  'max(s - 100, 0)',
  'max(90 - s, 0)',
  'max(10 - abs(s - 100), 0)',
]
