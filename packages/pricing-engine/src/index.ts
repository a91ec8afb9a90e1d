/**
 * @option-pricer/pricing-engine
 *
 * Option pricing with two independent numerical engines:
 * - Binomial: recombining CRR-style lattice, European and American exercise
 * - Monte Carlo: risk-neutral GBM with user-supplied payoff expressions
 *
 * Both engines compound continuously and are pure functions of their
 * inputs (and, for Monte Carlo, the seed).
 */

// Types
export type {
  OptionType,
  Payoff,
  BinomialParams,
  TreeFactors,
  MonteCarloParams,
  MonteCarloResult,
} from './types'

// Errors
export {
  PricingError,
  InvalidParameterError,
  PayoffParseError,
  PayoffEvaluationError,
} from './errors'

// Binomial lattice
export { BinomialPricer, priceBinomial, crrFactors } from './binomial'

// Monte Carlo
export { priceMonteCarlo, monteCarloPrice } from './monte-carlo'

// Payoff expressions
export { PayoffExpression, parsePayoff } from './payoff-expression'
export type { PayoffNode, BinaryOperator } from './payoff-expression'
export { VARIABLE_NAMES, FUNCTION_NAMES } from './payoff-lexer'
export type { VariableName, FunctionName } from './payoff-lexer'

// Closed-form reference
export { blackScholesPrice, normCDF } from './black-scholes'

// Random utilities
export { Rng } from './random'
