/**
 * Pricing Engine Domain Types
 *
 * Parameter and result shapes for the two pricing engines:
 * the recombining binomial lattice and the Monte Carlo simulator
 * with user-supplied payoff expressions.
 */

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

/** Option type */
export type OptionType = 'call' | 'put'

/** Maps a terminal asset price to a cash payoff */
export type Payoff = (terminalPrice: number) => number

// ---------------------------------------------------------------------------
// Binomial Lattice
// ---------------------------------------------------------------------------

export interface BinomialParams {
  /** Current underlying price S₀ */
  spot: number
  /** Strike price K */
  strike: number
  /** Annualized continuously compounded risk-free rate */
  rate: number
  /** Up-factor per period (u) */
  up: number
  /** Down-factor per period (d), 0 < d < u */
  down: number
  /** Number of periods in the tree */
  periods: number
  /** Time to maturity in years */
  maturity: number
  optionType: OptionType
  /** Allow early exercise at every node */
  american: boolean
}

/** Up/down multipliers of a tree step */
export interface TreeFactors {
  up: number
  down: number
}

// ---------------------------------------------------------------------------
// Monte Carlo
// ---------------------------------------------------------------------------

export interface MonteCarloParams {
  /** Current underlying price S₀ */
  spot: number
  /** Annualized continuously compounded risk-free rate */
  rate: number
  /** Annualized volatility σ (0 gives a deterministic terminal price) */
  volatility: number
  /** Time to maturity in years */
  maturity: number
  /** Continuous dividend yield q */
  dividend: number
  /** Number of simulated paths */
  paths: number
  /** RNG seed; identical seeds reproduce identical estimates */
  seed?: number
  /**
   * Exact GBM sub-steps per path. The payoff only sees the terminal
   * price, so this changes the draws but not the distribution. Default 1.
   */
  steps?: number
}

export interface MonteCarloResult {
  /** Discounted sample mean of the payoff */
  price: number
  /** Sample standard deviation / √N (NaN for a single path) */
  standardError: number
  /** Number of simulated paths */
  paths: number
}
