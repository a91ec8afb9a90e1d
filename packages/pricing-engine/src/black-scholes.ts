/**
 * Black-Scholes closed-form European prices.
 *
 * The reference value both numerical engines converge to: the binomial
 * tree as periods grow with u·d = 1, and Monte Carlo as paths grow.
 *
 * References:
 * - Black & Scholes (1973). "The Pricing of Options and Corporate Liabilities"
 * - Merton (1973). "Theory of Rational Option Pricing" (continuous dividend yield)
 */

import type { OptionType } from './types'

// ---------------------------------------------------------------------------
// Normal Distribution Functions
// ---------------------------------------------------------------------------

/**
 * Standard normal CDF using Abramowitz & Stegun approximation.
 * Maximum absolute error < 1.5e-7.
 */
export function normCDF(x: number): number {
  const a1 = 0.254829592
  const a2 = -0.284496736
  const a3 = 1.421413741
  const a4 = -1.453152027
  const a5 = 1.061405429
  const p = 0.3275911

  const sign = x < 0 ? -1 : 1
  const absX = Math.abs(x) / Math.SQRT2
  const t = 1.0 / (1.0 + p * absX)
  const y = 1.0 - ((((a5 * t + a4) * t + a3) * t + a2) * t + a1) * t * Math.exp(-absX * absX)
  return 0.5 * (1.0 + sign * y)
}

// ---------------------------------------------------------------------------
// Black-Scholes-Merton Pricing
// ---------------------------------------------------------------------------

/**
 * European option price with continuous dividend yield.
 *
 *   C = S·e^{-qT}·N(d₁) - K·e^{-rT}·N(d₂)
 *   P = K·e^{-rT}·N(-d₂) - S·e^{-qT}·N(-d₁)
 *
 * where:
 *   d₁ = [ln(S/K) + (r - q + σ²/2)T] / (σ√T)
 *   d₂ = d₁ - σ√T
 *
 * Degenerate inputs (T ≤ 0 or σ ≤ 0) collapse to the discounted
 * intrinsic value of the forward.
 */
export function blackScholesPrice(
  spot: number,
  strike: number,
  maturity: number,
  rate: number,
  volatility: number,
  type: OptionType,
  dividend: number = 0,
): number {
  const sign = type === 'call' ? 1 : -1

  if (maturity <= 0) {
    return Math.max(sign * (spot - strike), 0)
  }

  const discount = Math.exp(-rate * maturity)
  const carry = Math.exp(-dividend * maturity)

  if (volatility <= 0) {
    return Math.max(sign * (spot * carry - strike * discount), 0)
  }

  const sqrtT = Math.sqrt(maturity)
  const d1 =
    (Math.log(spot / strike) + (rate - dividend + 0.5 * volatility * volatility) * maturity) /
    (volatility * sqrtT)
  const d2 = d1 - volatility * sqrtT

  return sign * (spot * carry * normCDF(sign * d1) - strike * discount * normCDF(sign * d2))
}
