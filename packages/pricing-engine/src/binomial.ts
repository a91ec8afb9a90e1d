/**
 * Recombining Binomial Lattice
 *
 * Prices European and American calls and puts by backward induction
 * over a recombining tree. Node (i, j) — period i, j up-moves — carries
 * the asset price S₀·uʲ·d^(i−j), so each period needs only i+1 values
 * and the whole tree fits in one Float64Array of length n+1.
 *
 * Compounding is continuous, matching the Monte Carlo engine:
 *   g = e^{rΔt},  p = (g − d) / (u − d),  V(i,j) = [p·V(i+1,j+1) + (1−p)·V(i+1,j)] / g
 *
 * References:
 * - Cox, Ross & Rubinstein (1979). "Option Pricing: A Simplified Approach"
 */

import type { BinomialParams, OptionType, TreeFactors } from './types'
import { InvalidParameterError } from './errors'
import { requireCount, requireFinite, requirePositive } from './validation'

/**
 * Binomial pricer bound to one immutable set of parameters.
 * Validation and the per-period constants happen at construction.
 */
export class BinomialPricer {
  readonly params: Readonly<BinomialParams>
  /** Period length Δt = T/n */
  readonly dt: number
  /** Per-period growth factor e^{rΔt} */
  readonly growth: number
  /** Per-period discount factor e^{-rΔt} */
  readonly discount: number
  /** Risk-neutral up-move probability */
  readonly probability: number

  constructor(params: BinomialParams) {
    validateBinomialParams(params)
    this.params = Object.freeze({ ...params })

    this.dt = params.maturity / params.periods
    this.growth = Math.exp(params.rate * this.dt)
    this.discount = 1 / this.growth
    this.probability = (this.growth - params.down) / (params.up - params.down)

    if (!(this.probability >= 0 && this.probability <= 1)) {
      throw new InvalidParameterError(
        'rate',
        `Arbitrage violation: risk-neutral probability ${this.probability} is outside [0, 1]; ` +
        `require down (${params.down}) <= e^(rate·dt) (${this.growth}) <= up (${params.up})`,
      )
    }
  }

  /** Option value at the root of the tree. */
  price(): number {
    const { periods: n, american } = this.params
    const p = this.probability
    const g = this.growth

    // Terminal payoffs, indexed by number of up-moves
    const values = new Float64Array(n + 1)
    for (let j = 0; j <= n; j++) {
      values[j] = this.intrinsic(this.nodePrice(n, j))
    }

    // Backward induction: values[j] is overwritten after values[j+1] of the
    // next period has been read, so one array serves every period.
    for (let step = n - 1; step >= 0; step--) {
      for (let j = 0; j <= step; j++) {
        const hold = (p * values[j + 1]! + (1 - p) * values[j]!) / g
        if (american) {
          const exercise = this.intrinsic(this.nodePrice(step, j))
          // Exercise only when it strictly dominates
          values[j] = exercise > hold ? exercise : hold
        } else {
          values[j] = hold
        }
      }
    }

    return values[0]!
  }

  /**
   * Asset price after `upMoves` up-moves in `period` periods, summed in log
   * space so that u^j may overflow while S₀·u^j·d^(i−j) does not.
   */
  nodePrice(period: number, upMoves: number): number {
    const { spot, up, down } = this.params
    const price = Math.exp(Math.log(spot) + upMoves * Math.log(up) + (period - upMoves) * Math.log(down))
    if (!Number.isFinite(price)) {
      throw new InvalidParameterError(
        'periods',
        `Asset price at period ${period} overflows with ${this.params.periods} periods; ` +
        `use fewer periods or factors closer to 1`,
      )
    }
    return price
  }

  /** Immediate exercise value, also used for terminal payoffs. */
  intrinsic(assetPrice: number): number {
    return payoff(this.params.optionType, assetPrice, this.params.strike)
  }
}

/**
 * Price a single option on a binomial tree.
 *
 * @throws InvalidParameterError on malformed input or when the
 *   derived risk-neutral probability falls outside [0, 1]
 */
export function priceBinomial(params: BinomialParams): number {
  return new BinomialPricer(params).price()
}

/**
 * Cox-Ross-Rubinstein factors for a symmetric tree (u·d = 1):
 *   u = e^{σ√Δt},  d = 1/u
 */
export function crrFactors(volatility: number, maturity: number, periods: number): TreeFactors {
  requirePositive('volatility', volatility)
  requirePositive('maturity', maturity)
  requireCount('periods', periods)

  const up = Math.exp(volatility * Math.sqrt(maturity / periods))
  return { up, down: 1 / up }
}

function payoff(type: OptionType, assetPrice: number, strike: number): number {
  return type === 'call' ? Math.max(assetPrice - strike, 0) : Math.max(strike - assetPrice, 0)
}

function validateBinomialParams(params: BinomialParams): void {
  requireCount('periods', params.periods)
  requirePositive('maturity', params.maturity)
  requirePositive('spot', params.spot)
  requirePositive('strike', params.strike)
  requireFinite('rate', params.rate)
  requirePositive('down', params.down)
  requireFinite('up', params.up)

  if (params.up <= params.down) {
    throw new InvalidParameterError(
      'up',
      `up factor (${params.up}) must exceed down factor (${params.down})`,
    )
  }
  if (params.optionType !== 'call' && params.optionType !== 'put') {
    throw new InvalidParameterError('optionType', `optionType must be 'call' or 'put'`)
  }
}
