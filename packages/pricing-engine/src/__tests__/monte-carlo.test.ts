import { describe, it, expect } from 'vitest'
import { priceMonteCarlo, monteCarloPrice } from '../monte-carlo'
import { parsePayoff } from '../payoff-expression'
import { blackScholesPrice } from '../black-scholes'
import { InvalidParameterError, PayoffEvaluationError, PayoffParseError } from '../errors'
import type { MonteCarloParams } from '../types'

describe('Monte Carlo Engine', () => {
  const market: MonteCarloParams = {
    spot: 100,
    rate: 0.05,
    volatility: 0.2,
    maturity: 1,
    dividend: 0,
    paths: 50_000,
    seed: 42,
  }

  // -----------------------------------------------------------------------
  // Deterministic cases
  // -----------------------------------------------------------------------
  describe('zero volatility', () => {
    it('at-the-money call is exactly zero with zero standard error', () => {
      const result = priceMonteCarlo(
        { spot: 100, rate: 0, volatility: 0, maturity: 1, dividend: 0, paths: 1000, seed: 7 },
        'max(s-100,0)',
      )
      expect(result.price).toBe(0)
      expect(result.standardError).toBe(0)
      expect(result.paths).toBe(1000)
    })

    it('prices the discounted forward S₀·e^{-qT}', () => {
      const result = priceMonteCarlo(
        { ...market, volatility: 0, dividend: 0.02, paths: 1000 },
        's',
      )
      expect(result.price).toBeCloseTo(100 * Math.exp(-0.02), 10)
      expect(result.standardError).toBeCloseTo(0, 10)
    })

    it('sub-stepping leaves the deterministic forward unchanged', () => {
      const result = priceMonteCarlo(
        { ...market, volatility: 0, dividend: 0.02, paths: 100, steps: 12 },
        's',
      )
      expect(result.price).toBeCloseTo(100 * Math.exp(-0.02), 10)
    })
  })

  // -----------------------------------------------------------------------
  // Statistical behaviour
  // -----------------------------------------------------------------------
  describe('estimates', () => {
    it('is bit-for-bit reproducible with a fixed seed', () => {
      const a = priceMonteCarlo({ ...market, paths: 2000 }, 'max(s - 100, 0)')
      const b = priceMonteCarlo({ ...market, paths: 2000 }, 'max(s - 100, 0)')
      expect(a).toEqual(b)
    })

    it('different seeds give different estimates', () => {
      const a = priceMonteCarlo({ ...market, paths: 2000, seed: 1 }, 'max(s - 100, 0)')
      const b = priceMonteCarlo({ ...market, paths: 2000, seed: 2 }, 'max(s - 100, 0)')
      expect(a.price).not.toBe(b.price)
    })

    it('call converges to Black-Scholes within four standard errors', () => {
      const result = priceMonteCarlo(market, 'max(s - 100, 0)')
      const reference = blackScholesPrice(100, 100, 1, 0.05, 0.2, 'call')
      expect(Math.abs(result.price - reference)).toBeLessThan(4 * result.standardError)
    })

    it('put with dividend yield converges to Black-Scholes-Merton', () => {
      const result = priceMonteCarlo({ ...market, dividend: 0.03 }, 'max(95 - S_T, 0)')
      const reference = blackScholesPrice(100, 95, 1, 0.05, 0.2, 'put', 0.03)
      expect(Math.abs(result.price - reference)).toBeLessThan(4 * result.standardError)
    })

    it('multi-step simulation samples the same terminal distribution', () => {
      const result = priceMonteCarlo({ ...market, steps: 4 }, 'max(s - 100, 0)')
      const reference = blackScholesPrice(100, 100, 1, 0.05, 0.2, 'call')
      expect(Math.abs(result.price - reference)).toBeLessThan(4 * result.standardError)
    })

    it('standard error shrinks like 1/√N', () => {
      const small = priceMonteCarlo({ ...market, paths: 10_000 }, 'max(s - 100, 0)')
      const large = priceMonteCarlo({ ...market, paths: 40_000 }, 'max(s - 100, 0)')
      expect(large.standardError / small.standardError).toBeCloseTo(0.5, 1)
    })

    it('a single path has no standard error estimate', () => {
      const result = priceMonteCarlo({ ...market, paths: 1 }, 'max(s - 100, 0)')
      expect(result.standardError).toBeNaN()
    })
  })

  // -----------------------------------------------------------------------
  // Payoff sources
  // -----------------------------------------------------------------------
  describe('payoffs', () => {
    it('accepts a pre-parsed expression', () => {
      const expression = parsePayoff('max(s - 100, 0)')
      expect(priceMonteCarlo({ ...market, paths: 500 }, expression))
        .toEqual(priceMonteCarlo({ ...market, paths: 500 }, 'max(s - 100, 0)'))
    })

    it('monteCarloPrice takes a payoff function', () => {
      // Under zero rates and dividends E[S_T] = S₀
      const result = monteCarloPrice({ ...market, rate: 0 }, (s) => s)
      expect(Math.abs(result.price - 100)).toBeLessThan(4 * result.standardError)
    })

    it('rejects a bad expression before simulating any path', () => {
      // A hundred million paths would not finish if simulation started first
      expect(() => priceMonteCarlo({ ...market, paths: 100_000_000 }, 'os.system(1)'))
        .toThrow(PayoffParseError)
    })

    it('a domain error on one path aborts the whole call', () => {
      try {
        priceMonteCarlo({ ...market, rate: 0, volatility: 0, paths: 10 }, '1 / (s - 100)')
        expect.unreachable()
      } catch (err) {
        expect(err).toBeInstanceOf(PayoffEvaluationError)
        expect(err).toMatchObject({ terminalPrice: 100 })
      }
    })
  })

  // -----------------------------------------------------------------------
  // Validation
  // -----------------------------------------------------------------------
  describe('validation', () => {
    const cases: Array<[string, Partial<MonteCarloParams>]> = [
      ['paths', { paths: 0 }],
      ['paths', { paths: 10.5 }],
      ['maturity', { maturity: 0 }],
      ['volatility', { volatility: -0.1 }],
      ['spot', { spot: 0 }],
      ['dividend', { dividend: -0.01 }],
      ['rate', { rate: Number.POSITIVE_INFINITY }],
      ['seed', { seed: 1.5 }],
      ['steps', { steps: 0 }],
    ]

    it.each(cases)('rejects invalid %s', (field, overrides) => {
      try {
        priceMonteCarlo({ ...market, ...overrides }, 'max(s - 100, 0)')
        expect.unreachable()
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidParameterError)
        expect(err).toMatchObject({ field })
      }
    })

    it('parameters are validated before the payoff is parsed', () => {
      expect(() => priceMonteCarlo({ ...market, paths: 0 }, 'bogus')).toThrow(InvalidParameterError)
    })
  })
})
