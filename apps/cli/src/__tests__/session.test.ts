import { describe, it, expect } from 'vitest'
import { DEFAULT_LIMITS } from '@option-pricer/config'
import { runSession, parseEngine, formatMonteCarlo } from '../session'

function scripted(answers: string[]) {
  const queue = [...answers]
  const questions: string[] = []
  const output: string[] = []
  return {
    questions,
    output,
    ask: async (question: string) => {
      questions.push(question)
      return queue.shift() ?? ''
    },
    write: (line: string) => {
      output.push(line)
    },
  }
}

describe('CLI session', () => {
  it('prices a Monte Carlo payoff, accepting defaults on Enter', async () => {
    // engine, spot, rate, volatility, maturity, dividend, paths, steps, seed, payoff
    const io = scripted(['', '', '0', '0', '', '', '100', '', '', ''])
    const code = await runSession(io.ask, io.write, DEFAULT_LIMITS)

    expect(code).toBe(0)
    expect(io.questions[0]).toBe('Pricing engine (binomial / monte-carlo) [monte-carlo]: ')
    expect(io.questions[1]).toBe('Spot price [100]: ')
    expect(io.questions).toContain('Random seed (blank for none): ')
    expect(io.output).toEqual([
      'Estimated option price: 0.0000',
      'Standard error: 0.0000 (100 paths)',
      '95% confidence interval: [0.0000, 0.0000]',
    ])
  })

  it('prices the default binomial tree with up/down factors', async () => {
    const io = scripted(['binomial'])
    const code = await runSession(io.ask, io.write, DEFAULT_LIMITS)

    expect(code).toBe(0)
    expect(io.questions.slice(-2)).toEqual(['Up factor [1.1]: ', 'Down factor [0.9]: '])
    expect(io.output).toEqual([
      'Estimated option price: 9.8758',
      'Tree factors: up 1.1000, down 0.9000, probability 0.5840',
    ])
  })

  it('skips the factor questions when volatility is given', async () => {
    // engine, spot, strike, rate, maturity, periods, optionType, american, volatility
    const io = scripted(['binomial', '', '', '', '', '', 'put', 'y', '0.2'])
    const code = await runSession(io.ask, io.write, DEFAULT_LIMITS)

    expect(code).toBe(0)
    expect(io.questions).not.toContain('Up factor [1.1]: ')
    expect(io.output).toHaveLength(3)
    expect(io.output[2]).toMatch(/^Black-Scholes \(European\): \d+\.\d{4}$/)
  })

  it('reports engine errors and exits with 1', async () => {
    // rate 0.5 on 1.01 / 0.9 factors breaks the no-arbitrage bound
    const io = scripted(['b', '', '', '0.5', '', '', '', '', '', '1.01', ''])
    const code = await runSession(io.ask, io.write, DEFAULT_LIMITS)

    expect(code).toBe(1)
    expect(io.output).toHaveLength(1)
    expect(io.output[0]).toMatch(/^Error: Arbitrage violation/)
  })

  it('reports validation errors and exits with 1', async () => {
    const io = scripted(['monte-carlo', 'abc'])
    const code = await runSession(io.ask, io.write, DEFAULT_LIMITS)

    expect(code).toBe(1)
    expect(io.output).toEqual(['Error: Spot must be numeric'])
  })

  it('reports payoff errors and exits with 1', async () => {
    const io = scripted(['mc', '', '', '', '', '', '10', '', '', 'exp(s)'])
    const code = await runSession(io.ask, io.write, DEFAULT_LIMITS)

    expect(code).toBe(1)
    expect(io.output).toEqual([
      'Error: Name "exp" is not allowed; use s, S, S_T or the functions max, min, abs',
    ])
  })

  it('rejects an unknown engine', async () => {
    const io = scripted(['trinomial'])
    expect(await runSession(io.ask, io.write, DEFAULT_LIMITS)).toBe(1)
    expect(io.output).toEqual(['Error: engine must be "binomial" or "monte-carlo"'])
  })
})

describe('parseEngine', () => {
  it('defaults to Monte Carlo and accepts short names', () => {
    expect(parseEngine('')).toBe('monte-carlo')
    expect(parseEngine(' MC ')).toBe('monte-carlo')
    expect(parseEngine('Binomial')).toBe('binomial')
    expect(parseEngine('tree')).toBeUndefined()
  })
})

describe('formatMonteCarlo', () => {
  it('prints a 95% interval of 1.96 standard errors', () => {
    expect(formatMonteCarlo({ price: 10, standardError: 0.5, paths: 400 })).toEqual([
      'Estimated option price: 10.0000',
      'Standard error: 0.5000 (400 paths)',
      '95% confidence interval: [9.0200, 10.9800]',
    ])
  })

  it('omits the interval for a single path', () => {
    expect(formatMonteCarlo({ price: 3, standardError: Number.NaN, paths: 1 })).toEqual([
      'Estimated option price: 3.0000',
      'Standard error: n/a (one path)',
    ])
  })
})
