import { BINOMIAL_DEFAULTS, MONTE_CARLO_DEFAULTS } from '@option-pricer/config'
import type { PricingLimits } from '@option-pricer/config'
import { PricingError } from '@option-pricer/pricing-engine'
import type { MonteCarloResult } from '@option-pricer/pricing-engine'
import {
  binomialRequestSchema,
  monteCarloRequestSchema,
  quoteBinomial,
  quoteMonteCarlo,
} from '@option-pricer/shared'
import type { BinomialQuote } from '@option-pricer/shared'
import type { ZodError } from 'zod'

/** Ask one question and resolve with the raw answer. */
export type Ask = (question: string) => Promise<string>

/** Write one line of output. */
export type Write = (line: string) => void

export type Engine = 'binomial' | 'monte-carlo'

interface Question {
  field: string
  label: string
  fallback: string
}

// ── Questions ───────────────────────────────────────────────────────

const MONTE_CARLO_QUESTIONS: readonly Question[] = [
  { field: 'spot', label: 'Spot price', fallback: String(MONTE_CARLO_DEFAULTS.spot) },
  { field: 'rate', label: 'Risk-free rate', fallback: String(MONTE_CARLO_DEFAULTS.rate) },
  { field: 'volatility', label: 'Volatility', fallback: String(MONTE_CARLO_DEFAULTS.volatility) },
  { field: 'maturity', label: 'Maturity (years)', fallback: String(MONTE_CARLO_DEFAULTS.maturity) },
  { field: 'dividend', label: 'Dividend yield', fallback: String(MONTE_CARLO_DEFAULTS.dividend) },
  { field: 'paths', label: 'Monte Carlo paths', fallback: String(MONTE_CARLO_DEFAULTS.paths) },
  { field: 'steps', label: 'Time steps per path', fallback: String(MONTE_CARLO_DEFAULTS.steps) },
  { field: 'seed', label: 'Random seed (blank for none)', fallback: '' },
  { field: 'payoff', label: 'Payoff expression', fallback: MONTE_CARLO_DEFAULTS.payoff },
]

const BINOMIAL_QUESTIONS: readonly Question[] = [
  { field: 'spot', label: 'Spot price', fallback: String(BINOMIAL_DEFAULTS.spot) },
  { field: 'strike', label: 'Strike price', fallback: String(BINOMIAL_DEFAULTS.strike) },
  { field: 'rate', label: 'Risk-free rate', fallback: String(BINOMIAL_DEFAULTS.rate) },
  { field: 'maturity', label: 'Maturity (years)', fallback: String(BINOMIAL_DEFAULTS.maturity) },
  { field: 'periods', label: 'Periods', fallback: String(BINOMIAL_DEFAULTS.periods) },
  { field: 'optionType', label: 'Option type (call / put)', fallback: BINOMIAL_DEFAULTS.optionType },
  { field: 'american', label: 'American exercise? (y/n)', fallback: BINOMIAL_DEFAULTS.american ? 'y' : 'n' },
  { field: 'volatility', label: 'Volatility (blank to enter up/down factors)', fallback: '' },
]

const FACTOR_QUESTIONS: readonly Question[] = [
  { field: 'up', label: 'Up factor', fallback: String(BINOMIAL_DEFAULTS.up) },
  { field: 'down', label: 'Down factor', fallback: String(BINOMIAL_DEFAULTS.down) },
]

function prompt({ label, fallback }: Question): string {
  return fallback === '' ? `${label}: ` : `${label} [${fallback}]: `
}

async function askAll(ask: Ask, questions: readonly Question[], answers: Record<string, string>): Promise<void> {
  for (const question of questions) {
    const answer = (await ask(prompt(question))).trim()
    answers[question.field] = answer === '' ? question.fallback : answer
  }
}

export function parseEngine(answer: string): Engine | undefined {
  const normalized = answer.trim().toLowerCase()
  if (normalized === '' || normalized === 'monte-carlo' || normalized === 'mc') return 'monte-carlo'
  if (normalized === 'binomial' || normalized === 'b') return 'binomial'
  return undefined
}

function yesNo(answer: string): string {
  return /^y(es)?$/i.test(answer) ? 'true' : 'false'
}

// ── Output ──────────────────────────────────────────────────────────

export function formatMonteCarlo(result: MonteCarloResult): string[] {
  const lines = [`Estimated option price: ${result.price.toFixed(4)}`]
  if (Number.isNaN(result.standardError)) {
    lines.push('Standard error: n/a (one path)')
    return lines
  }
  const halfWidth = 1.96 * result.standardError
  lines.push(
    `Standard error: ${result.standardError.toFixed(4)} (${result.paths} paths)`,
    `95% confidence interval: [${(result.price - halfWidth).toFixed(4)}, ${(result.price + halfWidth).toFixed(4)}]`,
  )
  return lines
}

export function formatBinomial(quote: BinomialQuote): string[] {
  const lines = [
    `Estimated option price: ${quote.price.toFixed(4)}`,
    `Tree factors: up ${quote.up.toFixed(4)}, down ${quote.down.toFixed(4)}, probability ${quote.probability.toFixed(4)}`,
  ]
  if (quote.blackScholes !== undefined) {
    lines.push(`Black-Scholes (European): ${quote.blackScholes.toFixed(4)}`)
  }
  return lines
}

function describeValidation(error: ZodError): string {
  return Object.values(error.flatten().fieldErrors)
    .flatMap((messages) => messages ?? [])
    .join('; ')
}

// ── Session ─────────────────────────────────────────────────────────

/**
 * Run one interactive pricing session. Resolves with the process exit
 * code: 0 after printing a price, 1 after printing an error.
 */
export async function runSession(ask: Ask, write: Write, limits: PricingLimits): Promise<number> {
  const engine = parseEngine(await ask('Pricing engine (binomial / monte-carlo) [monte-carlo]: '))
  if (!engine) {
    write('Error: engine must be "binomial" or "monte-carlo"')
    return 1
  }

  const answers: Record<string, string> = {}
  try {
    if (engine === 'monte-carlo') {
      await askAll(ask, MONTE_CARLO_QUESTIONS, answers)
      const parsed = monteCarloRequestSchema.safeParse(answers)
      if (!parsed.success) {
        write(`Error: ${describeValidation(parsed.error)}`)
        return 1
      }
      formatMonteCarlo(quoteMonteCarlo(parsed.data, limits)).forEach(write)
      return 0
    }

    await askAll(ask, BINOMIAL_QUESTIONS, answers)
    answers['american'] = yesNo(answers['american'] ?? '')
    if (answers['volatility'] === '') await askAll(ask, FACTOR_QUESTIONS, answers)

    const parsed = binomialRequestSchema.safeParse(answers)
    if (!parsed.success) {
      write(`Error: ${describeValidation(parsed.error)}`)
      return 1
    }
    formatBinomial(quoteBinomial(parsed.data, limits)).forEach(write)
    return 0
  } catch (err) {
    if (!(err instanceof PricingError)) throw err
    write(`Error: ${err.message}`)
    return 1
  }
}
