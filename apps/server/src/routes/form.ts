import { Hono } from 'hono'
import { html } from 'hono/html'
import { MONTE_CARLO_DEFAULTS, PAYOFF_EXAMPLES } from '@option-pricer/config'
import { PricingError } from '@option-pricer/pricing-engine'
import type { MonteCarloResult } from '@option-pricer/pricing-engine'
import { monteCarloRequestSchema, quoteMonteCarlo } from '@option-pricer/shared'
import { readBody, isResponse } from '../lib/validate'
import type { PricingRouteOptions } from './options'

// ---------------------------------------------------------------------------
// Page
// ---------------------------------------------------------------------------

type FieldName = 'spot' | 'rate' | 'volatility' | 'maturity' | 'dividend' | 'paths' | 'payoff'

export type FormValues = Record<FieldName, string>

interface FormState {
  values: FormValues
  errors: string[]
  result?: MonteCarloResult
}

const NUMBER_FIELDS: ReadonlyArray<{ name: Exclude<FieldName, 'payoff'>, label: string, step: string }> = [
  { name: 'spot', label: 'Spot price', step: 'any' },
  { name: 'rate', label: 'Risk-free rate (r)', step: 'any' },
  { name: 'volatility', label: 'Volatility (sigma)', step: 'any' },
  { name: 'maturity', label: 'Maturity (years)', step: 'any' },
  { name: 'dividend', label: 'Dividend yield', step: 'any' },
  { name: 'paths', label: 'Monte Carlo paths', step: '1' },
]

export const DEFAULT_FORM_VALUES: Readonly<FormValues> = Object.freeze({
  spot: String(MONTE_CARLO_DEFAULTS.spot),
  rate: String(MONTE_CARLO_DEFAULTS.rate),
  volatility: String(MONTE_CARLO_DEFAULTS.volatility),
  maturity: String(MONTE_CARLO_DEFAULTS.maturity),
  dividend: String(MONTE_CARLO_DEFAULTS.dividend),
  paths: String(MONTE_CARLO_DEFAULTS.paths),
  payoff: MONTE_CARLO_DEFAULTS.payoff,
})

function renderPage({ values, errors, result }: FormState) {
  return html`<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8">
    <meta name="viewport" content="width=device-width, initial-scale=1">
    <title>Monte Carlo Option Pricer</title>
    <style>
      body { font-family: system-ui, -apple-system, sans-serif; margin: 2rem; line-height: 1.5; }
      form { max-width: 640px; display: grid; gap: 0.75rem; }
      label { display: flex; flex-direction: column; font-weight: 600; }
      input { padding: 0.45rem 0.5rem; font-size: 1rem; }
      .error { color: #b00020; }
      .result { margin-top: 1rem; padding: 0.75rem; background: #f3f6ff; border-left: 4px solid #2d5cf6; }
    </style>
  </head>
  <body>
    <h1>Monte Carlo Option Calculator</h1>
    <p>Simulate geometric Brownian motion under the risk-neutral measure. Write the payoff with
      <code>s</code> (or <code>S</code>, <code>S_T</code>) for the terminal price, for example
      ${PAYOFF_EXAMPLES.map((example, i) => html`${i > 0 ? ', ' : ''}<code>${example}</code>`)}.</p>
    <form method="post">
      ${NUMBER_FIELDS.map((field) => html`
      <label>${field.label}
        <input type="number" step="${field.step}" name="${field.name}" value="${values[field.name]}" required>
      </label>`)}
      <label>Payoff expression
        <input type="text" name="payoff" value="${values.payoff}" required>
      </label>
      <button type="submit">Price option</button>
    </form>
    ${errors.length > 0 ? html`
    <div class="error">
      <h3>Input issues</h3>
      <ul>
        ${errors.map((error) => html`<li>${error}</li>`)}
      </ul>
    </div>` : ''}
    ${result ? html`
    <div class="result">
      <strong>Estimated option price:</strong> ${result.price.toFixed(4)}
      <br>Standard error: ${formatStandardError(result.standardError)} (${result.paths} paths)
    </div>` : ''}
  </body>
</html>`
}

function formatStandardError(value: number): string {
  return Number.isNaN(value) ? 'n/a' : value.toFixed(4)
}

function echoValues(body: Record<string, unknown>): FormValues {
  const values: FormValues = { ...DEFAULT_FORM_VALUES }
  for (const key of Object.keys(values)) {
    if (!isFieldName(key)) continue
    const raw = body[key]
    if (typeof raw === 'string' && raw.trim() !== '') values[key] = raw
  }
  return values
}

function isFieldName(key: string): key is FieldName {
  return key in DEFAULT_FORM_VALUES
}

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

/**
 * HTML form for the Monte Carlo engine. Pricing and validation errors are
 * shown on the page; anything else propagates to the app's error handler.
 */
export function formRoutes({ limits, throttle }: PricingRouteOptions) {
  const routes = new Hono()

  /** GET / — blank form with defaults */
  routes.get('/', (c) => c.html(renderPage({ values: { ...DEFAULT_FORM_VALUES }, errors: [] })))

  /** POST / — price and re-render with the submitted values */
  routes.post('/', throttle, async (c) => {
    const body = await readBody(c)
    if (isResponse(body)) return body

    const values = echoValues(body)
    const parsed = monteCarloRequestSchema.safeParse(body)
    if (!parsed.success) {
      const errors = Object.values(parsed.error.flatten().fieldErrors).flatMap((messages) => messages ?? [])
      return c.html(renderPage({ values, errors }), 400)
    }

    try {
      const result = quoteMonteCarlo(parsed.data, limits)
      return c.html(renderPage({ values, errors: [], result }))
    } catch (err) {
      if (!(err instanceof PricingError)) throw err
      return c.html(renderPage({ values, errors: [err.message] }), 400)
    }
  })

  return routes
}
