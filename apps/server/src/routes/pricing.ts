import { Hono } from 'hono'
import {
  binomialRequestSchema,
  monteCarloRequestSchema,
  quoteBinomial,
  quoteMonteCarlo,
} from '@option-pricer/shared'
import { parseBody, isResponse } from '../lib/validate'
import type { PricingRouteOptions } from './options'

/**
 * JSON pricing API. Engine errors propagate to the app's error handler,
 * which maps them to 400 / 422 bodies.
 */
export function pricingRoutes({ limits, throttle }: PricingRouteOptions) {
  const routes = new Hono()

  /** POST /api/price — Monte Carlo price for a payoff expression */
  routes.post('/', throttle, async (c) => {
    const request = await parseBody(c, monteCarloRequestSchema)
    if (isResponse(request)) return request

    const result = quoteMonteCarlo(request, limits)
    return c.json(result)
  })

  /** POST /api/price/binomial — binomial lattice price */
  routes.post('/binomial', throttle, async (c) => {
    const request = await parseBody(c, binomialRequestSchema)
    if (isResponse(request)) return request

    const quote = quoteBinomial(request, limits)
    return c.json(quote)
  })

  return routes
}
