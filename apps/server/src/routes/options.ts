import type { MiddlewareHandler } from 'hono'
import type { PricingLimits } from '@option-pricer/config'

export interface PricingRouteOptions {
  limits: PricingLimits
  /** Rate limiter in front of every pricing request */
  throttle: MiddlewareHandler
}
