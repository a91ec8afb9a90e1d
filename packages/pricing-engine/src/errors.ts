/**
 * Error taxonomy shared by both engines.
 *
 * Every error is raised before or instead of a result; the engines never
 * catch their own errors, so adapters decide how to present them.
 */

/** Base class for every pricing failure. */
export class PricingError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'PricingError'
  }
}

/** Malformed or arbitrage-violating numeric input. */
export class InvalidParameterError extends PricingError {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(message)
    this.name = 'InvalidParameterError'
  }
}

/** Payoff expression failed to parse or used a construct outside the allowlist. */
export class PayoffParseError extends PricingError {
  constructor(
    message: string,
    public readonly token: string,
    public readonly position: number,
  ) {
    super(message)
    this.name = 'PayoffParseError'
  }
}

/** A valid payoff expression hit a numeric domain error at one terminal price. */
export class PayoffEvaluationError extends PricingError {
  constructor(
    message: string,
    public readonly terminalPrice: number,
  ) {
    super(`${message} at terminal price ${terminalPrice}`)
    this.name = 'PayoffEvaluationError'
  }
}
