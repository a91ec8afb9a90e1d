/**
 * Parameter guards shared by the engines.
 * Each guard throws InvalidParameterError naming the offending field.
 */

import { InvalidParameterError } from './errors'

export function requireFinite(field: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(field, `${field} must be a finite number, got ${value}`)
  }
}

export function requirePositive(field: string, value: number): void {
  requireFinite(field, value)
  if (value <= 0) {
    throw new InvalidParameterError(field, `${field} must be positive, got ${value}`)
  }
}

export function requireNonNegative(field: string, value: number): void {
  requireFinite(field, value)
  if (value < 0) {
    throw new InvalidParameterError(field, `${field} must not be negative, got ${value}`)
  }
}

/** Integer ≥ 1 */
export function requireCount(field: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new InvalidParameterError(field, `${field} must be an integer of at least 1, got ${value}`)
  }
}
