import { z } from 'zod'

/**
 * Field builders for pricing inputs that may arrive as JSON numbers,
 * form strings or CLI answers. Blank values take the supplied default.
 */

function blankToUndefined(value: unknown): unknown {
  if (value === null) return undefined
  if (typeof value === 'string' && value.trim() === '') return undefined
  return value
}

/** Finite number (numeric strings accepted), defaulting when blank. */
export function numberField(fallback: number, label: string) {
  return z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ invalid_type_error: `${label} must be numeric` })
      .finite(`${label} must be finite`)
      .default(fallback),
  )
}

/** Integer (numeric strings accepted), defaulting when blank. */
export function integerField(fallback: number, label: string) {
  return z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ invalid_type_error: `${label} must be an integer` })
      .int(`${label} must be an integer`)
      .default(fallback),
  )
}

/** Integer that may be left out entirely. */
export function optionalIntegerField(label: string) {
  return z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ invalid_type_error: `${label} must be an integer` })
      .int(`${label} must be an integer`)
      .optional(),
  )
}

/** Finite number that may be left out entirely. */
export function optionalNumberField(label: string) {
  return z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ invalid_type_error: `${label} must be numeric` })
      .finite(`${label} must be finite`)
      .optional(),
  )
}

/** Checkbox-style flag: true, 'true', 'on' and '1' are set; anything else is not. */
export function flagField() {
  return z.preprocess(
    (value) => value === true || value === 'true' || value === 'on' || value === '1',
    z.boolean(),
  )
}
