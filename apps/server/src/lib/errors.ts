import type { Context } from 'hono'
import { HTTPException } from 'hono/http-exception'
import {
  InvalidParameterError,
  PayoffEvaluationError,
  PayoffParseError,
} from '@option-pricer/pricing-engine'

export interface ErrorBody {
  error: string
  field?: string
  token?: string
  position?: number
  terminalPrice?: number
}

export type ErrorStatus = 400 | 404 | 422 | 429 | 500

export interface MappedError {
  status: ErrorStatus
  body: ErrorBody
}

const STATUSES: readonly ErrorStatus[] = [400, 404, 422, 429]

function httpStatus(status: number): ErrorStatus {
  return STATUSES.find((known) => known === status) ?? 500
}

/** Translate a thrown error into an HTTP status and JSON body. */
export function mapError(err: unknown): MappedError {
  if (err instanceof InvalidParameterError) {
    return { status: 400, body: { error: err.message, field: err.field } }
  }
  if (err instanceof PayoffParseError) {
    return { status: 400, body: { error: err.message, token: err.token, position: err.position } }
  }
  if (err instanceof PayoffEvaluationError) {
    return { status: 422, body: { error: err.message, terminalPrice: err.terminalPrice } }
  }
  if (err instanceof HTTPException) {
    const status = httpStatus(err.status)
    if (status < 500) return { status, body: { error: err.message } }
  }
  return { status: 500, body: { error: 'Internal server error.' } }
}

export function errorResponse(c: Context, err: unknown): Response {
  const { status, body } = mapError(err)
  return c.json(body, status)
}
