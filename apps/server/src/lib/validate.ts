import type { Context } from 'hono'
import { z } from 'zod'

const FORM_TYPES = ['application/x-www-form-urlencoded', 'multipart/form-data']

function isFormRequest(c: Context): boolean {
  const type = c.req.header('content-type')?.toLowerCase() ?? ''
  return FORM_TYPES.some((form) => type.startsWith(form))
}

/**
 * Read the request body as a plain object: form fields for form posts,
 * JSON otherwise. Returns a 400 response when the JSON is malformed or
 * is not an object.
 */
export async function readBody(c: Context): Promise<Record<string, unknown> | Response> {
  if (isFormRequest(c)) return c.req.parseBody()

  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    return c.json({ error: 'Invalid JSON body.' }, 400)
  }

  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return c.json({ error: 'Request body must be a JSON object.' }, 400)
  }
  return { ...body }
}

/** Parse and validate request body with a Zod schema. Returns 400 on failure. */
export async function parseBody<T extends z.ZodTypeAny>(
  c: Context,
  schema: T,
): Promise<z.infer<T> | Response> {
  const body = await readBody(c)
  if (isResponse(body)) return body

  const result = schema.safeParse(body)
  if (!result.success) {
    const errors = result.error.flatten().fieldErrors
    return c.json({ error: 'Validation failed.', fields: errors }, 400)
  }

  const data: z.infer<T> = result.data
  return data
}

/** Check if a parseBody result is a Response (validation error). */
export function isResponse(value: unknown): value is Response {
  return value instanceof Response
}
