import { describe, it, expect } from 'vitest'
import { Hono } from 'hono'
import { z } from 'zod'
import { parseBody, readBody, isResponse } from '../lib/validate'

describe('Validation Helper', () => {
  const schema = z.object({
    spot: z.coerce.number().positive(),
    payoff: z.string().min(1),
    seed: z.coerce.number().int().optional(),
  })

  function buildApp() {
    const app = new Hono()
    app.post('/test', async (c) => {
      const result = await parseBody(c, schema)
      if (isResponse(result)) return result
      return c.json({ parsed: result })
    })
    return app
  }

  const postJson = (body: string) =>
    buildApp().request('/test', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    })

  describe('parseBody', () => {
    it('parses valid JSON body', async () => {
      const res = await postJson(JSON.stringify({ spot: 100, payoff: 'max(s - 100, 0)' }))

      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({ parsed: { spot: 100, payoff: 'max(s - 100, 0)' } })
    })

    it('parses a form-encoded body', async () => {
      const res = await buildApp().request('/test', {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({ spot: '95.5', payoff: 's', seed: '3' }).toString(),
      })

      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({ parsed: { spot: 95.5, payoff: 's', seed: 3 } })
    })

    it('returns 400 for invalid JSON', async () => {
      const res = await postJson('not json')

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'Invalid JSON body.' })
    })

    it('returns 400 for a JSON array', async () => {
      const res = await postJson('[1, 2]')

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'Request body must be a JSON object.' })
    })

    it('returns 400 with field errors for schema violations', async () => {
      const res = await postJson(JSON.stringify({ spot: -1, payoff: '' }))

      expect(res.status).toBe(400)
      const body = await res.json()
      expect(body.error).toBe('Validation failed.')
      expect(Object.keys(body.fields).sort()).toEqual(['payoff', 'spot'])
    })
  })

  describe('readBody', () => {
    it('reads JSON without validating it', async () => {
      const app = new Hono()
      app.post('/raw', async (c) => {
        const body = await readBody(c)
        if (isResponse(body)) return body
        return c.json(body)
      })

      const res = await app.request('/raw', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ anything: 'goes' }),
      })
      expect(await res.json()).toEqual({ anything: 'goes' })
    })
  })

  describe('isResponse', () => {
    it('returns true for Response instances', () => {
      expect(isResponse(new Response())).toBe(true)
    })

    it('returns false for plain objects', () => {
      expect(isResponse({ spot: 100 })).toBe(false)
      expect(isResponse(null)).toBe(false)
      expect(isResponse(42)).toBe(false)
    })
  })
})
