import { describe, it, expect } from 'vitest'
import { Hono } from 'hono'
import { createLogger, type LogEntry } from '@fir-workbench/config'
import { InvalidSpecificationError } from '@fir-workbench/fir-core'
import { requestLogger } from '../lib/request-logger'
import { securityHeaders } from '../lib/security-headers'
import { handleError } from '../lib/errors'

describe('requestLogger', () => {
  it('emits one http.request entry per request', async () => {
    const entries: LogEntry[] = []
    const log = createLogger({ level: 'info', sink: (entry) => entries.push(entry) })

    const app = new Hono()
    app.use('*', requestLogger(log))
    app.get('/ping', (c) => c.text('pong'))

    await app.request('/ping')

    expect(entries).toHaveLength(1)
    expect(entries[0]?.event).toBe('http.request')
    expect(entries[0]?.level).toBe('info')
    expect(entries[0]?.method).toBe('GET')
    expect(entries[0]?.path).toBe('/ping')
    expect(entries[0]?.status).toBe(200)
    expect(typeof entries[0]?.ms).toBe('number')
  })

  it('stays quiet below its level', async () => {
    const entries: LogEntry[] = []
    const log = createLogger({ level: 'warn', sink: (entry) => entries.push(entry) })

    const app = new Hono()
    app.use('*', requestLogger(log))
    app.get('/ping', (c) => c.text('pong'))

    await app.request('/ping')
    expect(entries).toHaveLength(0)
  })
})

describe('securityHeaders', () => {
  it('sets hardening headers and no-store', async () => {
    const app = new Hono()
    app.use('*', securityHeaders('development'))
    app.get('/', (c) => c.text('ok'))

    const res = await app.request('/')
    expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff')
    expect(res.headers.get('X-Frame-Options')).toBe('DENY')
    expect(res.headers.get('Cache-Control')).toBe('no-store')
    expect(res.headers.get('Strict-Transport-Security')).toBeNull()
  })

  it('adds HSTS in production', async () => {
    const app = new Hono()
    app.use('*', securityHeaders('production'))
    app.get('/', (c) => c.text('ok'))

    const res = await app.request('/')
    expect(res.headers.get('Strict-Transport-Security')).toBe('max-age=31536000; includeSubDomains')
  })
})

describe('handleError', () => {
  it('maps design errors to 422 with their code and field', async () => {
    const app = new Hono()
    app.onError(handleError)
    app.get('/', () => {
      throw new InvalidSpecificationError('cutoff must lie in (0, 1), got 2', 'cutoff')
    })

    const res = await app.request('/')
    expect(res.status).toBe(422)
    expect(await res.json()).toEqual({
      error: 'cutoff must lie in (0, 1), got 2',
      code: 'INVALID_SPECIFICATION',
      field: 'cutoff',
    })
  })

  it('hides unexpected errors behind a 500', async () => {
    const app = new Hono()
    app.onError(handleError)
    app.get('/', () => {
      throw new Error('boom')
    })

    const res = await app.request('/')
    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({ error: 'Internal server error.' })
  })
})
