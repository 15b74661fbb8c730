import type { Context } from 'hono'
import { HTTPException } from 'hono/http-exception'
import { isFilterDesignError } from '@fir-workbench/fir-core'
import { logger } from '@fir-workbench/config'
import { env } from './env'

const log = logger.child({ component: 'http' })

/**
 * Design errors are the caller's fault and map to 422 with their code.
 * Anything else is logged and hidden behind a 500.
 */
export function handleError(err: Error, c: Context): Response {
  if (isFilterDesignError(err)) {
    return c.json({ error: err.message, code: err.code, field: err.field ?? null }, 422)
  }

  if (err instanceof HTTPException) {
    return err.getResponse()
  }

  log.error('http.unhandled_error', {
    method: c.req.method,
    path: c.req.path,
    error: err.message,
    stack: env.NODE_ENV !== 'production' ? err.stack : undefined,
  })
  return c.json({ error: 'Internal server error.' }, 500)
}
