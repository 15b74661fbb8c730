/**
 * Structured request logging middleware.
 *
 * Emits one `http.request` entry per request with method, path,
 * response status and duration in ms.
 */

import type { Context, Next } from 'hono'
import { logger, type Logger } from '@fir-workbench/config'

export function requestLogger(log: Logger = logger.child({ component: 'http' })) {
  return async (c: Context, next: Next): Promise<void> => {
    const start = performance.now()
    await next()
    const ms = (performance.now() - start).toFixed(1)

    log.info('http.request', {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      ms: Number(ms),
    })
  }
}
