/**
 * Security headers middleware.
 *
 * Design results are computed per request, so responses are marked
 * `no-store` alongside the usual hardening headers. HSTS only in production.
 */

import type { Context, Next } from 'hono'
import { env } from './env'

export function securityHeaders(nodeEnv: string = env.NODE_ENV) {
  return async (c: Context, next: Next): Promise<void> => {
    await next()
    c.header('X-Content-Type-Options', 'nosniff')
    c.header('X-Frame-Options', 'DENY')
    c.header('Referrer-Policy', 'no-referrer')
    c.header('Cache-Control', 'no-store')
    if (nodeEnv === 'production') {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains')
    }
  }
}
