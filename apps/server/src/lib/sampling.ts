import type { Context } from 'hono'
import { DEFAULT_SAMPLE_COUNT } from '@fir-workbench/fir-core'
import { env } from './env'

/**
 * Grid size for a response payload: the requested count, or the core
 * default, capped by MAX_RESPONSE_SAMPLES. Returns 400 when the request
 * asks for more.
 */
export function resolveSampleCount(
  c: Context,
  requested: number | undefined,
  limit: number = env.MAX_RESPONSE_SAMPLES,
): number | Response {
  if (requested === undefined) return Math.min(DEFAULT_SAMPLE_COUNT, limit)
  if (requested > limit) {
    return c.json(
      {
        error: 'Validation failed.',
        fields: { sampleCount: [`At most ${limit} samples per response`] },
      },
      400,
    )
  }
  return requested
}
