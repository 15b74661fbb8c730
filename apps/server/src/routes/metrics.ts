import { Hono } from 'hono'
import { analyzeMetrics, evaluateFrequencyResponse } from '@fir-workbench/fir-core'
import { resolveMetricsSettings } from '@fir-workbench/config'
import { metricsRequestSchema } from '@fir-workbench/shared'
import { parseBody, isResponse } from '../lib/validate'
import { resolveSampleCount } from '../lib/sampling'
import { serializeMetrics } from '../lib/serialize'

const metricsRoutes = new Hono()

/** POST /metrics — edges, attenuation and symmetry of arbitrary taps */
metricsRoutes.post('/', async (c) => {
  const data = await parseBody(c, metricsRequestSchema)
  if (isResponse(data)) return data

  const sampleCount = resolveSampleCount(c, data.sampleCount)
  if (isResponse(sampleCount)) return sampleCount

  const settings = resolveMetricsSettings(data.settings)
  const response = evaluateFrequencyResponse(data.taps, sampleCount)
  const metrics = analyzeMetrics(response, data.nominalCutoff, settings)
  return c.json({ metrics: serializeMetrics(metrics), settings })
})

export { metricsRoutes }
