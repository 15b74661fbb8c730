import { Hono } from 'hono'
import {
  analyzeMetrics,
  designWindowedFilter,
  evaluateFrequencyResponse,
  nominalCutoff,
  type FilterSpecification,
} from '@fir-workbench/fir-core'
import { metricsSettings } from '@fir-workbench/config'
import { designRequestSchema } from '@fir-workbench/shared'
import { parseBody, isResponse } from '../lib/validate'
import { resolveSampleCount } from '../lib/sampling'
import { serializeDesign, serializeMetrics, serializeResponse } from '../lib/serialize'

const designRoutes = new Hono()

/** POST /designs — windowed design, its frequency response and metrics */
designRoutes.post('/', async (c) => {
  const data = await parseBody(c, designRequestSchema)
  if (isResponse(data)) return data

  const sampleCount = resolveSampleCount(c, data.sampleCount)
  if (isResponse(sampleCount)) return sampleCount

  const specification: FilterSpecification = {
    band: data.band,
    order: data.order,
    window: data.window,
    allowEvenOrder: data.allowEvenOrder,
  }
  const design = designWindowedFilter(specification)
  const response = evaluateFrequencyResponse(design.coefficients, sampleCount, data.sampleRate)
  const metrics = analyzeMetrics(response, nominalCutoff(specification.band), metricsSettings)

  return c.json({
    specification,
    design: serializeDesign(design),
    response: serializeResponse(response),
    metrics: serializeMetrics(metrics),
  })
})

export { designRoutes }
