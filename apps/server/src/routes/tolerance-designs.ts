import { Hono } from 'hono'
import {
  analyzeMetrics,
  designFromTolerances,
  evaluateFrequencyResponse,
  nominalCutoff,
} from '@fir-workbench/fir-core'
import { metricsSettings } from '@fir-workbench/config'
import { toleranceDesignSchema } from '@fir-workbench/shared'
import { parseBody, isResponse } from '../lib/validate'
import { resolveSampleCount } from '../lib/sampling'
import { serializeDesign, serializeMetrics, serializeResponse } from '../lib/serialize'

const toleranceDesignRoutes = new Hono()

/** POST /tolerance-designs — length and cutoff from Hz tolerances, then design */
toleranceDesignRoutes.post('/', async (c) => {
  const data = await parseBody(c, toleranceDesignSchema)
  if (isResponse(data)) return data

  const sampleCount = resolveSampleCount(c, data.sampleCount)
  if (isResponse(sampleCount)) return sampleCount

  const design = designFromTolerances({
    type: data.type,
    sampleRate: data.sampleRate,
    passbandEdgeHz: data.passbandEdgeHz,
    transitionWidthHz: data.transitionWidthHz,
    attenuationDb: data.attenuationDb,
    windowId: data.windowId,
  })
  const response = evaluateFrequencyResponse(design.coefficients, sampleCount, data.sampleRate)
  const metrics = analyzeMetrics(response, nominalCutoff(design.specification.band), metricsSettings)

  return c.json({
    specification: design.specification,
    stopbandEdgeHz: design.stopbandEdgeHz,
    cutoffHz: design.cutoffHz,
    normalizedTransition: design.normalizedTransition,
    characteristics: design.characteristics,
    design: serializeDesign(design),
    response: serializeResponse(response),
    metrics: serializeMetrics(metrics),
  })
})

export { toleranceDesignRoutes }
