import { Hono } from 'hono'
import { evaluateFrequencyResponse } from '@fir-workbench/fir-core'
import { frequencyResponseRequestSchema } from '@fir-workbench/shared'
import { parseBody, isResponse } from '../lib/validate'
import { resolveSampleCount } from '../lib/sampling'
import { serializeResponse } from '../lib/serialize'

const responseRoutes = new Hono()

/** POST /responses — H(e^{jω}) of arbitrary taps */
responseRoutes.post('/', async (c) => {
  const data = await parseBody(c, frequencyResponseRequestSchema)
  if (isResponse(data)) return data

  const sampleCount = resolveSampleCount(c, data.sampleCount)
  if (isResponse(sampleCount)) return sampleCount

  const response = evaluateFrequencyResponse(data.taps, sampleCount, data.sampleRate)
  return c.json({ length: data.taps.length, response: serializeResponse(response) })
})

export { responseRoutes }
