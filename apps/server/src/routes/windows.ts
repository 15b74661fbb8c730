import { Hono } from 'hono'
import {
  WINDOW_CHARACTERISTICS,
  generateWindow,
  mainLobeWidth,
  parseWindowSpec,
  windowsMeetingAttenuation,
} from '@fir-workbench/fir-core'
import { windowCoefficientsQuerySchema, windowsQuerySchema } from '@fir-workbench/shared'
import { parseQuery, isResponse } from '../lib/validate'

const windowRoutes = new Hono()

/** GET /windows — characteristics table, optionally filtered by required attenuation */
windowRoutes.get('/', (c) => {
  const query = parseQuery(c, windowsQuerySchema)
  if (isResponse(query)) return query

  const entries =
    query.attenuation === undefined ? [...WINDOW_CHARACTERISTICS] : windowsMeetingAttenuation(query.attenuation)
  const { length } = query

  const windows = entries.map((entry) =>
    length === undefined
      ? entry
      : { ...entry, mainLobeWidth: mainLobeWidth(entry.window.kind, length) ?? null },
  )
  return c.json({ windows })
})

/** GET /windows/:kind/coefficients — w[n] for a window kind and length */
windowRoutes.get('/:kind/coefficients', (c) => {
  const query = parseQuery(c, windowCoefficientsQuerySchema)
  if (isResponse(query)) return query

  const window = parseWindowSpec(c.req.param('kind'), query.beta)
  const coefficients = generateWindow(window, query.length)
  return c.json({ window, coefficients: Array.from(coefficients) })
})

export { windowRoutes }
