import { Hono } from 'hono'
import { estimateKaiserOrder } from '@fir-workbench/fir-core'
import { orderLimits } from '@fir-workbench/config'
import { kaiserSpecificationSchema } from '@fir-workbench/shared'
import { parseBody, isResponse } from '../lib/validate'

const kaiserRoutes = new Hono()

/** POST /kaiser/estimate — order, β and cutoff from δ and band edges (radians) */
kaiserRoutes.post('/estimate', async (c) => {
  const data = await parseBody(c, kaiserSpecificationSchema)
  if (isResponse(data)) return data

  const estimate = estimateKaiserOrder(data, orderLimits)
  return c.json({ estimate, limits: orderLimits })
})

export { kaiserRoutes }
