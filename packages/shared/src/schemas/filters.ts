import { z } from 'zod'

/** Largest tap count accepted at the boundary. */
export const MAX_TAPS = 8191

/** Largest frequency grid accepted at the boundary. */
export const MAX_SAMPLE_COUNT = 65536

const normalizedFrequency = z
  .number()
  .gt(0, 'Must be above 0 (fraction of Nyquist)')
  .lt(1, 'Must be below 1 (fraction of Nyquist)')

const bandEdges = z
  .tuple([normalizedFrequency, normalizedFrequency])
  .refine(([low, high]) => low < high, 'Lower edge must be below upper edge')

export const windowSpecSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('rectangular') }),
  z.object({ kind: z.literal('bartlett') }),
  z.object({ kind: z.literal('hanning') }),
  z.object({ kind: z.literal('hamming') }),
  z.object({ kind: z.literal('blackman') }),
  z.object({ kind: z.literal('kaiser'), beta: z.number().min(0).max(15) }),
])

export const filterBandSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('lowpass'), cutoff: normalizedFrequency }),
  z.object({ type: z.literal('highpass'), cutoff: normalizedFrequency }),
  z.object({ type: z.literal('bandpass'), cutoffs: bandEdges }),
  z.object({ type: z.literal('bandstop'), cutoffs: bandEdges }),
])

const filterSpecificationObject = z.object({
  band: filterBandSchema,
  order: z.number().int().min(1).max(MAX_TAPS),
  window: windowSpecSchema,
  allowEvenOrder: z.boolean().optional(),
})

const oddUnlessAllowed = (spec: { order: number; allowEvenOrder?: boolean }) =>
  spec.allowEvenOrder === true || spec.order % 2 === 1

const oddOrderIssue = { message: 'Order must be odd unless allowEvenOrder is set', path: ['order'] }

export const filterSpecificationSchema = filterSpecificationObject.refine(oddUnlessAllowed, oddOrderIssue)

export const sampleCountSchema = z.number().int().min(2).max(MAX_SAMPLE_COUNT)

export const sampleRateSchema = z.number().finite().positive()

/** Specification plus the grid the designed filter is evaluated on. */
export const designRequestSchema = filterSpecificationObject
  .extend({
    sampleCount: sampleCountSchema.optional(),
    sampleRate: sampleRateSchema.optional(),
  })
  .refine(oddUnlessAllowed, oddOrderIssue)

export const toleranceDesignSchema = z.object({
  type: z.enum(['lowpass', 'highpass']),
  sampleRate: sampleRateSchema,
  passbandEdgeHz: z.number().finite().positive(),
  transitionWidthHz: z.number().finite().positive(),
  attenuationDb: z.number().finite().positive(),
  windowId: z.string().min(1),
  sampleCount: sampleCountSchema.optional(),
})

export type WindowSpecInput = z.infer<typeof windowSpecSchema>
export type FilterBandInput = z.infer<typeof filterBandSchema>
export type FilterSpecificationInput = z.infer<typeof filterSpecificationSchema>
export type DesignRequestInput = z.infer<typeof designRequestSchema>
export type ToleranceDesignInput = z.infer<typeof toleranceDesignSchema>

// ─── Query strings ──────────────────────────────────────────────────────────

export const windowsQuerySchema = z.object({
  attenuation: z.coerce.number().finite().positive().optional(),
  length: z.coerce.number().int().min(1).max(MAX_TAPS).optional(),
})

export const windowCoefficientsQuerySchema = z.object({
  length: z.coerce.number().int().min(1).max(MAX_TAPS),
  beta: z.coerce.number().min(0).max(15).optional(),
})

export type WindowsQueryInput = z.infer<typeof windowsQuerySchema>
export type WindowCoefficientsQueryInput = z.infer<typeof windowCoefficientsQuerySchema>
