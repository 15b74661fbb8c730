import { z } from 'zod'
import { MAX_TAPS, sampleCountSchema, sampleRateSchema } from './filters'

const radians = z.number().gt(0).lt(Math.PI, 'Must be below π')

export const kaiserSpecificationSchema = z
  .object({
    delta: z.number().gt(0).lt(1),
    passbandEdge: radians,
    stopbandEdge: radians,
  })
  .refine((spec) => spec.passbandEdge < spec.stopbandEdge, {
    message: 'Passband edge must be below stopband edge',
    path: ['stopbandEdge'],
  })

export const tapsSchema = z.array(z.number().finite()).min(1).max(MAX_TAPS)

export const frequencyResponseRequestSchema = z.object({
  taps: tapsSchema,
  sampleCount: sampleCountSchema.optional(),
  sampleRate: sampleRateSchema.optional(),
})

export const metricsSettingsSchema = z
  .object({
    passbandLevelDb: z.number().finite().max(0),
    stopbandLevelsDb: z.array(z.number().finite().max(0)).min(1),
    stopbandEdgeGuard: z.number().min(0).lt(1),
    stopbandSearchCeiling: z.number().gt(0).max(1),
    attenuationGuard: z.number().min(0).lt(1),
    attenuationSearchCeiling: z.number().gt(0).max(1),
  })
  .partial()

export const metricsRequestSchema = z.object({
  taps: tapsSchema,
  nominalCutoff: z.number().gt(0).lt(1),
  sampleCount: sampleCountSchema.optional(),
  settings: metricsSettingsSchema.optional(),
})

export type KaiserSpecificationInput = z.infer<typeof kaiserSpecificationSchema>
export type FrequencyResponseRequestInput = z.infer<typeof frequencyResponseRequestSchema>
export type MetricsSettingsInput = z.infer<typeof metricsSettingsSchema>
export type MetricsRequestInput = z.infer<typeof metricsRequestSchema>
