export {
  windowSpecSchema,
  filterBandSchema,
  filterSpecificationSchema,
  designRequestSchema,
  toleranceDesignSchema,
  sampleCountSchema,
  sampleRateSchema,
  MAX_TAPS,
  MAX_SAMPLE_COUNT,
  windowsQuerySchema,
  windowCoefficientsQuerySchema,
  type WindowsQueryInput,
  type WindowCoefficientsQueryInput,
  type WindowSpecInput,
  type FilterBandInput,
  type FilterSpecificationInput,
  type DesignRequestInput,
  type ToleranceDesignInput,
} from './filters'

export {
  kaiserSpecificationSchema,
  frequencyResponseRequestSchema,
  metricsRequestSchema,
  metricsSettingsSchema,
  tapsSchema,
  type KaiserSpecificationInput,
  type FrequencyResponseRequestInput,
  type MetricsSettingsInput,
  type MetricsRequestInput,
} from './analysis'
