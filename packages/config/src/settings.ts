/** Thresholds and guard margins used when extracting metrics from a response. */
export interface MetricsSettings {
  /** Level (dB) that defines the passband edge. */
  passbandLevelDb: number
  /** Stopband levels (dB) tried in order until one produces a crossing. */
  stopbandLevelsDb: number[]
  /** Stopband-edge search starts this far (fraction of π) beyond the nominal cutoff. */
  stopbandEdgeGuard: number
  /** No stopband-edge search when the nominal cutoff is at or above this. */
  stopbandSearchCeiling: number
  /** Attenuation is measured this far (fraction of π) beyond the nominal cutoff. */
  attenuationGuard: number
  /** Above this cutoff the attenuation falls back to the whole curve. */
  attenuationSearchCeiling: number
  symmetryAbsTolerance: number
  symmetryRelTolerance: number
  /** Added to |H| before taking the logarithm. */
  magnitudeFloor: number
}

/** Inclusive bounds on filter length. Both bounds are odd. */
export interface OrderLimits {
  min: number
  max: number
}

export const DEFAULT_METRICS_SETTINGS: MetricsSettings = {
  passbandLevelDb: -3,
  stopbandLevelsDb: [-40, -30],
  stopbandEdgeGuard: 0.05,
  stopbandSearchCeiling: 0.8,
  attenuationGuard: 0.1,
  attenuationSearchCeiling: 0.9,
  symmetryAbsTolerance: 1e-10,
  symmetryRelTolerance: 1e-5,
  magnitudeFloor: 1e-10,
}

/** Limits applied to Kaiser estimates and to interactive order stepping. */
export const DEFAULT_ORDER_LIMITS: OrderLimits = { min: 11, max: 201 }

/** Limits applied to orders derived from Hz tolerance specifications. */
export const TOLERANCE_ORDER_LIMITS: OrderLimits = { min: 11, max: 501 }

function readEnv(key: string): string | undefined {
  if (typeof process !== 'undefined' && process.env) {
    const val = process.env[key]
    if (val !== undefined && val.trim() !== '') return val
  }
  return undefined
}

/** Read a finite number from the environment, `undefined` when absent or malformed. */
export function readEnvNumber(key: string): number | undefined {
  const raw = readEnv(key)
  if (raw === undefined) return undefined
  const val = Number(raw)
  return Number.isFinite(val) ? val : undefined
}

/** Read a comma-separated list of finite numbers; any malformed entry rejects the whole list. */
export function readEnvNumberList(key: string): number[] | undefined {
  const raw = readEnv(key)
  if (raw === undefined) return undefined
  const parts = raw.split(',').map((part) => part.trim())
  if (parts.some((part) => part === '')) return undefined
  const values = parts.map(Number)
  if (values.some((v) => !Number.isFinite(v))) return undefined
  return values
}

/** Defaults with environment overrides applied. Read once per call. */
export function loadMetricsSettings(): MetricsSettings {
  return {
    ...DEFAULT_METRICS_SETTINGS,
    stopbandLevelsDb: readEnvNumberList('FIR_STOPBAND_LEVELS_DB') ?? [...DEFAULT_METRICS_SETTINGS.stopbandLevelsDb],
    stopbandEdgeGuard: readEnvNumber('FIR_STOPBAND_EDGE_GUARD') ?? DEFAULT_METRICS_SETTINGS.stopbandEdgeGuard,
    attenuationGuard: readEnvNumber('FIR_ATTENUATION_GUARD') ?? DEFAULT_METRICS_SETTINGS.attenuationGuard,
  }
}

export function loadOrderLimits(): OrderLimits {
  const min = readEnvNumber('FIR_ORDER_MIN') ?? DEFAULT_ORDER_LIMITS.min
  const max = readEnvNumber('FIR_ORDER_MAX') ?? DEFAULT_ORDER_LIMITS.max
  if (!Number.isInteger(min) || !Number.isInteger(max) || min < 1 || min > max || min % 2 === 0 || max % 2 === 0) {
    return { ...DEFAULT_ORDER_LIMITS }
  }
  return { min, max }
}

/** Resolved settings (env overrides > defaults). */
export const metricsSettings: MetricsSettings = loadMetricsSettings()

export const orderLimits: OrderLimits = loadOrderLimits()

/** Merge partial overrides over the resolved settings. The result owns its level list. */
export function resolveMetricsSettings(overrides: Partial<MetricsSettings> = {}): MetricsSettings {
  const merged = { ...metricsSettings, ...overrides }
  return { ...merged, stopbandLevelsDb: [...merged.stopbandLevelsDb] }
}
