import {
  compensatedPhase,
  magnitude,
  magnitudeDb,
  unwrappedPhase,
  type FilterMetrics,
  type FrequencyResponse,
  type WindowedDesign,
} from '@fir-workbench/fir-core'
import { metricsSettings } from '@fir-workbench/config'

// Float64Array serializes as an index-keyed object; payloads carry plain arrays.

export function serializeDesign(design: WindowedDesign) {
  return {
    coefficients: Array.from(design.coefficients),
    window: Array.from(design.window),
    ideal: Array.from(design.ideal),
  }
}

export function serializeResponse(response: FrequencyResponse) {
  return {
    sampleRate: response.sampleRate ?? null,
    frequencies: Array.from(response.frequencies),
    magnitude: Array.from(magnitude(response)),
    magnitudeDb: Array.from(magnitudeDb(response, metricsSettings.magnitudeFloor)),
    phase: Array.from(unwrappedPhase(response)),
    compensatedPhase: Array.from(compensatedPhase(response)),
  }
}

/** Edges that were not found go out as `null` rather than dropped keys. */
export function serializeMetrics(metrics: FilterMetrics) {
  return {
    ...metrics,
    passbandEdge: metrics.passbandEdge ?? null,
    stopbandEdge: metrics.stopbandEdge ?? null,
    stopbandLevelDb: metrics.stopbandLevelDb ?? null,
    transitionWidth: metrics.transitionWidth ?? null,
    phaseType: metrics.phaseType ?? null,
  }
}
