// ---------------------------------------------------------------------------
// @fir-workbench/fir-core — Barrel Export
// ---------------------------------------------------------------------------
// Windowed FIR design: windows, ideal responses, Kaiser estimation,
// frequency response and metric extraction. Pure functions, no I/O.

export type {
  WindowKind,
  WindowSpec,
  WindowCoefficients,
  WindowCharacteristics,
  FilterKind,
  FilterBand,
  FilterSpecification,
  ImpulseResponse,
  WindowedDesign,
  KaiserSpecification,
  KaiserEstimate,
  FrequencyResponse,
  LinearPhaseType,
  FilterMetrics,
  ToleranceSpecification,
  ToleranceDesign,
} from './types.js';

export {
  FilterDesignError,
  InvalidParameterError,
  InvalidSpecificationError,
  isFilterDesignError,
  type FilterDesignErrorCode,
} from './errors.js';

export * from './windows/index.js';
export * from './ideal/index.js';
export * from './kaiser/index.js';
export * from './response/index.js';
export * from './metrics/index.js';
export * from './design/index.js';
