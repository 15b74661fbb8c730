// ---------------------------------------------------------------------------
// @fir-workbench/fir-core — Filter Design Types
// ---------------------------------------------------------------------------

// ---------------------------------------------------------------------------
// Windows
// ---------------------------------------------------------------------------

export type WindowKind =
  | 'rectangular'
  | 'bartlett'
  | 'hanning'
  | 'hamming'
  | 'blackman'
  | 'kaiser';

/** Closed set of window selections. Only Kaiser carries a shape parameter. */
export type WindowSpec =
  | { kind: 'rectangular' }
  | { kind: 'bartlett' }
  | { kind: 'hanning' }
  | { kind: 'hamming' }
  | { kind: 'blackman' }
  | { kind: 'kaiser'; beta: number };

/** N values in [0, 1]. */
export type WindowCoefficients = Float64Array;

/** Tabulated behaviour of a window (Oppenheim & Schafer style comparison table). */
export interface WindowCharacteristics {
  id: string;
  label: string;
  window: WindowSpec;
  /** Peak side-lobe level relative to the main lobe (dB); undefined for Kaiser presets. */
  peakSidelobeDb: number | undefined;
  /** Typical minimum stopband attenuation of a windowed lowpass (dB). */
  stopbandAttenuationDb: number;
  /** Typical passband ripple (dB). */
  passbandRippleDb: number;
  /** Transition width × N, with the width as a fraction of the sample rate. */
  transitionFactor: number;
  /** Closed-form expression of w[n]. */
  expression: string;
}

// ---------------------------------------------------------------------------
// Filter specification
// ---------------------------------------------------------------------------

export type FilterKind = 'lowpass' | 'highpass' | 'bandpass' | 'bandstop';

/**
 * Band layout. Cutoffs are fractions of Nyquist in (0, 1);
 * band edges satisfy low < high.
 */
export type FilterBand =
  | { type: 'lowpass'; cutoff: number }
  | { type: 'highpass'; cutoff: number }
  | { type: 'bandpass'; cutoffs: readonly [number, number] }
  | { type: 'bandstop'; cutoffs: readonly [number, number] };

export interface FilterSpecification {
  band: FilterBand;
  /** Filter length N (number of taps). Odd unless `allowEvenOrder` is set. */
  order: number;
  window: WindowSpec;
  /** Permit even N (Type II designs). */
  allowEvenOrder?: boolean;
}

/** N real taps centred at α = (N-1)/2. */
export type ImpulseResponse = Float64Array;

export interface WindowedDesign {
  /** Final taps: ideal[n] · window[n]. */
  coefficients: ImpulseResponse;
  window: WindowCoefficients;
  ideal: ImpulseResponse;
}

// ---------------------------------------------------------------------------
// Kaiser estimation
// ---------------------------------------------------------------------------

export interface KaiserSpecification {
  /** Peak approximation error δ ∈ (0, 1). */
  delta: number;
  /** Passband edge ωp in radians. */
  passbandEdge: number;
  /** Stopband edge ωs in radians. */
  stopbandEdge: number;
}

export interface KaiserEstimate {
  /** Odd filter length after rounding and clamping. */
  order: number;
  /** ceil((A-8)/(2.285·Δω)) before parity and clamp. */
  rawOrder: number;
  clamped: boolean;
  beta: number;
  /** Stopband attenuation A = -20·log10(δ) in dB. */
  attenuationDb: number;
  /** Δω = ωs - ωp in radians. */
  transitionWidth: number;
  /** ωc = (ωp + ωs)/2 in radians. */
  cutoffRadians: number;
  /** ωc as a fraction of π, ready to feed a FilterSpecification. */
  cutoff: number;
}

// ---------------------------------------------------------------------------
// Frequency response
// ---------------------------------------------------------------------------

export interface FrequencyResponse {
  /** Grid in Hz when a sample rate was given, else radians/sample in [0, π]. */
  frequencies: Float64Array;
  /** Grid in radians/sample, always [0, π]. */
  omega: Float64Array;
  real: Float64Array;
  imag: Float64Array;
  /** Taps the response was evaluated from. */
  taps: Float64Array;
  sampleRate: number | undefined;
}

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

export type LinearPhaseType = 'I' | 'II' | 'III' | 'IV';

export interface FilterMetrics {
  /** Frequencies below are fractions of π. */
  passbandEdge: number | undefined;
  stopbandEdge: number | undefined;
  /** Level at which the stopband edge was searched last (dB). */
  stopbandLevelDb: number | undefined;
  transitionWidth: number | undefined;
  minStopbandAttenuationDb: number;
  symmetric: boolean;
  antisymmetric: boolean;
  /** Undefined when the taps are neither symmetric nor antisymmetric. */
  phaseType: LinearPhaseType | undefined;
  /** (N-1)/2 samples; meaningful for linear-phase taps. */
  groupDelay: number;
  length: number;
}

// ---------------------------------------------------------------------------
// Tolerance-driven design (Hz)
// ---------------------------------------------------------------------------

export interface ToleranceSpecification {
  type: 'lowpass' | 'highpass';
  sampleRate: number;
  passbandEdgeHz: number;
  transitionWidthHz: number;
  /** Required stopband attenuation (dB). */
  attenuationDb: number;
  /** Id from the window characteristics table. */
  windowId: string;
}

export interface ToleranceDesign extends WindowedDesign {
  specification: FilterSpecification;
  stopbandEdgeHz: number;
  cutoffHz: number;
  /** Transition width as a fraction of the sample rate. */
  normalizedTransition: number;
  characteristics: WindowCharacteristics;
}
