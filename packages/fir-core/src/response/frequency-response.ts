// ---------------------------------------------------------------------------
// Frequency response of a finite tap sequence
// ---------------------------------------------------------------------------
// H(e^{jω}) = Σ_{n=0}^{N-1} h[n]·e^{-jωn}, sampled at K evenly spaced ω in
// [0, π] (both ends included). Each term is evaluated directly rather than
// by a rotating phasor recurrence, so error does not accumulate with N.

import type { FrequencyResponse } from '../types.js';
import { InvalidParameterError } from '../errors.js';

export const DEFAULT_SAMPLE_COUNT = 8000;
export const DEFAULT_MAGNITUDE_FLOOR = 1e-10;

function assertTaps(taps: ArrayLike<number>): void {
  if (taps.length === 0) {
    throw new InvalidParameterError('Coefficient sequence must not be empty', 'taps');
  }
  for (let n = 0; n < taps.length; n++) {
    if (!Number.isFinite(taps[n])) {
      throw new InvalidParameterError(`Coefficient ${n} is not finite`, 'taps');
    }
  }
}

/**
 * Evaluate H over `sampleCount` grid points.
 *
 * @param sampleRate When given, `frequencies` spans [0, fs/2] in Hz.
 */
export function evaluateFrequencyResponse(
  taps: ArrayLike<number>,
  sampleCount: number = DEFAULT_SAMPLE_COUNT,
  sampleRate?: number,
): FrequencyResponse {
  assertTaps(taps);
  if (!Number.isInteger(sampleCount) || sampleCount < 2) {
    throw new InvalidParameterError(`sampleCount must be an integer ≥ 2, got ${sampleCount}`, 'sampleCount');
  }
  if (sampleRate !== undefined && (!Number.isFinite(sampleRate) || sampleRate <= 0)) {
    throw new InvalidParameterError(`sampleRate must be positive, got ${sampleRate}`, 'sampleRate');
  }

  const h = Float64Array.from(taps);
  const N = h.length;
  const omega = new Float64Array(sampleCount);
  const frequencies = new Float64Array(sampleCount);
  const real = new Float64Array(sampleCount);
  const imag = new Float64Array(sampleCount);
  const step = Math.PI / (sampleCount - 1);

  for (let k = 0; k < sampleCount; k++) {
    const w = k === sampleCount - 1 ? Math.PI : k * step;
    omega[k] = w;
    frequencies[k] = sampleRate === undefined ? w : (w / Math.PI) * (sampleRate / 2);

    let re = 0;
    let im = 0;
    for (let n = 0; n < N; n++) {
      const phase = w * n;
      re += h[n] * Math.cos(phase);
      im -= h[n] * Math.sin(phase);
    }
    real[k] = re;
    imag[k] = im;
  }

  return { frequencies, omega, real, imag, taps: h, sampleRate };
}

/** |H(e^{jω})|. */
export function magnitude(response: FrequencyResponse): Float64Array {
  const out = new Float64Array(response.real.length);
  for (let k = 0; k < out.length; k++) {
    out[k] = Math.hypot(response.real[k], response.imag[k]);
  }
  return out;
}

/** 20·log10(|H| + floor). */
export function magnitudeDb(
  response: FrequencyResponse,
  floor: number = DEFAULT_MAGNITUDE_FLOOR,
): Float64Array {
  const mag = magnitude(response);
  for (let k = 0; k < mag.length; k++) {
    mag[k] = 20 * Math.log10(mag[k] + floor);
  }
  return mag;
}

/** Remove 2π jumps between consecutive samples. */
export function unwrap(phase: Float64Array): Float64Array {
  const out = new Float64Array(phase.length);
  if (phase.length === 0) return out;
  out[0] = phase[0];
  let correction = 0;
  for (let k = 1; k < phase.length; k++) {
    const d = phase[k] - phase[k - 1];
    if (Math.abs(d) >= Math.PI) {
      let dmod = ((((d + Math.PI) % (2 * Math.PI)) + 2 * Math.PI) % (2 * Math.PI)) - Math.PI;
      if (dmod === -Math.PI && d > 0) dmod = Math.PI;
      correction += dmod - d;
    }
    out[k] = phase[k] + correction;
  }
  return out;
}

/** Unwrapped angle of H. */
export function unwrappedPhase(response: FrequencyResponse): Float64Array {
  const wrapped = new Float64Array(response.real.length);
  for (let k = 0; k < wrapped.length; k++) {
    wrapped[k] = Math.atan2(response.imag[k], response.real[k]);
  }
  return unwrap(wrapped);
}

/** Unwrapped phase with the linear term -α·ω removed (α = (N-1)/2). */
export function compensatedPhase(response: FrequencyResponse): Float64Array {
  const delay = (response.taps.length - 1) / 2;
  const phase = unwrappedPhase(response);
  for (let k = 0; k < phase.length; k++) {
    phase[k] += delay * response.omega[k];
  }
  return phase;
}
