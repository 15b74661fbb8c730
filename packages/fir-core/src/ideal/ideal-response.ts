// ---------------------------------------------------------------------------
// Ideal (truncated) impulse responses, centred at α = (N-1)/2
// ---------------------------------------------------------------------------
// lowpass(ω)  h[n] = sin(ω(n-α)) / (π(n-α)),        h[α] = ω/π
// highpass(ω) h[n] = sinc(n-α) - lowpass(ω)[n],     h[α] = 1 - ω/π
// bandpass    h[n] = lowpass(ω2)[n] - lowpass(ω1)[n], h[α] = (ω2-ω1)/π
// bandstop    h[n] = sinc(n-α) - bandpass[n],       h[α] = 1 - (ω2-ω1)/π
// Cutoffs arrive as fractions of π; ω = wc·π.

import type { FilterBand, ImpulseResponse } from '../types.js';
import {
  InvalidSpecificationError,
  assertLength,
  assertNormalizedFrequency,
} from '../errors.js';

/** |n - α| below this selects the closed-form limit. */
export const CENTER_TOLERANCE = 1e-10;

/** sin(πx)/(πx) with sinc(0) = 1. */
export function sinc(x: number): number {
  if (Math.abs(x) < CENTER_TOLERANCE) return 1;
  return Math.sin(Math.PI * x) / (Math.PI * x);
}

/** One lowpass tap at offset m = n - α for cutoff ω (radians). */
function lowpassTap(m: number, omega: number): number {
  if (Math.abs(m) < CENTER_TOLERANCE) return omega / Math.PI;
  return Math.sin(omega * m) / (Math.PI * m);
}

/** Validate cutoffs; throws InvalidSpecificationError. */
export function assertBand(band: FilterBand): void {
  switch (band.type) {
    case 'lowpass':
    case 'highpass':
      assertNormalizedFrequency(band.cutoff, 'cutoff');
      return;
    case 'bandpass':
    case 'bandstop': {
      const [low, high] = band.cutoffs;
      assertNormalizedFrequency(low, 'cutoffs[0]');
      assertNormalizedFrequency(high, 'cutoffs[1]');
      if (low >= high) {
        throw new InvalidSpecificationError(
          `Band edges must satisfy wc1 < wc2, got ${low} and ${high}`,
          'cutoffs',
        );
      }
      return;
    }
  }
}

function tapAt(band: FilterBand, m: number): number {
  switch (band.type) {
    case 'lowpass':
      return lowpassTap(m, band.cutoff * Math.PI);
    case 'highpass':
      return sinc(m) - lowpassTap(m, band.cutoff * Math.PI);
    case 'bandpass':
      return lowpassTap(m, band.cutoffs[1] * Math.PI) - lowpassTap(m, band.cutoffs[0] * Math.PI);
    case 'bandstop':
      return sinc(m) - (lowpassTap(m, band.cutoffs[1] * Math.PI) - lowpassTap(m, band.cutoffs[0] * Math.PI));
  }
}

/**
 * Generate the ideal impulse response truncated to N taps.
 * Odd N gives h[n] = h[N-1-n] up to rounding.
 */
export function idealImpulseResponse(band: FilterBand, length: number): ImpulseResponse {
  assertLength(length, 'order');
  assertBand(band);

  const alpha = (length - 1) / 2;
  const h = new Float64Array(length);
  for (let n = 0; n < length; n++) {
    h[n] = tapAt(band, n - alpha);
  }
  return h;
}

/** Nominal cutoff used for metric guard regions: the (first) band edge. */
export function nominalCutoff(band: FilterBand): number {
  return band.type === 'lowpass' || band.type === 'highpass' ? band.cutoff : band.cutoffs[0];
}
