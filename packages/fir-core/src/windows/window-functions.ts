// ---------------------------------------------------------------------------
// Window functions — w[n] for 0 ≤ n ≤ M, M = N-1
// ---------------------------------------------------------------------------
// Symmetric (filter-design) windows: both endpoints are included, so the
// cosine windows reach zero at n = 0 and n = M.

import type { WindowCoefficients, WindowKind, WindowSpec } from '../types.js';
import { InvalidParameterError, assertLength } from '../errors.js';

export const KAISER_BETA_MIN = 0;
export const KAISER_BETA_MAX = 15;

export const WINDOW_KINDS: readonly WindowKind[] = [
  'rectangular',
  'bartlett',
  'hanning',
  'hamming',
  'blackman',
  'kaiser',
];

export function isWindowKind(value: string): value is WindowKind {
  return WINDOW_KINDS.some((kind) => kind === value);
}

/**
 * Modified Bessel function of the first kind, order 0.
 * Power series Σ ((x/2)^k / k!)², converges for every finite x.
 */
export function besselI0(x: number): number {
  let sum = 1;
  let term = 1;
  const halfX = x / 2;
  for (let k = 1; k <= 60; k++) {
    term *= (halfX / k) * (halfX / k);
    sum += term;
    if (term < 1e-17 * sum) break;
  }
  return sum;
}

function assertBeta(beta: number): void {
  if (!Number.isFinite(beta) || beta < KAISER_BETA_MIN || beta > KAISER_BETA_MAX) {
    throw new InvalidParameterError(
      `Kaiser beta must lie in [${KAISER_BETA_MIN}, ${KAISER_BETA_MAX}], got ${beta}`,
      'beta',
    );
  }
}

/** Validate a window selection without generating it. */
export function assertWindowSpec(spec: WindowSpec): void {
  if (spec.kind === 'kaiser') assertBeta(spec.beta);
}

/**
 * Build a window selection from loose input (a name and an optional β).
 * Unknown names are rejected rather than replaced by a default window.
 */
export function parseWindowSpec(name: string, beta?: number): WindowSpec {
  const kind = name.trim().toLowerCase();
  if (!isWindowKind(kind)) {
    throw new InvalidParameterError(
      `Unknown window "${name}". Expected one of: ${WINDOW_KINDS.join(', ')}`,
      'window',
    );
  }
  if (kind === 'kaiser') {
    if (beta === undefined) throw new InvalidParameterError('Kaiser window requires beta', 'beta');
    assertBeta(beta);
    return { kind, beta };
  }
  return { kind };
}

function cosineSum(n: number, M: number, a0: number, a1: number, a2: number): number {
  const w = a0 - a1 * Math.cos((2 * Math.PI * n) / M) + a2 * Math.cos((4 * Math.PI * n) / M);
  // Blackman's endpoints land a few ulps below zero.
  return Math.min(1, Math.max(0, w));
}

function windowSample(spec: WindowSpec, n: number, M: number, i0Beta: number): number {
  switch (spec.kind) {
    case 'rectangular':
      return 1;
    case 'hanning':
      return cosineSum(n, M, 0.5, 0.5, 0);
    case 'hamming':
      return cosineSum(n, M, 0.54, 0.46, 0);
    case 'blackman':
      return cosineSum(n, M, 0.42, 0.5, 0.08);
    case 'bartlett':
      return n <= M / 2 ? (2 * n) / M : 2 - (2 * n) / M;
    case 'kaiser': {
      const x = (2 * n) / M - 1;
      return besselI0(spec.beta * Math.sqrt(Math.max(0, 1 - x * x))) / i0Beta;
    }
  }
}

/**
 * Generate N window coefficients.
 *
 * N = 1 yields [1] for every window (M = 0 would divide by zero).
 */
export function generateWindow(spec: WindowSpec, length: number): WindowCoefficients {
  assertLength(length, 'length');
  assertWindowSpec(spec);

  const w = new Float64Array(length);
  if (length === 1) {
    w[0] = 1;
    return w;
  }

  const M = length - 1;
  const i0Beta = spec.kind === 'kaiser' ? besselI0(spec.beta) : 1;
  for (let n = 0; n < length; n++) {
    w[n] = windowSample(spec, n, M, i0Beta);
  }
  return w;
}

/** Theoretical main-lobe width (fraction of π) for length N; undefined for Kaiser. */
export function mainLobeWidth(kind: WindowKind, length: number): number | undefined {
  assertLength(length, 'length');
  const M = length - 1;
  switch (kind) {
    case 'rectangular':
      return 4 / length;
    case 'bartlett':
    case 'hanning':
    case 'hamming':
      return M === 0 ? undefined : 8 / M;
    case 'blackman':
      return M === 0 ? undefined : 12 / M;
    case 'kaiser':
      return undefined;
  }
}
