// ---------------------------------------------------------------------------
// Metric extraction from an evaluated response
// ---------------------------------------------------------------------------
// All edges are reported as fractions of π regardless of the response's
// sample rate. An edge that is never crossed is `undefined`, not an error.

import { DEFAULT_METRICS_SETTINGS, type MetricsSettings } from '@fir-workbench/config';
import type { FilterMetrics, FrequencyResponse, LinearPhaseType } from '../types.js';
import { assertNormalizedFrequency } from '../errors.js';
import { magnitudeDb } from '../response/frequency-response.js';

/**
 * Linear interpolation of the first sign change of (levelsDb - targetDb).
 * Searches indices [start, end).
 */
export function findCrossing(
  frequencies: ArrayLike<number>,
  levelsDb: ArrayLike<number>,
  targetDb: number,
  start = 0,
  end = levelsDb.length,
): number | undefined {
  for (let i = start; i + 1 < end; i++) {
    const s1 = Math.sign(levelsDb[i] - targetDb);
    const s2 = Math.sign(levelsDb[i + 1] - targetDb);
    if (s1 === s2) continue;

    const f1 = frequencies[i];
    const f2 = frequencies[i + 1];
    const db1 = levelsDb[i];
    const db2 = levelsDb[i + 1];
    if (Math.abs(db2 - db1) > 1e-6) {
      return f1 + ((targetDb - db1) * (f2 - f1)) / (db2 - db1);
    }
    return f1;
  }
  return undefined;
}

/** First frequency (in the response's own units) where |H| in dB crosses `targetDb`. */
export function findFrequencyAtLevel(
  response: FrequencyResponse,
  targetDb: number,
  floor: number = DEFAULT_METRICS_SETTINGS.magnitudeFloor,
): number | undefined {
  return findCrossing(response.frequencies, magnitudeDb(response, floor), targetDb);
}

export interface SymmetryReport {
  symmetric: boolean;
  antisymmetric: boolean;
  phaseType: LinearPhaseType | undefined;
}

/**
 * Compare taps with their reversal: |a - b| ≤ atol + rtol·|b|.
 * Symmetric → Type I (odd N) / II (even N); antisymmetric → III / IV.
 */
export function classifyLinearPhase(
  taps: ArrayLike<number>,
  absTolerance: number = DEFAULT_METRICS_SETTINGS.symmetryAbsTolerance,
  relTolerance: number = DEFAULT_METRICS_SETTINGS.symmetryRelTolerance,
): SymmetryReport {
  const N = taps.length;
  let symmetric = true;
  let antisymmetric = true;
  for (let n = 0; n < N; n++) {
    const a = taps[n];
    const b = taps[N - 1 - n];
    const tol = absTolerance + relTolerance * Math.abs(b);
    if (Math.abs(a - b) > tol) symmetric = false;
    if (Math.abs(a + b) > tol) antisymmetric = false;
  }

  const odd = N % 2 === 1;
  let phaseType: LinearPhaseType | undefined;
  if (symmetric) phaseType = odd ? 'I' : 'II';
  else if (antisymmetric) phaseType = odd ? 'III' : 'IV';
  return { symmetric, antisymmetric: antisymmetric && !symmetric, phaseType };
}

/** Index of the first grid point strictly above `threshold`, or `length` if none. */
function firstIndexAbove(grid: Float64Array, threshold: number): number {
  for (let k = 0; k < grid.length; k++) {
    if (grid[k] > threshold) return k;
  }
  return grid.length;
}

/**
 * Derive advisory metrics. `nominalCutoff` is a fraction of π and anchors
 * the stopband search regions.
 */
export function analyzeMetrics(
  response: FrequencyResponse,
  nominalCutoff: number,
  settings: MetricsSettings = DEFAULT_METRICS_SETTINGS,
): FilterMetrics {
  assertNormalizedFrequency(nominalCutoff, 'nominalCutoff');

  const K = response.omega.length;
  const grid = new Float64Array(K);
  for (let k = 0; k < K; k++) grid[k] = response.omega[k] / Math.PI;
  const db = magnitudeDb(response, settings.magnitudeFloor);

  const passbandEdge = findCrossing(grid, db, settings.passbandLevelDb);

  let stopbandEdge: number | undefined;
  let stopbandLevelDb: number | undefined;
  if (nominalCutoff < settings.stopbandSearchCeiling) {
    const start = firstIndexAbove(grid, nominalCutoff + settings.stopbandEdgeGuard);
    if (start < K) {
      for (const level of settings.stopbandLevelsDb) {
        stopbandLevelDb = level;
        stopbandEdge = findCrossing(grid, db, level, start);
        if (stopbandEdge !== undefined) break;
      }
    }
  }

  const transitionWidth =
    passbandEdge !== undefined && stopbandEdge !== undefined
      ? Math.abs(stopbandEdge - passbandEdge)
      : undefined;

  let floorDb = Infinity;
  for (let k = 0; k < K; k++) floorDb = Math.min(floorDb, db[k]);
  let minStopbandAttenuationDb = -floorDb;
  if (nominalCutoff < settings.attenuationSearchCeiling) {
    const start = firstIndexAbove(grid, nominalCutoff + settings.attenuationGuard);
    if (start < K) {
      let peak = -Infinity;
      for (let k = start; k < K; k++) peak = Math.max(peak, db[k]);
      minStopbandAttenuationDb = -peak;
    }
  }

  const N = response.taps.length;
  const symmetry = classifyLinearPhase(
    response.taps,
    settings.symmetryAbsTolerance,
    settings.symmetryRelTolerance,
  );

  return {
    passbandEdge,
    stopbandEdge,
    stopbandLevelDb,
    transitionWidth,
    minStopbandAttenuationDb,
    symmetric: symmetry.symmetric,
    antisymmetric: symmetry.antisymmetric,
    phaseType: symmetry.phaseType,
    groupDelay: (N - 1) / 2,
    length: N,
  };
}
