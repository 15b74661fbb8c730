// ---------------------------------------------------------------------------
// Kaiser order estimation
// ---------------------------------------------------------------------------
// A  = -20·log10(δ)
// β  = 0.1102(A-8.7)                       A > 50
//    = 0.5842(A-21)^0.4 + 0.07886(A-21)    21 ≤ A ≤ 50
//    = 0                                   A < 21
// N  = ceil((A-8) / (2.285·Δω)), rounded up to odd, clamped to the limits
// ωc = (ωp + ωs)/2

import { DEFAULT_ORDER_LIMITS, logger, type OrderLimits } from '@fir-workbench/config';
import type { KaiserEstimate, KaiserSpecification } from '../types.js';
import { InvalidParameterError, InvalidSpecificationError } from '../errors.js';

const log = logger.child({ component: 'kaiser' });

/** Shape parameter β for a stopband attenuation A (dB). */
export function kaiserBeta(attenuationDb: number): number {
  const A = attenuationDb;
  if (A > 50) return 0.1102 * (A - 8.7);
  if (A >= 21) return 0.5842 * Math.pow(A - 21, 0.4) + 0.07886 * (A - 21);
  return 0;
}

/** Unclamped length estimate ceil((A-8)/(2.285·Δω)). */
export function kaiserRawOrder(attenuationDb: number, transitionWidth: number): number {
  return Math.ceil((attenuationDb - 8) / (2.285 * transitionWidth));
}

/** Round up to the next odd integer. */
export function toOdd(n: number): number {
  return n % 2 === 0 ? n + 1 : n;
}

export function assertOrderLimits(limits: OrderLimits): void {
  const { min, max } = limits;
  if (!Number.isInteger(min) || !Number.isInteger(max) || min < 1 || min > max) {
    throw new InvalidParameterError(`Order limits must satisfy 1 ≤ min ≤ max, got [${min}, ${max}]`, 'limits');
  }
  if (min % 2 === 0 || max % 2 === 0) {
    throw new InvalidParameterError(`Order limits must be odd, got [${min}, ${max}]`, 'limits');
  }
}

export function assertKaiserSpecification(spec: KaiserSpecification): void {
  const { delta, passbandEdge: wp, stopbandEdge: ws } = spec;
  if (!Number.isFinite(delta) || delta <= 0 || delta >= 1) {
    throw new InvalidSpecificationError(`delta must lie in (0, 1), got ${delta}`, 'delta');
  }
  if (!Number.isFinite(wp) || !Number.isFinite(ws) || wp <= 0 || ws >= Math.PI) {
    throw new InvalidSpecificationError('Band edges must lie in (0, π)', 'passbandEdge');
  }
  if (wp >= ws) {
    throw new InvalidSpecificationError(
      `Passband edge must be below stopband edge, got ωp=${wp} and ωs=${ws}`,
      'stopbandEdge',
    );
  }
}

/**
 * Estimate Kaiser window length and β from tolerances.
 * Closed form: no iteration beyond ceiling, parity and clamp.
 */
export function estimateKaiserOrder(
  spec: KaiserSpecification,
  limits: OrderLimits = DEFAULT_ORDER_LIMITS,
): KaiserEstimate {
  assertKaiserSpecification(spec);
  assertOrderLimits(limits);

  const attenuationDb = -20 * Math.log10(spec.delta);
  const beta = kaiserBeta(attenuationDb);
  const transitionWidth = spec.stopbandEdge - spec.passbandEdge;
  const rawOrder = kaiserRawOrder(attenuationDb, transitionWidth);
  const order = Math.max(limits.min, Math.min(limits.max, toOdd(rawOrder)));
  const clamped = order !== toOdd(rawOrder);
  const cutoffRadians = (spec.passbandEdge + spec.stopbandEdge) / 2;

  if (clamped) {
    log.warn('kaiser.order_clamped', { rawOrder, order, min: limits.min, max: limits.max });
  }

  return {
    order,
    rawOrder,
    clamped,
    beta,
    attenuationDb,
    transitionWidth,
    cutoffRadians,
    cutoff: cutoffRadians / Math.PI,
  };
}
