// ---------------------------------------------------------------------------
// Windowing method: h[n] = h_ideal[n] · w[n]
// ---------------------------------------------------------------------------

import { DEFAULT_ORDER_LIMITS, logger, type OrderLimits } from '@fir-workbench/config';
import type { FilterSpecification, WindowedDesign } from '../types.js';
import { InvalidParameterError, assertLength } from '../errors.js';
import { assertWindowSpec, generateWindow } from '../windows/window-functions.js';
import { assertBand, idealImpulseResponse } from '../ideal/ideal-response.js';
import { assertOrderLimits } from '../kaiser/kaiser-order.js';

/** Upper bound on taps accepted by a single design call. */
export const MAX_TAPS = 8191;

const log = logger.child({ component: 'design' });

/** Validate every field before anything is computed. */
export function assertFilterSpecification(spec: FilterSpecification): void {
  assertLength(spec.order, 'order', spec.allowEvenOrder === true);
  if (spec.order > MAX_TAPS) {
    throw new InvalidParameterError(`order must not exceed ${MAX_TAPS}, got ${spec.order}`, 'order');
  }
  assertBand(spec.band);
  assertWindowSpec(spec.window);
}

/**
 * Design a windowed FIR filter.
 * Returns the final taps together with the window and ideal response
 * they were formed from; all three have length `spec.order`.
 */
export function designWindowedFilter(spec: FilterSpecification): WindowedDesign {
  assertFilterSpecification(spec);

  const window = generateWindow(spec.window, spec.order);
  const ideal = idealImpulseResponse(spec.band, spec.order);
  const coefficients = new Float64Array(spec.order);
  for (let n = 0; n < spec.order; n++) {
    coefficients[n] = ideal[n] * window[n];
  }

  log.debug('design.completed', {
    band: spec.band.type,
    window: spec.window.kind,
    order: spec.order,
  });

  return { coefficients, window, ideal };
}

/**
 * Move an odd order by `delta`, skipping even values in the direction of
 * travel (upwards when delta is 0), then clamp to the limits.
 */
export function stepOrder(
  current: number,
  delta: number,
  limits: OrderLimits = DEFAULT_ORDER_LIMITS,
): number {
  assertOrderLimits(limits);
  if (!Number.isInteger(current) || !Number.isInteger(delta)) {
    throw new InvalidParameterError('order and step must be integers', 'order');
  }
  let next = current + delta;
  if (next % 2 === 0) next += delta !== 0 ? Math.sign(delta) : 1;
  return Math.max(limits.min, Math.min(limits.max, next));
}
