// ---------------------------------------------------------------------------
// Design from Hz tolerances and a tabulated window
// ---------------------------------------------------------------------------
// Stopband edge sits one transition width beyond the passband edge; the
// cutoff is the midpoint. Length comes from the window's transition factor
// (N = factor / (Δf/fs)) or, for Kaiser presets, from Kaiser's formula.

import { TOLERANCE_ORDER_LIMITS, type OrderLimits } from '@fir-workbench/config';
import type { FilterSpecification, ToleranceDesign, ToleranceSpecification } from '../types.js';
import { InvalidParameterError, InvalidSpecificationError } from '../errors.js';
import { findWindowCharacteristics } from '../windows/characteristics.js';
import { kaiserRawOrder, toOdd } from '../kaiser/kaiser-order.js';
import { designWindowedFilter } from './windowed-design.js';

function assertPositive(value: number, field: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidParameterError(`${field} must be positive, got ${value}`, field);
  }
}

export function designFromTolerances(
  spec: ToleranceSpecification,
  limits: OrderLimits = TOLERANCE_ORDER_LIMITS,
): ToleranceDesign {
  const { sampleRate, passbandEdgeHz, transitionWidthHz, attenuationDb } = spec;
  assertPositive(sampleRate, 'sampleRate');
  assertPositive(transitionWidthHz, 'transitionWidthHz');
  assertPositive(attenuationDb, 'attenuationDb');

  const nyquist = sampleRate / 2;
  if (!Number.isFinite(passbandEdgeHz) || passbandEdgeHz <= 0 || passbandEdgeHz >= nyquist) {
    throw new InvalidSpecificationError(
      `Passband edge must lie in (0, ${nyquist}) Hz, got ${passbandEdgeHz}`,
      'passbandEdgeHz',
    );
  }

  const stopbandEdgeHz =
    spec.type === 'lowpass' ? passbandEdgeHz + transitionWidthHz : passbandEdgeHz - transitionWidthHz;
  if (stopbandEdgeHz <= 0 || stopbandEdgeHz >= nyquist) {
    throw new InvalidSpecificationError(
      `Stopband edge ${stopbandEdgeHz} Hz falls outside (0, ${nyquist}) Hz`,
      'transitionWidthHz',
    );
  }

  const characteristics = findWindowCharacteristics(spec.windowId);
  if (characteristics.stopbandAttenuationDb < attenuationDb) {
    throw new InvalidSpecificationError(
      `${characteristics.label} reaches ${characteristics.stopbandAttenuationDb} dB, ${attenuationDb} dB required`,
      'windowId',
    );
  }

  const normalizedTransition = transitionWidthHz / sampleRate;
  const rawOrder =
    characteristics.window.kind === 'kaiser'
      ? kaiserRawOrder(attenuationDb, 2 * Math.PI * normalizedTransition)
      : Math.ceil(characteristics.transitionFactor / normalizedTransition);
  const order = Math.max(limits.min, Math.min(limits.max, toOdd(rawOrder)));

  const cutoffHz = (passbandEdgeHz + stopbandEdgeHz) / 2;
  const specification: FilterSpecification = {
    band: { type: spec.type, cutoff: cutoffHz / nyquist },
    order,
    window: { ...characteristics.window },
  };

  return {
    ...designWindowedFilter(specification),
    specification,
    stopbandEdgeHz,
    cutoffHz,
    normalizedTransition,
    characteristics,
  };
}
