// ---------------------------------------------------------------------------
// Window comparison table
// ---------------------------------------------------------------------------
// Side-lobe level, attainable attenuation, passband ripple and the
// transition-width factor Δf·N (Δf as a fraction of fs) for each window.
// Kaiser appears as three presets tuned for 50/70/90 dB.

import type { WindowCharacteristics } from '../types.js';
import { InvalidParameterError } from '../errors.js';

const KAISER_EXPRESSION = 'w[n] = I0(β·√(1 - (2n/M - 1)²)) / I0(β)';

export const WINDOW_CHARACTERISTICS: readonly WindowCharacteristics[] = [
  {
    id: 'rectangular',
    label: 'Rectangular',
    window: { kind: 'rectangular' },
    peakSidelobeDb: -13,
    stopbandAttenuationDb: 21,
    passbandRippleDb: 0.7416,
    transitionFactor: 0.9,
    expression: 'w[n] = 1',
  },
  {
    id: 'bartlett',
    label: 'Bartlett',
    window: { kind: 'bartlett' },
    peakSidelobeDb: -25,
    stopbandAttenuationDb: 25,
    passbandRippleDb: 0.185,
    transitionFactor: 2.3,
    expression: 'w[n] = 2n/M for n ≤ M/2, 2 - 2n/M otherwise',
  },
  {
    id: 'hanning',
    label: 'Hanning',
    window: { kind: 'hanning' },
    peakSidelobeDb: -31,
    stopbandAttenuationDb: 44,
    passbandRippleDb: 0.0546,
    transitionFactor: 3.1,
    expression: 'w[n] = 0.5 - 0.5·cos(2πn/M)',
  },
  {
    id: 'hamming',
    label: 'Hamming',
    window: { kind: 'hamming' },
    peakSidelobeDb: -41,
    stopbandAttenuationDb: 53,
    passbandRippleDb: 0.0194,
    transitionFactor: 3.3,
    expression: 'w[n] = 0.54 - 0.46·cos(2πn/M)',
  },
  {
    id: 'blackman',
    label: 'Blackman',
    window: { kind: 'blackman' },
    peakSidelobeDb: -57,
    stopbandAttenuationDb: 75,
    passbandRippleDb: 0.0017,
    transitionFactor: 5.5,
    expression: 'w[n] = 0.42 - 0.5·cos(2πn/M) + 0.08·cos(4πn/M)',
  },
  {
    id: 'kaiser-4.54',
    label: 'Kaiser (β = 4.54)',
    window: { kind: 'kaiser', beta: 4.54 },
    peakSidelobeDb: undefined,
    stopbandAttenuationDb: 50,
    passbandRippleDb: 0.0274,
    transitionFactor: 2.93,
    expression: KAISER_EXPRESSION,
  },
  {
    id: 'kaiser-6.76',
    label: 'Kaiser (β = 6.76)',
    window: { kind: 'kaiser', beta: 6.76 },
    peakSidelobeDb: undefined,
    stopbandAttenuationDb: 70,
    passbandRippleDb: 0.00275,
    transitionFactor: 4.32,
    expression: KAISER_EXPRESSION,
  },
  {
    id: 'kaiser-8.96',
    label: 'Kaiser (β = 8.96)',
    window: { kind: 'kaiser', beta: 8.96 },
    peakSidelobeDb: undefined,
    stopbandAttenuationDb: 90,
    passbandRippleDb: 0.000275,
    transitionFactor: 5.71,
    expression: KAISER_EXPRESSION,
  },
];

/** Detached copy of a table entry; callers may mutate what they receive. */
function copyEntry(entry: WindowCharacteristics): WindowCharacteristics {
  return { ...entry, window: { ...entry.window } };
}

export function findWindowCharacteristics(id: string): WindowCharacteristics {
  const entry = WINDOW_CHARACTERISTICS.find((w) => w.id === id);
  if (!entry) {
    throw new InvalidParameterError(
      `Unknown window "${id}". Expected one of: ${WINDOW_CHARACTERISTICS.map((w) => w.id).join(', ')}`,
      'windowId',
    );
  }
  return copyEntry(entry);
}

/** Table entries whose attainable attenuation meets `requiredDb`, in table order. */
export function windowsMeetingAttenuation(requiredDb: number): WindowCharacteristics[] {
  return WINDOW_CHARACTERISTICS.filter((w) => w.stopbandAttenuationDb >= requiredDb).map(copyEntry);
}
