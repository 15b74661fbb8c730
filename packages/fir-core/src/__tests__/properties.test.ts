/**
 * Property-based tests for design invariants.
 */

import { describe, test, expect } from 'vitest'
import fc from 'fast-check'
import { generateWindow } from '../windows/window-functions.js'
import { idealImpulseResponse } from '../ideal/ideal-response.js'
import { estimateKaiserOrder } from '../kaiser/kaiser-order.js'
import { designWindowedFilter } from '../design/windowed-design.js'
import { evaluateFrequencyResponse } from '../response/frequency-response.js'
import { analyzeMetrics } from '../metrics/filter-metrics.js'
import type { FilterBand, WindowSpec } from '../types.js'

// ─── Arbitrary Generators ──────────────────────────────────────────────────

const oddLength = fc.integer({ min: 0, max: 100 }).map((k) => 2 * k + 1)

const cutoff = fc.double({ min: 0.02, max: 0.98, noNaN: true })

const band: fc.Arbitrary<FilterBand> = fc.oneof(
  cutoff.map((c): FilterBand => ({ type: 'lowpass', cutoff: c })),
  cutoff.map((c): FilterBand => ({ type: 'highpass', cutoff: c })),
  fc
    .tuple(fc.double({ min: 0.02, max: 0.48, noNaN: true }), fc.double({ min: 0.52, max: 0.98, noNaN: true }))
    .map(([lo, hi]): FilterBand => ({ type: 'bandpass', cutoffs: [lo, hi] })),
  fc
    .tuple(fc.double({ min: 0.02, max: 0.48, noNaN: true }), fc.double({ min: 0.52, max: 0.98, noNaN: true }))
    .map(([lo, hi]): FilterBand => ({ type: 'bandstop', cutoffs: [lo, hi] })),
)

const window: fc.Arbitrary<WindowSpec> = fc.oneof(
  fc.constantFrom<WindowSpec>(
    { kind: 'rectangular' },
    { kind: 'bartlett' },
    { kind: 'hanning' },
    { kind: 'hamming' },
    { kind: 'blackman' },
  ),
  fc.double({ min: 0, max: 15, noNaN: true }).map((beta): WindowSpec => ({ kind: 'kaiser', beta })),
)

// ─── Property Tests ────────────────────────────────────────────────────────

describe('Property: windows', () => {
  test('every window has length N and values in [0, 1]', () => {
    fc.assert(
      fc.property(window, fc.integer({ min: 1, max: 201 }), (w, N) => {
        const values = generateWindow(w, N)
        if (values.length !== N) return false
        return values.every((v) => v >= 0 && v <= 1)
      }),
      { numRuns: 200 },
    )
  })
})

describe('Property: ideal responses', () => {
  test('odd lengths give symmetric taps', () => {
    fc.assert(
      fc.property(band, oddLength, (b, N) => {
        const h = idealImpulseResponse(b, N)
        for (let n = 0; n < N; n++) {
          if (Math.abs(h[n] - h[N - 1 - n]) > 1e-9) return false
        }
        return true
      }),
      { numRuns: 200 },
    )
  })

  test('lowpass centre tap equals the cutoff', () => {
    fc.assert(
      fc.property(cutoff, oddLength, (c, N) => {
        const h = idealImpulseResponse({ type: 'lowpass', cutoff: c }, N)
        return Math.abs(h[(N - 1) / 2] - c) < 1e-9
      }),
    )
  })

  test('highpass and lowpass sum to a centred unit impulse', () => {
    fc.assert(
      fc.property(cutoff, oddLength, (c, N) => {
        const lp = idealImpulseResponse({ type: 'lowpass', cutoff: c }, N)
        const hp = idealImpulseResponse({ type: 'highpass', cutoff: c }, N)
        const centre = (N - 1) / 2
        for (let n = 0; n < N; n++) {
          const expected = n === centre ? 1 : 0
          if (Math.abs(lp[n] + hp[n] - expected) > 1e-12) return false
        }
        return true
      }),
    )
  })
})

describe('Property: Kaiser estimate', () => {
  test('a tighter δ never lowers the order', () => {
    fc.assert(
      fc.property(
        fc.double({ min: 1e-6, max: 0.3, noNaN: true }),
        fc.double({ min: 1e-6, max: 0.3, noNaN: true }),
        fc.double({ min: 0.05, max: 1.5, noNaN: true }),
        fc.double({ min: 0.05, max: 1.5, noNaN: true }),
        (d1, d2, wp, gap) => {
          const limits = { min: 1, max: 100001 }
          const spec = { passbandEdge: wp, stopbandEdge: wp + gap }
          const loose = estimateKaiserOrder({ ...spec, delta: Math.max(d1, d2) }, limits)
          const tight = estimateKaiserOrder({ ...spec, delta: Math.min(d1, d2) }, limits)
          return tight.order >= loose.order && tight.beta >= loose.beta
        },
      ),
      { numRuns: 200 },
    )
  })

  test('the order is always odd', () => {
    fc.assert(
      fc.property(
        fc.double({ min: 1e-6, max: 0.3, noNaN: true }),
        fc.double({ min: 0.05, max: 1.5, noNaN: true }),
        fc.double({ min: 0.05, max: 1.5, noNaN: true }),
        (delta, wp, gap) =>
          estimateKaiserOrder({ delta, passbandEdge: wp, stopbandEdge: wp + gap }, { min: 1, max: 100001 })
            .order % 2 === 1,
      ),
    )
  })
})

describe('Property: designs', () => {
  test('identical specifications give identical taps', () => {
    fc.assert(
      fc.property(band, oddLength, window, (b, N, w) => {
        const spec = { band: b, order: N, window: w }
        const a = designWindowedFilter(spec).coefficients
        const c = designWindowedFilter(spec).coefficients
        return a.every((v, i) => v === c[i])
      }),
      { numRuns: 50 },
    )
  })

  test('lowpass passband edge lies below the stopband edge', () => {
    const tapered = fc.oneof(
      fc.constantFrom<WindowSpec>({ kind: 'hanning' }, { kind: 'hamming' }, { kind: 'blackman' }),
      fc.constant<WindowSpec>({ kind: 'kaiser', beta: 5 }),
    )
    fc.assert(
      fc.property(
        tapered,
        fc.integer({ min: 10, max: 50 }).map((k) => 2 * k + 1),
        fc.double({ min: 0.1, max: 0.7, noNaN: true }),
        (w, N, c) => {
          const { coefficients } = designWindowedFilter({ band: { type: 'lowpass', cutoff: c }, order: N, window: w })
          const m = analyzeMetrics(evaluateFrequencyResponse(coefficients, 512), c)
          if (m.minStopbandAttenuationDb < 20) return true
          if (m.passbandEdge === undefined || m.stopbandEdge === undefined) return true
          return m.passbandEdge < m.stopbandEdge
        },
      ),
      { numRuns: 40 },
    )
  })

  test('designs are Type I', () => {
    fc.assert(
      fc.property(band, oddLength, window, (b, N, w) => {
        const { coefficients } = designWindowedFilter({ band: b, order: N, window: w })
        return analyzeMetrics(evaluateFrequencyResponse(coefficients, 16), 0.5).phaseType === 'I'
      }),
      { numRuns: 50 },
    )
  })
})
