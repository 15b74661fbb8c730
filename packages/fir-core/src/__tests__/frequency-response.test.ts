// ---------------------------------------------------------------------------
// Frequency response tests
// ---------------------------------------------------------------------------
import { describe, it, expect } from 'vitest';
import {
  evaluateFrequencyResponse,
  magnitude,
  magnitudeDb,
  unwrap,
  unwrappedPhase,
  compensatedPhase,
} from '../response/frequency-response.js';
import { InvalidParameterError } from '../errors.js';

describe('evaluateFrequencyResponse', () => {
  it('spans [0, π] inclusive', () => {
    const r = evaluateFrequencyResponse([1], 5);
    expect(r.omega[0]).toBe(0);
    expect(r.omega[2]).toBeCloseTo(Math.PI / 2, 15);
    expect(r.omega[4]).toBe(Math.PI);
    expect(Array.from(r.frequencies)).toEqual(Array.from(r.omega));
    expect(r.sampleRate).toBeUndefined();
  });

  it('maps the grid to [0, fs/2] when a sample rate is given', () => {
    const r = evaluateFrequencyResponse([1], 5, 1000);
    expect(r.frequencies[0]).toBe(0);
    expect(r.frequencies[1]).toBeCloseTo(125, 10);
    expect(r.frequencies[3]).toBeCloseTo(375, 10);
    expect(r.frequencies[4]).toBe(500);
    expect(r.sampleRate).toBe(1000);
  });

  it('a unit impulse has unit gain everywhere', () => {
    const r = evaluateFrequencyResponse([1], 16);
    for (let k = 0; k < 16; k++) {
      expect(r.real[k]).toBe(1);
      expect(r.imag[k]).toBeCloseTo(0, 15);
    }
    for (const db of magnitudeDb(r)) expect(db).toBeCloseTo(0, 6);
  });

  it('a one-sample delay rotates by -ω', () => {
    const r = evaluateFrequencyResponse([0, 1], 3);
    expect(r.real[2]).toBe(-1);
    expect(r.imag[1]).toBeCloseTo(-1, 15);
    for (const m of magnitude(r)) expect(m).toBeCloseTo(1, 14);
  });

  it('DC gain is the tap sum and a [1 2 1]/4 filter nulls Nyquist', () => {
    const r = evaluateFrequencyResponse([0.25, 0.5, 0.25], 9);
    expect(r.real[0]).toBe(1);
    const db = magnitudeDb(r);
    expect(db[8]).toBeCloseTo(-200, 3);
  });

  it('keeps a copy of the taps', () => {
    const taps = [0.1, 0.2, 0.1];
    const r = evaluateFrequencyResponse(taps, 4);
    taps[0] = 9;
    expect(Array.from(r.taps)).toEqual([0.1, 0.2, 0.1]);
  });

  it('rejects empty or non-finite taps', () => {
    expect(() => evaluateFrequencyResponse([], 8)).toThrow(InvalidParameterError);
    expect(() => evaluateFrequencyResponse([1, Number.NaN], 8)).toThrow(/Coefficient 1/);
  });

  it('rejects grids smaller than two points', () => {
    expect(() => evaluateFrequencyResponse([1], 1)).toThrow(InvalidParameterError);
    expect(() => evaluateFrequencyResponse([1], 2.5)).toThrow(InvalidParameterError);
  });

  it('rejects non-positive sample rates', () => {
    expect(() => evaluateFrequencyResponse([1], 8, 0)).toThrow(/sampleRate/);
    expect(() => evaluateFrequencyResponse([1], 8, -48000)).toThrow(InvalidParameterError);
  });
});

describe('phase', () => {
  it('unwraps a 2π jump', () => {
    const out = unwrap(new Float64Array([3, -3]));
    expect(out[0]).toBe(3);
    expect(out[1]).toBeCloseTo(-3 + 2 * Math.PI, 12);
  });

  it('leaves smooth phase untouched', () => {
    expect(Array.from(unwrap(new Float64Array([0, -1, -2, -3])))).toEqual([0, -1, -2, -3]);
  });

  it('symmetric taps have phase -αω', () => {
    const r = evaluateFrequencyResponse([0.25, 0.5, 0.25], 9);
    const phase = unwrappedPhase(r);
    const flat = compensatedPhase(r);
    for (let k = 0; k < 8; k++) {
      expect(phase[k]).toBeCloseTo(-r.omega[k], 9);
      expect(flat[k]).toBeCloseTo(0, 9);
    }
  });
});
