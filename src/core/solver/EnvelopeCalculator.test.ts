import { describe, it, expect } from 'vitest';
import { calculateEnvelope } from './EnvelopeCalculator';
import type { IShearMomentResult } from '../beam/types';

function result(shear: number[], moment: number[]): IShearMomentResult {
  return {
    x: shear.map((_, i) => i),
    shear,
    moment,
    reactions: [],
    maxShear: Math.max(...shear),
    minShear: Math.min(...shear),
    maxMoment: Math.max(...moment),
    minMoment: Math.min(...moment),
  };
}

describe('calculateEnvelope', () => {
  it('takes min and max per sample', () => {
    const envelope = calculateEnvelope([
      result([1, -2, 0], [0, 5, -1]),
      result([3, -1, -4], [0, 2, 1]),
    ]);

    expect(envelope.x).toEqual([0, 1, 2]);
    expect(envelope.minShear).toEqual([1, -2, -4]);
    expect(envelope.maxShear).toEqual([3, -1, 0]);
    expect(envelope.minMoment).toEqual([0, 2, -1]);
    expect(envelope.maxMoment).toEqual([0, 5, 1]);
  });

  it('does not alias the first result', () => {
    const first = result([1, 2], [3, 4]);
    const envelope = calculateEnvelope([first, result([5, 6], [7, 8])]);
    expect(first.shear).toEqual([1, 2]);
    expect(envelope.maxShear).toEqual([5, 6]);
  });

  it('returns empty arrays without results', () => {
    expect(calculateEnvelope([])).toEqual({ x: [], minShear: [], maxShear: [], minMoment: [], maxMoment: [] });
  });

  it('rejects results on different grids', () => {
    expect(() => calculateEnvelope([result([1, 2], [1, 2]), result([1], [1])])).toThrow(
      'Envelope results must share the same section grid'
    );
  });
});
