import { describe, it, expect } from 'vitest';
import { parseBeamLoad, parseBeamOptions } from './schema';
import { BeamAnalysisError, InvalidParameterError } from './errors';

function issuesOf(action: () => unknown): string[] {
  try {
    action();
  } catch (err) {
    if (err instanceof InvalidParameterError) return err.issues;
    throw err;
  }
  throw new Error('expected an InvalidParameterError');
}

describe('parseBeamOptions', () => {
  it('accepts a minimal simply supported beam', () => {
    expect(parseBeamOptions({ length: 10, ei: 1000 })).toEqual({ length: 10, ei: 1000 });
  });

  it('rejects a non-positive length', () => {
    expect(issuesOf(() => parseBeamOptions({ length: -1, ei: 1000 }))).toEqual([
      'length: Number must be greater than 0',
    ]);
  });

  it('rejects supports in the wrong order', () => {
    expect(issuesOf(() => parseBeamOptions({ length: 10, ei: 1, dl: 6, dr: 4 }))).toEqual([
      'dl: left support must be before right support',
    ]);
  });

  it('rejects supports off the beam', () => {
    expect(issuesOf(() => parseBeamOptions({ length: 10, ei: 1, dr: 12 }))).toEqual([
      'dr: must lie within [0, 10]',
    ]);
  });

  it('rejects a cantilever with two different fixed ends', () => {
    expect(issuesOf(() => parseBeamOptions({ length: 10, ei: 1, cantilever: true, dl: 0, dr: 10 }))).toEqual([
      'dr: cantilever needs a single fixed end (dl must equal dr)',
    ]);
  });

  it('rejects a cantilever fixed inside the span', () => {
    expect(issuesOf(() => parseBeamOptions({ length: 10, ei: 1, cantilever: true, dl: 3 }))).toEqual([
      'dl: cantilever fixed end must be at 0 or 10',
    ]);
  });
});

describe('parseBeamLoad', () => {
  it('accepts a point load', () => {
    const load = { kind: 'point', d: 1, m: -2, effect: 'shear', loadType: 'D' };
    expect(parseBeamLoad(load)).toEqual(load);
  });

  it('rejects a distributed load that ends before it starts', () => {
    const load = { kind: 'distributed', dl: 3, dr: 1, ml: 0, mr: 0, loadType: 'D' };
    expect(issuesOf(() => parseBeamLoad(load))).toEqual(['dr: load end must not be before load start']);
  });

  it('rejects an unknown load type', () => {
    const load = { kind: 'point', d: 1, m: 1, effect: 'shear', loadType: 'X' };
    expect(() => parseBeamLoad(load)).toThrow(InvalidParameterError);
  });
});

describe('errors', () => {
  it('joins issues into the message and keeps the code', () => {
    const error = new InvalidParameterError(['a', 'b']);
    expect(error.message).toBe('Invalid parameter: a; b');
    expect(error.code).toBe('INVALID_PARAMETER');
    expect(error).toBeInstanceOf(BeamAnalysisError);
    expect(error).toBeInstanceOf(Error);
  });
});
