import { describe, it, expect } from 'vitest';
import { createSectionGrid, nearestSectionIndex } from './SectionGrid';
import { InvalidParameterError } from './errors';

describe('createSectionGrid', () => {
  it('places N + 1 samples from 0 to L', () => {
    const grid = createSectionGrid(10, 4);
    expect(grid.x).toEqual([0, 2.5, 5, 7.5, 10]);
    expect(grid.width).toBe(2.5);
    expect(grid.sections).toBe(4);
  });

  it('ends exactly on the beam length', () => {
    const grid = createSectionGrid(3.7, 1000);
    expect(grid.x).toHaveLength(1001);
    expect(grid.x[0]).toBe(0);
    expect(grid.x[1000]).toBe(3.7);
  });

  it('rejects a non-positive length', () => {
    expect(() => createSectionGrid(0, 10)).toThrow(InvalidParameterError);
    expect(() => createSectionGrid(Number.NaN, 10)).toThrow(InvalidParameterError);
  });

  it('rejects fewer than two sections', () => {
    expect(() => createSectionGrid(10, 1)).toThrow('sections: must be an integer of at least 2, got 1');
    expect(() => createSectionGrid(10, 2.5)).toThrow(InvalidParameterError);
  });
});

describe('nearestSectionIndex', () => {
  const grid = createSectionGrid(10, 4);

  it('picks the closest sample', () => {
    expect(nearestSectionIndex(grid, 6.3)).toBe(2);
    expect(nearestSectionIndex(grid, 10)).toBe(4);
  });

  it('prefers the lower index when two samples are equally close', () => {
    expect(nearestSectionIndex(grid, 3.75)).toBe(1);
  });
});
