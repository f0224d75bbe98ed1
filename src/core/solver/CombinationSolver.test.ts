import { describe, it, expect, beforeEach } from 'vitest';
import {
  assertCombinable,
  evaluateCombinations,
  factorLoads,
  findCriticalCombinations,
  reduceCriticalCombinations,
} from './CombinationSolver';
import { createPointLoad } from '../beam/Load';
import { createSectionGrid } from '../beam/SectionGrid';
import { PreconditionNotMetError } from '../beam/errors';
import { createLoadCombination, generateLoadCombinations } from '../standards/LoadCombinations';
import { ConsoleService } from '../console/ConsoleService';
import type { IBeamSupport } from '../beam/types';

const support: IBeamSupport = { length: 10, cantilever: false, dl: 0, dr: 10 };
const grid = createSectionGrid(10, 10);
const loads = [
  createPointLoad(5, -1, 'D'),
  createPointLoad(5, -1, 'L'),
  createPointLoad(5, 1, 'E'),
];

describe('factorLoads', () => {
  it('scales each load by the factor of its type and zeroes absent types', () => {
    const factored = factorLoads(loads, createLoadCombination(0, 'Check', { D: 2 }));
    const magnitudes = factored.map(load => (load.kind === 'point' ? load.m : Number.NaN));
    expect(magnitudes[0]).toBe(-2);
    expect(magnitudes[1]).toBeCloseTo(0, 15);
    expect(magnitudes[2]).toBeCloseTo(0, 15);
    expect(factored.map(load => load.loadType)).toEqual(['D', 'L', 'E']);
  });
});

describe('findCriticalCombinations', () => {
  beforeEach(() => {
    ConsoleService.clear();
  });

  it('finds the governing LRFD combinations for a midspan load', () => {
    const critical = findCriticalCombinations(support, grid, loads, generateLoadCombinations('LRFD'));

    expect(critical.combinations).toHaveLength(16);

    expect(critical.maxMoment.value).toBeCloseTo(7, 12);
    expect(critical.maxMoment.x).toBe(5);
    expect(critical.maxMoment.combinationIndex).toBe(1);
    expect(critical.maxMoment.combinationName).toBe('LRFD 2: 1.2D + 1.6L + 0.5Lr');

    expect(critical.minMoment.value).toBeCloseTo(-0.25, 12);
    expect(critical.minMoment.x).toBe(5);
    expect(critical.minMoment.combinationIndex).toBe(15);
    expect(critical.minMoment.combinationName).toBe('LRFD 7: 0.9D + 1.0E');

    expect(critical.maxShear.value).toBeCloseTo(1.4, 12);
    expect(critical.maxShear.x).toBe(0);
    expect(critical.maxShear.combinationIndex).toBe(1);

    expect(critical.minShear.value).toBeCloseTo(-1.4, 12);
    expect(critical.minShear.x).toBe(5);
    expect(critical.minShear.combinationIndex).toBe(1);
  });

  it('summarizes each combination', () => {
    const critical = findCriticalCombinations(support, grid, loads, generateLoadCombinations('LRFD'));
    const first = critical.combinations[0];
    expect(first.combination.name).toBe('LRFD 1: 1.4D');
    expect(first.maxMoment).toBeCloseTo(3.5, 12);
    expect(first.maxShear).toBeCloseTo(0.7, 12);
  });

  it('logs the governing moments', () => {
    findCriticalCombinations(support, grid, loads, generateLoadCombinations('LRFD'));
    const entries = ConsoleService.getEntries();
    expect(entries).toHaveLength(1);
    expect(entries[0].type).toBe('info');
    expect(entries[0].content).toMatch(/^Evaluated 16 load combinations: max M 7\.000 \(LRFD 2: 1\.2D \+ 1\.6L \+ 0\.5Lr\)/);
  });

  it('reports the same combinations when run again', () => {
    const combinations = generateLoadCombinations('LRFD');
    const first = findCriticalCombinations(support, grid, loads, combinations);
    const second = findCriticalCombinations(support, grid, loads, combinations);

    const indices = (critical: typeof first) => [
      critical.maxShear.combinationIndex,
      critical.minShear.combinationIndex,
      critical.maxMoment.combinationIndex,
      critical.minMoment.combinationIndex,
    ];
    expect(indices(second)).toEqual(indices(first));
    expect(indices(first)).toEqual([1, 1, 1, 15]);
    expect(second.maxMoment.value).toBe(first.maxMoment.value);
  });

  it('requires a load with a load type', () => {
    const untagged = [createPointLoad(5, -1)];
    expect(() => findCriticalCombinations(support, grid, untagged, generateLoadCombinations('LRFD'))).toThrow(
      PreconditionNotMetError
    );
  });

  it('requires at least one combination', () => {
    expect(() => assertCombinable(loads, [])).toThrow('No load combination applies to the load types present');
  });
});

describe('reduceCriticalCombinations', () => {
  it('keeps the first combination on a tie', () => {
    const a = createLoadCombination(0, 'A', { D: 1 });
    const b = createLoadCombination(1, 'B', { D: 1 });
    const runs = evaluateCombinations(support, grid, loads, [a, b]);
    const critical = reduceCriticalCombinations(runs);

    expect(critical.maxMoment.combinationIndex).toBe(0);
    expect(critical.minShear.combinationIndex).toBe(0);
  });

  it('rejects an empty run list', () => {
    expect(() => reduceCriticalCombinations([])).toThrow('No load combinations to evaluate');
  });
});
