/**
 * Load Combination Evaluator
 *
 * Runs the shear/moment integrator once per factored combination and reduces
 * the results to the governing extremes. Each load is multiplied by the
 * factor of its category; categories absent from a combination contribute 0.
 */

import type {
  BeamLoad,
  IBeamSupport,
  ICombinationSummary,
  ICriticalCombinations,
  ICriticalValue,
  ILoadCombination,
  ISectionGrid,
  IShearMomentResult,
} from '../beam/types';
import { scaleLoad } from '../beam/Load';
import { PreconditionNotMetError } from '../beam/errors';
import { findExtremes } from '../math/Integration';
import { solveShearMoment } from './ShearMomentSolver';
import { ConsoleService } from '../console/ConsoleService';

export interface ICombinationRun {
  combination: ILoadCombination;
  result: IShearMomentResult;
}

export function factorLoads(loads: readonly BeamLoad[], combination: ILoadCombination): BeamLoad[] {
  return loads.map(load => scaleLoad(load, combination.factors.get(load.loadType) ?? 0));
}

export function evaluateCombinations(
  support: IBeamSupport,
  grid: ISectionGrid,
  loads: readonly BeamLoad[],
  combinations: ILoadCombination[]
): ICombinationRun[] {
  return combinations.map(combination => ({
    combination,
    result: solveShearMoment(support, grid, factorLoads(loads, combination)),
  }));
}

function critical(value: number, x: number, combination: ILoadCombination): ICriticalValue {
  return {
    value,
    x,
    combinationIndex: combination.index,
    combinationName: combination.name,
  };
}

/**
 * Governing max/min shear and moment across runs. Ties keep the first
 * combination in run order, and within a combination the first sample.
 */
export function reduceCriticalCombinations(runs: ICombinationRun[]): ICriticalCombinations {
  let maxShear: ICriticalValue | undefined;
  let minShear: ICriticalValue | undefined;
  let maxMoment: ICriticalValue | undefined;
  let minMoment: ICriticalValue | undefined;
  const combinations: ICombinationSummary[] = [];

  for (const { combination, result } of runs) {
    const V = findExtremes(result.shear);
    const M = findExtremes(result.moment);

    if (!maxShear || V.max > maxShear.value) maxShear = critical(V.max, result.x[V.maxIndex], combination);
    if (!minShear || V.min < minShear.value) minShear = critical(V.min, result.x[V.minIndex], combination);
    if (!maxMoment || M.max > maxMoment.value) maxMoment = critical(M.max, result.x[M.maxIndex], combination);
    if (!minMoment || M.min < minMoment.value) minMoment = critical(M.min, result.x[M.minIndex], combination);

    combinations.push({
      combination,
      maxShear: V.max,
      minShear: V.min,
      maxMoment: M.max,
      minMoment: M.min,
    });
  }

  if (!maxShear || !minShear || !maxMoment || !minMoment) {
    throw new PreconditionNotMetError('No load combinations to evaluate');
  }

  return { maxShear, minShear, maxMoment, minMoment, combinations };
}

export function assertCombinable(loads: readonly BeamLoad[], combinations: ILoadCombination[]): void {
  if (!loads.some(load => load.loadType !== 'none')) {
    throw new PreconditionNotMetError('Load combinations need at least one load with a load type');
  }
  if (combinations.length === 0) {
    throw new PreconditionNotMetError('No load combination applies to the load types present');
  }
}

export function findCriticalCombinations(
  support: IBeamSupport,
  grid: ISectionGrid,
  loads: readonly BeamLoad[],
  combinations: ILoadCombination[]
): ICriticalCombinations {
  assertCombinable(loads, combinations);
  const governing = reduceCriticalCombinations(evaluateCombinations(support, grid, loads, combinations));

  ConsoleService.info(
    `Evaluated ${combinations.length} load combinations: ` +
    `max M ${governing.maxMoment.value.toPrecision(4)} (${governing.maxMoment.combinationName}), ` +
    `min M ${governing.minMoment.value.toPrecision(4)} (${governing.minMoment.combinationName})`
  );

  return governing;
}
