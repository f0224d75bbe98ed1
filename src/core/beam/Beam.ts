/**
 * Straight prismatic beam: simply supported (two supports, overhangs allowed)
 * or cantilever (one fixed end at x = 0 or x = L).
 *
 * Usage: construct, add all loads, then calculate. Every calculation
 * recomputes from the current load list; loads must not change while one runs.
 */

import type {
  AnalysisMethod,
  BeamLoad,
  DeflectionMethod,
  IBeamOptions,
  IBeamSupport,
  ICriticalCombinations,
  IDeflectionResult,
  IEnvelopeResult,
  ILoadCombination,
  ISectionGrid,
  IShearMomentResult,
  LoadType,
} from './types';
import { BeamAnalysisError, InvalidParameterError, LoadOutOfBoundsError } from './errors';
import { parseBeamLoad, parseBeamOptions } from './schema';
import { createSectionGrid, nearestSectionIndex } from './SectionGrid';
import { createDistributedLoad, createMomentLoad, createPointLoad, loadLocations } from './Load';
import { solveShearMoment } from '../solver/ShearMomentSolver';
import { type DeflectionBoundary, solveDeflection } from '../solver/DeflectionSolver';
import {
  assertCombinable,
  evaluateCombinations,
  findCriticalCombinations,
} from '../solver/CombinationSolver';
import { calculateEnvelope } from '../solver/EnvelopeCalculator';
import { getApplicableCombinations } from '../standards/LoadCombinations';
import { ConsoleService } from '../console/ConsoleService';

export const DEFAULT_BEAM_SETTINGS: {
  cantilever: boolean;
  analysisMethod: AnalysisMethod;
  sections: number;
  rotDelta: number;
  deflectionMethod: DeflectionMethod;
} = {
  cantilever: false,
  analysisMethod: 'LRFD',
  sections: 1000,
  rotDelta: 0.0001,
  deflectionMethod: 'direct',
};

/** Run `action`, recording engine errors in the console before rethrowing */
function logged<T>(action: () => T): T {
  try {
    return action();
  } catch (err) {
    if (err instanceof BeamAnalysisError) {
      ConsoleService.error(err.message);
    }
    throw err;
  }
}

export class Beam implements IBeamSupport {
  readonly length: number;
  readonly ei: number;
  readonly cantilever: boolean;
  readonly dl: number;
  readonly dr: number;
  readonly analysisMethod: AnalysisMethod;
  readonly sections: number;
  readonly rotDelta: number;
  readonly deflectionMethod: DeflectionMethod;
  readonly grid: ISectionGrid;
  readonly supportIndexL: number;
  readonly supportIndexR: number;
  private readonly loadList: BeamLoad[] = [];

  constructor(options: IBeamOptions) {
    const parsed = logged(() => parseBeamOptions(options));

    this.length = parsed.length;
    this.ei = parsed.ei;
    this.cantilever = parsed.cantilever ?? DEFAULT_BEAM_SETTINGS.cantilever;
    this.analysisMethod = parsed.analysisMethod ?? DEFAULT_BEAM_SETTINGS.analysisMethod;
    this.sections = parsed.sections ?? DEFAULT_BEAM_SETTINGS.sections;
    this.rotDelta = parsed.rotDelta ?? DEFAULT_BEAM_SETTINGS.rotDelta;
    this.deflectionMethod = parsed.deflectionMethod ?? DEFAULT_BEAM_SETTINGS.deflectionMethod;

    if (this.cantilever) {
      const fixed = parsed.dl ?? parsed.dr ?? 0;
      this.dl = fixed;
      this.dr = fixed;
    } else {
      this.dl = parsed.dl ?? 0;
      this.dr = parsed.dr ?? this.length;
    }

    this.grid = createSectionGrid(this.length, this.sections);
    this.supportIndexL = nearestSectionIndex(this.grid, this.dl);
    this.supportIndexR = nearestSectionIndex(this.grid, this.dr);

    if (!this.cantilever && this.supportIndexL === this.supportIndexR) {
      const error = new InvalidParameterError([
        `dr: supports at ${this.dl} and ${this.dr} fall on the same section, increase sections`,
      ]);
      ConsoleService.error(error.message);
      throw error;
    }
  }

  get loads(): readonly BeamLoad[] {
    return this.loadList;
  }

  /** Append a load; rejected loads leave the beam unchanged */
  addLoad(load: BeamLoad): BeamLoad {
    this.assertOnBeam(loadLocations(load));
    const parsed = logged(() => parseBeamLoad(load));

    const stored = Object.freeze(parsed);
    this.loadList.push(stored);
    return stored;
  }

  addPointLoad(d: number, m: number, loadType: LoadType = 'none'): BeamLoad {
    this.assertOnBeam([d]);
    return this.addLoad(logged(() => createPointLoad(d, m, loadType)));
  }

  addMomentLoad(d: number, m: number, loadType: LoadType = 'none'): BeamLoad {
    this.assertOnBeam([d]);
    return this.addLoad(logged(() => createMomentLoad(d, m, loadType)));
  }

  addDistributedLoad(dl: number, dr: number, ml: number, mr: number, loadType: LoadType = 'none'): BeamLoad {
    this.assertOnBeam([dl, dr]);
    return this.addLoad(logged(() => createDistributedLoad(dl, dr, ml, mr, loadType)));
  }

  /** Range check against [0, L], ahead of the load factories' own validation */
  private assertOnBeam(locations: number[]): void {
    for (const location of locations) {
      if (location < 0 || location > this.length) {
        const error = new LoadOutOfBoundsError(location, this.length);
        ConsoleService.error(error.message);
        throw error;
      }
    }
  }

  calculateShearMoment(): IShearMomentResult {
    const result = solveShearMoment(this, this.grid, this.loadList);
    ConsoleService.info(
      `Shear/moment: ${this.loadList.length} loads, ${this.sections} sections, ` +
      `V [${result.minShear.toPrecision(4)}, ${result.maxShear.toPrecision(4)}], ` +
      `M [${result.minMoment.toPrecision(4)}, ${result.maxMoment.toPrecision(4)}]`
    );
    return result;
  }

  /** Runs the shear/moment calculation first, then integrates the moment */
  calculateDeflection(): IDeflectionResult {
    const shearMoment = this.calculateShearMoment();
    const moment = [...shearMoment.moment];

    // A fixed end on the last sample carries the reaction couple and any
    // couple applied at x = L; integrate with the moment just left of it.
    if (this.cantilever && this.supportIndexL === this.grid.sections) {
      let endCouple = shearMoment.reactions[0].moment;
      for (const load of this.loadList) {
        if (load.kind === 'point' && load.effect === 'moment' && load.d === this.length) {
          endCouple += load.m;
        }
      }
      moment[moment.length - 1] -= endCouple;
    }

    const boundary: DeflectionBoundary = this.cantilever
      ? { kind: 'fixed', index: this.supportIndexL }
      : { kind: 'simple', left: this.supportIndexL, right: this.supportIndexR };

    const result = solveDeflection({
      grid: this.grid,
      moment,
      ei: this.ei,
      boundary,
      method: this.deflectionMethod,
      rotDelta: this.rotDelta,
    });

    ConsoleService.info(
      `Deflection (${this.deflectionMethod}): ` +
      `y [${result.minDeflection.toPrecision(4)}, ${result.maxDeflection.toPrecision(4)}]`
    );
    return result;
  }

  /** Load types carried by at least one load, excluding 'none' */
  getLoadTypes(): Set<LoadType> {
    return new Set(this.loadList.map(load => load.loadType).filter(t => t !== 'none'));
  }

  /** Code-table combinations that reference a load type present on the beam */
  getLoadCombinations(): ILoadCombination[] {
    return getApplicableCombinations(this.analysisMethod, this.getLoadTypes());
  }

  findCriticalCombinations(combinations?: ILoadCombination[]): ICriticalCombinations {
    const list = combinations ?? this.getLoadCombinations();
    return logged(() => findCriticalCombinations(this, this.grid, this.loadList, list));
  }

  calculateEnvelope(combinations?: ILoadCombination[]): IEnvelopeResult {
    const list = combinations ?? this.getLoadCombinations();
    logged(() => assertCombinable(this.loadList, list));
    const runs = evaluateCombinations(this, this.grid, this.loadList, list);
    return calculateEnvelope(runs.map(run => run.result));
  }
}
