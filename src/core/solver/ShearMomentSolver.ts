import type {
  BeamLoad,
  IBeamSupport,
  IPointLoad,
  IReaction,
  ISectionGrid,
  IShearMomentResult,
} from '../beam/types';
import { loadContribution, loadStatics } from '../beam/Load';
import { addInto, findExtremes } from '../math/Integration';

/**
 * Support reactions from equilibrium of the total applied load.
 *
 * With F = Σ forces, S = Σ force·x and C = Σ couples, shear and moment
 * beyond the last support must vanish:
 *   simply supported:  Rl + Rr = -F,  Rl·dl + Rr·dr = C - S
 *   cantilever (xf):   R = -F,        Mr = S - C - F·xf
 */
export function resolveReactions(support: IBeamSupport, loads: readonly BeamLoad[]): IReaction[] {
  let F = 0;
  let S = 0;
  let C = 0;
  for (const load of loads) {
    const statics = loadStatics(load);
    F += statics.force;
    S += statics.firstMoment;
    C += statics.couple;
  }

  if (support.cantilever) {
    const xf = support.dl;
    return [{ x: xf, force: -F, moment: S - C - F * xf }];
  }

  const span = support.dr - support.dl;
  const Rr = (C - S + F * support.dl) / span;
  const Rl = -F - Rr;
  return [
    { x: support.dl, force: Rl, moment: 0 },
    { x: support.dr, force: Rr, moment: 0 },
  ];
}

/** Reactions expressed as point loads so they superpose like any other load */
export function reactionLoads(reactions: IReaction[]): IPointLoad[] {
  const loads: IPointLoad[] = [];
  for (const r of reactions) {
    loads.push({ kind: 'point', d: r.x, m: r.force, effect: 'shear', loadType: 'none' });
    if (r.moment !== 0) {
      loads.push({ kind: 'point', d: r.x, m: r.moment, effect: 'moment', loadType: 'none' });
    }
  }
  return loads;
}

/**
 * Shear and moment at every grid sample.
 *
 * Loads are summed in insertion order, then reactions are added. Point
 * loads are right-continuous: the jump shows at the sample the load sits on.
 */
export function solveShearMoment(
  support: IBeamSupport,
  grid: ISectionGrid,
  loads: readonly BeamLoad[]
): IShearMomentResult {
  const n = grid.x.length;
  const shear = new Array<number>(n).fill(0);
  const moment = new Array<number>(n).fill(0);

  for (const load of loads) {
    const contribution = loadContribution(load, grid);
    addInto(shear, contribution.shear);
    addInto(moment, contribution.moment);
  }

  const reactions = resolveReactions(support, loads);
  for (const load of reactionLoads(reactions)) {
    const contribution = loadContribution(load, grid);
    addInto(shear, contribution.shear);
    addInto(moment, contribution.moment);
  }

  const V = findExtremes(shear);
  const M = findExtremes(moment);

  return {
    x: [...grid.x],
    shear,
    moment,
    reactions,
    maxShear: V.max,
    minShear: V.min,
    maxMoment: M.max,
    minMoment: M.min,
  };
}
