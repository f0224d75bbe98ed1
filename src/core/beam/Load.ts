/**
 * Beam loads: point forces, point moments and linearly varying distributed loads.
 *
 * Each load contributes to shear and moment at every grid sample; the
 * integrator sums contributions (superposition) before resolving reactions.
 */

import type {
  BeamLoad,
  IDistributedLoad,
  ILoadContribution,
  IPointLoad,
  ISectionGrid,
  LoadType,
} from './types';
import { parseBeamLoad } from './schema';
import { cumulativeTrapezoid } from '../math/Integration';

export function createPointLoad(d: number, m: number, loadType: LoadType = 'none'): IPointLoad {
  const load: IPointLoad = { kind: 'point', d, m, effect: 'shear', loadType };
  parseBeamLoad(load);
  return Object.freeze(load);
}

export function createMomentLoad(d: number, m: number, loadType: LoadType = 'none'): IPointLoad {
  const load: IPointLoad = { kind: 'point', d, m, effect: 'moment', loadType };
  parseBeamLoad(load);
  return Object.freeze(load);
}

export function createDistributedLoad(
  dl: number,
  dr: number,
  ml: number,
  mr: number,
  loadType: LoadType = 'none'
): IDistributedLoad {
  const load: IDistributedLoad = { kind: 'distributed', dl, dr, ml, mr, loadType };
  parseBeamLoad(load);
  return Object.freeze(load);
}

/** Locations a load touches, for range checks against the beam */
export function loadLocations(load: BeamLoad): number[] {
  return load.kind === 'point' ? [load.d] : [load.dl, load.dr];
}

/** Copy of a load with its magnitudes multiplied by `factor` */
export function scaleLoad(load: BeamLoad, factor: number): BeamLoad {
  if (load.kind === 'point') {
    return Object.freeze({ ...load, m: load.m * factor });
  }
  return Object.freeze({ ...load, ml: load.ml * factor, mr: load.mr * factor });
}

export interface ILoadStatics {
  force: number;        // Net transverse force
  firstMoment: number;  // Σ force · position about x = 0
  couple: number;       // Applied concentrated moment
}

/** Static resultants of a load, used for reaction equilibrium */
export function loadStatics(load: BeamLoad): ILoadStatics {
  if (load.kind === 'point') {
    if (load.effect === 'moment') {
      return { force: 0, firstMoment: 0, couple: load.m };
    }
    return { force: load.m, firstMoment: load.m * load.d, couple: 0 };
  }

  const { dl, dr, ml, mr } = load;
  const len = dr - dl;
  // Exact integrals of w(x) and x·w(x) for a linear ramp
  const force = (ml + mr) / 2 * len;
  const firstMoment = len * (ml * (2 * dl + dr) + mr * (dl + 2 * dr)) / 6;
  return { force, firstMoment, couple: 0 };
}

/**
 * Total magnitude and centroid of a distributed load. The centroid of a
 * self-balancing ramp (ml = -mr) falls back to the load midpoint.
 */
export function distributedLoadResultant(load: IDistributedLoad): { magnitude: number; centroid: number } {
  const { force, firstMoment } = loadStatics(load);
  const centroid = force !== 0 ? firstMoment / force : (load.dl + load.dr) / 2;
  return { magnitude: force, centroid };
}

function pointLoadContribution(load: IPointLoad, grid: ISectionGrid): ILoadContribution {
  const n = grid.x.length;
  const shear = new Array<number>(n).fill(0);
  const moment = new Array<number>(n).fill(0);

  for (let i = 0; i < n; i++) {
    const x = grid.x[i];
    if (x < load.d) continue;

    if (load.effect === 'shear') {
      shear[i] = load.m;
      moment[i] = load.m * (x - load.d);
    } else {
      moment[i] = load.m;
    }
  }

  return { shear, moment };
}

function distributedLoadContribution(load: IDistributedLoad, grid: ISectionGrid): ILoadContribution {
  const n = grid.x.length;
  const shear = new Array<number>(n).fill(0);
  const len = load.dr - load.dl;

  if (len === 0) {
    return { shear, moment: new Array<number>(n).fill(0) };
  }

  const total = (load.ml + load.mr) / 2 * len;
  for (let i = 0; i < n; i++) {
    const x = grid.x[i];
    if (x >= load.dl && x <= load.dr) {
      const s = x - load.dl;
      shear[i] = load.ml * s + s * s * (load.mr - load.ml) / (2 * len);
    } else if (x > load.dr) {
      shear[i] = total;
    }
  }

  return { shear, moment: cumulativeTrapezoid(shear, grid.width) };
}

/** Unreacted shear/moment contribution of one load at every grid sample */
export function loadContribution(load: BeamLoad, grid: ISectionGrid): ILoadContribution {
  switch (load.kind) {
    case 'point':
      return pointLoadContribution(load, grid);
    case 'distributed':
      return distributedLoadContribution(load, grid);
  }
}
