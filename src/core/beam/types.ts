/**
 * Beam model types
 *
 * Sign conventions:
 * - Load magnitudes are positive upward; gravity loads are negative
 * - V(x) is the running sum of forces from the left end (V = dM/dx)
 * - M positive: sagging (tension in bottom fiber)
 * - Deflection positive upward, rotation positive counter-clockwise
 */

/** Load category tags used by the load combination table */
export type LoadType = 'D' | 'L' | 'Lr' | 'S' | 'R' | 'W' | 'E' | 'none';

export type AnalysisMethod = 'LRFD' | 'ASD';

export type DeflectionMethod = 'direct' | 'shooting';

export interface IPointLoad {
  kind: 'point';
  d: number;                   // Location from left end
  m: number;                   // Force (effect 'shear') or couple (effect 'moment')
  effect: 'shear' | 'moment';
  loadType: LoadType;
}

export interface IDistributedLoad {
  kind: 'distributed';
  dl: number;   // Start location
  dr: number;   // End location
  ml: number;   // Intensity at start
  mr: number;   // Intensity at end (ml === mr → uniform)
  loadType: LoadType;
}

export type BeamLoad = IPointLoad | IDistributedLoad;

export interface IBeamOptions {
  length: number;
  ei: number;                // Flexural rigidity, consistent with length/load units
  cantilever?: boolean;
  dl?: number;               // Left support (cantilever: fixed end)
  dr?: number;               // Right support (cantilever: fixed end)
  analysisMethod?: AnalysisMethod;
  sections?: number;         // Number of integration sections N
  rotDelta?: number;         // Shooting perturbation, multiplier of 1/EI
  deflectionMethod?: DeflectionMethod;
}

/** Support layout consumed by the shear/moment integrator */
export interface IBeamSupport {
  length: number;
  cantilever: boolean;
  dl: number;
  dr: number;
}

export interface ISectionGrid {
  sections: number;
  width: number;   // Width of one section, L / N
  x: number[];     // N + 1 sample locations
}

export interface ILoadContribution {
  shear: number[];
  moment: number[];
}

export interface IReaction {
  x: number;
  force: number;
  moment: number;   // Reaction couple (cantilever fixed end only)
}

export interface IShearMomentResult {
  x: number[];
  shear: number[];
  moment: number[];
  reactions: IReaction[];
  maxShear: number;
  minShear: number;
  maxMoment: number;
  minMoment: number;
}

export interface IDeflectionResult {
  x: number[];
  rotation: number[];
  deflection: number[];
  initialRotation: number;
  maxDeflection: number;   // Largest positive (upward) value, 0 if none
  minDeflection: number;   // Most negative (downward) value, 0 if none
  iterations: number;      // Shooting iterations, 0 for the direct solve
}

export interface ILoadCombination {
  index: number;
  name: string;
  method: AnalysisMethod;
  factors: Map<LoadType, number>;  // loadType -> factor, in table order
}

export interface ICriticalValue {
  value: number;
  x: number;
  combinationIndex: number;
  combinationName: string;
}

export interface ICombinationSummary {
  combination: ILoadCombination;
  maxShear: number;
  minShear: number;
  maxMoment: number;
  minMoment: number;
}

export interface ICriticalCombinations {
  maxShear: ICriticalValue;
  minShear: ICriticalValue;
  maxMoment: ICriticalValue;
  minMoment: ICriticalValue;
  combinations: ICombinationSummary[];
}

export interface IEnvelopeResult {
  x: number[];
  minShear: number[];
  maxShear: number[];
  minMoment: number[];
  maxMoment: number[];
}
