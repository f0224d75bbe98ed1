/**
 * Beam Diagrams Engine
 *
 * Shear, moment, rotation and deflection of simply-supported and cantilever
 * beams, with ASCE 7 load combination envelopes.
 */

export { Beam, DEFAULT_BEAM_SETTINGS } from './core/beam/Beam';

export {
  createPointLoad,
  createMomentLoad,
  createDistributedLoad,
  distributedLoadResultant,
  loadContribution,
  loadLocations,
  loadStatics,
  scaleLoad,
  type ILoadStatics,
} from './core/beam/Load';

export { createSectionGrid, nearestSectionIndex } from './core/beam/SectionGrid';

export {
  BeamAnalysisError,
  InvalidParameterError,
  LoadOutOfBoundsError,
  PreconditionNotMetError,
  type BeamErrorCode,
} from './core/beam/errors';

export {
  BeamOptionsSchema,
  BeamLoadSchema,
  LoadTypeSchema,
  AnalysisMethodSchema,
  DeflectionMethodSchema,
  PointLoadSchema,
  DistributedLoadSchema,
  parseBeamOptions,
  parseBeamLoad,
} from './core/beam/schema';

// Solvers
export { solveShearMoment, resolveReactions, reactionLoads } from './core/solver/ShearMomentSolver';
export {
  solveDeflection,
  MAX_SHOOTING_ITERATIONS,
  SHOOTING_TOLERANCE,
  type DeflectionBoundary,
  type IDeflectionInput,
} from './core/solver/DeflectionSolver';
export {
  assertCombinable,
  evaluateCombinations,
  factorLoads,
  findCriticalCombinations,
  reduceCriticalCombinations,
  type ICombinationRun,
} from './core/solver/CombinationSolver';
export { calculateEnvelope } from './core/solver/EnvelopeCalculator';

// Load combination table
export {
  LRFD_COMBINATIONS,
  ASD_COMBINATIONS,
  LOAD_TYPES,
  createLoadCombination,
  formatCombinationName,
  generateLoadCombinations,
  getCombinationTemplates,
  getApplicableCombinations,
  type ICombinationOption,
  type ICombinationTemplate,
} from './core/standards/LoadCombinations';

export { ConsoleService, type ConsoleEntry } from './core/console/ConsoleService';

// Types
export type {
  AnalysisMethod,
  BeamLoad,
  DeflectionMethod,
  IBeamOptions,
  IBeamSupport,
  ICombinationSummary,
  ICriticalCombinations,
  ICriticalValue,
  IDeflectionResult,
  IDistributedLoad,
  IEnvelopeResult,
  ILoadCombination,
  ILoadContribution,
  IPointLoad,
  IReaction,
  ISectionGrid,
  IShearMomentResult,
  LoadType,
} from './core/beam/types';
