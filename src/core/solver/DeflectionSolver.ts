/**
 * Deflection Solver
 *
 * Integrates curvature M/EI twice over the section grid, starting from an
 * assumed initial rotation of zero, then corrects the initial rotation θ₀ and
 * a rigid offset c so the boundary conditions hold:
 *   simply supported: y = 0 at both support samples
 *   cantilever:       y = 0 and θ = 0 at the fixed sample
 *
 * rotation(x)   = rotation₀(x) + θ₀
 * deflection(x) = deflection₀(x) + θ₀·x + c
 *
 * 'direct' solves θ₀ and c from the 2×2 system. 'shooting' re-integrates with
 * trial rotations (first step rotDelta / EI) and walks the boundary residual
 * to zero with secant steps.
 */

import type { DeflectionMethod, IDeflectionResult, ISectionGrid } from '../beam/types';
import { cumulativeTrapezoid, findExtremes } from '../math/Integration';
import { solveLinearSystem } from '../math/GaussElimination';
import { ConsoleService } from '../console/ConsoleService';

export const MAX_SHOOTING_ITERATIONS = 25;
export const SHOOTING_TOLERANCE = 1e-9;   // Residual reduction relative to θ₀ = 0

export type DeflectionBoundary =
  | { kind: 'simple'; left: number; right: number }   // Support sample indices
  | { kind: 'fixed'; index: number };                  // Fixed-end sample index

export interface IDeflectionInput {
  grid: ISectionGrid;
  moment: number[];
  ei: number;
  boundary: DeflectionBoundary;
  method: DeflectionMethod;
  rotDelta: number;
}

interface IIntegrated {
  rotation: number[];
  deflection: number[];
}

function integrate(curvature: number[], grid: ISectionGrid, theta0: number): IIntegrated {
  const rotation = cumulativeTrapezoid(curvature, grid.width, theta0);
  const deflection = cumulativeTrapezoid(rotation, grid.width, 0);
  return { rotation, deflection };
}

/** Boundary error that depends on θ₀ only (independent of the offset c) */
function boundaryResidual(boundary: DeflectionBoundary, state: IIntegrated): number {
  if (boundary.kind === 'simple') {
    return state.deflection[boundary.right] - state.deflection[boundary.left];
  }
  return state.rotation[boundary.index];
}

function anchorIndex(boundary: DeflectionBoundary): number {
  return boundary.kind === 'simple' ? boundary.left : boundary.index;
}

function solveDirect(curvature: number[], grid: ISectionGrid, boundary: DeflectionBoundary) {
  const base = integrate(curvature, grid, 0);
  const { x } = grid;

  let A: number[][];
  let b: number[];
  if (boundary.kind === 'simple') {
    const { left, right } = boundary;
    A = [[x[left], 1], [x[right], 1]];
    b = [-base.deflection[left], -base.deflection[right]];
  } else {
    const k = boundary.index;
    A = [[1, 0], [x[k], 1]];
    b = [-base.rotation[k], -base.deflection[k]];
  }

  const [theta0, offset] = solveLinearSystem(A, b);
  const rotation = base.rotation.map(r => r + theta0);
  const deflection = base.deflection.map((y, i) => y + theta0 * x[i] + offset);

  return { rotation, deflection, iterations: 0 };
}

function solveShooting(
  curvature: number[],
  grid: ISectionGrid,
  boundary: DeflectionBoundary,
  step: number
) {
  let thetaA = 0;
  let errorA = boundaryResidual(boundary, integrate(curvature, grid, thetaA));
  const tolerance = SHOOTING_TOLERANCE * Math.abs(errorA);

  let best = { theta: thetaA, error: errorA };
  let iterations = 0;

  if (errorA !== 0) {
    let thetaB = step;
    let errorB = boundaryResidual(boundary, integrate(curvature, grid, thetaB));
    iterations = 1;
    if (Math.abs(errorB) < Math.abs(best.error)) best = { theta: thetaB, error: errorB };

    while (Math.abs(best.error) > tolerance && iterations < MAX_SHOOTING_ITERATIONS) {
      if (errorB === errorA) break;
      const thetaC = thetaB - errorB * (thetaB - thetaA) / (errorB - errorA);
      thetaA = thetaB;
      errorA = errorB;
      thetaB = thetaC;
      errorB = boundaryResidual(boundary, integrate(curvature, grid, thetaB));
      iterations++;
      if (Math.abs(errorB) < Math.abs(best.error)) best = { theta: thetaB, error: errorB };
    }

    if (Math.abs(best.error) > tolerance) {
      ConsoleService.warn(
        `Deflection shooting stopped after ${iterations} iterations with residual ${best.error.toExponential(3)}`
      );
    }
  }

  const final = integrate(curvature, grid, best.theta);
  const offset = -final.deflection[anchorIndex(boundary)];
  const deflection = final.deflection.map(y => y + offset);

  return { rotation: final.rotation, deflection, iterations };
}

export function solveDeflection(input: IDeflectionInput): IDeflectionResult {
  const { grid, moment, ei, boundary, method } = input;
  const curvature = moment.map(m => m / ei);

  const { rotation, deflection, iterations } = method === 'shooting'
    ? solveShooting(curvature, grid, boundary, input.rotDelta / ei)
    : solveDirect(curvature, grid, boundary);

  const extremes = findExtremes(deflection);

  return {
    x: [...grid.x],
    rotation,
    deflection,
    initialRotation: rotation[0],
    maxDeflection: Math.max(0, extremes.max),
    minDeflection: Math.min(0, extremes.min),
    iterations,
  };
}
