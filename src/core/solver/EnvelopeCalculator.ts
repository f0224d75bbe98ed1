/**
 * Envelope Calculator
 *
 * Computes min/max shear and moment envelopes across multiple shear/moment
 * results (one per load combination), sample by sample.
 */

import type { IEnvelopeResult, IShearMomentResult } from '../beam/types';

/**
 * Calculate the envelope (min/max) across an array of results on the same grid.
 * Typically called with one result per load combination.
 */
export function calculateEnvelope(results: IShearMomentResult[]): IEnvelopeResult {
  if (results.length === 0) {
    return { x: [], minShear: [], maxShear: [], minMoment: [], maxMoment: [] };
  }

  const x = [...results[0].x];
  const count = x.length;

  // Initialize from the first result
  const minShear = [...results[0].shear];
  const maxShear = [...results[0].shear];
  const minMoment = [...results[0].moment];
  const maxMoment = [...results[0].moment];

  for (let r = 1; r < results.length; r++) {
    const { shear, moment } = results[r];
    if (shear.length !== count || moment.length !== count) {
      throw new Error('Envelope results must share the same section grid');
    }

    for (let i = 0; i < count; i++) {
      if (shear[i] < minShear[i]) minShear[i] = shear[i];
      if (shear[i] > maxShear[i]) maxShear[i] = shear[i];
      if (moment[i] < minMoment[i]) minMoment[i] = moment[i];
      if (moment[i] > maxMoment[i]) maxMoment[i] = moment[i];
    }
  }

  return { x, minShear, maxShear, minMoment, maxMoment };
}
