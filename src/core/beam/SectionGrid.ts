import type { ISectionGrid } from './types';
import { InvalidParameterError } from './errors';

/**
 * Divide the beam into `sections` equal slices. Samples are computed as
 * (i / N) * L so both ends land exactly on 0 and L.
 */
export function createSectionGrid(length: number, sections: number): ISectionGrid {
  if (!Number.isFinite(length) || length <= 0) {
    throw new InvalidParameterError([`length: must be positive, got ${length}`]);
  }
  if (!Number.isInteger(sections) || sections < 2) {
    throw new InvalidParameterError([`sections: must be an integer of at least 2, got ${sections}`]);
  }

  const x: number[] = [];
  for (let i = 0; i <= sections; i++) {
    x.push((i / sections) * length);
  }

  return {
    sections,
    width: length / sections,
    x,
  };
}

/** Index of the sample closest to `location` (lower index on a tie) */
export function nearestSectionIndex(grid: ISectionGrid, location: number): number {
  let best = 0;
  let bestDistance = Infinity;
  for (let i = 0; i < grid.x.length; i++) {
    const distance = Math.abs(grid.x[i] - location);
    if (distance < bestDistance) {
      bestDistance = distance;
      best = i;
    }
  }
  return best;
}
