/**
 * ASCE 7-16 load combinations
 * Strength design (LRFD, §2.3) and allowable stress design (ASD, §2.4).
 *
 * A term with several options reads "factor × (A or B or C)"; each option
 * becomes its own combination, expanded in table order.
 */

import type { AnalysisMethod, ILoadCombination, LoadType } from '../beam/types';

export interface ICombinationOption {
  loadType: LoadType;
  factor: number;
}

export interface ICombinationTemplate {
  code: string;
  description: string;
  terms: ICombinationOption[][];
}

const ROOF_OPTIONS = (factor: number): ICombinationOption[] => [
  { loadType: 'Lr', factor },
  { loadType: 'S', factor },
  { loadType: 'R', factor },
];

export const LRFD_COMBINATIONS: ICombinationTemplate[] = [
  {
    code: '1',
    description: '1.4D',
    terms: [[{ loadType: 'D', factor: 1.4 }]],
  },
  {
    code: '2',
    description: '1.2D + 1.6L + 0.5(Lr or S or R)',
    terms: [
      [{ loadType: 'D', factor: 1.2 }],
      [{ loadType: 'L', factor: 1.6 }],
      ROOF_OPTIONS(0.5),
    ],
  },
  {
    code: '3',
    description: '1.2D + 1.6(Lr or S or R) + (L or 0.5W)',
    terms: [
      [{ loadType: 'D', factor: 1.2 }],
      ROOF_OPTIONS(1.6),
      [{ loadType: 'L', factor: 1.0 }, { loadType: 'W', factor: 0.5 }],
    ],
  },
  {
    code: '4',
    description: '1.2D + 1.0W + L + 0.5(Lr or S or R)',
    terms: [
      [{ loadType: 'D', factor: 1.2 }],
      [{ loadType: 'W', factor: 1.0 }],
      [{ loadType: 'L', factor: 1.0 }],
      ROOF_OPTIONS(0.5),
    ],
  },
  {
    code: '5',
    description: '0.9D + 1.0W',
    terms: [[{ loadType: 'D', factor: 0.9 }], [{ loadType: 'W', factor: 1.0 }]],
  },
  {
    code: '6',
    description: '1.2D + 1.0E + L + 0.2S',
    terms: [
      [{ loadType: 'D', factor: 1.2 }],
      [{ loadType: 'E', factor: 1.0 }],
      [{ loadType: 'L', factor: 1.0 }],
      [{ loadType: 'S', factor: 0.2 }],
    ],
  },
  {
    code: '7',
    description: '0.9D + 1.0E',
    terms: [[{ loadType: 'D', factor: 0.9 }], [{ loadType: 'E', factor: 1.0 }]],
  },
];

export const ASD_COMBINATIONS: ICombinationTemplate[] = [
  {
    code: '1',
    description: 'D',
    terms: [[{ loadType: 'D', factor: 1.0 }]],
  },
  {
    code: '2',
    description: 'D + L',
    terms: [[{ loadType: 'D', factor: 1.0 }], [{ loadType: 'L', factor: 1.0 }]],
  },
  {
    code: '3',
    description: 'D + (Lr or S or R)',
    terms: [[{ loadType: 'D', factor: 1.0 }], ROOF_OPTIONS(1.0)],
  },
  {
    code: '4',
    description: 'D + 0.75L + 0.75(Lr or S or R)',
    terms: [
      [{ loadType: 'D', factor: 1.0 }],
      [{ loadType: 'L', factor: 0.75 }],
      ROOF_OPTIONS(0.75),
    ],
  },
  {
    code: '5',
    description: 'D + (0.6W or 0.7E)',
    terms: [
      [{ loadType: 'D', factor: 1.0 }],
      [{ loadType: 'W', factor: 0.6 }, { loadType: 'E', factor: 0.7 }],
    ],
  },
  {
    code: '6a',
    description: 'D + 0.75L + 0.75(0.6W) + 0.75(Lr or S or R)',
    terms: [
      [{ loadType: 'D', factor: 1.0 }],
      [{ loadType: 'L', factor: 0.75 }],
      [{ loadType: 'W', factor: 0.45 }],
      ROOF_OPTIONS(0.75),
    ],
  },
  {
    code: '6b',
    description: 'D + 0.75L + 0.75(0.7E) + 0.75S',
    terms: [
      [{ loadType: 'D', factor: 1.0 }],
      [{ loadType: 'L', factor: 0.75 }],
      [{ loadType: 'E', factor: 0.525 }],
      [{ loadType: 'S', factor: 0.75 }],
    ],
  },
  {
    code: '7',
    description: '0.6D + 0.6W',
    terms: [[{ loadType: 'D', factor: 0.6 }], [{ loadType: 'W', factor: 0.6 }]],
  },
  {
    code: '8',
    description: '0.6D + 0.7E',
    terms: [[{ loadType: 'D', factor: 0.6 }], [{ loadType: 'E', factor: 0.7 }]],
  },
];

export function getCombinationTemplates(method: AnalysisMethod): ICombinationTemplate[] {
  return method === 'LRFD' ? LRFD_COMBINATIONS : ASD_COMBINATIONS;
}

function formatFactor(factor: number): string {
  return Number.isInteger(factor) ? factor.toFixed(1) : String(factor);
}

export function formatCombinationName(method: AnalysisMethod, code: string, factors: Map<LoadType, number>): string {
  const parts = [...factors].map(([loadType, factor]) => `${formatFactor(factor)}${loadType}`);
  return `${method} ${code}: ${parts.join(' + ')}`;
}

export const LOAD_TYPES: readonly LoadType[] = ['D', 'L', 'Lr', 'S', 'R', 'W', 'E', 'none'];

/** User-defined combination, e.g. createLoadCombination(0, 'Service', { D: 1.0, L: 1.0 }) */
export function createLoadCombination(
  index: number,
  name: string,
  factors: Map<LoadType, number> | Partial<Record<LoadType, number>>,
  method: AnalysisMethod = 'LRFD'
): ILoadCombination {
  const map = new Map<LoadType, number>();
  if (factors instanceof Map) {
    for (const [loadType, factor] of factors) map.set(loadType, factor);
  } else {
    for (const loadType of LOAD_TYPES) {
      const factor = factors[loadType];
      if (factor !== undefined) map.set(loadType, factor);
    }
  }

  return { index, name, method, factors: map };
}

/** Cartesian product of the term options, first term varying slowest */
function expandTemplate(template: ICombinationTemplate): Map<LoadType, number>[] {
  let expanded: Map<LoadType, number>[] = [new Map()];
  for (const options of template.terms) {
    const next: Map<LoadType, number>[] = [];
    for (const partial of expanded) {
      for (const option of options) {
        const factors = new Map(partial);
        factors.set(option.loadType, option.factor);
        next.push(factors);
      }
    }
    expanded = next;
  }
  return expanded;
}

/** Every combination of the code table for a method, with stable indices */
export function generateLoadCombinations(method: AnalysisMethod): ILoadCombination[] {
  const combinations: ILoadCombination[] = [];
  for (const template of getCombinationTemplates(method)) {
    for (const factors of expandTemplate(template)) {
      combinations.push({
        index: combinations.length,
        name: formatCombinationName(method, template.code, factors),
        method,
        factors,
      });
    }
  }
  return combinations;
}

/**
 * Combinations that reference at least one present load category.
 * Categories without loads contribute zero; they never disqualify a combination.
 */
export function getApplicableCombinations(
  method: AnalysisMethod,
  presentTypes: ReadonlySet<LoadType>
): ILoadCombination[] {
  return generateLoadCombinations(method).filter(combination =>
    [...combination.factors.keys()].some(loadType => presentTypes.has(loadType))
  );
}
