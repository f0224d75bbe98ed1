import { z } from 'zod';
import type { BeamLoad, IBeamOptions } from './types';
import { InvalidParameterError } from './errors';

const finite = () => z.number().finite();

export const LoadTypeSchema = z.enum(['D', 'L', 'Lr', 'S', 'R', 'W', 'E', 'none']);
export const AnalysisMethodSchema = z.enum(['LRFD', 'ASD']);
export const DeflectionMethodSchema = z.enum(['direct', 'shooting']);

export const BeamOptionsSchema = z.object({
  length: finite().positive(),
  ei: finite().positive(),
  cantilever: z.boolean().optional(),
  dl: finite().optional(),
  dr: finite().optional(),
  analysisMethod: AnalysisMethodSchema.optional(),
  sections: z.number().int().min(2).optional(),
  rotDelta: finite().positive().optional(),
  deflectionMethod: DeflectionMethodSchema.optional(),
}).superRefine((options, ctx) => {
  const { length, dl, dr } = options;
  if (!(length > 0)) return;

  if (options.cantilever) {
    if (dl !== undefined && dr !== undefined && dl !== dr) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['dr'],
        message: 'cantilever needs a single fixed end (dl must equal dr)',
      });
      return;
    }
    const fixed = dl ?? dr ?? 0;
    if (fixed !== 0 && fixed !== length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [dl !== undefined ? 'dl' : 'dr'],
        message: `cantilever fixed end must be at 0 or ${length}`,
      });
    }
    return;
  }

  const left = dl ?? 0;
  const right = dr ?? length;
  if (left < 0 || left > length) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['dl'], message: `must lie within [0, ${length}]` });
  }
  if (right < 0 || right > length) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['dr'], message: `must lie within [0, ${length}]` });
  }
  if (left >= right) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['dl'], message: 'left support must be before right support' });
  }
});

export const PointLoadSchema = z.object({
  kind: z.literal('point'),
  d: finite().nonnegative(),
  m: finite(),
  effect: z.enum(['shear', 'moment']),
  loadType: LoadTypeSchema,
});

export const DistributedLoadSchema = z.object({
  kind: z.literal('distributed'),
  dl: finite().nonnegative(),
  dr: finite().nonnegative(),
  ml: finite(),
  mr: finite(),
  loadType: LoadTypeSchema,
});

export const BeamLoadSchema = z
  .discriminatedUnion('kind', [PointLoadSchema, DistributedLoadSchema])
  .superRefine((load, ctx) => {
    if (load.kind === 'distributed' && load.dl > load.dr) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['dr'],
        message: 'load end must not be before load start',
      });
    }
  });

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function parseBeamOptions(options: IBeamOptions): z.infer<typeof BeamOptionsSchema> {
  const result = BeamOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new InvalidParameterError(formatIssues(result.error));
  }
  return result.data;
}

export function parseBeamLoad(load: unknown): BeamLoad {
  const result = BeamLoadSchema.safeParse(load);
  if (!result.success) {
    throw new InvalidParameterError(formatIssues(result.error));
  }
  return result.data;
}
