import { z } from 'zod';
import { InvalidArgumentError } from '../../domain/errors/archive.errors';

const radius = z.coerce.number().positive().max(180);
const text = z.string().trim().min(1);
const sbid = z.coerce.number().int().positive();

export const ImagesOptionsSchema = z.object({
  ra: text,
  dec: text,
  radius: radius.default(0.1),
});

export const CutoutsOptionsSchema = z.object({
  sbid,
  fullFiles: z.boolean().default(false),
  radius: radius.default(0.1),
  minFlux: z.coerce.number().default(500),
});

export const SliceOptionsSchema = z.object({
  sbid,
  numChannels: z.coerce.number().int().positive(),
  type: text.default('spectral.restored.3d'),
});

export const SourcesOptionsSchema = z.object({
  imageId: text,
  sourceFile: text,
  radius: radius.default(0.1),
});

export const SpectraOptionsSchema = z.object({
  sourceFile: text,
  radius: radius.default(1.0),
});

export const ProjectCutoutsOptionsSchema = z.object({
  project: text,
  sourceFile: text,
  radius: radius.default(0.1),
});

export type ImagesOptionsDto = z.infer<typeof ImagesOptionsSchema>;
export type CutoutsOptionsDto = z.infer<typeof CutoutsOptionsSchema>;
export type SliceOptionsDto = z.infer<typeof SliceOptionsSchema>;
export type SourcesOptionsDto = z.infer<typeof SourcesOptionsSchema>;
export type SpectraOptionsDto = z.infer<typeof SpectraOptionsSchema>;
export type ProjectCutoutsOptionsDto = z.infer<typeof ProjectCutoutsOptionsSchema>;

/**
 * Parse command arguments with a schema, reporting every invalid one at once.
 */
export function validateOptions<T extends z.ZodTypeAny>(schema: T, data: unknown): z.output<T> {
  const result = schema.safeParse(data);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new InvalidArgumentError(`Invalid arguments: ${errors}`);
  }

  return result.data;
}
