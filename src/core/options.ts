/**
 * Generator options: schema and validation
 */

import { z } from 'zod';
import { InvalidOptionsError } from './errors';
import { MAX_INSTANCE_COUNT } from '../utils/files';
import { MAX_SEED } from '../utils/random';

/** LO/PN text: at most 64 characters, no value separator */
const DescriptiveText = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[^\\]*$/, 'must not contain a backslash');

export const StudyOverridesSchema = z
  .object({
    patientName: DescriptiveText.optional(),
    patientID: DescriptiveText.optional(),
    studyDescription: DescriptiveText.optional(),
    seriesDescription: DescriptiveText.optional(),
  })
  .strict();

/** Descriptive fields a caller may pin instead of drawing them */
export type StudyOverrides = z.infer<typeof StudyOverridesSchema>;

export const GeneratorOptionsSchema = z
  .object({
    frameCount: z.number().int().positive().max(MAX_INSTANCE_COUNT),
    /** Size string such as "100MB" or "4.5GB" */
    totalSize: z.string().min(1),
    outputDir: z.string().min(1),
    seed: z.number().int().nonnegative().max(MAX_SEED).optional(),
    dicomdir: z.boolean().default(true),
    overrides: StudyOverridesSchema.optional(),
  })
  .strict();

export type GeneratorOptionsInput = z.input<typeof GeneratorOptionsSchema>;
export type GeneratorOptions = z.output<typeof GeneratorOptionsSchema>;

/**
 * Validate raw options, raising InvalidOptionsError with one line per issue
 */
export function resolveGeneratorOptions(input: unknown): GeneratorOptions {
  const result = GeneratorOptionsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : 'options';
      return `${where}: ${issue.message}`;
    });
    throw new InvalidOptionsError(`Invalid generator options: ${issues.join('; ')}`, issues);
  }
  return result.data;
}
