/**
 * Option schemas for every component. Defaults live here so each class only
 * ever sees fully-resolved options.
 */

import { z } from 'zod';
import { DEFAULT_COLORS } from '@/data/defaultColors';
import { ValidationError } from './errors';

const channel = z.number().min(0).max(255);

export const rgbSchema = z.object({ r: channel, g: channel, b: channel });

const seed = z.number().int().optional();

export const clustererOptionsSchema = z.object({
    nColors: z.number().int().positive().default(18),
    nInit: z.number().int().positive().default(10),
    maxIterations: z.number().int().positive().default(300),
    seed,
});

export const corpusOptionsSchema = z.object({
    skipTransparent: z.boolean().default(true),
});

export const extractorOptionsSchema = clustererOptionsSchema.extend({
    grayThreshold: z.number().nonnegative().default(1),
});

export const cooccurrenceOptionsSchema = z.object({
    distanceThreshold: z.number().nonnegative().default(1.0),
});

export const geneticOptionsSchema = z.object({
    nColors: z.number().int().positive(),
    populationSize: z.number().int().positive().default(16),
    mutationRate: z.number().min(0).max(1).default(0.3),
    maxMutationChange: z.number().nonnegative().default(0.3),
    eliteThreshold: z.number().default(7.5),
    candidateColors: z.array(rgbSchema).default(() => DEFAULT_COLORS.map((c) => ({ ...c }))),
    seed,
    clusterSeed: z.number().int().default(42),
    clusterInit: z.number().int().positive().default(10),
});

export type ClustererOptions = z.output<typeof clustererOptionsSchema>;
export type ClustererOptionsInput = z.input<typeof clustererOptionsSchema>;
export type CorpusOptionsInput = z.input<typeof corpusOptionsSchema>;
export type ExtractorOptions = z.output<typeof extractorOptionsSchema>;
export type ExtractorOptionsInput = z.input<typeof extractorOptionsSchema>;
export type CooccurrenceOptions = z.output<typeof cooccurrenceOptionsSchema>;
export type CooccurrenceOptionsInput = z.input<typeof cooccurrenceOptionsSchema>;
export type GeneticOptions = z.output<typeof geneticOptionsSchema>;
export type GeneticOptionsInput = z.input<typeof geneticOptionsSchema>;

/** Parse options against a schema, turning zod issues into a ValidationError. */
export function parseOptions<S extends z.ZodTypeAny>(
    schema: S,
    input: unknown,
    context: string
): z.output<S> {
    const result = schema.safeParse(input ?? {});
    if (!result.success) {
        const details = result.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ValidationError(`Invalid ${context} options - ${details}`);
    }
    return result.data;
}
