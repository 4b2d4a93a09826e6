/**
 * Interactive Genetic Color Optimizer
 *
 * Evolves color schemes for one image whose pixels have been clustered into
 * N segments. A scheme assigns one color per segment; fitness comes from the
 * caller (typically a person rating each rendered scheme), so every
 * generation is a two-phase step:
 *
 *   setScores(...)  ->  evolve()
 *
 * evolve() keeps elites (score >= eliteThreshold) untouched, breeds the rest
 * through roulette selection and two-point crossover, mutates a fraction of
 * the offspring and resets every score to the neutral value.
 */

import type { ColorCluster, GenerationRecord, Individual, PixelSample, RGB, Scheme } from '@/types';
import { NEUTRAL_SCORE } from '@/data/defaultColors';
import { ColorClusterer } from './clustering';
import { clampChannel, copyRgb } from './colorUtils';
import {
    geneticOptionsSchema,
    parseOptions,
    type GeneticOptions,
    type GeneticOptionsInput,
} from './config';
import { toRgba } from './corpus';
import { ValidationError } from './errors';
import { SeededRandom } from './random';

// ============================================================================
// Genetic Operators
// ============================================================================

function cloneScheme(scheme: Scheme): Scheme {
    return scheme.map(copyRgb);
}

/**
 * Roulette-wheel selection: pick an individual with probability
 * proportional to its score. Falls back to a uniform pick when the scores
 * sum to zero.
 */
export function rouletteSelect(population: readonly Individual[], rng: SeededRandom): Individual {
    const total = population.reduce((sum, ind) => sum + ind.score, 0);
    if (total === 0) return population[rng.nextInt(0, population.length)];
    return population[rng.weightedIndex(population.map((ind) => ind.score))];
}

/**
 * Two-point crossover: child = parent1[0:a] + parent2[a:b] + parent1[b:]
 * with distinct cut points a < b drawn from [1, N-1]. Schemes shorter than
 * three colors have no two distinct inner cuts, so the child copies parent1.
 */
export function twoPointCrossover(parent1: Scheme, parent2: Scheme, rng: SeededRandom): Scheme {
    const n = parent1.length;
    if (n < 3) return cloneScheme(parent1);

    const cuts = Array.from({ length: n - 1 }, (_, i) => i + 1);
    const [a, b] = rng.sample(cuts, 2).sort((x, y) => x - y);
    return cloneScheme([...parent1.slice(0, a), ...parent2.slice(a, b), ...parent1.slice(b)]);
}

/** Scale every channel by (1 + u), u ~ U[-maxChange, maxChange], truncate and clamp. */
export function mutateScheme(scheme: Scheme, maxChange: number, rng: SeededRandom): Scheme {
    const mutateChannel = (v: number) =>
        clampChannel(Math.trunc(v * (1 + rng.uniform(-maxChange, maxChange))));
    return scheme.map((c) => ({
        r: mutateChannel(c.r),
        g: mutateChannel(c.g),
        b: mutateChannel(c.b),
    }));
}

// ============================================================================
// Optimizer
// ============================================================================

export class GeneticColorOptimizer {
    readonly options: GeneticOptions;
    private readonly rng: SeededRandom;
    private readonly segmentation: number[];
    private readonly segmentClusters: ColorCluster[];
    private individuals: Individual[];
    private records: GenerationRecord[] = [];
    private generationCount = 0;

    constructor(pixels: readonly PixelSample[], options: GeneticOptionsInput) {
        this.options = parseOptions(geneticOptionsSchema, options, 'genetic optimizer');
        const { nColors, candidateColors, populationSize } = this.options;

        if (pixels.length === 0) {
            throw new ValidationError('Target image has no pixels to segment');
        }
        if (candidateColors.length < nColors) {
            throw new ValidationError(
                `Candidate pool has ${candidateColors.length} colors, need at least ${nColors}`
            );
        }

        const clusterer = new ColorClusterer({
            nColors,
            nInit: this.options.clusterInit,
            seed: this.options.clusterSeed,
        });
        const { clusters, labels } = clusterer.fit(pixels);
        this.segmentation = labels;
        this.segmentClusters = clusters;

        this.rng = new SeededRandom(this.options.seed);
        const selected = candidateColors.slice(0, nColors);
        this.individuals = Array.from({ length: populationSize }, () => ({
            scheme: cloneScheme(this.rng.shuffle(selected)),
            score: NEUTRAL_SCORE,
        }));
    }

    /** Number of colors per scheme (N). */
    get size(): number {
        return this.options.nColors;
    }

    get generation(): number {
        return this.generationCount;
    }

    get population(): Individual[] {
        return this.individuals.map((ind) => ({ scheme: cloneScheme(ind.scheme), score: ind.score }));
    }

    get scores(): number[] {
        return this.individuals.map((ind) => ind.score);
    }

    get history(): GenerationRecord[] {
        return this.records.map((r) => ({ ...r }));
    }

    /** Cluster index of every pixel of the target image. */
    get labels(): readonly number[] {
        return this.segmentation;
    }

    /** The clusters the segmentation labels refer to, in label order. */
    get segmentPalette(): ColorCluster[] {
        return this.segmentClusters.map((c) => ({ ...c, color: copyRgb(c.color) }));
    }

    /** Replace the scores of the current generation. All-or-nothing. */
    setScores(scores: readonly number[]): void {
        if (scores.length !== this.individuals.length) {
            throw new ValidationError(
                `Expected ${this.individuals.length} scores, received ${scores.length}`
            );
        }
        this.individuals = this.individuals.map((ind, i) => ({ scheme: ind.scheme, score: scores[i] }));
    }

    /** Advance one generation using the current scores. */
    evolve(): void {
        const { populationSize, eliteThreshold } = this.options;
        if (this.individuals.some((ind) => ind.score < 0)) {
            throw new ValidationError('All schemes must have non-negative scores before evolving');
        }

        const scores = this.scores;
        const average = scores.reduce((sum, s) => sum + s, 0) / scores.length;
        const best = Math.max(...scores);
        this.records.push({ generation: this.generationCount, average, best });

        const elite = this.individuals.filter((ind) => ind.score >= eliteThreshold);

        const offspring: Scheme[] = [];
        while (offspring.length < populationSize - elite.length) {
            const parent1 = rouletteSelect(this.individuals, this.rng);
            const parent2 = rouletteSelect(this.individuals, this.rng);
            offspring.push(twoPointCrossover(parent1.scheme, parent2.scheme, this.rng));
        }

        const mutated = this.mutate(offspring);

        this.individuals = [...mutated, ...elite.map((ind) => ind.scheme)].map((scheme) => ({
            scheme,
            score: NEUTRAL_SCORE,
        }));
        this.generationCount++;

        console.debug(
            `[GeneticColorOptimizer] generation ${this.generationCount}: ` +
                `${elite.length} elite, ${offspring.length} offspring, avg ${average.toFixed(2)}, best ${best}`
        );
    }

    private mutate(offspring: Scheme[]): Scheme[] {
        const count = Math.floor(this.options.mutationRate * offspring.length);
        const indices = this.rng.sample(
            offspring.map((_, i) => i),
            count
        );
        const result = [...offspring];
        for (const idx of indices) {
            result[idx] = mutateScheme(result[idx], this.options.maxMutationChange, this.rng);
        }
        return result;
    }

    /** Recolor the segmentation: every pixel takes the scheme color of its label. */
    applyScheme(scheme: Scheme): RGB[] {
        if (scheme.length !== this.size) {
            throw new ValidationError(`Scheme must have ${this.size} colors, got ${scheme.length}`);
        }
        return this.segmentation.map((label) => copyRgb(scheme[label]));
    }

    /** `applyScheme` packed as opaque RGBA, ready for an ImageData/canvas. */
    renderScheme(scheme: Scheme): Uint8ClampedArray {
        return toRgba(this.applyScheme(scheme));
    }

    /** Highest-scoring scheme; the first one wins ties. */
    bestScheme(): Individual {
        let bestIdx = 0;
        for (let i = 1; i < this.individuals.length; i++) {
            if (this.individuals[i].score > this.individuals[bestIdx].score) bestIdx = i;
        }
        const best = this.individuals[bestIdx];
        return { scheme: cloneScheme(best.scheme), score: best.score };
    }
}
