/**
 * K-means color clustering.
 *
 * Pixels are first collapsed into a histogram of unique colors so that the
 * assignment/update loop runs over distinct colors weighted by their pixel
 * count instead of every pixel. Each restart seeds its centroids with
 * weighted k-means++ and the run with the lowest inertia wins.
 */

import type { ClusteringResult, ColorCluster, Palette, PixelSample, RGB } from '@/types';
import {
    clustererOptionsSchema,
    parseOptions,
    type ClustererOptions,
    type ClustererOptionsInput,
} from './config';
import { distanceSquared, isByteColor, rgbKey } from './colorUtils';
import { ValidationError } from './errors';
import { SeededRandom } from './random';

interface HistogramEntry extends RGB {
    count: number;
}

interface Histogram {
    entries: HistogramEntry[];
    // index into `entries` for every input pixel
    pixelEntry: Int32Array;
}

interface RunResult {
    centroids: RGB[];
    assignments: Int32Array; // per histogram entry
    inertia: number;
}

/** Collapse pixels into unique colors with counts, remembering each pixel's entry. */
function buildHistogram(pixels: readonly PixelSample[]): Histogram {
    const index = new Map<number, number>();
    const entries: HistogramEntry[] = [];
    const pixelEntry = new Int32Array(pixels.length);
    for (let i = 0; i < pixels.length; i++) {
        const p = pixels[i];
        const key = rgbKey(p);
        let at = index.get(key);
        if (at === undefined) {
            at = entries.length;
            index.set(key, at);
            entries.push({ r: p.r, g: p.g, b: p.b, count: 0 });
        }
        entries[at].count++;
        pixelEntry[i] = at;
    }
    return { entries, pixelEntry };
}

function nearestCentroid(color: RGB, centroids: readonly RGB[]): { index: number; dist: number } {
    let index = 0;
    let dist = Infinity;
    for (let c = 0; c < centroids.length; c++) {
        const v = distanceSquared(color, centroids[c]);
        if (v < dist) {
            dist = v;
            index = c;
        }
    }
    return { index, dist };
}

/**
 * k-means++ init over histogram entries, weighted by pixel count.
 * When every entry already coincides with a centroid the remaining centroids
 * duplicate a count-weighted pick and end up empty.
 */
function seedCentroids(entries: readonly HistogramEntry[], k: number, rng: SeededRandom): RGB[] {
    const counts = entries.map((e) => e.count);
    const first = entries[rng.weightedIndex(counts)];
    const centroids: RGB[] = [{ r: first.r, g: first.g, b: first.b }];

    while (centroids.length < k) {
        const dists = entries.map((e) => nearestCentroid(e, centroids).dist * e.count);
        const hasSpread = dists.some((d) => d > 0);
        const pick = entries[rng.weightedIndex(hasSpread ? dists : counts)];
        centroids.push({ r: pick.r, g: pick.g, b: pick.b });
    }
    return centroids;
}

function runKMeans(
    entries: readonly HistogramEntry[],
    k: number,
    maxIterations: number,
    rng: SeededRandom
): RunResult {
    const centroids = seedCentroids(entries, k, rng);
    const assignments = new Int32Array(entries.length).fill(-1);

    for (let iter = 0; iter < maxIterations; iter++) {
        let changed = false;
        // assign
        for (let i = 0; i < entries.length; i++) {
            const best = nearestCentroid(entries[i], centroids).index;
            if (assignments[i] !== best) {
                assignments[i] = best;
                changed = true;
            }
        }
        if (!changed) break;

        // recompute centroids; an empty cluster keeps its previous centroid
        const sums = centroids.map(() => ({ r: 0, g: 0, b: 0, w: 0 }));
        for (let i = 0; i < entries.length; i++) {
            const s = sums[assignments[i]];
            const e = entries[i];
            s.r += e.r * e.count;
            s.g += e.g * e.count;
            s.b += e.b * e.count;
            s.w += e.count;
        }
        for (let c = 0; c < centroids.length; c++) {
            const s = sums[c];
            if (s.w > 0) centroids[c] = { r: s.r / s.w, g: s.g / s.w, b: s.b / s.w };
        }
    }

    let inertia = 0;
    for (let i = 0; i < entries.length; i++) {
        inertia += distanceSquared(entries[i], centroids[assignments[i]]) * entries[i].count;
    }
    return { centroids, assignments, inertia };
}

/** Sort clusters by descending weight; equal weights keep label order. */
export function sortPalette(palette: readonly ColorCluster[]): Palette {
    return [...palette].sort((a, b) => b.weight - a.weight || a.label - b.label);
}

export class ColorClusterer {
    readonly options: ClustererOptions;

    constructor(options: ClustererOptionsInput = {}) {
        this.options = parseOptions(clustererOptionsSchema, options, 'clusterer');
    }

    /**
     * Partition `pixels` into `k` clusters. Restarts share one seeded
     * generator, so a fixed seed reproduces the whole run.
     */
    fit(pixels: readonly PixelSample[], k: number = this.options.nColors): ClusteringResult {
        if (pixels.length === 0) return { clusters: [], labels: [], inertia: 0 };
        if (!Number.isInteger(k) || k < 1) {
            throw new ValidationError(`Cluster count must be a positive integer, got ${k}`);
        }
        if (k > pixels.length) {
            throw new ValidationError(
                `Cannot form ${k} clusters from ${pixels.length} pixel${pixels.length === 1 ? '' : 's'}`
            );
        }
        const bad = pixels.findIndex((p) => !isByteColor(p));
        if (bad !== -1) {
            throw new ValidationError(`Pixel ${bad} has a channel outside the integers 0-255`);
        }

        const { entries, pixelEntry } = buildHistogram(pixels);
        const rng = new SeededRandom(this.options.seed);

        let best: RunResult | null = null;
        for (let run = 0; run < this.options.nInit; run++) {
            const result = runKMeans(entries, k, this.options.maxIterations, rng);
            if (best === null || result.inertia < best.inertia) best = result;
        }
        if (best === null) throw new ValidationError('Clustering requires at least one restart');

        const counts = new Array<number>(k).fill(0);
        const labels = new Array<number>(pixels.length);
        for (let i = 0; i < pixels.length; i++) {
            const label = best.assignments[pixelEntry[i]];
            labels[i] = label;
            counts[label]++;
        }

        const clusters = best.centroids.map((color, label) => ({
            label,
            color,
            weight: counts[label] / pixels.length,
        }));

        console.debug(
            `[ColorClusterer] ${pixels.length} pixels (${entries.length} unique) -> ${k} clusters, ` +
                `inertia ${best.inertia.toFixed(2)} over ${this.options.nInit} restarts`
        );

        return { clusters, labels, inertia: best.inertia };
    }

    /** Same as `fit`, but only the palette, sorted by descending weight. */
    fitSorted(pixels: readonly PixelSample[], k?: number): Palette {
        return sortPalette(this.fit(pixels, k).clusters);
    }
}

/**
 * Pool several pixel populations and cluster them together, to find a
 * palette shared across an image collection.
 */
export function clusterCombined(
    populations: readonly (readonly PixelSample[])[],
    nColors = 18,
    options: ClustererOptionsInput = {}
): Palette {
    const pooled: PixelSample[] = [];
    for (const population of populations) {
        for (const p of population) pooled.push(p);
    }
    if (pooled.length === 0) return [];

    const clusterer = new ColorClusterer({ nInit: 20, ...options, nColors });
    return clusterer.fitSorted(pooled);
}
