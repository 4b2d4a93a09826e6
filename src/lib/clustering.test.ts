import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { PixelSample } from '@/types';
import { ColorClusterer, clusterCombined, sortPalette } from './clustering';
import { ValidationError } from './errors';
import { SeededRandom } from './random';

const RED = { r: 255, g: 0, b: 0 };
const BLUE = { r: 0, g: 0, b: 255 };

function repeat(color: PixelSample, count: number): PixelSample[] {
    return Array.from({ length: count }, () => ({ ...color }));
}

function noisyPixels(count: number, seed: number): PixelSample[] {
    const rng = new SeededRandom(seed);
    return Array.from({ length: count }, () => ({
        r: rng.nextInt(0, 256),
        g: rng.nextInt(0, 256),
        b: rng.nextInt(0, 256),
    }));
}

beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
});

afterEach(() => {
    vi.restoreAllMocks();
});

describe('ColorClusterer.fit', () => {
    it('splits pure red and pure blue into two half-weight clusters', () => {
        const pixels = [...repeat(RED, 1000), ...repeat(BLUE, 1000)];
        const palette = new ColorClusterer({ seed: 7 }).fitSorted(pixels, 2);

        expect(palette).toHaveLength(2);
        expect(palette.map((c) => c.weight)).toEqual([0.5, 0.5]);
        // equal weights keep label order
        expect(palette.map((c) => c.label)).toEqual([0, 1]);
        expect(palette.map((c) => c.color)).toContainEqual(RED);
        expect(palette.map((c) => c.color)).toContainEqual(BLUE);
    });

    it('weights sum to one', () => {
        const result = new ColorClusterer({ nColors: 5, seed: 3 }).fit(noisyPixels(300, 1));
        const total = result.clusters.reduce((sum, c) => sum + c.weight, 0);

        expect(result.clusters).toHaveLength(5);
        expect(total).toBeCloseTo(1, 10);
        for (const c of result.clusters) {
            expect(c.weight).toBeGreaterThanOrEqual(0);
            expect(c.weight).toBeLessThanOrEqual(1);
        }
    });

    it('labels every pixel with the cluster whose weight counts it', () => {
        const pixels = [...repeat(RED, 30), ...repeat(BLUE, 10)];
        const { clusters, labels } = new ColorClusterer({ seed: 1 }).fit(pixels, 2);

        expect(labels).toHaveLength(40);
        const redLabel = labels[0];
        expect(clusters[redLabel].color).toEqual(RED);
        expect(clusters[redLabel].weight).toBe(0.75);
        expect(new Set(labels.slice(0, 30))).toEqual(new Set([redLabel]));
        expect(new Set(labels.slice(30))).toEqual(new Set([1 - redLabel]));
    });

    it('gives surplus clusters weight zero when there are fewer distinct colors than k', () => {
        const pixels = repeat({ r: 10, g: 20, b: 30 }, 10);
        const result = new ColorClusterer({ seed: 5 }).fit(pixels, 3);

        expect(result.clusters.map((c) => c.weight)).toEqual([1, 0, 0]);
        for (const c of result.clusters) expect(c.color).toEqual({ r: 10, g: 20, b: 30 });
        expect(result.inertia).toBe(0);
    });

    it('is reproducible for a fixed seed', () => {
        const pixels = noisyPixels(200, 9);
        const a = new ColorClusterer({ nColors: 4, seed: 42 }).fit(pixels);
        const b = new ColorClusterer({ nColors: 4, seed: 42 }).fit(pixels);
        expect(a).toEqual(b);
    });

    it('returns an empty result for an empty population', () => {
        const clusterer = new ColorClusterer();
        expect(clusterer.fit([])).toEqual({ clusters: [], labels: [], inertia: 0 });
        expect(clusterer.fitSorted([])).toEqual([]);
    });

    it('rejects more clusters than pixels', () => {
        expect(() => new ColorClusterer().fit(repeat(RED, 2), 3)).toThrow(ValidationError);
    });

    it('rejects pixels with fractional or out-of-range channels', () => {
        const clusterer = new ColorClusterer();
        expect(() =>
            clusterer.fit(
                [
                    { r: 10.9, g: 0, b: 0 },
                    { r: 10.1, g: 0, b: 0 },
                ],
                1
            )
        ).toThrow('Pixel 0 has a channel outside the integers 0-255');
        expect(() => clusterer.fit([RED, { r: 0, g: 256, b: 0 }], 1)).toThrow(ValidationError);
    });

    it('rejects invalid options', () => {
        expect(() => new ColorClusterer({ nInit: 0 })).toThrow(ValidationError);
        expect(() => new ColorClusterer({ nColors: 2.5 })).toThrow(/nColors/);
    });

    it('does not mutate the input pixels', () => {
        const pixels = noisyPixels(50, 4);
        const before = pixels.map((p) => ({ ...p }));
        new ColorClusterer({ nColors: 3, seed: 2 }).fit(pixels);
        expect(pixels).toEqual(before);
    });
});

describe('sortPalette', () => {
    const palette = [
        { label: 0, color: RED, weight: 0.2 },
        { label: 1, color: BLUE, weight: 0.5 },
        { label: 2, color: { r: 0, g: 255, b: 0 }, weight: 0.2 },
        { label: 3, color: { r: 9, g: 9, b: 9 }, weight: 0.1 },
    ];

    it('orders by descending weight with ties in label order', () => {
        expect(sortPalette(palette).map((c) => c.label)).toEqual([1, 0, 2, 3]);
    });

    it('is idempotent', () => {
        const once = sortPalette(palette);
        expect(sortPalette(once)).toEqual(once);
    });

    it('produces non-increasing weights for a real clustering', () => {
        const sorted = new ColorClusterer({ nColors: 6, seed: 8 }).fitSorted(noisyPixels(250, 2));
        for (let i = 1; i < sorted.length; i++) {
            expect(sorted[i].weight).toBeLessThanOrEqual(sorted[i - 1].weight);
        }
    });
});

describe('clusterCombined', () => {
    it('pools populations before clustering', () => {
        const palette = clusterCombined([repeat(RED, 20), repeat(BLUE, 20)], 2, { seed: 11 });
        expect(palette.map((c) => c.weight)).toEqual([0.5, 0.5]);
        expect(palette.map((c) => c.color)).toContainEqual(RED);
        expect(palette.map((c) => c.color)).toContainEqual(BLUE);
    });

    it('returns an empty palette when every population is empty', () => {
        expect(clusterCombined([[], []], 2)).toEqual([]);
    });
});
