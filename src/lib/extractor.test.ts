import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { PixelSample, PixelSource } from '@/types';
import { ColorExtractor, paletteToHex } from './extractor';

const RED = { r: 255, g: 0, b: 0 };
const GREEN = { r: 0, g: 255, b: 0 };
const BLUE = { r: 0, g: 0, b: 255 };
const GRAY = { r: 128, g: 128, b: 128 };

const repeat = (c: PixelSample, n: number) => Array.from({ length: n }, () => ({ ...c }));

const source = (name: string, pixels: PixelSample[]): PixelSource => ({ name, load: () => pixels });
const broken: PixelSource = {
    name: 'broken.jpg',
    load: () => {
        throw new Error('unsupported format');
    },
};

beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
});

afterEach(() => {
    vi.restoreAllMocks();
});

describe('ColorExtractor.extractFromPixels', () => {
    const extractor = new ColorExtractor({ nColors: 2, seed: 3 });

    it('filters gray pixels before clustering', () => {
        const palette = extractor.extractFromPixels([...repeat(RED, 50), ...repeat(GRAY, 100), ...repeat(BLUE, 50)]);
        expect(palette.map((c) => c.weight)).toEqual([0.5, 0.5]);
        expect(paletteToHex(palette).sort()).toEqual(['#0000ff', '#ff0000']);
    });

    it('returns an empty palette for an all-gray image', () => {
        expect(extractor.extractFromPixels(repeat(GRAY, 20))).toEqual([]);
    });
});

describe('ColorExtractor.extractCombined', () => {
    it('pools readable sources and ignores broken or gray ones', async () => {
        const extractor = new ColorExtractor({ nColors: 2, seed: 4 });
        const palette = await extractor.extractCombined([
            source('red.png', repeat(RED, 30)),
            broken,
            source('gray.png', repeat(GRAY, 500)),
            source('blue.png', repeat(BLUE, 30)),
        ]);

        expect(palette.map((c) => c.weight)).toEqual([0.5, 0.5]);
        expect(paletteToHex(palette).sort()).toEqual(['#0000ff', '#ff0000']);
        expect(console.warn).toHaveBeenCalledWith('[PixelCorpus] Skipping broken.jpg: unsupported format');
    });

    it('returns an empty palette when nothing is left', async () => {
        const extractor = new ColorExtractor({ nColors: 2 });
        expect(await extractor.extractCombined([broken, source('gray.png', repeat(GRAY, 5))])).toEqual([]);
    });
});

describe('ColorExtractor.extractPerImage', () => {
    it('returns one sorted palette per usable source', async () => {
        const extractor = new ColorExtractor({ nColors: 2, seed: 6 });
        const results = await extractor.extractPerImage([
            source('mostly-red.png', [...repeat(RED, 30), ...repeat(GREEN, 10)]),
            broken,
            source('gray.png', repeat(GRAY, 10)),
            source('tiny.png', [RED, GRAY]),
        ]);

        expect(results).toHaveLength(1);
        expect(results[0].name).toBe('mostly-red.png');
        expect(results[0].palette.map((c) => c.weight)).toEqual([0.75, 0.25]);
        expect(paletteToHex(results[0].palette)).toEqual(['#ff0000', '#00ff00']);
        // tiny.png has a single colored pixel, too few for two clusters
        expect(console.warn).toHaveBeenCalledWith(
            '[ColorExtractor] Skipping tiny.png: Cannot form 2 clusters from 1 pixel'
        );
    });
});
