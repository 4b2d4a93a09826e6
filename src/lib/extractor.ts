/**
 * Dominant color extraction for single images and image collections.
 *
 * Near-gray pixels are filtered out before clustering so that backgrounds
 * and neutral tones do not crowd out the actual colors.
 */

import type { ImagePalette, Palette, PixelSample, PixelSource, ProgressOptions } from '@/types';
import { ColorClusterer } from './clustering';
import { rgbToHex } from './colorUtils';
import {
    extractorOptionsSchema,
    parseOptions,
    type ExtractorOptions,
    type ExtractorOptionsInput,
} from './config';
import { filterGrayPixels, loadPopulations } from './corpus';
import { errorMessage } from './errors';

export function paletteToHex(palette: Palette): string[] {
    return palette.map((c) => rgbToHex(c.color));
}

export class ColorExtractor {
    readonly options: ExtractorOptions;
    private readonly clusterer: ColorClusterer;

    constructor(options: ExtractorOptionsInput = {}) {
        this.options = parseOptions(extractorOptionsSchema, options, 'extractor');
        const { nColors, nInit, maxIterations, seed } = this.options;
        this.clusterer = new ColorClusterer({ nColors, nInit, maxIterations, seed });
    }

    /** Sorted palette for one population; empty when nothing survives the gray filter. */
    extractFromPixels(pixels: readonly PixelSample[]): Palette {
        const colored = filterGrayPixels(pixels, this.options.grayThreshold);
        if (colored.length === 0) return [];
        return this.clusterer.fitSorted(colored);
    }

    /** One palette for all sources pooled together. Unreadable or all-gray sources are left out. */
    async extractCombined(sources: readonly PixelSource[], opts: ProgressOptions = {}): Promise<Palette> {
        const { populations } = await loadPopulations(sources, opts);
        const pooled: PixelSample[] = [];
        for (const { pixels } of populations) {
            for (const p of filterGrayPixels(pixels, this.options.grayThreshold)) pooled.push(p);
        }
        if (pooled.length === 0) return [];
        return this.clusterer.fitSorted(pooled);
    }

    /** A separate palette per source. Sources that fail to load or cluster are skipped. */
    async extractPerImage(
        sources: readonly PixelSource[],
        opts: ProgressOptions = {}
    ): Promise<ImagePalette[]> {
        const { populations } = await loadPopulations(sources, opts);
        const results: ImagePalette[] = [];
        for (const { name, pixels } of populations) {
            try {
                const palette = this.extractFromPixels(pixels);
                if (palette.length > 0) results.push({ name, palette });
            } catch (err) {
                console.warn(`[ColorExtractor] Skipping ${name}: ${errorMessage(err)}`);
            }
        }
        return results;
    }
}
