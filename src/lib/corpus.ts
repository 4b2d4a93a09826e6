// Pixel population helpers: RGBA buffers in and out, gray filtering, and
// loading a list of sources where any single source may fail.

import type { PixelSample, PixelSource, ProgressOptions } from '@/types';
import { corpusOptionsSchema, parseOptions, type CorpusOptionsInput } from './config';
import { channelSpread } from './colorUtils';
import { errorMessage } from './errors';

export interface LoadedPopulation {
    name: string;
    pixels: readonly PixelSample[];
}

export interface LoadFailure {
    name: string;
    error: string;
}

export interface LoadReport {
    populations: LoadedPopulation[];
    failed: LoadFailure[];
}

/**
 * Read an RGBA byte buffer (e.g. `ImageData.data` or a decoder's raw output)
 * into pixel samples. Fully transparent pixels are dropped unless
 * `skipTransparent` is false.
 */
export function pixelsFromRgba(
    data: Uint8ClampedArray | Uint8Array,
    options: Pick<CorpusOptionsInput, 'skipTransparent'> = {}
): PixelSample[] {
    const { skipTransparent } = parseOptions(corpusOptionsSchema, options, 'corpus');
    const pixels: PixelSample[] = [];
    for (let i = 0; i + 3 < data.length; i += 4) {
        if (skipTransparent && data[i + 3] === 0) continue;
        pixels.push({ r: data[i], g: data[i + 1], b: data[i + 2] });
    }
    return pixels;
}

/** Pack pixels into an opaque RGBA buffer, rounding and clamping channels. */
export function toRgba(pixels: readonly PixelSample[]): Uint8ClampedArray {
    const out = new Uint8ClampedArray(pixels.length * 4);
    for (let i = 0; i < pixels.length; i++) {
        const p = pixels[i];
        out[i * 4] = p.r;
        out[i * 4 + 1] = p.g;
        out[i * 4 + 2] = p.b;
        out[i * 4 + 3] = 255;
    }
    return out;
}

export function isNearGray(pixel: PixelSample, threshold: number): boolean {
    return channelSpread(pixel) < threshold;
}

/** Keep only pixels whose max-min channel spread reaches `threshold`. */
export function filterGrayPixels(pixels: readonly PixelSample[], threshold = 1): PixelSample[] {
    return pixels.filter((p) => !isNearGray(p, threshold));
}

/**
 * Load every source in order. A source that throws (or rejects) is recorded
 * in `failed` and skipped; the remaining sources are still loaded.
 */
export async function loadPopulations(
    sources: readonly PixelSource[],
    opts: ProgressOptions = {}
): Promise<LoadReport> {
    const report: LoadReport = { populations: [], failed: [] };
    const total = sources.length;

    for (let i = 0; i < total; i++) {
        const source = sources[i];
        opts.onProgress?.(i, total, source.name);
        try {
            const pixels = await source.load();
            report.populations.push({ name: source.name, pixels });
        } catch (err) {
            const error = errorMessage(err);
            console.warn(`[PixelCorpus] Skipping ${source.name}: ${error}`);
            report.failed.push({ name: source.name, error });
        }
    }

    opts.onProgress?.(total, total);
    return report;
}
