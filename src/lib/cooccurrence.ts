/**
 * Pairwise color presence across an image collection.
 *
 * A pair (i, j) is credited for an image when at least one of the two colors
 * is found in it, not only when both are. The matrix therefore measures
 * presence agreement rather than strict joint occurrence.
 */

import type { CooccurrenceMatrix, CorpusItem, PixelSample, ProgressOptions, RGB } from '@/types';
import {
    cooccurrenceOptionsSchema,
    parseOptions,
    type CooccurrenceOptions,
    type CooccurrenceOptionsInput,
} from './config';
import { distanceSquared } from './colorUtils';
import { errorMessage } from './errors';

function emptyMatrix(n: number): CooccurrenceMatrix {
    return Array.from({ length: n }, () => new Array<number>(n).fill(0));
}

export interface AnalyzeOptions extends ProgressOptions {
    /** Per-call distance threshold; defaults to the engine's `distanceThreshold`. */
    threshold?: number;
}

export class CooccurrenceEngine {
    readonly options: CooccurrenceOptions;

    constructor(options: CooccurrenceOptionsInput = {}) {
        this.options = parseOptions(cooccurrenceOptionsSchema, options, 'co-occurrence');
    }

    /** True if some pixel lies within `threshold` (Euclidean RGB) of `color`. */
    isPresent(
        pixels: readonly PixelSample[],
        color: RGB,
        threshold: number = this.options.distanceThreshold
    ): boolean {
        if (threshold < 0) return false;
        const limit = threshold * threshold;
        for (const p of pixels) {
            if (distanceSquared(p, color) <= limit) return true;
        }
        return false;
    }

    /** Logical OR of `isPresent` across `colors`. */
    anyPresent(
        pixels: readonly PixelSample[],
        colors: readonly RGB[],
        threshold: number = this.options.distanceThreshold
    ): boolean {
        return colors.some((c) => this.isPresent(pixels, c, threshold));
    }

    /**
     * Build the presence-agreement matrix for `colors` over `corpora`.
     * Items whose loader throws are skipped and left out of the divisor.
     */
    analyze(
        corpora: readonly CorpusItem[],
        colors: readonly RGB[],
        opts: AnalyzeOptions = {}
    ): CooccurrenceMatrix {
        const threshold = opts.threshold ?? this.options.distanceThreshold;
        const n = colors.length;
        const counts = emptyMatrix(n);
        const total = corpora.length;
        let processed = 0;

        for (let idx = 0; idx < total; idx++) {
            opts.onProgress?.(idx, total);

            let pixels: readonly PixelSample[];
            try {
                const item = corpora[idx];
                pixels = typeof item === 'function' ? item() : item;
            } catch (err) {
                console.warn(`[CooccurrenceEngine] Skipping corpus item ${idx}: ${errorMessage(err)}`);
                continue;
            }
            processed++;

            // anyPresent over a pair is the OR of the two single-color checks
            const present = colors.map((c) => this.isPresent(pixels, c, threshold));
            if (!present.some(Boolean)) continue;

            for (let i = 0; i < n; i++) {
                for (let j = i + 1; j < n; j++) {
                    if (present[i] || present[j]) {
                        counts[i][j]++;
                        counts[j][i]++;
                    }
                }
            }
        }
        opts.onProgress?.(total, total);

        if (processed === 0) return counts;
        return counts.map((row) => row.map((v) => v / processed));
    }

    /** Render a matrix as fixed-precision rows, one per line. */
    static format(matrix: CooccurrenceMatrix, precision = 2): string {
        const lines = ['['];
        for (const row of matrix) {
            lines.push(`    [${row.map((v) => v.toFixed(precision)).join(', ')}],`);
        }
        lines.push(']');
        return lines.join('\n');
    }
}
