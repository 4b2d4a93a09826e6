/**
 * Shared color utility functions.
 */

import type { RGB } from '@/types';

/** Convert hex color to RGB */
export function hexToRgb(hex: string): RGB {
    const h = hex.replace(/^#/, '');
    return {
        r: parseInt(h.slice(0, 2), 16) || 0,
        g: parseInt(h.slice(2, 4), 16) || 0,
        b: parseInt(h.slice(4, 6), 16) || 0,
    };
}

/** Convert RGB to hex, rounding fractional channels */
export function rgbToHex(rgb: RGB): string {
    const toHex = (n: number) => clampChannel(Math.round(n)).toString(16).padStart(2, '0');
    return `#${toHex(rgb.r)}${toHex(rgb.g)}${toHex(rgb.b)}`;
}

export function clampChannel(v: number): number {
    return Math.max(0, Math.min(255, v));
}

export function distanceSquared(a: RGB, b: RGB): number {
    const dr = a.r - b.r;
    const dg = a.g - b.g;
    const db = a.b - b.b;
    return dr * dr + dg * dg + db * db;
}

/** Euclidean distance in RGB space */
export function distance(a: RGB, b: RGB): number {
    return Math.sqrt(distanceSquared(a, b));
}

/** Spread between the largest and smallest channel; 0 for pure grays. */
export function channelSpread(c: RGB): number {
    return Math.max(c.r, c.g, c.b) - Math.min(c.r, c.g, c.b);
}

/** True when every channel is an integer in 0-255. */
export function isByteColor(c: RGB): boolean {
    const ok = (v: number) => Number.isInteger(v) && v >= 0 && v <= 255;
    return ok(c.r) && ok(c.g) && ok(c.b);
}

/** Pack an integer RGB triplet into a single 24-bit key. */
export function rgbKey(c: RGB): number {
    return (c.r << 16) | (c.g << 8) | c.b;
}

export function copyRgb(c: RGB): RGB {
    return { r: c.r, g: c.g, b: c.b };
}
