import type { RGB } from '../types';

/** Candidate pool used by the genetic optimizer when none is supplied. */
export const DEFAULT_COLORS: readonly RGB[] = [
    { r: 171, g: 162, b: 157 }, // warm gray
    { r: 175, g: 186, b: 196 }, // cool gray
    { r: 211, g: 196, b: 182 }, // sand
    { r: 84, g: 33, b: 35 }, // oxblood
    { r: 216, g: 160, b: 80 }, // ochre
    { r: 86, g: 86, b: 69 }, // olive
    { r: 229, g: 170, b: 72 }, // marigold
    { r: 0, g: 0, b: 0 },
    { r: 255, g: 255, b: 255 },
];

export const NEUTRAL_SCORE = 5.0;
