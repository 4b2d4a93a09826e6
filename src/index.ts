export type * from './types';
export { DEFAULT_COLORS, NEUTRAL_SCORE } from './data/defaultColors';
export { ColorClusterer, clusterCombined, sortPalette } from './lib/clustering';
export { CooccurrenceEngine } from './lib/cooccurrence';
export type { AnalyzeOptions } from './lib/cooccurrence';
export {
    GeneticColorOptimizer,
    mutateScheme,
    rouletteSelect,
    twoPointCrossover,
} from './lib/genetic';
export { ColorExtractor, paletteToHex } from './lib/extractor';
export {
    filterGrayPixels,
    isNearGray,
    loadPopulations,
    pixelsFromRgba,
    toRgba,
    type LoadFailure,
    type LoadReport,
    type LoadedPopulation,
} from './lib/corpus';
export { hexToRgb, rgbToHex, distance } from './lib/colorUtils';
export { SeededRandom } from './lib/random';
export { ValidationError } from './lib/errors';
export type {
    ClustererOptionsInput,
    CooccurrenceOptionsInput,
    ExtractorOptionsInput,
    GeneticOptionsInput,
} from './lib/config';
