/** RGB color (0-255 range). Pixel samples are integers, cluster centroids may be fractional. */
export interface RGB {
    r: number;
    g: number;
    b: number;
}

/** One pixel; clustering requires integer channels in 0-255. */
export type PixelSample = RGB;

/** One representative color of a clustering run. */
export interface ColorCluster {
    label: number; // cluster index within the run that produced it
    color: RGB;
    weight: number; // fraction of input pixels assigned to this cluster (0-1)
}

export type Palette = ColorCluster[];

export interface ClusteringResult {
    clusters: ColorCluster[]; // in label order
    labels: number[]; // one cluster index per input pixel
    inertia: number; // sum of squared distances to the assigned centroid
}

/** Position i is the color substituted for cluster label i. */
export type Scheme = RGB[];

export interface Individual {
    scheme: Scheme;
    score: number;
}

export interface GenerationRecord {
    generation: number;
    average: number;
    best: number;
}

export type CooccurrenceMatrix = number[][];

/** Called with a zero-based index before each item and once with (total, total) when done. */
export type ProgressCallback = (current: number, total: number, name?: string) => void;

export interface ProgressOptions {
    onProgress?: ProgressCallback;
}

/** A named pixel population that may need I/O to produce. */
export interface PixelSource {
    name: string;
    load: () => readonly PixelSample[] | Promise<readonly PixelSample[]>;
}

/** A corpus item for co-occurrence analysis: pixels, or a loader that may throw. */
export type CorpusItem = readonly PixelSample[] | (() => readonly PixelSample[]);

export interface ImagePalette {
    name: string;
    palette: Palette;
}
