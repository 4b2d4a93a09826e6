/**
 * LCG (Linear Congruential Generator) for deterministic random numbers.
 * Uses parameters from Numerical Recipes (a=1664525, c=1013904223, m=2^32).
 */
export class SeededRandom {
    private state: number;

    constructor(seed: number = Date.now()) {
        this.state = seed >>> 0; // Ensure unsigned 32-bit
    }

    /** Generate random float in [0, 1) */
    next(): number {
        this.state = (this.state * 1664525 + 1013904223) >>> 0;
        return this.state / 0x100000000;
    }

    /** Generate random integer in [min, max) */
    nextInt(min: number, max: number): number {
        return Math.floor(this.next() * (max - min)) + min;
    }

    /** Generate random float in [min, max] */
    uniform(min: number, max: number): number {
        return min + this.next() * (max - min);
    }

    /** Shuffle a copy of the array using Fisher-Yates */
    shuffle<T>(array: readonly T[]): T[] {
        const arr = [...array];
        for (let i = arr.length - 1; i > 0; i--) {
            const j = this.nextInt(0, i + 1);
            [arr[i], arr[j]] = [arr[j], arr[i]];
        }
        return arr;
    }

    /** Pick `count` distinct values from the array, in draw order */
    sample<T>(array: readonly T[], count: number): T[] {
        return this.shuffle(array).slice(0, Math.min(count, array.length));
    }

    /**
     * Pick an index with probability proportional to its weight.
     * Zero-weight entries are never returned while some weight is positive.
     */
    weightedIndex(weights: readonly number[]): number {
        let total = 0;
        let last = -1;
        for (let i = 0; i < weights.length; i++) {
            if (weights[i] > 0) {
                total += weights[i];
                last = i;
            }
        }
        if (last < 0) return this.nextInt(0, weights.length);

        let pick = this.next() * total;
        for (let i = 0; i < weights.length; i++) {
            if (weights[i] <= 0) continue;
            pick -= weights[i];
            if (pick < 0) return i;
        }
        // float drift can leave a tiny positive remainder
        return last;
    }
}
