/**
 * Seeded random number generator for sound variation.
 *
 * Uses the Mulberry32 algorithm. Variant choice and pitch/volume jitter all
 * draw from one instance owned by the SoundManager, so a fixed seed replays
 * the exact same sequence of sounds (which is what the tests rely on).
 *
 * ```typescript
 * const rng = new SeededRng(12345);
 * rng.next();              // 0.0 to 1.0
 * rng.nextInt(3);          // 0 to 2
 * rng.nextFloat(0.9, 1.1); // 0.9 to 1.1
 * rng.pick(variants);      // random element
 * ```
 */
export class SeededRng {
    private state: number;

    /**
     * @param seed Initial seed value (will be converted to 32-bit integer)
     */
    constructor(seed: number) {
        this.state = seed >>> 0;
        // Warm up the generator (first few values can be low quality)
        for (let i = 0; i < 10; i++) {
            this.next();
        }
    }

    getState(): number {
        return this.state;
    }

    setState(state: number): void {
        this.state = state >>> 0;
    }

    /**
     * Generate the next random float in [0, 1).
     */
    next(): number {
        let t = (this.state += 0x6D2B79F5);
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    /**
     * Generate a random integer in [0, max).
     * @param max Exclusive upper bound
     */
    nextInt(max: number): number {
        return Math.floor(this.next() * max);
    }

    /**
     * Uniform float between low and high. Returns exactly `low` when the
     * bounds are equal, so fixed ranges stay fixed.
     */
    nextFloat(low: number, high: number): number {
        if (low === high) return low;
        return low + this.next() * (high - low);
    }

    /**
     * Pick a random element from an array.
     * @returns The selected element, or undefined if array is empty
     */
    pick<T>(array: readonly T[]): T | undefined {
        if (array.length === 0) return undefined;
        return array[this.nextInt(array.length)];
    }
}

/** Default seed used when settings don't name one */
export const DEFAULT_SFX_SEED = 12345;

export function createSfxRng(seed: number = DEFAULT_SFX_SEED): SeededRng {
    return new SeededRng(seed);
}
