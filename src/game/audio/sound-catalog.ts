import { isNoSound } from './audio-definitions';
import type { PlayableVariant, SoundClip, SoundKey, SoundVariant } from './audio-definitions';
import type { SfxObserver } from './sfx-observer';

function hasClip<TClip extends SoundClip>(variant: SoundVariant<TClip>): variant is PlayableVariant<TClip> {
    return variant.clip !== null && variant.clip !== undefined;
}

/**
 * Volume must be non-negative, and both ranges ordered. Pitch may go below
 * zero (reverse playback on voices that support it).
 */
function hasValidRanges(variant: SoundVariant): boolean {
    const values = [variant.volumeLow, variant.volumeHigh, variant.pitchLow, variant.pitchHigh];
    if (!values.every(Number.isFinite)) return false;
    return variant.volumeLow >= 0
        && variant.volumeLow <= variant.volumeHigh
        && variant.pitchLow <= variant.pitchHigh;
}

/**
 * Lookup from sound type to its registered variants.
 *
 * build() takes a snapshot: each accepted variant is copied once into a frozen
 * record the catalog owns, so later edits to the source only show up after the
 * next build. Rejected entries are reported to the observer and skipped.
 */
export class SoundCatalog<TClip extends SoundClip = SoundClip> {
    private variants = new Map<SoundKey, PlayableVariant<TClip>[]>();

    constructor(private readonly observer?: SfxObserver) {}

    /**
     * Clear and repopulate from `source`.
     * @param knownSounds when given, declared sound types left without variants are reported
     */
    public build(source: readonly SoundVariant<TClip>[], knownSounds?: readonly SoundKey[]): void {
        this.variants.clear();

        source.forEach((variant, index) => {
            if (isNoSound(variant.sound)) {
                this.observer?.variantSkipped?.(variant.sound, 'no-sound', index);
                return;
            }
            if (!hasClip(variant)) {
                this.observer?.variantSkipped?.(variant.sound, 'missing-clip', index);
                return;
            }
            if (!hasValidRanges(variant)) {
                this.observer?.variantSkipped?.(variant.sound, 'invalid-range', index);
                return;
            }

            const entry: PlayableVariant<TClip> = Object.freeze({
                sound: variant.sound,
                clip: variant.clip,
                volumeLow: variant.volumeLow,
                volumeHigh: variant.volumeHigh,
                pitchLow: variant.pitchLow,
                pitchHigh: variant.pitchHigh,
            });

            const list = this.variants.get(variant.sound);
            if (list) {
                list.push(entry);
            } else {
                this.variants.set(variant.sound, [entry]);
            }
        });

        if (this.variants.size === 0) {
            this.observer?.emptyCatalog?.();
        }

        if (knownSounds) {
            const missing = this.checkCompleteness(knownSounds);
            if (missing.length > 0) {
                this.observer?.unassignedSoundTypes?.(missing);
            }
        }
    }

    /**
     * Declared sound types that have no variant, in declaration order.
     * Purely diagnostic; playback never consults it.
     */
    public checkCompleteness(allSounds: readonly SoundKey[]): SoundKey[] {
        const missing = new Set<SoundKey>();
        for (const sound of allSounds) {
            if (isNoSound(sound) || this.variants.has(sound)) continue;
            missing.add(sound);
        }
        return [...missing];
    }

    public get(sound: SoundKey): readonly PlayableVariant<TClip>[] | undefined {
        return this.variants.get(sound);
    }

    public has(sound: SoundKey): boolean {
        return this.variants.has(sound);
    }

    public keys(): SoundKey[] {
        return [...this.variants.keys()];
    }

    /** Sound type -> number of variants */
    public variantCounts(): Map<SoundKey, number> {
        const counts = new Map<SoundKey, number>();
        for (const [sound, list] of this.variants) {
            counts.set(sound, list.length);
        }
        return counts;
    }

    /** Number of playable sound types */
    public get size(): number {
        return this.variants.size;
    }
}
