import type { SeededRng } from '@/game/rng';
import type { PlayableVariant, SoundClip } from './audio-definitions';
import { SfxInvariantError } from './sfx-errors';

export interface PlaybackParams {
    volume: number;
    pitch: number;
}

/**
 * Picks which variant to play and jitters its pitch and volume.
 */
export class VariantSelector {
    constructor(private readonly rng: SeededRng) {}

    /** Uniformly random variant. The catalog never hands out an empty list. */
    public pick<TClip extends SoundClip>(variants: readonly PlayableVariant<TClip>[]): PlayableVariant<TClip> {
        const variant = this.rng.pick(variants);
        if (!variant) {
            throw new SfxInvariantError('Cannot pick from an empty variant list');
        }
        return variant;
    }

    /**
     * Fresh, independent draws from the variant's ranges, scaled by the
     * request multipliers.
     */
    public derive(variant: PlayableVariant, volumeMultiplier = 1, pitchMultiplier = 1): PlaybackParams {
        const volume = this.rng.nextFloat(variant.volumeLow, variant.volumeHigh) * volumeMultiplier;
        const pitch = this.rng.nextFloat(variant.pitchLow, variant.pitchHigh) * pitchMultiplier;
        return { volume, pitch };
    }
}
