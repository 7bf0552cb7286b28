/**
 * Sound types are plain strings supplied by the host game. 'None' is reserved
 * as the "nothing selected" value and can never be played or registered.
 */
export type SoundKey = string;

export const NO_SOUND: SoundKey = 'None';

/** True for the reserved sentinel (and the empty string, which means the same) */
export function isNoSound(sound: SoundKey): boolean {
    return sound === NO_SOUND || sound === '';
}

export interface Vec3 {
    readonly x: number;
    readonly y: number;
    readonly z: number;
}

export const ORIGIN: Vec3 = Object.freeze({ x: 0, y: 0, z: 0 });

export function vec3(x: number, y: number, z = 0): Vec3 {
    return { x, y, z };
}

/** A decoded, ready-to-play sound buffer. Only its length matters here. */
export interface SoundClip {
    readonly name: string;
    /** Length in seconds at pitch 1 */
    readonly length: number;
}

/**
 * One registered variation of a sound type. Several variants of the same type
 * make repeated plays of that type sound different.
 */
export interface SoundVariant<TClip extends SoundClip = SoundClip> {
    readonly sound: SoundKey;
    /** Null/undefined when the clip could not be resolved; such variants are skipped */
    readonly clip: TClip | null | undefined;
    readonly volumeLow: number;
    readonly volumeHigh: number;
    readonly pitchLow: number;
    readonly pitchHigh: number;
}

/** A variant that survived catalog validation */
export interface PlayableVariant<TClip extends SoundClip = SoundClip> extends SoundVariant<TClip> {
    readonly clip: TClip;
}

/**
 * The audio primitive a handle drives: one reusable voice that plays one clip
 * at a time and owns a mutable 3-D position.
 */
export interface AudioVoice<TClip extends SoundClip = SoundClip> {
    readonly name: string;
    configure(clip: TClip, pitch: number, volume: number): void;
    /**
     * Speed the configured clip will actually play at, for voices that cannot
     * honour every pitch. Without it the pitch is taken as given.
     */
    playbackRate?(): number;
    play(): void;
    stop(): void;
    isPlaying(): boolean;
    getPosition(): Vec3;
    setPosition(position: Vec3): void;
}

/** Creates voices when the pool grows */
export interface VoiceFactory<TClip extends SoundClip = SoundClip> {
    /** @param index 1-based running number of the voice within its pool */
    create(index: number): AudioVoice<TClip>;
}

/** Something that moves, e.g. a projectile a sound should stick to */
export interface PositionSource {
    readonly position: Vec3;
}

export type SpatialMode =
    | { readonly kind: 'none' }
    | { readonly kind: 'fixed'; readonly position: Vec3 }
    | { readonly kind: 'following'; readonly target: PositionSource };

export const NON_SPATIAL: SpatialMode = Object.freeze({ kind: 'none' });

export interface PlayRequest {
    sound: SoundKey;
    /** Multiplier applied on top of the variant's random volume. Default: 1 */
    volume?: number;
    /** Multiplier applied on top of the variant's random pitch. Default: 1 */
    pitch?: number;
    spatial?: SpatialMode;
    /** Invoked once, after the voice is back in the pool */
    onFinished?: (sound: SoundKey) => void;
}

export type PlayFailureReason = 'invalid_sound_type' | 'unknown_sound_type' | 'pool_exhausted' | 'voice_failed';
