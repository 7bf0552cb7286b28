import type { SoundClip, SoundKey, Vec3 } from './audio-definitions';
import type { SfxHandle } from './sfx-handle';

/**
 * One play request, as returned to the caller.
 *
 * Handles are pooled and go on to play other requests, so callers never get
 * the handle itself. A playback only reaches its handle while the handle is
 * still on the cycle this request started; after that it is finished for
 * good and stop() does nothing.
 */
export class SfxPlayback<TClip extends SoundClip = SoundClip> {
    constructor(
        private readonly handle: SfxHandle<TClip>,
        private readonly cycleId: number,
        public readonly sound: SoundKey,
        public readonly volume: number,
        public readonly pitch: number,
        /** Seconds the sound is expected to play */
        public readonly duration: number,
        /** Resolves with the sound type once the voice is back in the pool */
        public readonly finished: Promise<SoundKey>
    ) {}

    /** Pool handle id, as carried by the sfx:* events */
    public get handleId(): number {
        return this.handle.id;
    }

    public get voiceName(): string {
        return this.handle.name;
    }

    public get isPlaying(): boolean {
        return this.isCurrent && this.handle.state === 'playing';
    }

    /** Position of the voice while this request plays, null afterwards */
    public get position(): Vec3 | null {
        return this.isCurrent ? this.handle.position : null;
    }

    /**
     * Cut the sound short. Completion fires right away.
     * @returns false when this request had already finished
     */
    public stop(): boolean {
        if (!this.isPlaying) return false;
        this.handle.stopNow();
        return true;
    }

    private get isCurrent(): boolean {
        return this.handle.playbackId === this.cycleId;
    }
}
