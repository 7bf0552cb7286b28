import { Howl } from 'howler';
import { LogHandler } from '@/utilities/log-handler';
import { ORIGIN } from './audio-definitions';
import type { AudioVoice, SoundKey, Vec3, VoiceFactory } from './audio-definitions';
import type { ClipResolver } from './catalog-source';
import { SfxInvariantError } from './sfx-errors';

/**
 * A loaded sound file. Length reads 0 until Howler has decoded it; sounds
 * played before that are released by the stopped-check instead of the timer,
 * and HowlVoice reports them as playing while Howler still holds them queued.
 */
export class HowlClip {
    constructor(
        public readonly name: string,
        public readonly howl: Howl
    ) {}

    public get length(): number {
        return this.howl.duration();
    }
}

export interface HowlClipResolverOptions {
    /** Prefixed to every clip reference. Default: '' */
    basePath?: string;
    /** Passed to Howler when the file extension does not tell the format */
    format?: string[];
}

/**
 * Clip resolver that creates one Howl per reference and reuses it on later
 * rebuilds. Created with neutral volume; volume and rate are set per play.
 */
export function createHowlClipResolver(options: HowlClipResolverOptions = {}): ClipResolver<HowlClip> {
    const log = new LogHandler('HowlClips');
    const clips = new Map<string, HowlClip>();
    const basePath = options.basePath ?? '';

    return (clipRef: string, sound: SoundKey): HowlClip | null => {
        const cached = clips.get(clipRef);
        if (cached) return cached;

        if (clipRef.trim() === '') return null;

        const howl = new Howl({
            src: [basePath + clipRef],
            format: options.format,
            volume: 1.0,
            autoplay: false,
            onloaderror: (_id, err) => {
                log.child(clipRef).error(`Failed to load clip for '${sound}': ${String(err)}`);
            },
            onplayerror: (_id, err) => {
                log.child(clipRef).error(`Failed to play clip for '${sound}': ${String(err)}`);
            },
        });

        const clip = new HowlClip(clipRef, howl);
        clips.set(clipRef, clip);
        return clip;
    };
}

/**
 * One voice backed by Howler. A voice plays one clip at a time and keeps the
 * id Howler gives back, so several voices can share one Howl.
 *
 * Howler cannot play backwards: negative pitch plays forward at the same
 * speed. Rates are clamped to Howler's supported range.
 */
export class HowlVoice implements AudioVoice<HowlClip> {
    private static readonly MIN_RATE = 0.5;
    private static readonly MAX_RATE = 4.0;

    private clip: HowlClip | null = null;
    private playId: number | null = null;
    /** play() was queued by Howler until the file finishes loading */
    private pending = false;
    private rate = 1;
    private volume = 1;
    private position: Vec3 = ORIGIN;

    constructor(public readonly name: string) {}

    public configure(clip: HowlClip, pitch: number, volume: number): void {
        this.clip = clip;
        this.playId = null;
        this.pending = false;
        this.rate = Math.min(Math.max(Math.abs(pitch), HowlVoice.MIN_RATE), HowlVoice.MAX_RATE);
        this.volume = volume;
    }

    public playbackRate(): number {
        return this.rate;
    }

    public play(): void {
        const clip = this.clip;
        if (!clip) {
            throw new SfxInvariantError(`${this.name} played without a clip`);
        }

        const id = clip.howl.play();
        clip.howl.rate(this.rate, id);
        clip.howl.volume(this.volume, id);
        clip.howl.pos(this.position.x, this.position.y, this.position.z, id);
        this.playId = id;

        // A queued play is not reported by playing(id) until it really starts
        this.pending = clip.howl.state() !== 'loaded';
        if (this.pending) {
            const settle = (): void => {
                clip.howl.off('play', settle, id);
                clip.howl.off('loaderror', settle);
                if (this.playId === id) this.pending = false;
            };
            clip.howl.once('play', settle, id);
            clip.howl.once('loaderror', settle);
        }
    }

    public stop(): void {
        this.pending = false;
        if (this.clip && this.playId !== null) {
            this.clip.howl.stop(this.playId);
        }
    }

    public isPlaying(): boolean {
        if (!this.clip || this.playId === null) return false;
        return this.pending || this.clip.howl.playing(this.playId);
    }

    public getPosition(): Vec3 {
        return this.position;
    }

    public setPosition(position: Vec3): void {
        this.position = { x: position.x, y: position.y, z: position.z };
        if (this.clip && this.playId !== null) {
            this.clip.howl.pos(position.x, position.y, position.z, this.playId);
        }
    }
}

/** Voices named sfx-voice-1, sfx-voice-2, ... */
export const howlVoiceFactory: VoiceFactory<HowlClip> = {
    create: (index: number) => new HowlVoice(`sfx-voice-${index}`),
};
