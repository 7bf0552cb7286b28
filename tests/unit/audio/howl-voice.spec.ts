/**
 * Unit tests for the Howler backend
 *
 * Howl is mocked to verify which calls reach Howler for each play id.
 */
/* eslint-disable max-lines-per-function */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { HowlOptions } from 'howler';

type HowlEventListener = { event: string; callback: () => void; id?: number };

const howler = vi.hoisted(() => ({
    options: new Array<HowlOptions>(),
    listeners: new Array<HowlEventListener>(),
    loadState: 'loaded',
}));

// Mock Howler before importing the voice
vi.mock('howler', () => {
    const mockHowl = vi.fn().mockImplementation(function (options: HowlOptions) {
        howler.options.push(options);
        return {
            state: vi.fn(() => howler.loadState),
            once: vi.fn((event: string, callback: () => void, id?: number) => {
                howler.listeners.push({ event, callback, id });
            }),
            off: vi.fn(),
            play: vi.fn().mockReturnValue(7),
            stop: vi.fn(),
            rate: vi.fn(),
            volume: vi.fn(),
            pos: vi.fn(),
            playing: vi.fn().mockReturnValue(true),
            duration: vi.fn().mockReturnValue(2.5),
        };
    });

    return {
        Howl: mockHowl,
        Howler: {
            ctx: { state: 'running' },
        },
    };
});

// Must import after mock setup
import { Howl } from 'howler';
import { HowlVoice, createHowlClipResolver, howlVoiceFactory } from '@/game/audio/howl-voice';
import type { HowlClip } from '@/game/audio/howl-voice';
import { vec3 } from '@/game/audio/audio-definitions';
import { SfxInvariantError } from '@/game/audio/sfx-errors';
import { LogHandler } from '@/utilities/log-handler';

describe('createHowlClipResolver', () => {
    beforeEach(() => {
        vi.clearAllMocks();
        howler.options.length = 0;
    });

    it('should create one Howl per clip reference', () => {
        const resolve = createHowlClipResolver({ basePath: 'sfx/' });

        const first = resolve('click.ogg', 'Click');
        const second = resolve('click.ogg', 'Click');

        expect(first).not.toBeNull();
        expect(second).toBe(first);
        expect(Howl).toHaveBeenCalledTimes(1);
        expect(Howl).toHaveBeenCalledWith(expect.objectContaining({
            src: ['sfx/click.ogg'],
            volume: 1,
            autoplay: false,
        }));
    });

    it('should resolve an empty reference to null', () => {
        const resolve = createHowlClipResolver();
        expect(resolve('  ', 'Click')).toBeNull();
        expect(Howl).not.toHaveBeenCalled();
    });

    it('should log load failures under the clip reference', () => {
        LogHandler.getLogManager().setConsoleOutput(false);
        LogHandler.getLogManager().clear();
        createHowlClipResolver()('ui/click.ogg', 'Click');

        howler.options[0]?.onloaderror?.(1, 'decode failed');

        const last = LogHandler.getLogManager().log.at(-1);
        expect(last?.source).toBe('HowlClips/ui/click.ogg');
        expect(last?.msg).toBe("Failed to load clip for 'Click': decode failed");
        LogHandler.getLogManager().setConsoleOutput(true);
    });

    it('should report the decoded length of the file', () => {
        const clip = createHowlClipResolver()('boom.ogg', 'Explosion');
        expect(clip?.name).toBe('boom.ogg');
        expect(clip?.length).toBe(2.5);
    });
});

describe('HowlVoice', () => {
    let clip: HowlClip;
    let voice: HowlVoice;

    beforeEach(() => {
        vi.clearAllMocks();
        howler.listeners.length = 0;
        howler.loadState = 'loaded';
        const resolved = createHowlClipResolver()('click.ogg', 'Click');
        if (!resolved) throw new Error('expected a clip');
        clip = resolved;
        voice = new HowlVoice('sfx-voice-1');
    });

    it('should apply rate, volume and position to the play id', () => {
        voice.setPosition(vec3(3, 4, 5));
        voice.configure(clip, 1.5, 0.25);
        voice.play();

        expect(clip.howl.play).toHaveBeenCalledTimes(1);
        expect(clip.howl.rate).toHaveBeenCalledWith(1.5, 7);
        expect(clip.howl.volume).toHaveBeenCalledWith(0.25, 7);
        expect(clip.howl.pos).toHaveBeenCalledWith(3, 4, 5, 7);
    });

    it('should play negative pitch forward and clamp the rate', () => {
        voice.configure(clip, -2, 1);
        voice.play();
        expect(clip.howl.rate).toHaveBeenLastCalledWith(2, 7);

        voice.configure(clip, 8, 1);
        voice.play();
        expect(clip.howl.rate).toHaveBeenLastCalledWith(4, 7);

        voice.configure(clip, 0.1, 1);
        voice.play();
        expect(clip.howl.rate).toHaveBeenLastCalledWith(0.5, 7);
    });

    it('should ask Howler whether its own play id is still playing', () => {
        expect(voice.isPlaying()).toBe(false);

        voice.configure(clip, 1, 1);
        voice.play();
        expect(voice.isPlaying()).toBe(true);
        expect(clip.howl.playing).toHaveBeenCalledWith(7);

        vi.mocked(clip.howl.playing).mockReturnValue(false);
        expect(voice.isPlaying()).toBe(false);
    });

    it('should count a play queued behind loading as playing until it starts', () => {
        howler.loadState = 'loading';
        vi.mocked(clip.howl.playing).mockReturnValue(false);

        voice.configure(clip, 1, 1);
        voice.play();
        expect(voice.isPlaying()).toBe(true);
        expect(howler.listeners.map(l => [l.event, l.id])).toEqual([['play', 7], ['loaderror', undefined]]);

        howler.listeners[0]?.callback();
        expect(voice.isPlaying()).toBe(false);
        expect(clip.howl.off).toHaveBeenCalledWith('loaderror', howler.listeners[0]?.callback);
    });

    it('should stop counting a queued play once the file fails to load', () => {
        howler.loadState = 'loading';
        vi.mocked(clip.howl.playing).mockReturnValue(false);

        voice.configure(clip, 1, 1);
        voice.play();
        howler.listeners[1]?.callback();

        expect(voice.isPlaying()).toBe(false);
    });

    it('should not wait for load events when the file is already loaded', () => {
        voice.configure(clip, 1, 1);
        voice.play();
        expect(clip.howl.once).not.toHaveBeenCalled();
    });

    it('should report the clamped rate as its playback rate', () => {
        voice.configure(clip, 0.1, 1);
        expect(voice.playbackRate()).toBe(0.5);

        voice.configure(clip, -2, 1);
        expect(voice.playbackRate()).toBe(2);
    });

    it('should stop only its own play id', () => {
        voice.stop();
        expect(clip.howl.stop).not.toHaveBeenCalled();

        voice.configure(clip, 1, 1);
        voice.play();
        voice.stop();
        expect(clip.howl.stop).toHaveBeenCalledWith(7);
    });

    it('should move a playing sound', () => {
        voice.configure(clip, 1, 1);
        voice.play();
        voice.setPosition(vec3(9, 8));

        expect(voice.getPosition()).toEqual({ x: 9, y: 8, z: 0 });
        expect(clip.howl.pos).toHaveBeenLastCalledWith(9, 8, 0, 7);
    });

    it('should refuse to play before being configured', () => {
        expect(() => voice.play()).toThrow(SfxInvariantError);
    });
});

describe('howlVoiceFactory', () => {
    it('should number the voices it creates', () => {
        expect(howlVoiceFactory.create(3).name).toBe('sfx-voice-3');
    });
});
