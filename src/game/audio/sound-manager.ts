import { CoroutineRunner } from '@/game/coroutine-runner';
import { EventBus } from '@/game/event-bus';
import { createSfxRng } from '@/game/rng';
import type { SeededRng } from '@/game/rng';
import type { TickSystem } from '@/game/tick-system';
import { LogHandler } from '@/utilities/log-handler';
import { NON_SPATIAL, isNoSound } from './audio-definitions';
import type {
    PlayFailureReason,
    PlayRequest,
    PositionSource,
    SoundClip,
    SoundKey,
    SoundVariant,
    Vec3,
    VoiceFactory,
} from './audio-definitions';
import { SoundCatalog } from './sound-catalog';
import { SfxInvariantError } from './sfx-errors';
import type { SfxObserver } from './sfx-observer';
import { SfxPlayback } from './sfx-playback';
import { SfxPool } from './sfx-pool';
import { resolveSfxSettings } from './sfx-settings';
import type { SfxSettings } from './sfx-settings';
import { VariantSelector } from './variant-selector';

/** Where variants come from; a function is re-read on every init/rebuild */
export type VariantSource<TClip extends SoundClip> =
    | readonly SoundVariant<TClip>[]
    | (() => readonly SoundVariant<TClip>[]);

export interface SoundManagerOptions<TClip extends SoundClip> {
    voiceFactory: VoiceFactory<TClip>;
    source: VariantSource<TClip>;
    settings?: Partial<SfxSettings>;
    /** Diagnostics sink; leave out for silent operation */
    observer?: SfxObserver;
    eventBus?: EventBus;
    /** Overrides the RNG seeded from settings.seed */
    rng?: SeededRng;
}

export type PlayResult<TClip extends SoundClip = SoundClip> =
    | { success: true; playback: SfxPlayback<TClip> }
    | { success: false; failureReason: PlayFailureReason };

export type PlayOptions = Omit<PlayRequest, 'sound' | 'spatial'>;

/**
 * Entry point for sound effects.
 *
 * Owns the catalog, the voice pool and the routine runner that releases
 * voices. One instance per game; pass it to whatever needs to make noise.
 * Register it as a TickSystem (or call tick() every frame) or voices are
 * never released.
 *
 * Request failures (no-sound placeholder, unknown type, no free voice, a voice
 * that refuses to play) are returned as values and reported to the observer;
 * nothing here throws for them.
 */
export class SoundManager<TClip extends SoundClip = SoundClip> implements TickSystem {
    private static log = new LogHandler('SoundManager');

    public readonly settings: SfxSettings;
    public readonly eventBus: EventBus;

    private readonly catalog: SoundCatalog<TClip>;
    private readonly selector: VariantSelector;
    private readonly runner = new CoroutineRunner();
    private readonly pool: SfxPool<TClip>;
    private readonly readSource: () => readonly SoundVariant<TClip>[];
    private readonly observer: SfxObserver | undefined;
    private initialized = false;

    constructor(options: SoundManagerOptions<TClip>) {
        this.settings = resolveSfxSettings(options.settings);
        this.observer = options.observer;
        this.eventBus = options.eventBus ?? new EventBus();

        const source = options.source;
        this.readSource = typeof source === 'function' ? source : () => source;

        this.catalog = new SoundCatalog<TClip>(this.observer);
        this.selector = new VariantSelector(options.rng ?? createSfxRng(this.settings.seed));
        this.pool = new SfxPool<TClip>(options.voiceFactory, this.settings.canGrowPool, {
            runner: this.runner,
            timing: {
                releaseMargin: this.settings.releaseMargin,
                retryReleaseWait: this.settings.retryReleaseWait,
            },
            observer: this.observer,
            eventBus: this.eventBus,
        });
    }

    public get isInitialized(): boolean {
        return this.initialized;
    }

    /** Build the catalog and create the initial voices. Safe to call twice. */
    public init(): void {
        if (this.initialized) {
            SoundManager.log.debug('SoundManager already initialized, skipping re-init');
            return;
        }

        this.populateCatalog();
        const initial = this.settings.initialPoolSize;
        if (initial > 0) {
            this.pool.grow(initial);
            this.eventBus.emit('pool:grown', { size: this.pool.size, added: initial, reason: 'startup' });
        }
        this.initialized = true;

        SoundManager.log.debug(
            `Initialized with ${this.catalog.size} sound types and ${this.pool.size} voices`
        );
    }

    /**
     * Re-read the source and rebuild the catalog. Playing sounds keep the
     * variant they started with; the pool is untouched.
     */
    public rebuild(): void {
        this.populateCatalog();
    }

    public tryPlay(request: PlayRequest): PlayResult<TClip> {
        if (!this.initialized) {
            this.observer?.playedBeforeInit?.();
            this.init();
        }

        const { sound } = request;

        if (isNoSound(sound)) {
            this.observer?.invalidSoundType?.(sound);
            return this.reject(sound, 'invalid_sound_type');
        }

        const variants = this.catalog.get(sound);
        if (!variants) {
            this.observer?.unknownSoundType?.(sound);
            return this.reject(sound, 'unknown_sound_type');
        }

        if (this.pool.idleCount === 0) {
            if (!this.pool.canGrow) {
                this.observer?.poolExhausted?.(sound, this.pool.size);
                return this.reject(sound, 'pool_exhausted');
            }
            // Grow, then reserve below: the new voice goes to this request
            this.pool.grow(1);
            this.observer?.poolGrown?.(sound, this.pool.size);
            this.eventBus.emit('pool:grown', { size: this.pool.size, added: 1, reason: 'exhausted' });
        }

        const variant = this.selector.pick(variants);
        const { volume, pitch } = this.selector.derive(variant, request.volume ?? 1, request.pitch ?? 1);

        const handle = this.pool.reserve();
        if (!handle) {
            throw new SfxInvariantError(`No idle voice for '${sound}' right after the pool check`);
        }

        let finished: Promise<SoundKey>;
        try {
            finished = handle.start({
                sound,
                variant,
                volume,
                pitch,
                spatial: request.spatial ?? NON_SPATIAL,
                onFinished: request.onFinished,
            });
        } catch (e) {
            // start() has already put the handle back
            const err = e instanceof Error ? e : new Error(String(e));
            SoundManager.log.error(`${handle.name} failed to play '${sound}'`, err);
            return this.reject(sound, 'voice_failed');
        }

        const cycleId = handle.playbackId;
        if (cycleId === null) {
            throw new SfxInvariantError(`${handle.name} has no cycle right after starting '${sound}'`);
        }
        const playback = new SfxPlayback(handle, cycleId, sound, volume, pitch, handle.expectedDuration ?? 0, finished);
        return { success: true, playback };
    }

    /** Play a sound. Returns the playback, or null if it cannot play. */
    public play(request: PlayRequest): SfxPlayback<TClip> | null {
        const result = this.tryPlay(request);
        return result.success ? result.playback : null;
    }

    /** Play at a fixed world position; the voice goes back to its origin afterwards */
    public playAt(sound: SoundKey, position: Vec3, options: PlayOptions = {}): SfxPlayback<TClip> | null {
        return this.play({ ...options, sound, spatial: { kind: 'fixed', position } });
    }

    /** Play and keep the voice on `target` every tick until the sound ends */
    public playFollowing(sound: SoundKey, target: PositionSource, options: PlayOptions = {}): SfxPlayback<TClip> | null {
        return this.play({ ...options, sound, spatial: { kind: 'following', target } });
    }

    /**
     * Stop one sound now; its completion notifications fire immediately.
     * @returns false when that request had already finished, whatever its voice plays now
     */
    public stop(playback: SfxPlayback<TClip>): boolean {
        return playback.stop();
    }

    /** Stop everything that is playing. Returns the number of sounds stopped. */
    public stopAll(): number {
        let stopped = 0;
        for (const handle of this.pool.busyHandles()) {
            if (handle.state === 'playing') {
                handle.stopNow();
                stopped++;
            }
        }
        return stopped;
    }

    public tick(dt: number): void {
        this.runner.tick(dt);
    }

    public destroy(): void {
        this.stopAll();
        this.runner.destroy();
    }

    /** Declared sound types with no variants (diagnostics only) */
    public checkCompleteness(allSounds: readonly SoundKey[] = this.settings.soundTypes): SoundKey[] {
        return this.catalog.checkCompleteness(allSounds);
    }

    /** Sound type -> variant count of the current catalog */
    public variantCounts(): Map<SoundKey, number> {
        return this.catalog.variantCounts();
    }

    public get poolSize(): number {
        return this.pool.size;
    }

    public get idleCount(): number {
        return this.pool.idleCount;
    }

    public get busyCount(): number {
        return this.pool.busyCount;
    }

    public get peakBusy(): number {
        return this.pool.peakBusy;
    }

    private populateCatalog(): void {
        const knownSounds = this.settings.checkUnassignedSounds ? this.settings.soundTypes : undefined;
        this.catalog.build(this.readSource(), knownSounds);
    }

    private reject(sound: SoundKey, failureReason: PlayFailureReason): PlayResult<TClip> {
        this.eventBus.emit('sfx:rejected', { sound, reason: failureReason });
        return { success: false, failureReason };
    }
}
