import { nextTick, waitSeconds } from '@/game/coroutine-runner';
import type { CoroutineRunner, Routine, RoutineHandle } from '@/game/coroutine-runner';
import type { EventBus } from '@/game/event-bus';
import { defineStateMachine } from '@/game/util/state-machine';
import type { StateMachine } from '@/game/util/state-machine';
import type {
    AudioVoice,
    PlayableVariant,
    PositionSource,
    SoundClip,
    SoundKey,
    SpatialMode,
    Vec3,
} from './audio-definitions';
import { SfxInvariantError } from './sfx-errors';
import type { SfxObserver } from './sfx-observer';
import { LogHandler } from '@/utilities/log-handler';

export type SfxHandleState = 'idle' | 'reserved' | 'playing' | 'finishing';

type SfxHandleEvent = 'reserve' | 'start' | 'finish' | 'release';

interface HandleLifecycle {
    clearCycle(): void;
}

const handleStates = defineStateMachine<HandleLifecycle>()<SfxHandleEvent>()({
    idle: {
        transitions: { reserve: 'reserved' },
        onEnter: (ctx) => ctx.clearCycle(),
    },
    reserved: {
        transitions: { start: 'playing' },
    },
    playing: {
        transitions: { finish: 'finishing' },
    },
    finishing: {
        transitions: { release: 'idle' },
    },
});

/** Fixed release timing knobs, in seconds */
export interface ReleaseTiming {
    /** Added to the expected duration before the first stopped-check */
    releaseMargin: number;
    /** Delay between checks while the voice still reports playing */
    retryReleaseWait: number;
}

export interface SfxHandleDeps<TClip extends SoundClip> {
    runner: CoroutineRunner;
    timing: ReleaseTiming;
    /** Hands the handle back to its pool; called while the handle is finishing */
    release: (handle: SfxHandle<TClip>) => void;
    observer?: SfxObserver;
    eventBus?: EventBus;
}

/** Everything a handle needs for one play cycle */
export interface PlaybackPlan<TClip extends SoundClip> {
    sound: SoundKey;
    variant: PlayableVariant<TClip>;
    volume: number;
    pitch: number;
    spatial: SpatialMode;
    onFinished?: (sound: SoundKey) => void;
}

interface PlaybackCycle<TClip extends SoundClip> extends PlaybackPlan<TClip> {
    /** Counts up with every start of this handle */
    id: number;
    duration: number;
    /** Voice position before the cycle moved it */
    origin: Vec3;
    extraWaits: number;
    completion: RoutineHandle | null;
    follow: RoutineHandle | null;
    resolve: (sound: SoundKey) => void;
}

/**
 * Playback time for a clip at a given pitch. Negative pitch plays in reverse
 * at the same speed, hence the absolute value. Zero pitch, an empty clip or a
 * clip of unknown length (a stream) gives 0, leaving the release to the
 * stopped-check.
 */
export function expectedDuration(length: number, pitch: number): number {
    if (pitch === 0 || !Number.isFinite(pitch) || !(length > 0) || !Number.isFinite(length)) return 0;
    return Math.abs(length / pitch);
}

/**
 * One reusable voice plus the bookkeeping for the cycle it is currently
 * playing: idle -> reserved -> playing -> finishing -> idle.
 *
 * Only the pool reserves a handle and only the SoundManager starts one.
 * Callers that get a handle back from play() may read it and may stop it,
 * but must not touch the voice directly.
 */
export class SfxHandle<TClip extends SoundClip = SoundClip> {
    private static log = new LogHandler('SfxHandle');

    private readonly machine: StateMachine<SfxHandleState, SfxHandleEvent, HandleLifecycle>;
    private cycle: PlaybackCycle<TClip> | null = null;
    private cycleCount = 0;

    constructor(
        public readonly id: number,
        private readonly voice: AudioVoice<TClip>,
        private readonly deps: SfxHandleDeps<TClip>
    ) {
        this.machine = handleStates.create('idle', {
            clearCycle: () => {
                this.cycle = null;
            },
        });
    }

    public get name(): string {
        return this.voice.name;
    }

    public get state(): SfxHandleState {
        return this.machine.state;
    }

    public get isBusy(): boolean {
        return this.machine.state !== 'idle';
    }

    /**
     * Identifies the current play cycle, null while idle. A caller holding
     * an older id holds a request that has already finished.
     */
    public get playbackId(): number | null {
        return this.cycle?.id ?? null;
    }

    /** Sound type of the current cycle, null while idle */
    public get sound(): SoundKey | null {
        return this.cycle?.sound ?? null;
    }

    public get volume(): number | null {
        return this.cycle?.volume ?? null;
    }

    public get pitch(): number | null {
        return this.cycle?.pitch ?? null;
    }

    /** Seconds the current cycle is expected to play */
    public get expectedDuration(): number | null {
        return this.cycle?.duration ?? null;
    }

    /** Stopped-checks that found the voice still playing during this cycle */
    public get extraWaits(): number {
        return this.cycle?.extraWaits ?? 0;
    }

    public get position(): Vec3 {
        return this.voice.getPosition();
    }

    /** idle -> reserved. Called by the pool when handing the handle out. */
    public reserve(): void {
        this.transition('reserve');
    }

    /**
     * reserved -> playing. Configures and starts the voice and schedules the
     * release. The promise resolves with the sound type once the handle is
     * back in the pool; it never rejects.
     */
    public start(plan: PlaybackPlan<TClip>): Promise<SoundKey> {
        if (this.machine.state !== 'reserved') {
            throw new SfxInvariantError(`${this.name} cannot start while ${this.machine.state}`);
        }

        let resolve: (sound: SoundKey) => void = () => undefined;
        const finished = new Promise<SoundKey>((r) => {
            resolve = r;
        });

        const origin = { ...this.voice.getPosition() };
        let duration = 0;

        try {
            this.voice.configure(plan.variant.clip, plan.pitch, plan.volume);
            duration = expectedDuration(plan.variant.clip.length, this.voice.playbackRate?.() ?? plan.pitch);
            if (plan.spatial.kind === 'fixed') {
                this.voice.setPosition(plan.spatial.position);
            } else if (plan.spatial.kind === 'following') {
                this.voice.setPosition(plan.spatial.target.position);
            }
            this.voice.play();
        } catch (e) {
            this.abandon(origin, plan.spatial);
            throw e;
        }

        const cycle: PlaybackCycle<TClip> = {
            ...plan,
            id: ++this.cycleCount,
            duration,
            origin,
            extraWaits: 0,
            completion: null,
            follow: null,
            resolve,
        };
        this.cycle = cycle;
        this.transition('start');

        cycle.completion = this.deps.runner.start(
            `${this.name}:release`,
            this.awaitCompletion(cycle, cycle.duration + this.deps.timing.releaseMargin)
        );
        if (plan.spatial.kind === 'following') {
            cycle.follow = this.deps.runner.start(`${this.name}:follow`, this.followTarget(plan.spatial.target));
        }

        this.deps.eventBus?.emit('sfx:started', {
            handleId: this.id,
            sound: plan.sound,
            volume: plan.volume,
            pitch: plan.pitch,
            duration: cycle.duration,
        });

        return finished;
    }

    /**
     * Cut playback short: stop the voice and run the release right away.
     * Completion notifications fire as for a natural end.
     */
    public stopNow(): void {
        if (this.machine.state !== 'playing') {
            throw new SfxInvariantError(`${this.name} has no active playback to stop (state: ${this.machine.state})`);
        }
        this.voice.stop();
        this.complete(true);
    }

    private *awaitCompletion(cycle: PlaybackCycle<TClip>, delay: number): Routine {
        yield waitSeconds(delay);

        // Never release a voice that is still sounding
        while (this.voice.isPlaying()) {
            cycle.extraWaits++;
            this.deps.observer?.releaseDelayed?.(cycle.sound, cycle.extraWaits, this.voice.name);
            yield waitSeconds(this.deps.timing.retryReleaseWait);
        }

        this.complete(false);
    }

    private *followTarget(target: PositionSource): Routine {
        for (;;) {
            yield nextTick();
            this.voice.setPosition(target.position);
        }
    }

    /** playing -> finishing -> idle, then notify */
    private complete(stopped: boolean): void {
        const cycle = this.cycle;
        if (!cycle) {
            throw new SfxInvariantError(`${this.name} is playing without a cycle`);
        }
        this.transition('finish');

        if (cycle.follow) {
            this.deps.runner.cancel(cycle.follow);
        }
        if (stopped && cycle.completion) {
            this.deps.runner.cancel(cycle.completion);
        }
        if (cycle.spatial.kind !== 'none') {
            this.voice.setPosition(cycle.origin);
        }

        this.deps.release(this);
        this.transition('release');

        this.deps.eventBus?.emit('sfx:finished', {
            handleId: this.id,
            sound: cycle.sound,
            extraWaits: cycle.extraWaits,
            stopped,
        });
        cycle.resolve(cycle.sound);
        try {
            cycle.onFinished?.(cycle.sound);
        } catch (e) {
            const err = e instanceof Error ? e : new Error(String(e));
            SfxHandle.log.error(`Completion callback for '${cycle.sound}' on ${this.name} failed`, err);
        }
    }

    /** The voice refused to start: put everything back as it was */
    private abandon(origin: Vec3, spatial: SpatialMode): void {
        if (spatial.kind !== 'none') {
            this.voice.setPosition(origin);
        }
        this.transition('start');
        this.transition('finish');
        this.deps.release(this);
        this.transition('release');
    }

    private transition(event: SfxHandleEvent): void {
        const from = this.machine.state;
        if (!this.machine.send(event)) {
            throw new SfxInvariantError(`${this.name} cannot ${event} while ${from}`);
        }
    }
}
