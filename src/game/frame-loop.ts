import { LogHandler } from '@/utilities/log-handler';
import type { TickSystem } from './tick-system';

const DEFAULT_TICK_RATE = 30;

/** Frame deltas are capped so a stalled process doesn't replay seconds of ticks */
const MAX_FRAME_DELTA = 0.1;

/** Consecutive failures before a tick system is disabled */
const SYSTEM_CIRCUIT_BREAKER_THRESHOLD = 100;

const ERROR_THROTTLE_MS = 1000;

/** Per-system error tracking */
interface SystemErrorState {
    name: string;
    consecutiveFailures: number;
    disabled: boolean;
    lastErrorTime: number;
    suppressedCount: number;
}

export interface FrameLoopOptions {
    /** Fixed ticks per second. Default: 30 */
    tickRate?: number;
    /** Millisecond clock. Default: performance.now */
    now?: () => number;
}

/**
 * Fixed-timestep loop for headless hosts.
 * Wakes up once per tick interval, converts wall time into whole ticks with an
 * accumulator and runs every registered TickSystem. Errors are isolated per
 * system: a system that keeps failing is switched off by a circuit breaker
 * while the others keep ticking.
 */
export class FrameLoop {
    private static log = new LogHandler('FrameLoop');

    private accumulator = 0;
    private lastTime = 0;
    private running = false;
    private timer: ReturnType<typeof setTimeout> | null = null;

    private readonly tickDuration: number;
    private readonly now: () => number;
    /** Bound frame handler to avoid creating closures every frame */
    private readonly boundFrame: () => void;

    private systems: TickSystem[] = [];
    private systemErrors = new Map<TickSystem, SystemErrorState>();

    constructor(options: FrameLoopOptions = {}) {
        const tickRate = options.tickRate ?? DEFAULT_TICK_RATE;
        if (!(tickRate > 0)) {
            throw new RangeError(`FrameLoop tick rate must be positive, got ${tickRate}`);
        }
        this.tickDuration = 1 / tickRate;
        this.now = options.now ?? (() => performance.now());
        this.boundFrame = this.frame.bind(this);
    }

    /** Register a tick system to be updated each tick */
    public registerSystem(system: TickSystem, name?: string): void {
        this.systems.push(system);
        this.systemErrors.set(system, {
            name: name ?? (system.constructor.name || 'Unknown'),
            consecutiveFailures: 0,
            disabled: false,
            lastErrorTime: Number.NEGATIVE_INFINITY,
            suppressedCount: 0,
        });
    }

    /** Whether the circuit breaker switched a system off */
    public isDisabled(system: TickSystem): boolean {
        return this.systemErrors.get(system)?.disabled ?? false;
    }

    public start(): void {
        if (this.running) return;
        this.running = true;
        this.lastTime = this.now();
        this.schedule();
        FrameLoop.log.debug(`Started at ${Math.round(1 / this.tickDuration)} ticks/s`);
    }

    public stop(): void {
        this.running = false;
        if (this.timer !== null) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }

    /** Stop the loop and tear down every registered system */
    public destroy(): void {
        this.stop();
        for (const system of this.systems) {
            system.destroy?.();
        }
        this.systems = [];
        this.systemErrors.clear();
    }

    public get isRunning(): boolean {
        return this.running;
    }

    /**
     * Feed elapsed wall time into the loop and run the ticks it adds up to.
     * Hosts with their own frame callback call this instead of start().
     * @returns number of ticks run
     */
    public advance(deltaSec: number): number {
        this.accumulator += Math.min(Math.max(deltaSec, 0), MAX_FRAME_DELTA);

        let ticks = 0;
        while (this.accumulator >= this.tickDuration) {
            this.tick(this.tickDuration);
            this.accumulator -= this.tickDuration;
            ticks++;
        }
        return ticks;
    }

    private schedule(): void {
        this.timer = setTimeout(this.boundFrame, this.tickDuration * 1000);
    }

    private frame(): void {
        if (!this.running) return;

        const now = this.now();
        const deltaSec = (now - this.lastTime) / 1000;
        this.lastTime = now;
        this.advance(deltaSec);

        this.schedule();
    }

    private tick(dt: number): void {
        for (const system of this.systems) {
            const errorState = this.systemErrors.get(system);

            if (errorState?.disabled) continue;

            try {
                system.tick(dt);
                if (errorState && errorState.consecutiveFailures > 0) {
                    errorState.consecutiveFailures = 0;
                }
            } catch (e) {
                this.handleSystemError(system, e);
            }
        }
    }

    /**
     * Handle a per-system tick error. Logs with per-system throttling, tracks
     * consecutive failures, and disables the system via circuit breaker.
     */
    private handleSystemError(system: TickSystem, error: unknown): void {
        const state = this.systemErrors.get(system);
        if (!state) return;
        state.consecutiveFailures++;

        if (!state.disabled && state.consecutiveFailures >= SYSTEM_CIRCUIT_BREAKER_THRESHOLD) {
            state.disabled = true;
            FrameLoop.log.error(
                `System "${state.name}" disabled after ${SYSTEM_CIRCUIT_BREAKER_THRESHOLD} consecutive failures`
            );
            return;
        }

        const now = this.now();
        if (now - state.lastErrorTime >= ERROR_THROTTLE_MS) {
            const err = error instanceof Error ? error : new Error(String(error));
            if (state.suppressedCount > 0) {
                FrameLoop.log.error(
                    `System "${state.name}" tick failed (${state.suppressedCount} similar suppressed)`,
                    err
                );
                state.suppressedCount = 0;
            } else {
                FrameLoop.log.error(`System "${state.name}" tick failed`, err);
            }
            state.lastErrorTime = now;
        } else {
            state.suppressedCount++;
        }
    }
}
