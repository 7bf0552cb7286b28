import { LogHandler } from '@/utilities/log-handler';
import type { TickSystem } from './tick-system';

/** What a routine is waiting for before it runs again */
export type WaitInstruction =
    | { readonly kind: 'seconds'; readonly seconds: number }
    | { readonly kind: 'nextTick' };

/** A cooperative task: a generator that yields wait instructions */
export type Routine = Generator<WaitInstruction, void, void>;

const NEXT_TICK: WaitInstruction = { kind: 'nextTick' };

/** Suspend until at least `seconds` of tick time have passed */
export function waitSeconds(seconds: number): WaitInstruction {
    return { kind: 'seconds', seconds };
}

/** Suspend until the next tick */
export function nextTick(): WaitInstruction {
    return NEXT_TICK;
}

export interface RoutineHandle {
    readonly id: number;
    readonly name: string;
    readonly done: boolean;
}

interface RunningRoutine extends RoutineHandle {
    routine: Routine;
    /** Runner time at which the routine may resume; null means "next tick" */
    resumeAt: number | null;
    done: boolean;
}

/**
 * Tick-driven scheduler for generator routines.
 *
 * A routine runs synchronously up to its first `yield` when started. After
 * that it only ever resumes from tick(): a `waitSeconds` routine on the first
 * tick where runner time reaches its deadline, a `nextTick` routine on the
 * following tick. Routines started or re-suspended during a tick are not
 * resumed again within that same tick.
 *
 * A routine that throws is dropped and logged; the others keep running.
 */
export class CoroutineRunner implements TickSystem {
    private static log = new LogHandler('CoroutineRunner');

    private routines = new Map<number, RunningRoutine>();
    private elapsed = 0;
    private nextId = 1;
    private current: RunningRoutine | null = null;

    /** Seconds of tick time since the runner was created */
    public get time(): number {
        return this.elapsed;
    }

    /** Number of routines that have not finished */
    public get activeCount(): number {
        return this.routines.size;
    }

    public start(name: string, routine: Routine): RoutineHandle {
        const entry: RunningRoutine = {
            id: this.nextId++,
            name,
            routine,
            resumeAt: null,
            done: false,
        };
        this.routines.set(entry.id, entry);
        this.step(entry);
        return entry;
    }

    /**
     * Stop a routine before it completes. Returns false if it already finished.
     */
    public cancel(handle: RoutineHandle): boolean {
        const entry = this.routines.get(handle.id);
        if (!entry) return false;

        this.retire(entry);
        // A generator cannot be closed from inside its own body
        if (entry !== this.current) {
            entry.routine.return();
        }
        return true;
    }

    public tick(dt: number): void {
        this.elapsed += dt;

        for (const entry of [...this.routines.values()]) {
            if (entry.done) continue;
            if (entry.resumeAt !== null && this.elapsed < entry.resumeAt) continue;
            this.step(entry);
        }
    }

    /** Cancel every routine */
    public destroy(): void {
        for (const entry of [...this.routines.values()]) {
            this.cancel(entry);
        }
    }

    private step(entry: RunningRoutine): void {
        const previous = this.current;
        this.current = entry;
        try {
            const result = entry.routine.next();
            if (entry.done) return;
            if (result.done) {
                this.retire(entry);
                return;
            }
            const wait = result.value;
            entry.resumeAt = wait.kind === 'seconds'
                ? this.elapsed + Math.max(0, wait.seconds)
                : null;
        } catch (e) {
            this.retire(entry);
            const err = e instanceof Error ? e : new Error(String(e));
            CoroutineRunner.log.error(`Routine "${entry.name}" failed`, err);
        } finally {
            this.current = previous;
        }
    }

    private retire(entry: RunningRoutine): void {
        entry.done = true;
        this.routines.delete(entry.id);
    }
}
