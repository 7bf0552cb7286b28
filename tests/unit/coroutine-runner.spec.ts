/**
 * Unit tests for CoroutineRunner
 */
/* eslint-disable max-lines-per-function */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CoroutineRunner, nextTick, waitSeconds } from '@/game/coroutine-runner';
import type { Routine, RoutineHandle } from '@/game/coroutine-runner';
import { LogHandler } from '@/utilities/log-handler';
import { LogType } from '@/utilities/log-manager';

describe('CoroutineRunner', () => {
    let runner: CoroutineRunner;
    let trace: string[];

    beforeEach(() => {
        runner = new CoroutineRunner();
        trace = [];
        LogHandler.getLogManager().setConsoleOutput(false);
        LogHandler.getLogManager().clear();
    });

    afterEach(() => {
        LogHandler.getLogManager().setConsoleOutput(true);
    });

    function* waiter(name: string, seconds: number): Routine {
        trace.push(`${name}:start`);
        yield waitSeconds(seconds);
        trace.push(`${name}:end`);
    }

    it('should run a routine synchronously up to its first yield', () => {
        runner.start('a', waiter('a', 1));

        expect(trace).toEqual(['a:start']);
        expect(runner.activeCount).toBe(1);
    });

    it('should resume a timed wait on the first tick that reaches its deadline', () => {
        const handle = runner.start('a', waiter('a', 1));

        runner.tick(0.5);
        expect(trace).toEqual(['a:start']);

        runner.tick(0.5);
        expect(trace).toEqual(['a:start', 'a:end']);
        expect(handle.done).toBe(true);
        expect(runner.activeCount).toBe(0);
        expect(runner.time).toBe(1);
    });

    it('should resume nextTick waits once per tick', () => {
        let count = 0;
        runner.start('counter', (function* (): Routine {
            for (;;) {
                yield nextTick();
                count++;
            }
        })());

        runner.tick(0.1);
        runner.tick(0.1);
        runner.tick(0.1);
        expect(count).toBe(3);
    });

    it('should resume routines in start order', () => {
        runner.start('a', waiter('a', 0.5));
        runner.start('b', waiter('b', 0.5));

        runner.tick(1);
        expect(trace).toEqual(['a:start', 'b:start', 'a:end', 'b:end']);
    });

    it('should not resume a routine started during a tick until the next tick', () => {
        runner.start('spawner', (function* (): Routine {
            yield nextTick();
            runner.start('child', (function* (): Routine {
                trace.push('child:start');
                yield nextTick();
                trace.push('child:resumed');
            })());
        })());

        runner.tick(0.1);
        expect(trace).toEqual(['child:start']);

        runner.tick(0.1);
        expect(trace).toEqual(['child:start', 'child:resumed']);
    });

    it('should cancel a waiting routine', () => {
        const handle = runner.start('a', waiter('a', 1));

        expect(runner.cancel(handle)).toBe(true);
        expect(handle.done).toBe(true);

        runner.tick(2);
        expect(trace).toEqual(['a:start']);
        expect(runner.cancel(handle)).toBe(false);
    });

    it('should let a routine cancel another one in the same tick', () => {
        const victim = runner.start('victim', (function* (): Routine {
            yield nextTick();
            trace.push('victim ran');
        })());
        runner.start('killer', (function* (): Routine {
            yield nextTick();
            runner.cancel(victim);
        })());

        // Killer was started later, so victim still runs first this tick
        runner.tick(0.1);
        expect(trace).toEqual(['victim ran']);
    });

    it('should let a routine cancel itself', () => {
        let own: RoutineHandle | null = null;
        own = runner.start('self', (function* (): Routine {
            yield nextTick();
            if (own) runner.cancel(own);
            trace.push('after cancel');
            yield nextTick();
            trace.push('never');
        })());

        runner.tick(0.1);
        runner.tick(0.1);
        expect(trace).toEqual(['after cancel']);
        expect(runner.activeCount).toBe(0);
    });

    it('should drop and log a routine that throws', () => {
        runner.start('broken', (function* (): Routine {
            yield nextTick();
            throw new Error('boom');
        })());
        runner.start('healthy', waiter('healthy', 0.2));

        runner.tick(0.1);
        runner.tick(0.1);

        expect(trace).toEqual(['healthy:start', 'healthy:end']);
        expect(runner.activeCount).toBe(0);

        const last = LogHandler.getLogManager().log.at(-1);
        expect(last?.type).toBe(LogType.Error);
        expect(last?.source).toBe('CoroutineRunner');
        expect(last?.msg).toBe('Routine "broken" failed');
        expect(last?.exception?.message).toBe('boom');
    });

    it('should treat negative waits as zero', () => {
        runner.start('a', waiter('a', -5));
        runner.tick(0);
        expect(trace).toEqual(['a:start', 'a:end']);
    });

    it('should cancel everything on destroy', () => {
        runner.start('a', waiter('a', 1));
        runner.start('b', waiter('b', 1));

        runner.destroy();
        runner.tick(5);

        expect(runner.activeCount).toBe(0);
        expect(trace).toEqual(['a:start', 'b:start']);
    });
});
