/**
 * Unit tests for LogManager
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { LogManager, LogType } from '@/utilities/log-manager';
import type { ILogMessage } from '@/utilities/log-manager';

describe('LogManager', () => {
    let manager: LogManager;

    beforeEach(() => {
        manager = new LogManager();
        manager.setConsoleOutput(false);
    });

    it('should number messages and keep the last 100', () => {
        for (let i = 0; i < 105; i++) {
            manager.push({ type: LogType.Info, source: 'Test', msg: `message ${i}` });
        }

        expect(manager.log).toHaveLength(100);
        expect(manager.log[0]?.msg).toBe('message 5');
        expect(manager.log[0]?.index).toBe(5);
    });

    it('should replay history to a new listener and then stream', () => {
        manager.push({ type: LogType.Warn, source: 'Test', msg: 'early' });

        const received: ILogMessage[] = [];
        manager.onLogMessage((msg) => received.push(msg));
        manager.push({ type: LogType.Error, source: 'Test', msg: 'late' });

        expect(received.map((m) => m.msg)).toEqual(['early', 'late']);
    });

    it('should throttle identical console lines', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        manager.setConsoleOutput(true);

        manager.push({ type: LogType.Warn, source: 'Test', msg: 'same' });
        manager.push({ type: LogType.Warn, source: 'Test', msg: 'same' });
        manager.push({ type: LogType.Warn, source: 'Test', msg: 'different' });

        expect(warn).toHaveBeenCalledTimes(2);
        expect(warn).toHaveBeenNthCalledWith(1, 'Test\tsame');
        expect(warn).toHaveBeenNthCalledWith(2, 'Test\tdifferent');
        expect(manager.log).toHaveLength(3);

        warn.mockRestore();
    });

    it('should drop history on clear', () => {
        manager.push({ type: LogType.Debug, source: 'Test', msg: { key: 'value' } });
        manager.clear();
        expect(manager.log).toEqual([]);
    });
});
