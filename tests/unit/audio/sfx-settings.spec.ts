/**
 * Unit tests for sound manager settings
 */

import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
    DEFAULT_SFX_SETTINGS,
    loadSfxSettings,
    readSfxSettings,
    resolveSfxSettings,
} from '@/game/audio/sfx-settings';
import { SfxConfigError } from '@/game/audio/sfx-errors';

const SETTINGS_PATH = fileURLToPath(new URL('../../../config/sfx-settings.json', import.meta.url));

describe('resolveSfxSettings', () => {
    it('should fall back to the defaults', () => {
        expect(resolveSfxSettings()).toEqual({
            initialPoolSize: 10,
            canGrowPool: true,
            checkUnassignedSounds: true,
            soundTypes: [],
            releaseMargin: 0.05,
            retryReleaseWait: 0.1,
            seed: 12345,
            tickRate: 30,
        });
    });

    it('should apply overrides without touching the defaults', () => {
        const settings = resolveSfxSettings({ initialPoolSize: 2, canGrowPool: false });

        expect(settings.initialPoolSize).toBe(2);
        expect(settings.canGrowPool).toBe(false);
        expect(DEFAULT_SFX_SETTINGS.initialPoolSize).toBe(10);
    });

    it('should reject out-of-range values', () => {
        expect(() => resolveSfxSettings({ initialPoolSize: -1 }))
            .toThrow('initialPoolSize must be a non-negative integer, got -1');
        expect(() => resolveSfxSettings({ initialPoolSize: 1.5 })).toThrow(SfxConfigError);
        expect(() => resolveSfxSettings({ releaseMargin: -0.01 })).toThrow(SfxConfigError);
        expect(() => resolveSfxSettings({ retryReleaseWait: 0 }))
            .toThrow('retryReleaseWait must be a positive number, got 0');
        expect(() => resolveSfxSettings({ tickRate: Number.NaN })).toThrow(SfxConfigError);
    });

    it('should allow a zero release margin and an empty pool', () => {
        expect(() => resolveSfxSettings({ releaseMargin: 0, initialPoolSize: 0 })).not.toThrow();
    });
});

describe('readSfxSettings', () => {
    it('should keep correctly typed fields only', () => {
        expect(readSfxSettings({
            initialPoolSize: 4,
            canGrowPool: 'yes',
            soundTypes: ['Click', 3, 'Arrow'],
            unknownField: true,
        })).toEqual({
            initialPoolSize: 4,
            soundTypes: ['Click', 'Arrow'],
        });
    });

    it('should reject anything but an object', () => {
        expect(() => readSfxSettings([], 'settings.json')).toThrow('settings.json: settings must be a JSON object');
        expect(() => readSfxSettings(null)).toThrow(SfxConfigError);
    });
});

describe('loadSfxSettings', () => {
    let tempDir: string | null = null;

    afterEach(() => {
        if (tempDir) {
            rmSync(tempDir, { recursive: true, force: true });
            tempDir = null;
        }
    });

    function writeTemp(content: string): string {
        tempDir = mkdtempSync(join(tmpdir(), 'sfx-settings-'));
        const path = join(tempDir, 'settings.json');
        writeFileSync(path, content);
        return path;
    }

    it('should load the example settings file', () => {
        const settings = loadSfxSettings(SETTINGS_PATH);

        expect(settings.initialPoolSize).toBe(10);
        expect(settings.soundTypes).toEqual(['Click', 'Explosion', 'Footstep', 'Arrow', 'Coin']);
    });

    it('should merge a partial file with the defaults', () => {
        const settings = loadSfxSettings(writeTemp('{ "initialPoolSize": 4 }'));

        expect(settings.initialPoolSize).toBe(4);
        expect(settings.retryReleaseWait).toBe(0.1);
    });

    it('should report broken JSON with the file name', () => {
        const path = writeTemp('{ "initialPoolSize": ');
        expect(() => loadSfxSettings(path)).toThrow(SfxConfigError);
        expect(() => loadSfxSettings(path)).toThrow(`${path}: invalid JSON`);
    });

    it('should report a missing file', () => {
        expect(() => loadSfxSettings('/nonexistent/sfx-settings.json')).toThrow(SfxConfigError);
    });

    it('should validate values read from the file', () => {
        const path = writeTemp('{ "tickRate": 0 }');
        expect(() => loadSfxSettings(path)).toThrow('tickRate must be a positive number, got 0');
    });
});
