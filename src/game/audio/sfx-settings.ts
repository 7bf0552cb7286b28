import { readFileSync } from 'node:fs';
import { DEFAULT_SFX_SEED } from '@/game/rng';
import type { SoundKey } from './audio-definitions';
import { SfxConfigError } from './sfx-errors';

/**
 * Sound manager settings - add new settings here together with a default
 * and a field reader below.
 */
export interface SfxSettings {
    /** Voices created at startup */
    initialPoolSize: number;
    /** Create a voice when all are busy, instead of dropping the sound */
    canGrowPool: boolean;
    /** Warn about declared sound types that have no variants */
    checkUnassignedSounds: boolean;
    /** Every sound type the game declares, for the unassigned check */
    soundTypes: readonly SoundKey[];
    /** Seconds added to the expected playback time before the first stopped-check */
    releaseMargin: number;
    /** Seconds between stopped-checks once a voice overran its expected end */
    retryReleaseWait: number;
    /** Seed for variant choice and pitch/volume jitter */
    seed: number;
    /** Ticks per second when driven by a FrameLoop */
    tickRate: number;
}

/** Default values for all settings */
export const DEFAULT_SFX_SETTINGS: Readonly<SfxSettings> = Object.freeze({
    initialPoolSize: 10,
    canGrowPool: true,
    checkUnassignedSounds: true,
    soundTypes: [],
    releaseMargin: 0.05,
    retryReleaseWait: 0.1,
    seed: DEFAULT_SFX_SEED,
    tickRate: 30,
});

function requireRange(name: keyof SfxSettings, value: number, ok: boolean, expected: string): void {
    if (!ok) {
        throw new SfxConfigError(`${name} must be ${expected}, got ${value}`);
    }
}

/** Merge with defaults and validate ranges */
export function resolveSfxSettings(overrides: Partial<SfxSettings> = {}): SfxSettings {
    const settings: SfxSettings = { ...DEFAULT_SFX_SETTINGS, ...overrides };

    requireRange('initialPoolSize', settings.initialPoolSize,
        Number.isInteger(settings.initialPoolSize) && settings.initialPoolSize >= 0, 'a non-negative integer');
    requireRange('releaseMargin', settings.releaseMargin,
        Number.isFinite(settings.releaseMargin) && settings.releaseMargin >= 0, 'a non-negative number');
    requireRange('retryReleaseWait', settings.retryReleaseWait,
        Number.isFinite(settings.retryReleaseWait) && settings.retryReleaseWait > 0, 'a positive number');
    requireRange('tickRate', settings.tickRate,
        Number.isFinite(settings.tickRate) && settings.tickRate > 0, 'a positive number');
    requireRange('seed', settings.seed, Number.isFinite(settings.seed), 'a finite number');

    return settings;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep only the fields that have the right type. Unknown or mistyped fields
 * fall back to their defaults, so an old file keeps working after settings
 * are added or renamed.
 */
export function readSfxSettings(raw: unknown, source?: string): Partial<SfxSettings> {
    if (!isRecord(raw)) {
        throw new SfxConfigError('settings must be a JSON object', source);
    }

    const settings: Partial<SfxSettings> = {};
    if (typeof raw.initialPoolSize === 'number') settings.initialPoolSize = raw.initialPoolSize;
    if (typeof raw.canGrowPool === 'boolean') settings.canGrowPool = raw.canGrowPool;
    if (typeof raw.checkUnassignedSounds === 'boolean') settings.checkUnassignedSounds = raw.checkUnassignedSounds;
    if (Array.isArray(raw.soundTypes)) {
        settings.soundTypes = raw.soundTypes.filter((s): s is string => typeof s === 'string');
    }
    if (typeof raw.releaseMargin === 'number') settings.releaseMargin = raw.releaseMargin;
    if (typeof raw.retryReleaseWait === 'number') settings.retryReleaseWait = raw.retryReleaseWait;
    if (typeof raw.seed === 'number') settings.seed = raw.seed;
    if (typeof raw.tickRate === 'number') settings.tickRate = raw.tickRate;
    return settings;
}

/** Load settings from a JSON file, merging with defaults */
export function loadSfxSettings(path: string): SfxSettings {
    let text: string;
    try {
        text = readFileSync(path, 'utf8');
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new SfxConfigError(`cannot read settings (${reason})`, path);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new SfxConfigError(`invalid JSON (${reason})`, path);
    }

    return resolveSfxSettings(readSfxSettings(parsed, path));
}
