import { readFileSync } from 'node:fs';
import { reactive, watch } from 'vue';
import type { SoundClip, SoundKey, SoundVariant } from './audio-definitions';
import { SfxConfigError } from './sfx-errors';

/**
 * Editable form of a variant: plain data with the clip given by reference
 * (a file name, a sprite id...). Resolved to a real clip on every rebuild.
 */
export interface CatalogEntry {
    sound: SoundKey;
    /** Clip reference, null when none is assigned */
    clip: string | null;
    volumeLow: number;
    volumeHigh: number;
    pitchLow: number;
    pitchHigh: number;
}

/** Turns a clip reference into a loaded clip, or null if it does not exist */
export type ClipResolver<TClip extends SoundClip> = (clipRef: string, sound: SoundKey) => TClip | null;

/** Anything with a rebuild entry point, e.g. a SoundManager */
export interface Rebuildable {
    readonly isInitialized: boolean;
    rebuild(): void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Accepts `[low, high]`, a single number (fixed value) or nothing (1) */
function readRange(value: unknown, field: string, where: string, source?: string): [number, number] {
    if (value === undefined) return [1, 1];
    if (typeof value === 'number') return [value, value];
    if (Array.isArray(value) && value.length === 2) {
        const [low, high] = value;
        if (typeof low === 'number' && typeof high === 'number') return [low, high];
    }
    throw new SfxConfigError(`${where}: ${field} must be a number or a [low, high] pair`, source);
}

/**
 * Validate raw JSON catalog data. Takes either an array of records or
 * `{ "variants": [...] }`, each record shaped as
 * `{ "sound": "Click", "clip": "click.ogg", "volume": [0.8, 1], "pitch": [0.9, 1.1] }`.
 *
 * Structural problems throw; range problems (low > high and so on) are left
 * for the catalog to report and skip.
 */
export function parseCatalogEntries(raw: unknown, source?: string): CatalogEntry[] {
    const records = isRecord(raw) ? raw.variants : raw;
    if (!Array.isArray(records)) {
        throw new SfxConfigError('catalog must be an array or { "variants": [...] }', source);
    }

    return records.map((record: unknown, index): CatalogEntry => {
        const where = `entry #${index}`;
        if (!isRecord(record)) {
            throw new SfxConfigError(`${where} must be an object`, source);
        }
        if (typeof record.sound !== 'string') {
            throw new SfxConfigError(`${where}: sound must be a string`, source);
        }
        if (record.clip !== undefined && record.clip !== null && typeof record.clip !== 'string') {
            throw new SfxConfigError(`${where}: clip must be a string or null`, source);
        }

        const [volumeLow, volumeHigh] = readRange(record.volume, 'volume', where, source);
        const [pitchLow, pitchHigh] = readRange(record.pitch, 'pitch', where, source);

        return {
            sound: record.sound,
            clip: typeof record.clip === 'string' ? record.clip : null,
            volumeLow,
            volumeHigh,
            pitchLow,
            pitchHigh,
        };
    });
}

/** Read and validate a JSON catalog file */
export function loadCatalogFile(path: string): CatalogEntry[] {
    let parsed: unknown;
    try {
        parsed = JSON.parse(readFileSync(path, 'utf8'));
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new SfxConfigError(`cannot load catalog (${reason})`, path);
    }
    return parseCatalogEntries(parsed, path);
}

/**
 * Resolve clip references. An entry whose clip is missing or unknown keeps a
 * null clip so the catalog reports it instead of failing the whole build.
 */
export function resolveCatalogEntries<TClip extends SoundClip>(
    entries: readonly CatalogEntry[],
    resolveClip: ClipResolver<TClip>
): SoundVariant<TClip>[] {
    return entries.map((entry) => ({
        sound: entry.sound,
        clip: entry.clip === null ? null : resolveClip(entry.clip, entry.sound),
        volumeLow: entry.volumeLow,
        volumeHigh: entry.volumeHigh,
        pitchLow: entry.pitchLow,
        pitchHigh: entry.pitchHigh,
    }));
}

/**
 * Wrap entries in a reactive array that tools (debug panels, an editor) can
 * edit in place while the game runs.
 */
export function createCatalogSource(entries: readonly CatalogEntry[]): CatalogEntry[] {
    return reactive(entries.map((entry) => ({ ...entry })));
}

/** Variant source for a SoundManager that re-resolves the reactive entries on each build */
export function catalogSourceProvider<TClip extends SoundClip>(
    source: readonly CatalogEntry[],
    resolveClip: ClipResolver<TClip>
): () => SoundVariant<TClip>[] {
    return () => resolveCatalogEntries(source, resolveClip);
}

/**
 * Rebuild `target` whenever anything in `source` changes. Edits made before
 * the target is initialized are picked up by its own init().
 * @returns stop function
 */
export function watchCatalogSource(source: CatalogEntry[], target: Rebuildable): () => void {
    const stop = watch(source, () => {
        if (target.isInitialized) {
            target.rebuild();
        }
    }, { deep: true });
    return () => stop();
}
