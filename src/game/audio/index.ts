/**
 * Audio module public API
 *
 * All external code should import from this barrel file.
 */

// Core types
export { NO_SOUND, ORIGIN, NON_SPATIAL, isNoSound, vec3 } from './audio-definitions';
export type {
    AudioVoice,
    PlayFailureReason,
    PlayRequest,
    PlayableVariant,
    PositionSource,
    SoundClip,
    SoundKey,
    SoundVariant,
    SpatialMode,
    Vec3,
    VoiceFactory,
} from './audio-definitions';

// Main sound manager (one instance per game)
export { SoundManager } from './sound-manager';
export type { PlayOptions, PlayResult, SoundManagerOptions, VariantSource } from './sound-manager';
export { createSoundLoop } from './sound-loop';

// Settings
export { DEFAULT_SFX_SETTINGS, loadSfxSettings, readSfxSettings, resolveSfxSettings } from './sfx-settings';
export type { SfxSettings } from './sfx-settings';

// Catalog and variant choice
export { SoundCatalog } from './sound-catalog';
export { VariantSelector } from './variant-selector';
export type { PlaybackParams } from './variant-selector';
export {
    catalogSourceProvider,
    createCatalogSource,
    loadCatalogFile,
    parseCatalogEntries,
    resolveCatalogEntries,
    watchCatalogSource,
} from './catalog-source';
export type { CatalogEntry, ClipResolver, Rebuildable } from './catalog-source';

// SFX pooling
export { SfxPool } from './sfx-pool';
export { SfxHandle, expectedDuration } from './sfx-handle';
export { SfxPlayback } from './sfx-playback';
export type { PlaybackPlan, ReleaseTiming, SfxHandleDeps, SfxHandleState } from './sfx-handle';

// Diagnostics and errors
export { LoggingSfxObserver } from './sfx-observer';
export type { SfxObserver, VariantSkipReason } from './sfx-observer';
export { SfxConfigError, SfxInvariantError } from './sfx-errors';

// Howler backend
export { HowlClip, HowlVoice, createHowlClipResolver, howlVoiceFactory } from './howl-voice';
export type { HowlClipResolverOptions } from './howl-voice';
