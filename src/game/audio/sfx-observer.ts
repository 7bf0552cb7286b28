import { LogHandler } from '@/utilities/log-handler';
import { ThrottledLogger } from '@/utilities/throttled-logger';
import type { SoundKey } from './audio-definitions';

export type VariantSkipReason = 'no-sound' | 'missing-clip' | 'invalid-range';

/**
 * Diagnostics sink. Every method is optional and fire-and-forget; call sites
 * pass raw values only, so a missing observer costs nothing.
 */
export interface SfxObserver {
    /** The catalog source had no usable variant at all */
    emptyCatalog?(): void;
    variantSkipped?(sound: SoundKey, reason: VariantSkipReason, index: number): void;
    /** Declared sound types without a single variant */
    unassignedSoundTypes?(sounds: readonly SoundKey[]): void;
    /** play() ran before init(); the manager initialized itself */
    playedBeforeInit?(): void;
    invalidSoundType?(sound: SoundKey): void;
    unknownSoundType?(sound: SoundKey): void;
    /** No idle voice and growth is disabled; nothing was played */
    poolExhausted?(sound: SoundKey, poolSize: number): void;
    /** No idle voice, so one was created for this request */
    poolGrown?(sound: SoundKey, poolSize: number): void;
    /** The voice still reported playing past its expected end */
    releaseDelayed?(sound: SoundKey, waitCycle: number, voiceName: string): void;
}

/** Pool and release warnings are limited to one per second per channel */
const PRESSURE_LOG_THROTTLE_MS = 1000;

/** SfxObserver that writes everything to the log */
export class LoggingSfxObserver implements SfxObserver {
    private static defaultLog = new LogHandler('SoundManager');

    private readonly pressureLog: ThrottledLogger;

    constructor(
        private readonly log: LogHandler = LoggingSfxObserver.defaultLog,
        now?: () => number
    ) {
        this.pressureLog = new ThrottledLogger(log, PRESSURE_LOG_THROTTLE_MS, now);
    }

    emptyCatalog(): void {
        this.log.warn('No usable sound variants are registered; every play request will fail.');
    }

    variantSkipped(sound: SoundKey, reason: VariantSkipReason, index: number): void {
        switch (reason) {
        case 'no-sound':
            this.log.debug(`Variant #${index} has no sound type selected and was ignored.`);
            break;
        case 'missing-clip':
            this.log.warn(`Variant #${index} for '${sound}' has no clip and was ignored.`);
            break;
        case 'invalid-range':
            this.log.warn(`Variant #${index} for '${sound}' has an invalid volume or pitch range and was ignored.`);
            break;
        }
    }

    unassignedSoundTypes(sounds: readonly SoundKey[]): void {
        this.log.warn(`No variants registered for: ${sounds.join(', ')}`);
    }

    playedBeforeInit(): void {
        this.log.warn('Sound played before init(); initializing now. Call init() during startup.');
    }

    invalidSoundType(sound: SoundKey): void {
        this.log.warn(`Cannot play '${sound}': it is the "no sound" placeholder.`);
    }

    unknownSoundType(sound: SoundKey): void {
        this.log.warn(`Cannot play '${sound}': no variants are registered for it.`);
    }

    poolExhausted(sound: SoundKey, poolSize: number): void {
        this.pressureLog.warn(
            'pool',
            `Cannot play '${sound}': all ${poolSize} voices are busy and pool growth is disabled.`
        );
    }

    poolGrown(sound: SoundKey, poolSize: number): void {
        this.pressureLog.warn(
            'pool',
            `All voices busy when playing '${sound}'; pool grew to ${poolSize}. Consider a larger initialPoolSize.`
        );
    }

    releaseDelayed(sound: SoundKey, waitCycle: number, voiceName: string): void {
        this.pressureLog.warn(
            'release',
            `${voiceName} still playing '${sound}' past its expected end (extra wait ${waitCycle}). ` +
            'Consider a larger releaseMargin.'
        );
    }
}
