import { FrameLoop } from '@/game/frame-loop';
import type { FrameLoopOptions } from '@/game/frame-loop';
import type { SoundManager } from './sound-manager';
import type { SoundClip } from './audio-definitions';

/**
 * Frame loop for hosts without one of their own (tools, servers, tests of the
 * real backend). Ticks the manager at its configured tick rate.
 * The loop is returned stopped; call start(), or advance() from a host frame callback.
 */
export function createSoundLoop<TClip extends SoundClip>(
    manager: SoundManager<TClip>,
    options: Omit<FrameLoopOptions, 'tickRate'> = {}
): FrameLoop {
    const loop = new FrameLoop({ ...options, tickRate: manager.settings.tickRate });
    loop.registerSystem(manager, 'SoundManager');
    return loop;
}
