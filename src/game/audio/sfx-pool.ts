import type { SoundClip, VoiceFactory } from './audio-definitions';
import { SfxInvariantError } from './sfx-errors';
import { SfxHandle } from './sfx-handle';
import type { SfxHandleDeps } from './sfx-handle';

/**
 * The set of playback handles shared by every sound type.
 * Idle handles sit on a stack (last released, first reused). Handles are
 * never destroyed; capacity only grows.
 */
export class SfxPool<TClip extends SoundClip = SoundClip> {
    private handles: SfxHandle<TClip>[] = [];
    private idle: SfxHandle<TClip>[] = [];
    private idleSet = new Set<SfxHandle<TClip>>();
    private _peakBusy = 0;

    constructor(
        private readonly factory: VoiceFactory<TClip>,
        /** Whether a request that finds no idle handle may create one */
        public readonly canGrow: boolean,
        private readonly deps: Omit<SfxHandleDeps<TClip>, 'release'>
    ) {}

    /** Create `count` new idle handles */
    public grow(count: number): SfxHandle<TClip>[] {
        const created: SfxHandle<TClip>[] = [];
        for (let i = 0; i < count; i++) {
            const index = this.handles.length + 1;
            const handle = new SfxHandle<TClip>(index, this.factory.create(index), {
                ...this.deps,
                release: (h) => this.release(h),
            });
            this.handles.push(handle);
            this.pushIdle(handle);
            created.push(handle);
        }
        return created;
    }

    /** Take an idle handle, or null when none is left */
    public reserve(): SfxHandle<TClip> | null {
        const handle = this.idle.pop();
        if (!handle) return null;

        this.idleSet.delete(handle);
        handle.reserve();
        this._peakBusy = Math.max(this._peakBusy, this.busyCount);
        return handle;
    }

    /** Put a finishing handle back on the idle stack */
    public release(handle: SfxHandle<TClip>): void {
        if (handle.state !== 'finishing') {
            throw new SfxInvariantError(`${handle.name} released while ${handle.state}`);
        }
        if (this.handles[handle.id - 1] !== handle) {
            throw new SfxInvariantError(`${handle.name} does not belong to this pool`);
        }
        if (this.idleSet.has(handle)) {
            throw new SfxInvariantError(`${handle.name} is already idle`);
        }
        this.pushIdle(handle);
    }

    /** Whether a request could get a handle right now */
    public get canReserve(): boolean {
        return this.idle.length > 0 || this.canGrow;
    }

    /** Total handles ever created */
    public get size(): number {
        return this.handles.length;
    }

    public get idleCount(): number {
        return this.idle.length;
    }

    public get busyCount(): number {
        return this.handles.length - this.idle.length;
    }

    /** Highest busyCount seen since creation or the last resetPeak() */
    public get peakBusy(): number {
        return this._peakBusy;
    }

    public resetPeak(): void {
        this._peakBusy = this.busyCount;
    }

    public busyHandles(): SfxHandle<TClip>[] {
        return this.handles.filter((h) => !this.idleSet.has(h));
    }

    private pushIdle(handle: SfxHandle<TClip>): void {
        this.idle.push(handle);
        this.idleSet.add(handle);
    }
}
