/**
 * Interface for systems that update every frame tick.
 * Systems register with the FrameLoop (or any host loop) instead of
 * keeping their own timers.
 */
export interface TickSystem {
    /** Called each fixed-timestep tick, dt in seconds */
    tick(dt: number): void;

    /**
     * Optional: Called when the system is being torn down.
     * Called automatically by FrameLoop.destroy() for all registered systems.
     */
    destroy?(): void;
}
