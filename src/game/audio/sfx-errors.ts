/**
 * Thrown when a handle or the pool is driven into a transition its state
 * machine does not allow. This is always a bug in the caller (usually code
 * that reached into a handle directly), never a runtime condition to recover
 * from.
 */
export class SfxInvariantError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SfxInvariantError';
    }
}

/** Thrown while loading settings or catalog files that are malformed */
export class SfxConfigError extends Error {
    constructor(message: string, public readonly source?: string) {
        super(source ? `${source}: ${message}` : message);
        this.name = 'SfxConfigError';
    }
}
