import { LogHandler } from './log-handler';

interface ChannelState {
    lastTime: number;
    suppressed: number;
}

/**
 * Rate limiter in front of a LogHandler with one window per channel.
 *
 * Sound warnings can fire on every play request (pool pressure, late
 * releases). Each channel lets at most one entry through per `throttleMs`,
 * and the next entry that gets through carries the number dropped in between.
 *
 *   const tl = new ThrottledLogger(log, 1000);
 *   tl.warn('pool', 'Pool grew to 11 voices');
 */
export class ThrottledLogger {
    private readonly channels = new Map<string, ChannelState>();

    constructor(
        private readonly log: LogHandler,
        private readonly throttleMs: number,
        private readonly now: () => number = () => performance.now()
    ) {}

    /** Messages dropped on a channel since its last entry */
    public suppressedCount(channel: string): number {
        return this.channels.get(channel)?.suppressed ?? 0;
    }

    /** Returns `true` when the message was actually logged */
    public error(channel: string, message: string, error: Error): boolean {
        const text = this.admit(channel, message);
        if (text === null) return false;
        this.log.error(text, error);
        return true;
    }

    public warn(channel: string, message: string): boolean {
        const text = this.admit(channel, message);
        if (text === null) return false;
        this.log.warn(text);
        return true;
    }

    private admit(channel: string, message: string): string | null {
        const now = this.now();
        let state = this.channels.get(channel);
        if (!state) {
            state = { lastTime: Number.NEGATIVE_INFINITY, suppressed: 0 };
            this.channels.set(channel, state);
        }

        if (now - state.lastTime < this.throttleMs) {
            state.suppressed++;
            return null;
        }

        state.lastTime = now;
        const dropped = state.suppressed;
        state.suppressed = 0;
        return dropped > 0 ? `${message} (${dropped} similar suppressed)` : message;
    }
}
