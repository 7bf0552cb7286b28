export enum LogType {
    Error,
    Debug,
    Warn,
    Info
}

export interface ILogMessage {
    type: LogType;
    source: string;
    msg: string | object;
    exception?: Error;
    index?: number;
}

export type LogMessageCallback = ((msg: ILogMessage) => void);

/** Minimum interval between identical console lines (in ms) */
const LOG_THROTTLE_MS = 1000;

/** Number of messages kept in memory for late listeners */
const LOG_HISTORY_SIZE = 100;

/**
 * Frames where Node hands control back to its own scheduling internals.
 * Anything below them is timer/microtask plumbing, not our code.
 */
const ASYNC_BOUNDARY_PATTERNS = [
    /processTicksAndRejections/,
    /listOnTimeout/,
    /process\.processImmediate/,
    /processTimers/,
];

/**
 * Truncate a stack trace at the first async boundary.
 * @param stack The stack trace string
 * @returns Cleaned stack trace
 */
function cleanStackTrace(stack: string): string {
    const lines = stack.split('\n');
    const result: string[] = [];

    for (const line of lines) {
        if (ASYNC_BOUNDARY_PATTERNS.some(p => p.test(line.trim()))) {
            result.push(line);
            result.push('    ... (async stack truncated)');
            break;
        }
        result.push(line);
    }

    return result.join('\n');
}

export class LogManager {
    public log: ILogMessage[] = [];
    private logMsgCount = 0;
    private listener: LogMessageCallback | null = null;
    private consoleEnabled = true;

    /** Throttle state: source+type+msg -> { lastTime, suppressedCount } */
    private throttleState = new Map<string, { lastTime: number; suppressedCount: number }>();

    public onLogMessage(callback: LogMessageCallback | null): void {
        this.listener = callback;

        if (!callback) {
            return;
        }

        // send old messages
        for (const msg of this.log) {
            callback(msg);
        }
    }

    /** Silence console output (the in-memory log and the listener still receive everything) */
    public setConsoleOutput(enabled: boolean): void {
        this.consoleEnabled = enabled;
    }

    /** Drop the history and throttle state */
    public clear(): void {
        this.log = [];
        this.throttleState.clear();
    }

    public push(msg: ILogMessage): void {
        msg.index = this.logMsgCount++;

        this.log.push(msg);
        if (this.log.length > LOG_HISTORY_SIZE) {
            this.log.shift();
        }

        if (this.listener) {
            this.listener(msg);
        }

        if (!this.consoleEnabled) {
            return;
        }

        const msgStr = typeof msg.msg === 'string' ? msg.msg : JSON.stringify(msg.msg);
        const throttleKey = `${msg.source}:${msg.type}:${msgStr}`;
        const now = performance.now();
        const state = this.throttleState.get(throttleKey);

        if (state && now - state.lastTime < LOG_THROTTLE_MS) {
            state.suppressedCount++;
            return;
        }

        const suppressedNote = state && state.suppressedCount > 0
            ? ` (${state.suppressedCount} similar suppressed)`
            : '';

        this.throttleState.set(throttleKey, { lastTime: now, suppressedCount: 0 });

        if (typeof msg.msg !== 'string') {
            console.dir(msg.msg);
            return;
        }

        let formatted = msg.source + '\t' + msg.msg + suppressedNote;

        if (msg.exception) {
            formatted += '\n' + msg.exception.message;
            if (msg.exception.stack) {
                formatted += '\n' + cleanStackTrace(msg.exception.stack);
            }
        }

        switch (msg.type) {
        case LogType.Error:
            console.error(formatted);
            break;
        case LogType.Warn:
            console.warn(formatted);
            break;
        case LogType.Info:
            console.info(formatted);
            break;
        case LogType.Debug:
            console.debug(formatted);
            break;
        }
    }
}
