import { LogManager, LogType } from './log-manager';
import type { ILogMessage } from './log-manager';

/**
 * Named logger. Every instance feeds the one shared LogManager, tagged with
 * its source name; child() narrows the source, e.g. `HowlClips/click.ogg`.
 */
export class LogHandler {
    private static manager = new LogManager();

    constructor(public readonly moduleName: string) {}

    /** Logger for one part of this module */
    public child(scope: string): LogHandler {
        return new LogHandler(`${this.moduleName}/${scope}`);
    }

    public error(msg: string, exception?: Error): void {
        this.write(LogType.Error, msg, exception);
    }

    public warn(msg: string): void {
        this.write(LogType.Warn, msg);
    }

    public info(msg: string): void {
        this.write(LogType.Info, msg);
    }

    /** Objects are dumped as {prop:value} */
    public debug(msg: string | object): void {
        this.write(LogType.Debug, msg);
    }

    private write(type: LogType, msg: ILogMessage['msg'], exception?: Error): void {
        LogHandler.manager.push({ type, source: this.moduleName, msg, exception });
    }

    public static getLogManager(): LogManager {
        return this.manager;
    }
}
