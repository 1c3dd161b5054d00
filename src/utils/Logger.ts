/**
 * Internal logging utility for tentative.
 * Provides structured logging with levels and tags, allowing for
 * easy control of log noise in production environments.
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4
}

type ConsoleMethod = 'debug' | 'info' | 'warn' | 'error';

export class Logger {
    private level: LogLevel = LogLevel.INFO;
    private tag: string;
    private useJson: boolean = false;

    constructor(tag: string = 'tentative', debug: boolean = false) {
        this.tag = tag;
        if (debug) {
            this.level = LogLevel.DEBUG;
        }
    }

    public setLogLevel(level: LogLevel): void {
        this.level = level;
    }

    public getLogLevel(): LogLevel {
        return this.level;
    }

    public setJson(enabled: boolean): void {
        this.useJson = enabled;
    }

    private log(method: ConsoleMethod, levelName: string, message: string, args: unknown[]): void {
        if (this.useJson) {
            const entry = {
                timestamp: new Date().toISOString(),
                tag: this.tag,
                level: levelName,
                message,
                data: args.length > 0 ? args.map((arg) => Logger.toViewable(arg)) : undefined
            };
            console[method](JSON.stringify(entry));
        } else {
            const prefix = `[${this.tag}]${levelName === 'DEBUG' ? ' (DEBUG)' : ''}${levelName === 'WARN' ? ' ⚠️' : ''}${levelName === 'ERROR' ? ' ❌' : ''}`;
            console[method](`${prefix} ${message}`, ...args);
        }
    }

    public debug(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.DEBUG) {
            this.log('debug', 'DEBUG', message, args);
        }
    }

    public info(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.INFO) {
            this.log('info', 'INFO', message, args);
        }
    }

    public warn(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.WARN) {
            this.log('warn', 'WARN', message, args);
        }
    }

    public error(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.ERROR) {
            this.log('error', 'ERROR', message, args);
        }
    }

    /**
     * Creates a child logger with an extended tag.
     * The child copies the parent's level unless `debug` forces DEBUG.
     */
    public child(subTag: string, debug: boolean = false): Logger {
        const child = new Logger(`${this.tag}:${subTag}`);
        child.setLogLevel(debug ? LogLevel.DEBUG : this.level);
        child.setJson(this.useJson);
        return child;
    }

    /**
     * Converts a log payload into something JSON.stringify renders faithfully:
     * BigInts become strings with an `n` suffix, Errors become `{ name, message }`.
     */
    public static toViewable(value: unknown): unknown {
        if (value === null || value === undefined) return value;
        if (typeof value === 'bigint') return value.toString() + 'n';
        if (value instanceof Error) return { name: value.name, message: value.message };
        if (Array.isArray(value)) return value.map((item: unknown) => Logger.toViewable(item));
        if (typeof value === 'object') {
            const result: Record<string, unknown> = {};
            for (const [key, item] of Object.entries(value)) {
                result[key] = Logger.toViewable(item);
            }
            return result;
        }
        return value;
    }

    /**
     * Support for JSON.stringify(logger)
     */
    public toJSON(): { tag: string; level: LogLevel; useJson: boolean } {
        return {
            tag: this.tag,
            level: this.level,
            useJson: this.useJson
        };
    }
}

// Global default logger
export const logger = new Logger('tentative');
