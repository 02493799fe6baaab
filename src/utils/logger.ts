/**
 * Console logger for hub-tags
 * Structured, levelled log lines written to stderr so stdout stays reserved for results
 */

/**
 * Log levels
 */
export enum LogLevel {
    ERROR = 'error',
    WARN = 'warn',
    INFO = 'info',
    DEBUG = 'debug',
}

/**
 * Logger interface
 */
export interface Logger {
    error(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    info(message: string, meta?: Record<string, unknown>): void;
    debug(message: string, meta?: Record<string, unknown>): void;
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.ERROR, LogLevel.WARN, LogLevel.INFO, LogLevel.DEBUG];

export function isLogLevel(value: string): value is LogLevel {
    return LEVEL_ORDER.some((level) => level === value);
}

/**
 * Parse a level name, falling back to info for anything unknown
 */
export function parseLogLevel(value: string | undefined): LogLevel {
    const normalized = (value || '').trim().toLowerCase();
    return isLogLevel(normalized) ? normalized : LogLevel.INFO;
}

export type LogWriter = (line: string) => void;

export interface ConsoleLoggerOptions {
    level?: LogLevel;
    write?: LogWriter;
}

/**
 * Console logger implementation
 */
export class ConsoleLogger implements Logger {
    private level: LogLevel;
    private readonly write: LogWriter;

    constructor(options: ConsoleLoggerOptions = {}) {
        this.level = options.level ?? parseLogLevel(process.env['LOG_LEVEL']);
        this.write = options.write ?? ((line) => console.error(line));
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    getLevel(): LogLevel {
        return this.level;
    }

    private shouldLog(level: LogLevel): boolean {
        return LEVEL_ORDER.indexOf(level) <= LEVEL_ORDER.indexOf(this.level);
    }

    private formatMessage(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
        const timestamp = new Date().toISOString();
        const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
        return `[${timestamp}] ${level.toUpperCase()}: ${message}${metaStr}`;
    }

    private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
        if (this.shouldLog(level)) {
            this.write(this.formatMessage(level, message, meta));
        }
    }

    error(message: string, meta?: Record<string, unknown>): void {
        this.log(LogLevel.ERROR, message, meta);
    }

    warn(message: string, meta?: Record<string, unknown>): void {
        this.log(LogLevel.WARN, message, meta);
    }

    info(message: string, meta?: Record<string, unknown>): void {
        this.log(LogLevel.INFO, message, meta);
    }

    debug(message: string, meta?: Record<string, unknown>): void {
        this.log(LogLevel.DEBUG, message, meta);
    }
}

/**
 * Default logger instance
 */
export const logger = new ConsoleLogger();
