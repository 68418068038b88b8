/**
 * Standalone Logger Utility
 *
 * Provides consistent logging with environment-aware formatting and a level
 * threshold, so factory internals stay quiet inside test runs unless asked.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogMeta = Record<string, unknown>;

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

export class Logger {
    constructor(private level: LogLevel = 'warn') {}

    getLevel(): LogLevel {
        return this.level;
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    /**
     * Check whether a message at the given level would be written
     */
    enabled(level: Exclude<LogLevel, 'silent'>): boolean {
        return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
    }

    debug(message: string, meta?: LogMeta) {
        if (this.enabled('debug')) {
            console.info(this.formatLog('DEBUG', message, meta));
        }
    }

    info(message: string, meta?: LogMeta) {
        if (this.enabled('info')) {
            console.info(this.formatLog('INFO', message, meta));
        }
    }

    warn(message: string, meta?: LogMeta) {
        if (this.enabled('warn')) {
            console.warn(this.formatLog('WARN', message, meta));
        }
    }

    error(message: string, meta?: LogMeta) {
        if (this.enabled('error')) {
            console.error(this.formatLog('ERROR', message, meta));
        }
    }

    /**
     * Log timing data with calculated elapsed time using hrtime precision
     * Takes start time from process.hrtime.bigint() and calculates duration
     */
    time(label: string, startTime: bigint, meta: LogMeta = {}): void {
        if (!this.enabled('debug')) {
            return;
        }
        const durationNs = process.hrtime.bigint() - startTime;
        const durationMs = Number(durationNs) / 1_000_000;
        console.info('[TIME] %s %sms %j', label, durationMs, meta);
    }

    /**
     * Format log message with environment-aware output
     */
    formatLog(level: string, message: string, meta?: LogMeta): string {
        if (process.env.NODE_ENV === 'production') {
            // Structured JSON for log aggregation
            return JSON.stringify({
                timestamp: new Date().toISOString(),
                level,
                message,
                ...(meta && { meta }),
            });
        }

        const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
        return `${level} ${message}${metaStr}`;
    }
}

/**
 * Shared logger for code that runs without a factory context
 */
export const logger = new Logger();
