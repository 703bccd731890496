/**
 * Standalone Logger Utility
 *
 * Provides consistent logging with environment-aware formatting.
 * Level threshold comes from LOG_LEVEL (debug, info, warn, error, silent).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

export type LogMeta = Record<string, unknown>;

export class Logger {
    private level: LogLevel;

    constructor(level?: LogLevel) {
        const fromEnv = process.env.LOG_LEVEL?.toLowerCase() ?? 'info';
        this.level = level ?? (isLogLevel(fromEnv) ? fromEnv : 'info');
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    getLevel(): LogLevel {
        return this.level;
    }

    debug(message: string, meta?: LogMeta) {
        if (this.enabled('debug')) {
            console.debug(this.formatLog('DEBUG', message, meta));
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

    /**
     * Log failure message with context
     */
    error(message: string, meta?: LogMeta) {
        if (this.enabled('error')) {
            console.error(this.formatLog('ERROR', message, meta));
        }
    }

    private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
        return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
    }

    /**
     * Format log message with environment-aware output
     */
    private formatLog(level: string, message: string, meta?: LogMeta): string {
        if (process.env.NODE_ENV === 'production') {
            // Structured JSON for production log aggregation
            return JSON.stringify({
                timestamp: new Date().toISOString(),
                level,
                message,
                ...(meta && { meta }),
            });
        }

        // Pretty format for development
        const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
        return `${level} ${message}${metaStr}`;
    }
}

/**
 * Global logger instance for infrastructure components
 */
export const logger = new Logger();

/**
 * Render an unknown thrown value for log metadata
 */
export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
