/**
 * Console logger with a scope prefix and a level threshold.
 * Threshold comes from CLADEKIT_LOG_LEVEL (debug | info | warn | error), default info.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3
};

export interface Logger {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
}

export interface LoggerOptions {
    level?: LogLevel;
    silent?: boolean;
}

export function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function envLevel(): LogLevel {
    const raw = process.env.CLADEKIT_LOG_LEVEL?.toLowerCase();
    return isLogLevel(raw) ? raw : 'info';
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
    const threshold = LEVEL_ORDER[options.level ?? envLevel()];
    const prefix = `[${scope}]`;

    const emit = (level: LogLevel, message: string, details: unknown[]) => {
        if (options.silent || LEVEL_ORDER[level] < threshold) return;
        // Diagnostics go to stderr so stdout stays usable for Newick output
        if (level === 'error') console.error(prefix, message, ...details);
        else if (level === 'warn') console.warn(prefix, message, ...details);
        else console.error(prefix, message, ...details);
    };

    return {
        debug: (message, ...details) => emit('debug', message, details),
        info: (message, ...details) => emit('info', message, details),
        warn: (message, ...details) => emit('warn', message, details),
        error: (message, ...details) => emit('error', message, details)
    };
}

/** Logger that drops everything (tests, library callers that report themselves) */
export const silentLogger: Logger = createLogger('silent', { silent: true });
