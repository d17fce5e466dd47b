/**
 * Structured logging for readers and drivers
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export const LOG_LEVEL_ENV = 'CARD_READER_LOG_LEVEL';

function isLogLevel(value: string): value is LogLevel {
    return LEVELS.some((level) => level === value);
}

/**
 * Level taken from CARD_READER_LOG_LEVEL, `warn` when unset or invalid
 */
export function defaultLogLevel(
    env: NodeJS.ProcessEnv = process.env
): LogLevel {
    const value = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
    return value && isLogLevel(value) ? value : 'warn';
}

/**
 * Structured logger with context support
 */
export class Logger {
    private _minLevel: LogLevel;

    constructor(
        readonly component: string,
        minLevel: LogLevel = defaultLogLevel(),
        private readonly _context: LogContext = {}
    ) {
        this._minLevel = minLevel;
    }

    get level(): LogLevel {
        return this._minLevel;
    }

    setLevel(level: LogLevel): void {
        this._minLevel = level;
    }

    isEnabled(level: LogLevel): boolean {
        if (level === 'silent') {
            return false;
        }
        return LEVELS.indexOf(level) >= LEVELS.indexOf(this._minLevel);
    }

    /**
     * Format log message with context
     */
    format(level: LogLevel, message: string, context?: LogContext): string {
        const timestamp = new Date().toISOString();
        const ctx = { component: this.component, ...this._context, ...context };
        const contextStr = Object.entries(ctx)
            .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
            .join(' ');
        return `[${timestamp}] ${level.toUpperCase()} ${contextStr} - ${message}`;
    }

    debug(message: string, context?: LogContext): void {
        if (this.isEnabled('debug')) {
            console.debug(this.format('debug', message, context));
        }
    }

    info(message: string, context?: LogContext): void {
        if (this.isEnabled('info')) {
            console.info(this.format('info', message, context));
        }
    }

    warn(message: string, context?: LogContext): void {
        if (this.isEnabled('warn')) {
            console.warn(this.format('warn', message, context));
        }
    }

    error(message: string, error?: unknown, context?: LogContext): void {
        if (this.isEnabled('error')) {
            const errorContext =
                error instanceof Error
                    ? { ...context, error: error.message, stack: error.stack }
                    : error === undefined
                      ? context
                      : { ...context, error: String(error) };
            console.error(this.format('error', message, errorContext));
        }
    }

    /**
     * Create child logger with additional context
     */
    child(additionalContext: LogContext): Logger {
        return new Logger(this.component, this._minLevel, {
            ...this._context,
            ...additionalContext,
        });
    }
}

export function createLogger(
    component: string,
    level: LogLevel = defaultLogLevel()
): Logger {
    return new Logger(component, level);
}
