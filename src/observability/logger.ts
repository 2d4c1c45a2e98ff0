/**
 * Structured logger with request correlation support
 */
import pino from 'pino';

const LEVELS: readonly pino.LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Level to start with before config is validated; unknown values fall back to info
 */
export function initialLogLevel(value: string | undefined): pino.LevelWithSilent {
    return LEVELS.find(level => level === value) ?? 'info';
}

// Create base logger. The validated level is applied from config at start-up.
const baseLogger = pino({
    level: initialLogLevel(process.env.LOG_LEVEL),
    base: {
        service: 'media-relay-bot',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
        level: (label) => ({ level: label }),
    },
});

// Logger interface with correlation ID support
export interface LogContext {
    requestId?: string;
    chatId?: number;
    userId?: number;
}

export class Logger {
    constructor(private readonly logger: pino.Logger = baseLogger) { }

    child(context: LogContext): Logger {
        return new Logger(this.logger.child(context));
    }

    debug(message: string, data?: Record<string, unknown>): void {
        this.logger.debug(data || {}, message);
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.logger.info(data || {}, message);
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.logger.warn(data || {}, message);
    }

    error(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
        const errorData = error instanceof Error
            ? { error: { code: error.name, message: error.message, stack: error.stack } }
            : { error };
        this.logger.error({ ...errorData, ...data }, message);
    }
}

export function setLogLevel(level: pino.LevelWithSilent): void {
    baseLogger.level = level;
}

export const logger = new Logger();
