/**
 * Structured logger with run correlation support
 *
 * Every line of a sync run carries the same `runId`; per-stage and
 * per-asset children add `stage`, `assetIndex` or `repoPath`.
 */
import { pino, type Logger as PinoLogger } from 'pino';
import { config } from '../config/index.js';

// Create base logger
const baseLogger = pino({
    level: config.logLevel,
    base: {
        service: 'asset-sync',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
        level: (label) => ({ level: label }),
    },
});

// Fields bound onto a child logger
export interface LogContext {
    runId?: string;
    assetIndex?: number;
    repoPath?: string;
    stage?: 'load' | 'extract' | 'download' | 'publish';
}

/**
 * Message-first wrapper over pino: `log.info('Downloaded', { outputPath })`.
 * Errors go in their own argument so the stack is kept under `error`.
 */
export class Logger {
    private logger: PinoLogger;

    constructor(context?: LogContext) {
        this.logger = context ? baseLogger.child(context) : baseLogger;
    }

    // Narrow to a stage or asset without losing the run's fields
    child(context: LogContext): Logger {
        const newLogger = new Logger();
        newLogger.logger = this.logger.child(context);
        return newLogger;
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

// Process-wide logger and a factory for run-scoped ones
export const logger = new Logger();
export const createLogger = (context: LogContext) => new Logger(context);
