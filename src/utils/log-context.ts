/**
 * Structured Logging with Context
 *
 * Wraps the Homebridge logger with categories and per-fire context so every
 * line says where it came from.
 */

import {Logger} from 'homebridge';

export enum LogLevel {
    DEBUG = 'debug',
    INFO = 'info',
    WARN = 'warn',
    ERROR = 'error',
}

export enum LogCategory {
    PLATFORM = 'Platform',
    API = 'API',
    AUTH = 'Auth',
    FIRE = 'Fire',
    PROTOCOL = 'Protocol',
    SERVICE = 'Service',
    FEATURE = 'Feature',
    CONFIG = 'Config',
    ACCESSORY = 'Accessory',
}

export interface LogContext {
    category?: LogCategory;
    fireId?: string;
    fireName?: string;
    operation?: string;
    /** Parameter the line is about, e.g. "FlameEffect" */
    parameter?: string;
    feature?: string;
    metadata?: Record<string, unknown>;
}

export interface LogEntry {
    level: LogLevel;
    message: string;
    context?: LogContext;
    timestamp: Date;
}

const MAX_HISTORY_SIZE = 100;

/**
 * Render the bracketed prefix for a context
 */
export function formatContextPrefix(context: LogContext): string {
    const parts: string[] = [];

    if (context.category) {
        parts.push(`[${context.category}]`);
    }
    if (context.fireName) {
        parts.push(`[${context.fireName}]`);
    } else if (context.fireId) {
        parts.push(`[Fire:${context.fireId}]`);
    }
    if (context.parameter) {
        parts.push(`[Param:${context.parameter}]`);
    }
    if (context.operation) {
        parts.push(`(${context.operation})`);
    }
    if (context.feature) {
        parts.push(`[Feature:${context.feature}]`);
    }

    return parts.join(' ');
}

export class StructuredLogger {
    private readonly history: LogEntry[] = [];

    constructor(
        private readonly logger: Logger,
        private readonly defaultContext?: LogContext,
    ) {}

    debug(message: string, context?: LogContext): void {
        this.log(LogLevel.DEBUG, message, context);
    }

    info(message: string, context?: LogContext): void {
        this.log(LogLevel.INFO, message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.log(LogLevel.WARN, message, context);
    }

    error(message: string, context?: LogContext): void {
        this.log(LogLevel.ERROR, message, context);
    }

    log(level: LogLevel, message: string, context?: LogContext): void {
        const merged = this.mergeContext(context);
        const line = merged ? this.formatMessage(message, merged) : message;

        switch (level) {
            case LogLevel.DEBUG:
                this.logger.debug(line);
                break;
            case LogLevel.INFO:
                this.logger.info(line);
                break;
            case LogLevel.WARN:
                this.logger.warn(line);
                break;
            case LogLevel.ERROR:
                this.logger.error(line);
                break;
        }

        this.history.push({level, message, context: merged, timestamp: new Date()});
        if (this.history.length > MAX_HISTORY_SIZE) {
            this.history.splice(0, this.history.length - MAX_HISTORY_SIZE);
        }
    }

    /**
     * Create a child logger with additional context
     */
    child(context: LogContext): StructuredLogger {
        return new StructuredLogger(this.logger, this.mergeContext(context));
    }

    getHistory(limit?: number): LogEntry[] {
        return limit ? this.history.slice(-limit) : [...this.history];
    }

    clearHistory(): void {
        this.history.length = 0;
    }

    private mergeContext(context?: LogContext): LogContext | undefined {
        if (!this.defaultContext && !context) {
            return undefined;
        }

        return {
            ...this.defaultContext,
            ...context,
            metadata: {
                ...this.defaultContext?.metadata,
                ...context?.metadata,
            },
        };
    }

    private formatMessage(message: string, context: LogContext): string {
        const prefix = formatContextPrefix(context);
        const text = prefix ? `${prefix} ${message}` : message;

        if (context.metadata && Object.keys(context.metadata).length > 0) {
            return `${text} ${JSON.stringify(context.metadata)}`;
        }
        return text;
    }
}

export function createLogger(logger: Logger, context?: LogContext): StructuredLogger {
    return new StructuredLogger(logger, context);
}

export function createCategoryLogger(logger: Logger, category: LogCategory): StructuredLogger {
    return createLogger(logger, {category});
}

/**
 * Create a logger for one fire
 */
export function createFireLogger(
    logger: Logger,
    fireId: string,
    fireName?: string,
): StructuredLogger {
    return createLogger(logger, {
        category: LogCategory.FIRE,
        fireId,
        fireName,
    });
}
