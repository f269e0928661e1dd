/**
 * Error Handler Service
 *
 * Centralized categorisation, logging and user messages for errors raised
 * by the cloud client, the sign-in and the parameter codec.
 */

import {Logger} from 'homebridge';
import {ApiError, ApiTimeoutError, RateLimitedError} from '../api/flameconnect-api';
import {AuthenticationError} from '../api/b2c-login';
import {FireCommandError} from '../api/fire-commands';
import {ProtocolError} from '../protocol';
import {HTTP_STATUS} from '../constants';

export enum ErrorSeverity {
    INFO = 'INFO',
    WARNING = 'WARNING',
    ERROR = 'ERROR',
    FATAL = 'FATAL',
}

export enum ErrorCategory {
    AUTHENTICATION = 'AUTHENTICATION',
    NETWORK = 'NETWORK',
    RATE_LIMIT = 'RATE_LIMIT',
    VALIDATION = 'VALIDATION',
    API = 'API',
    PROTOCOL = 'PROTOCOL',
    FIRE = 'FIRE',
    CONFIGURATION = 'CONFIGURATION',
    UNKNOWN = 'UNKNOWN',
}

export interface ErrorContext {
    category: ErrorCategory;
    severity: ErrorSeverity;
    operation?: string;
    fireId?: string;
    retryable?: boolean;
    metadata?: Record<string, unknown>;
}

export interface HandledError {
    message: string;
    originalError: Error;
    context: ErrorContext;
    timestamp: Date;
    stack?: string;
}

const NETWORK_MARKERS = ['econnreset', 'econnrefused', 'etimedout', 'enotfound', 'socket hang up', 'network', 'timed out'];

const SEVERITY_BY_CATEGORY: Record<ErrorCategory, ErrorSeverity> = {
    [ErrorCategory.AUTHENTICATION]: ErrorSeverity.FATAL,
    [ErrorCategory.CONFIGURATION]: ErrorSeverity.FATAL,
    [ErrorCategory.RATE_LIMIT]: ErrorSeverity.WARNING,
    [ErrorCategory.NETWORK]: ErrorSeverity.WARNING,
    [ErrorCategory.PROTOCOL]: ErrorSeverity.WARNING,
    [ErrorCategory.VALIDATION]: ErrorSeverity.ERROR,
    [ErrorCategory.API]: ErrorSeverity.ERROR,
    [ErrorCategory.FIRE]: ErrorSeverity.ERROR,
    [ErrorCategory.UNKNOWN]: ErrorSeverity.ERROR,
};

const MAX_HISTORY_SIZE = 100;

/**
 * Turn whatever was thrown into an Error
 */
export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}

export class ErrorHandler {
    private errorHistory: HandledError[] = [];

    constructor(
        private readonly logger: Logger,
        private readonly contextPrefix: string = '',
    ) {}

    /**
     * Handle an error with context
     */
    handle(error: Error, context: Partial<ErrorContext> = {}): HandledError {
        const handledError = this.createHandledError(error, context);
        this.logError(handledError);
        this.recordError(handledError);
        return handledError;
    }

    /**
     * Handle an error and return a user-friendly message
     */
    handleWithMessage(error: Error, context: Partial<ErrorContext> = {}): string {
        return this.getUserMessage(this.handle(error, context));
    }

    /**
     * Transient failures worth trying again later
     */
    isRetryable(error: Error): boolean {
        if (error instanceof RateLimitedError || error instanceof ApiTimeoutError) {
            return true;
        }
        if (error instanceof ApiError) {
            return error.statusCode >= HTTP_STATUS.INTERNAL_SERVER_ERROR;
        }
        if (error instanceof AuthenticationError || error instanceof ProtocolError || error instanceof FireCommandError) {
            return false;
        }

        const message = error.message.toLowerCase();
        return NETWORK_MARKERS.some(marker => message.includes(marker))
            || message.includes('bad gateway')
            || message.includes('service unavailable')
            || message.includes('gateway timeout');
    }

    categorize(error: Error): ErrorCategory {
        if (error instanceof AuthenticationError) {
            return ErrorCategory.AUTHENTICATION;
        }
        if (error instanceof RateLimitedError) {
            return ErrorCategory.RATE_LIMIT;
        }
        if (error instanceof ProtocolError) {
            return ErrorCategory.PROTOCOL;
        }
        if (error instanceof FireCommandError) {
            return ErrorCategory.FIRE;
        }
        if (error instanceof ApiError) {
            return error.statusCode === HTTP_STATUS.UNAUTHORIZED ? ErrorCategory.AUTHENTICATION : ErrorCategory.API;
        }
        if (error instanceof ApiTimeoutError) {
            return ErrorCategory.NETWORK;
        }

        const message = error.message.toLowerCase();

        if (message.includes('unauthorized') || message.includes('token') || message.includes('authenticat')) {
            return ErrorCategory.AUTHENTICATION;
        }
        if (message.includes('rate limit')) {
            return ErrorCategory.RATE_LIMIT;
        }
        if (NETWORK_MARKERS.some(marker => message.includes(marker)) || message.includes('socket')) {
            return ErrorCategory.NETWORK;
        }
        if (message.includes('validation') || message.includes('invalid')) {
            return ErrorCategory.VALIDATION;
        }
        if (message.includes('fire')) {
            return ErrorCategory.FIRE;
        }
        if (message.includes('config')) {
            return ErrorCategory.CONFIGURATION;
        }
        if (message.includes('api') || message.includes('status')) {
            return ErrorCategory.API;
        }

        return ErrorCategory.UNKNOWN;
    }

    determineSeverity(category: ErrorCategory): ErrorSeverity {
        return SEVERITY_BY_CATEGORY[category];
    }

    getRecentErrors(limit = 10): HandledError[] {
        return this.errorHistory.slice(-limit);
    }

    getErrorsByCategory(category: ErrorCategory): HandledError[] {
        return this.errorHistory.filter(e => e.context.category === category);
    }

    clearHistory(): void {
        this.errorHistory = [];
    }

    private createHandledError(error: Error, context: Partial<ErrorContext>): HandledError {
        const category = context.category ?? this.categorize(error);
        const severity = context.severity ?? this.determineSeverity(category);
        const retryable = context.retryable ?? this.isRetryable(error);

        return {
            message: error.message,
            originalError: error,
            context: {
                ...context,
                category,
                severity,
                retryable,
            },
            timestamp: new Date(),
            stack: error.stack,
        };
    }

    private logError(error: HandledError): void {
        const prefix = this.contextPrefix ? `[${this.contextPrefix}] ` : '';
        const operation = error.context.operation ? ` (${error.context.operation})` : '';
        const fireId = error.context.fireId ? ` [${error.context.fireId}]` : '';
        const message = `${prefix}${error.context.category}${operation}${fireId}: ${error.message}`;

        switch (error.context.severity) {
            case ErrorSeverity.FATAL:
                this.logger.error(message);
                if (error.stack) {
                    this.logger.debug(error.stack);
                }
                break;
            case ErrorSeverity.ERROR:
                this.logger.error(message);
                break;
            case ErrorSeverity.WARNING:
                this.logger.warn(message);
                break;
            case ErrorSeverity.INFO:
                this.logger.info(message);
                break;
        }
    }

    private recordError(error: HandledError): void {
        this.errorHistory.push(error);
        if (this.errorHistory.length > MAX_HISTORY_SIZE) {
            this.errorHistory = this.errorHistory.slice(-MAX_HISTORY_SIZE);
        }
    }

    private getUserMessage(error: HandledError): string {
        switch (error.context.category) {
            case ErrorCategory.AUTHENTICATION:
                return 'Authentication failed. Please check your Flame Connect email and password.';
            case ErrorCategory.RATE_LIMIT:
                return 'API rate limit exceeded. Please wait before trying again.';
            case ErrorCategory.NETWORK:
                return 'Network connection issue. Will retry automatically.';
            case ErrorCategory.PROTOCOL:
                return `Fire data could not be processed: ${error.message}`;
            case ErrorCategory.FIRE:
                return `Fire error: ${error.message}`;
            case ErrorCategory.CONFIGURATION:
                return `Configuration error: ${error.message}`;
            case ErrorCategory.VALIDATION:
                return `Validation error: ${error.message}`;
            case ErrorCategory.API:
                return `API error: ${error.message}`;
            default:
                return error.message;
        }
    }
}

/**
 * Create a scoped error handler
 */
export function createErrorHandler(logger: Logger, context: string): ErrorHandler {
    return new ErrorHandler(logger, context);
}
