/**
 * ErrorHandler Tests
 */

import {ErrorHandler, ErrorCategory, ErrorSeverity, createErrorHandler, toError} from '../../../src/utils/error-handler';
import {ApiError, ApiTimeoutError, RateLimitedError} from '../../../src/api/flameconnect-api';
import {AuthenticationError} from '../../../src/api/b2c-login';
import {FireCommandError} from '../../../src/api/fire-commands';
import {insufficientData, unknownParameter} from '../../../src/protocol';
import {ParameterKind} from '../../../src/types/flameconnect-enums';
import {createMockLogger} from '../../helpers/test-isolation';

describe('ErrorHandler', () => {
    let mockLogger: ReturnType<typeof createMockLogger>;
    let handler: ErrorHandler;

    beforeEach(() => {
        mockLogger = createMockLogger();
        handler = new ErrorHandler(mockLogger, 'TestContext');
    });

    describe('categorize', () => {
        it('should categorize typed errors by class', () => {
            expect(handler.categorize(new AuthenticationError('Invalid email or password'))).toBe(ErrorCategory.AUTHENTICATION);
            expect(handler.categorize(new RateLimitedError('Rate limited', 60))).toBe(ErrorCategory.RATE_LIMIT);
            expect(handler.categorize(insufficientData(ParameterKind.MODE, 6, 4))).toBe(ErrorCategory.PROTOCOL);
            expect(handler.categorize(new FireCommandError('No FlameEffect parameter found'))).toBe(ErrorCategory.FIRE);
            expect(handler.categorize(new ApiError('API error (500)', 500, ''))).toBe(ErrorCategory.API);
            expect(handler.categorize(new ApiTimeoutError('Gateway Timeout', 504, 4))).toBe(ErrorCategory.NETWORK);
        });

        it('should treat a 401 ApiError as an authentication problem', () => {
            expect(handler.categorize(new ApiError('Unauthorized', 401, ''))).toBe(ErrorCategory.AUTHENTICATION);
        });

        it('should fall back to message heuristics', () => {
            expect(handler.categorize(new Error('Unauthorized token expired'))).toBe(ErrorCategory.AUTHENTICATION);
            expect(handler.categorize(new Error('Rate limit exceeded'))).toBe(ErrorCategory.RATE_LIMIT);
            expect(handler.categorize(new Error('ECONNRESET connection failed'))).toBe(ErrorCategory.NETWORK);
            expect(handler.categorize(new Error('Invalid configuration value'))).toBe(ErrorCategory.VALIDATION);
            expect(handler.categorize(new Error('Fire not responding'))).toBe(ErrorCategory.FIRE);
            expect(handler.categorize(new Error('Something went wrong'))).toBe(ErrorCategory.UNKNOWN);
        });
    });

    describe('isRetryable', () => {
        it('should retry transient failures', () => {
            expect(handler.isRetryable(new RateLimitedError('Rate limited', 60))).toBe(true);
            expect(handler.isRetryable(new ApiTimeoutError('Bad Gateway', 502, 4))).toBe(true);
            expect(handler.isRetryable(new ApiError('API error (500)', 500, ''))).toBe(true);
            expect(handler.isRetryable(new Error('socket hang up'))).toBe(true);
        });

        it('should not retry permanent failures', () => {
            expect(handler.isRetryable(new ApiError('API error (404)', 404, ''))).toBe(false);
            expect(handler.isRetryable(new AuthenticationError('Invalid email or password'))).toBe(false);
            expect(handler.isRetryable(unknownParameter(9999))).toBe(false);
            expect(handler.isRetryable(new Error('Something went wrong'))).toBe(false);
        });
    });

    describe('determineSeverity', () => {
        it('should map categories to severities', () => {
            expect(handler.determineSeverity(ErrorCategory.AUTHENTICATION)).toBe(ErrorSeverity.FATAL);
            expect(handler.determineSeverity(ErrorCategory.CONFIGURATION)).toBe(ErrorSeverity.FATAL);
            expect(handler.determineSeverity(ErrorCategory.RATE_LIMIT)).toBe(ErrorSeverity.WARNING);
            expect(handler.determineSeverity(ErrorCategory.PROTOCOL)).toBe(ErrorSeverity.WARNING);
            expect(handler.determineSeverity(ErrorCategory.API)).toBe(ErrorSeverity.ERROR);
        });
    });

    describe('handle', () => {
        it('should log warnings with prefix, operation and fire id', () => {
            handler.handle(insufficientData(ParameterKind.MODE, 6, 4), {operation: 'decode', fireId: 'fire-1'});
            expect(mockLogger.warn).toHaveBeenCalledWith(
                '[TestContext] PROTOCOL (decode) [fire-1]: Insufficient data for Mode: expected 6 bytes, got 4',
            );
        });

        it('should log fatal errors and their stack at debug level', () => {
            const error = new AuthenticationError('Invalid email or password');
            handler.handle(error);
            expect(mockLogger.error).toHaveBeenCalledWith('[TestContext] AUTHENTICATION: Invalid email or password');
            expect(mockLogger.debug).toHaveBeenCalledWith(error.stack);
        });

        it('should honour an explicit category and severity', () => {
            const handled = handler.handle(new Error('boom'), {
                category: ErrorCategory.CONFIGURATION,
                severity: ErrorSeverity.INFO,
            });
            expect(handled.context.category).toBe(ErrorCategory.CONFIGURATION);
            expect(handled.context.severity).toBe(ErrorSeverity.INFO);
            expect(mockLogger.info).toHaveBeenCalledWith('[TestContext] CONFIGURATION: boom');
        });

        it('should record errors in history', () => {
            handler.handle(new RateLimitedError('Rate limited', 60));
            handler.handle(new Error('Something went wrong'));

            expect(handler.getRecentErrors()).toHaveLength(2);
            expect(handler.getErrorsByCategory(ErrorCategory.RATE_LIMIT)).toHaveLength(1);

            handler.clearHistory();
            expect(handler.getRecentErrors()).toHaveLength(0);
        });

        it('should keep at most 100 errors', () => {
            for (let i = 0; i < 105; i++) {
                handler.handle(new Error(`Error ${i}`));
            }
            const recent = handler.getRecentErrors(200);
            expect(recent).toHaveLength(100);
            expect(recent[0].message).toBe('Error 5');
        });
    });

    describe('handleWithMessage', () => {
        it('should return user-facing messages per category', () => {
            expect(handler.handleWithMessage(new AuthenticationError('nope')))
                .toBe('Authentication failed. Please check your Flame Connect email and password.');
            expect(handler.handleWithMessage(unknownParameter(9999)))
                .toBe('Fire data could not be processed: Unknown parameter ID: 9999');
            expect(handler.handleWithMessage(new FireCommandError('Flame speed must be between 1 and 5')))
                .toBe('Fire error: Flame speed must be between 1 and 5');
            expect(handler.handleWithMessage(new Error('Something went wrong'))).toBe('Something went wrong');
        });
    });

    describe('helpers', () => {
        it('createErrorHandler should scope the prefix', () => {
            createErrorHandler(mockLogger, 'Platform').handle(new Error('Something went wrong'));
            expect(mockLogger.error).toHaveBeenCalledWith('[Platform] UNKNOWN: Something went wrong');
        });

        it('toError should wrap non-errors', () => {
            const wrapped = toError('plain string');
            expect(wrapped).toBeInstanceOf(Error);
            expect(wrapped.message).toBe('plain string');
        });
    });
});
