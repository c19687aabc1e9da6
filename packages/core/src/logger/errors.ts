import { ChartVaultRuntimeError } from '../errors/ChartVaultRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { LoggerErrorCode } from './error-codes.js';

/**
 * Logger error factory. Every error is raised at startup, before any storage
 * operation runs.
 */
export class LoggerError {
    static transportInitializationFailed(
        transportType: string,
        reason: string,
        details?: Record<string, unknown>
    ): ChartVaultRuntimeError {
        return new ChartVaultRuntimeError(
            LoggerErrorCode.TRANSPORT_INITIALIZATION_FAILED,
            ErrorScope.LOGGER,
            ErrorType.SYSTEM,
            `Failed to initialize ${transportType} transport: ${reason}`,
            { transportType, reason, ...details }
        );
    }

    static invalidConfig(issues: readonly { path: (string | number)[]; message: string }[]): ChartVaultRuntimeError {
        const summary = issues
            .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
            .join('; ');
        return new ChartVaultRuntimeError(
            LoggerErrorCode.INVALID_CONFIG,
            ErrorScope.LOGGER,
            ErrorType.USER,
            `Invalid logger configuration: ${summary || 'invalid shape'}`,
            { issues }
        );
    }

    static invalidLogLevel(level: string, validLevels: readonly string[]): ChartVaultRuntimeError {
        return new ChartVaultRuntimeError(
            LoggerErrorCode.INVALID_LOG_LEVEL,
            ErrorScope.LOGGER,
            ErrorType.USER,
            `Invalid log level '${level}'. Valid levels: ${validLevels.join(', ')}`,
            { level, validLevels }
        );
    }
}
