import { ChartVaultRuntimeError } from '../errors/ChartVaultRuntimeError.js';
import { ChartVaultValidationError } from '../errors/ChartVaultValidationError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { errnoOf } from '../utils/fs-errors.js';
import { StorageErrorCode } from './error-codes.js';

const IO_ERROR_CODES: ReadonlySet<string> = new Set([
    StorageErrorCode.READ_FAILED,
    StorageErrorCode.WRITE_FAILED,
    StorageErrorCode.DELETE_FAILED,
]);

function describeCause(error: unknown): { reason: string; errno?: string; causeCode?: string } {
    if (error instanceof ChartVaultRuntimeError) {
        // Already wrapped by a repository: keep its errno, not its code
        const context: unknown = error.context;
        const errno =
            typeof context === 'object' && context !== null && 'errno' in context && typeof context.errno === 'string'
                ? context.errno
                : undefined;
        return errno
            ? { reason: error.message, errno, causeCode: error.code }
            : { reason: error.message, causeCode: error.code };
    }
    if (error instanceof Error) {
        const errno = errnoOf(error);
        return errno ? { reason: error.message, errno } : { reason: error.message };
    }
    return { reason: String(error) };
}

/**
 * True for the disk-level failures (read/write/delete) surfaced by repositories.
 */
export function isStorageIOError(error: unknown): error is ChartVaultRuntimeError {
    return error instanceof ChartVaultRuntimeError && IO_ERROR_CODES.has(error.code);
}

export function isPermissionDenied(error: unknown): error is ChartVaultRuntimeError {
    return (
        error instanceof ChartVaultRuntimeError && error.code === StorageErrorCode.PERMISSION_DENIED
    );
}

/**
 * Storage error factory with typed methods for creating storage-specific errors
 * Each method creates a properly typed error with STORAGE scope
 */
export class StorageError {
    static notConnected(backendType: string, method: string) {
        return new ChartVaultRuntimeError(
            StorageErrorCode.NOT_CONNECTED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `${backendType} storage is not connected. Call connect() before ${method}()`,
            { backendType, method }
        );
    }

    /**
     * Read operation failed
     */
    static readFailed(operation: string, error: unknown, details?: Record<string, unknown>) {
        const cause = describeCause(error);
        return new ChartVaultRuntimeError(
            StorageErrorCode.READ_FAILED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `Storage read failed for ${operation}: ${cause.reason}`,
            { operation, ...cause, ...details }
        );
    }

    /**
     * Write operation failed
     */
    static writeFailed(operation: string, error: unknown, details?: Record<string, unknown>) {
        const cause = describeCause(error);
        return new ChartVaultRuntimeError(
            StorageErrorCode.WRITE_FAILED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `Storage write failed for ${operation}: ${cause.reason}`,
            { operation, ...cause, ...details }
        );
    }

    /**
     * Delete operation failed
     */
    static deleteFailed(operation: string, error: unknown, details?: Record<string, unknown>) {
        const cause = describeCause(error);
        return new ChartVaultRuntimeError(
            StorageErrorCode.DELETE_FAILED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `Storage delete failed for ${operation}: ${cause.reason}`,
            { operation, ...cause, ...details }
        );
    }

    /**
     * Record exists but belongs to another group
     */
    static permissionDenied(
        identifier: string,
        storedGroup: string,
        requestedGroup: string | null
    ): ChartVaultRuntimeError {
        return new ChartVaultRuntimeError(
            StorageErrorCode.PERMISSION_DENIED,
            ErrorScope.STORAGE,
            ErrorType.FORBIDDEN,
            requestedGroup === null
                ? `Access denied: image belongs to group '${storedGroup}'`
                : `Access denied: image belongs to group '${storedGroup}', not '${requestedGroup}'`,
            { identifier, storedGroup, requestedGroup }
        );
    }

    static invalidGuid(value: string): ChartVaultValidationError {
        return new ChartVaultValidationError([
            {
                code: StorageErrorCode.GUID_INVALID,
                message: `Invalid GUID format: ${value}`,
                scope: ErrorScope.STORAGE,
                type: ErrorType.USER,
                severity: 'error',
                context: { value },
            },
        ]);
    }

    static unsupportedFormat(format: string, supported: readonly string[]): ChartVaultValidationError {
        return new ChartVaultValidationError([
            {
                code: StorageErrorCode.FORMAT_UNSUPPORTED,
                message: `Unsupported image format '${format}'. Supported: ${supported.join(', ')}`,
                scope: ErrorScope.STORAGE,
                type: ErrorType.USER,
                severity: 'error',
                context: { format, supported },
            },
        ]);
    }

    static invalidAlias(alias: string): ChartVaultValidationError {
        return new ChartVaultValidationError([
            {
                code: StorageErrorCode.ALIAS_INVALID,
                message:
                    `Invalid alias format: '${alias}'. Must be 3-64 characters, ` +
                    'alphanumeric with hyphens/underscores only.',
                scope: ErrorScope.STORAGE,
                type: ErrorType.USER,
                severity: 'error',
                context: { alias },
            },
        ]);
    }

    static aliasAlreadyExists(
        alias: string,
        group: string | null,
        existingGuid: string
    ): ChartVaultRuntimeError {
        return new ChartVaultRuntimeError(
            StorageErrorCode.ALIAS_ALREADY_EXISTS,
            ErrorScope.STORAGE,
            ErrorType.CONFLICT,
            `Alias '${alias}' already exists in group '${group ?? 'public'}' for a different image (GUID: ${existingGuid})`,
            { alias, group, existingGuid }
        );
    }

    static aliasTargetNotFound(alias: string, guid: string): ChartVaultRuntimeError {
        return new ChartVaultRuntimeError(
            StorageErrorCode.ALIAS_TARGET_NOT_FOUND,
            ErrorScope.STORAGE,
            ErrorType.NOT_FOUND,
            `Cannot register alias '${alias}': GUID '${guid}' not found`,
            { alias, guid }
        );
    }

    static invalidPurgeAge(ageDays: number): ChartVaultValidationError {
        return new ChartVaultValidationError([
            {
                code: StorageErrorCode.PURGE_INVALID_AGE,
                message: `Purge age must be a non-negative number of days, got ${ageDays}`,
                scope: ErrorScope.STORAGE,
                type: ErrorType.USER,
                severity: 'error',
                context: { ageDays },
            },
        ]);
    }

    static purgeFailed(error: unknown, details?: Record<string, unknown>): ChartVaultRuntimeError {
        const cause = describeCause(error);
        return new ChartVaultRuntimeError(
            StorageErrorCode.PURGE_FAILED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `Failed to purge images: ${cause.reason}`,
            { ...cause, ...details }
        );
    }

    static unknownBackend(type: string, available: string[]): ChartVaultRuntimeError {
        return new ChartVaultRuntimeError(
            StorageErrorCode.BACKEND_UNKNOWN,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Unknown storage backend: '${type}'. Available backends: ${available.length > 0 ? available.join(', ') : 'none'}`,
            { type, available }
        );
    }

    static backendAlreadyRegistered(type: string): ChartVaultRuntimeError {
        return new ChartVaultRuntimeError(
            StorageErrorCode.BACKEND_ALREADY_REGISTERED,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Storage backend '${type}' is already registered. Use unregister() first if you need to replace it.`,
            { type }
        );
    }

    static backendInvalidConfig(
        message: string,
        context?: Record<string, unknown>
    ): ChartVaultValidationError {
        return new ChartVaultValidationError([
            {
                code: StorageErrorCode.BACKEND_INVALID_CONFIG,
                message,
                scope: ErrorScope.CONFIG,
                type: ErrorType.USER,
                severity: 'error',
                context: context ?? {},
            },
        ]);
    }
}
