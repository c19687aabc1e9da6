import type { StorageErrorCode } from '../storage/error-codes.js';
import type { LoggerErrorCode } from '../logger/error-codes.js';

/**
 * Subsystem that raised an error
 */
export enum ErrorScope {
    STORAGE = 'storage', // Blob, metadata and alias persistence
    CONFIG = 'config', // Backend selection and configuration parsing
    LOGGER = 'logger', // Transport setup and logger configuration
}

/**
 * Failure category. An HTTP front end maps each one to a status code.
 */
export enum ErrorType {
    USER = 'user', // 400: malformed GUID, alias, format or config
    FORBIDDEN = 'forbidden', // 403: record belongs to another group
    NOT_FOUND = 'not_found', // 404: unknown image or alias target
    CONFLICT = 'conflict', // 409: alias already taken
    SYSTEM = 'system', // 500: disk and I/O failures
}

export type ChartVaultErrorCode = StorageErrorCode | LoggerErrorCode;

/** Severity of an issue */
export type Severity = 'error' | 'warning';

/** One problem found while validating input */
export interface Issue<C = unknown> {
    code: ChartVaultErrorCode | string;
    message: string;
    scope: ErrorScope | string;
    type: ErrorType;
    severity: Severity;
    path?: Array<string | number>;
    context?: C;
}
