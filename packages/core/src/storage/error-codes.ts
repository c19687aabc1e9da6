/**
 * Storage-specific error codes
 * Covers blob, metadata and alias persistence plus backend selection
 */
export enum StorageErrorCode {
    // Lifecycle
    NOT_CONNECTED = 'storage_not_connected',

    // I/O (the "StorageIOError" family)
    READ_FAILED = 'storage_read_failed',
    WRITE_FAILED = 'storage_write_failed',
    DELETE_FAILED = 'storage_delete_failed',

    // Access control
    PERMISSION_DENIED = 'storage_permission_denied',

    // Validation
    GUID_INVALID = 'storage_guid_invalid',
    FORMAT_UNSUPPORTED = 'storage_format_unsupported',
    ALIAS_INVALID = 'storage_alias_invalid',

    // Alias state
    ALIAS_ALREADY_EXISTS = 'storage_alias_already_exists',
    ALIAS_TARGET_NOT_FOUND = 'storage_alias_target_not_found',

    // Retention
    PURGE_FAILED = 'storage_purge_failed',
    PURGE_INVALID_AGE = 'storage_purge_invalid_age',

    // Backend selection
    BACKEND_UNKNOWN = 'storage_backend_unknown',
    BACKEND_ALREADY_REGISTERED = 'storage_backend_already_registered',
    BACKEND_INVALID_CONFIG = 'storage_backend_invalid_config',
}
