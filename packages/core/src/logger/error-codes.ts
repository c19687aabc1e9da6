/**
 * Codes raised while building a logger from configuration
 */
export enum LoggerErrorCode {
    TRANSPORT_INITIALIZATION_FAILED = 'logger_transport_initialization_failed',
    INVALID_CONFIG = 'logger_invalid_config',
    INVALID_LOG_LEVEL = 'logger_invalid_log_level',
}
