export { ChartVaultLogger } from './chartvault-logger.js';
export type { ChartVaultLoggerConfig } from './chartvault-logger.js';
export { ChartVaultLogComponent, LOG_LEVELS } from './types.js';
export type { LogContext, LogEntry, LogLevel, Logger, LoggerTransport } from './types.js';
export { LoggerConfigSchema, LoggerTransportSchema } from './schemas.js';
export type { LoggerConfig, LoggerTransportConfig, ValidatedLoggerConfig } from './schemas.js';
export { createTransports } from './transport-factory.js';
export { createLogger, getDefaultLogLevel } from './factory.js';
export { ConsoleTransport, formatConsoleLine } from './transports/console-transport.js';
export { FileTransport } from './transports/file-transport.js';
export { SilentTransport } from './transports/silent-transport.js';
export { LoggerError } from './errors.js';
export { LoggerErrorCode } from './error-codes.js';
