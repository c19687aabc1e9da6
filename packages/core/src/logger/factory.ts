import { ChartVaultLogger } from './chartvault-logger.js';
import { LoggerError } from './errors.js';
import { LoggerConfigSchema } from './schemas.js';
import type { LoggerConfig } from './schemas.js';
import { createTransports } from './transport-factory.js';
import { ChartVaultLogComponent, LOG_LEVELS } from './types.js';
import type { LogLevel, Logger } from './types.js';

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

/**
 * Log level from `CHARTVAULT_LOG_LEVEL`, or `fallback` when unset.
 * An unrecognised value is a configuration error rather than a silent default.
 */
export function getDefaultLogLevel(
    env: NodeJS.ProcessEnv = process.env,
    fallback: LogLevel = 'info'
): LogLevel {
    const raw = env.CHARTVAULT_LOG_LEVEL?.trim().toLowerCase();
    if (!raw) {
        return fallback;
    }
    if (!isLogLevel(raw)) {
        throw LoggerError.invalidLogLevel(raw, LOG_LEVELS);
    }
    return raw;
}

/**
 * Build a root logger from (unvalidated) configuration.
 */
export function createLogger(
    config: LoggerConfig = {},
    component: ChartVaultLogComponent = ChartVaultLogComponent.STORAGE
): Logger {
    const parsed = LoggerConfigSchema.safeParse({ level: getDefaultLogLevel(), ...config });
    if (!parsed.success) {
        throw LoggerError.invalidConfig(parsed.error.issues);
    }

    return new ChartVaultLogger({
        level: parsed.data.level,
        component,
        instance: parsed.data.instance,
        transports: createTransports(parsed.data.transports),
    });
}
