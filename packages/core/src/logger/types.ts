/**
 * Severity names, most severe first. A logger set to a level records that
 * level and everything before it in this list.
 */
export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'silly'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Subsystem that produced an entry. The storage layer logs under its own
 * sub-components so blob, metadata and alias activity can be filtered apart.
 */
export enum ChartVaultLogComponent {
    STORAGE = 'storage',
    BLOB = 'blob',
    METADATA = 'metadata',
    ALIAS = 'alias',
    CONFIG = 'config',
    RENDER = 'render',
    API = 'api',
}

/**
 * What transports receive. `timestamp` is ISO-8601 UTC.
 */
export interface LogEntry {
    level: LogLevel;
    message: string;
    timestamp: string;
    component: ChartVaultLogComponent;
    /** Process or deployment name, to tell several writers of one log apart */
    instance: string;
    context?: Record<string, unknown> | undefined;
}

export type LogContext = Record<string, unknown>;

export interface Logger {
    error(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    debug(message: string, context?: LogContext): void;
    /** Full payload dumps and other output too noisy for `debug` */
    silly(message: string, context?: LogContext): void;

    /**
     * Log an error at `error` level with its name, class and stack in the context
     */
    trackException(error: Error, context?: LogContext): void;

    /**
     * Same transports, instance and level, tagged with another component.
     * Level changes on either logger apply to both.
     */
    createChild(component: ChartVaultLogComponent): Logger;

    setLevel(level: LogLevel): void;
    getLevel(): LogLevel;

    /** Flush and close every transport */
    destroy(): Promise<void>;
}

/**
 * Output destination. `write` may return a promise; rejections are reported on
 * stderr and never reach the logging call site.
 */
export interface LoggerTransport {
    write(entry: LogEntry): void | Promise<void>;
    destroy?(): void | Promise<void>;
}
