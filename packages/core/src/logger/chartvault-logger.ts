import { LOG_LEVELS } from './types.js';
import type {
    ChartVaultLogComponent,
    LogContext,
    LogEntry,
    LogLevel,
    Logger,
    LoggerTransport,
} from './types.js';

export interface ChartVaultLoggerConfig {
    level: LogLevel;
    component: ChartVaultLogComponent;
    instance: string;
    transports: LoggerTransport[];
}

/** Shared by a root logger and all of its children */
interface LevelState {
    level: LogLevel;
}

function reportTransportFailure(error: unknown): void {
    console.error('Logger transport error:', error);
}

/**
 * Fans structured entries out to a fixed set of transports.
 */
export class ChartVaultLogger implements Logger {
    private readonly state: LevelState;
    private readonly component: ChartVaultLogComponent;
    private readonly instance: string;
    private readonly transports: readonly LoggerTransport[];

    constructor(config: ChartVaultLoggerConfig, state?: LevelState) {
        this.state = state ?? { level: config.level };
        this.component = config.component;
        this.instance = config.instance;
        this.transports = config.transports;
    }

    error(message: string, context?: LogContext): void {
        this.emit('error', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.emit('warn', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.emit('info', message, context);
    }

    debug(message: string, context?: LogContext): void {
        this.emit('debug', message, context);
    }

    silly(message: string, context?: LogContext): void {
        this.emit('silly', message, context);
    }

    trackException(error: Error, context?: LogContext): void {
        this.emit('error', error.message, {
            ...context,
            errorName: error.name,
            errorType: error.constructor.name,
            errorStack: error.stack,
        });
    }

    createChild(component: ChartVaultLogComponent): ChartVaultLogger {
        return new ChartVaultLogger(
            {
                level: this.state.level,
                component,
                instance: this.instance,
                transports: [...this.transports],
            },
            this.state
        );
    }

    setLevel(level: LogLevel): void {
        this.state.level = level;
    }

    getLevel(): LogLevel {
        return this.state.level;
    }

    async destroy(): Promise<void> {
        const results = await Promise.allSettled(
            this.transports.map(async (transport) => transport.destroy?.())
        );
        for (const result of results) {
            if (result.status === 'rejected') {
                console.error('Error destroying transport:', result.reason);
            }
        }
    }

    private enabled(level: LogLevel): boolean {
        return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.state.level);
    }

    private emit(level: LogLevel, message: string, context: LogContext | undefined): void {
        if (!this.enabled(level)) {
            return;
        }

        const entry: LogEntry = {
            level,
            message,
            timestamp: new Date().toISOString(),
            component: this.component,
            instance: this.instance,
            context,
        };

        for (const transport of this.transports) {
            try {
                const result = transport.write(entry);
                if (result instanceof Promise) {
                    result.catch(reportTransportFailure);
                }
            } catch (error) {
                reportTransportFailure(error);
            }
        }
    }
}
