/**
 * Console Transport
 *
 * One line per entry: `HH:MM:SS.mmm LEVEL [component:instance] message key=value ...`.
 * Warnings and errors go to stderr so they survive stdout redirection.
 */

import chalk from 'chalk';
import type { LoggerTransport, LogEntry, LogLevel } from '../types.js';

export interface ConsoleTransportConfig {
    colorize?: boolean;
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
    error: chalk.red,
    warn: chalk.yellow,
    info: chalk.cyan,
    debug: chalk.gray,
    silly: chalk.magenta,
};

const LEVEL_WIDTH = 5;

function formatValue(value: unknown): string {
    if (typeof value === 'string') {
        return /\s/.test(value) ? JSON.stringify(value) : value;
    }
    if (value instanceof Error) {
        return JSON.stringify(value.message);
    }
    return JSON.stringify(value);
}

/**
 * Render an entry as a single console line
 */
export function formatConsoleLine(entry: LogEntry, colorize: boolean): string {
    const time = entry.timestamp.slice(11, 23);
    const level = entry.level.toUpperCase().padEnd(LEVEL_WIDTH);
    const source = `[${entry.component}:${entry.instance}]`;
    const fields = Object.entries(entry.context ?? {})
        .filter(([, value]) => value !== undefined)
        .map(([key, value]) => `${key}=${formatValue(value)}`);
    const suffix = fields.length > 0 ? ` ${fields.join(' ')}` : '';

    if (!colorize) {
        return `${time} ${level} ${source} ${entry.message}${suffix}`;
    }
    return `${chalk.dim(time)} ${LEVEL_COLORS[entry.level](level)} ${chalk.dim(source)} ${entry.message}${chalk.dim(suffix)}`;
}

export class ConsoleTransport implements LoggerTransport {
    private readonly colorize: boolean;

    constructor(config: ConsoleTransportConfig = {}) {
        this.colorize = config.colorize ?? true;
    }

    write(entry: LogEntry): void {
        const line = formatConsoleLine(entry, this.colorize);
        if (entry.level === 'error' || entry.level === 'warn') {
            console.error(line);
        } else {
            console.log(line);
        }
    }
}
