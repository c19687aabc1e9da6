import * as fs from 'fs';
import * as path from 'path';
import type { LoggerTransport, LogEntry } from '../types.js';
import { LoggerError } from '../errors.js';
import { isNotFoundError } from '../../utils/fs-errors.js';

export interface FileTransportConfig {
    path: string;
    /** Bytes; defaults to 10 MiB */
    maxSize?: number;
    /** Defaults to 5 */
    maxFiles?: number;
}

/**
 * Appends entries as JSON lines. When the next line would push the file past
 * `maxSize`, `storage.log` becomes `storage.log.1`, older files shift up one
 * and anything beyond `maxFiles` is removed.
 *
 * Appends run one at a time in call order; `destroy()` waits for the backlog.
 */
export class FileTransport implements LoggerTransport {
    private readonly filePath: string;
    private readonly maxSize: number;
    private readonly maxFiles: number;
    private size: number;
    private backlog: Promise<void> = Promise.resolve();

    constructor(config: FileTransportConfig) {
        this.filePath = config.path;
        this.maxSize = config.maxSize ?? 10 * 1024 * 1024;
        this.maxFiles = config.maxFiles ?? 5;

        try {
            fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
            this.size = FileTransport.currentSize(this.filePath);
        } catch (error) {
            throw LoggerError.transportInitializationFailed(
                'file',
                error instanceof Error ? error.message : String(error),
                { path: this.filePath }
            );
        }
    }

    private static currentSize(filePath: string): number {
        try {
            return fs.statSync(filePath).size;
        } catch (error) {
            if (isNotFoundError(error)) {
                return 0;
            }
            throw error;
        }
    }

    write(entry: LogEntry): void {
        const line = `${JSON.stringify(entry)}\n`;
        this.backlog = this.backlog
            .then(() => this.append(line))
            .catch((error: unknown) => {
                console.error('FileTransport write error:', error);
            });
    }

    getFilePath(): string {
        return this.filePath;
    }

    async destroy(): Promise<void> {
        await this.backlog;
    }

    private async append(line: string): Promise<void> {
        const bytes = Buffer.byteLength(line, 'utf8');
        if (this.size > 0 && this.size + bytes > this.maxSize) {
            await this.rotate();
        }
        await fs.promises.appendFile(this.filePath, line, 'utf8');
        this.size += bytes;
    }

    private async rotate(): Promise<void> {
        await fs.promises.rm(`${this.filePath}.${this.maxFiles}`, { force: true });
        for (let generation = this.maxFiles - 1; generation >= 1; generation--) {
            await this.moveIfPresent(`${this.filePath}.${generation}`, `${this.filePath}.${generation + 1}`);
        }
        await this.moveIfPresent(this.filePath, `${this.filePath}.1`);
        this.size = 0;
    }

    private async moveIfPresent(from: string, to: string): Promise<void> {
        try {
            await fs.promises.rename(from, to);
        } catch (error) {
            if (!isNotFoundError(error)) {
                throw error;
            }
        }
    }
}
