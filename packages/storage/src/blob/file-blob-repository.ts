import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import {
    ChartVaultLogComponent,
    IMAGE_FORMATS,
    StorageError,
    isGuid,
    isImageFormat,
    isNotFoundError,
} from '@chartvault/core';
import type { BlobRepository, ImageFormat, Logger } from '@chartvault/core';

/**
 * Splits `<guid>.<ext>` into its parts when both are recognised; anything else
 * (temp files, metadata, stray files) yields null.
 */
export function parseBlobFileName(fileName: string): { guid: string; format: ImageFormat } | null {
    const dot = fileName.lastIndexOf('.');
    if (dot <= 0) {
        return null;
    }
    const guid = fileName.slice(0, dot);
    const format = fileName.slice(dot + 1);
    if (!isGuid(guid) || !isImageFormat(format)) {
        return null;
    }
    return { guid, format };
}

/**
 * Filesystem blob repository: one file per blob at `{storePath}/{guid}.{format}`.
 *
 * Writes go to a uniquely named temp file in the same directory, are fsync'd and then
 * renamed into place, so a crash or a failed write never leaves a readable partial blob.
 */
export class FileBlobRepository implements BlobRepository {
    private readonly storePath: string;
    private readonly logger: Logger;
    private connected = false;

    constructor(storePath: string, logger: Logger) {
        this.storePath = path.resolve(storePath);
        this.logger = logger.createChild(ChartVaultLogComponent.BLOB);
    }

    async connect(): Promise<void> {
        if (this.connected) return;

        try {
            await fs.mkdir(this.storePath, { recursive: true });
        } catch (error) {
            throw StorageError.writeFailed('create storage directory', error, {
                path: this.storePath,
            });
        }
        this.connected = true;
        this.logger.debug(`FileBlobRepository connected at: ${this.storePath}`);
    }

    async disconnect(): Promise<void> {
        this.connected = false;
        this.logger.debug('FileBlobRepository disconnected');
    }

    isConnected(): boolean {
        return this.connected;
    }

    getStoragePath(): string {
        return this.storePath;
    }

    async save(guid: string, data: Uint8Array, format: string): Promise<void> {
        this.ensureConnected('save');
        const blobFormat = this.requireFormat(format);
        const blobPath = this.blobPath(this.requireGuid(guid), blobFormat);
        const tempPath = `${blobPath}.${randomUUID()}.tmp`;

        try {
            const handle = await fs.open(tempPath, 'wx');
            try {
                await handle.writeFile(data);
                await handle.sync();
            } finally {
                await handle.close();
            }
            await fs.rename(tempPath, blobPath);
        } catch (error) {
            await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
                this.logger.warn(`Failed to remove temp blob ${tempPath}: ${String(cleanupError)}`);
            });
            throw StorageError.writeFailed('blob save', error, { guid, format: blobFormat });
        }

        this.logger.debug(`Stored blob ${guid}.${blobFormat} (${data.byteLength} bytes)`);
    }

    async get(guid: string, format: string): Promise<Buffer | null> {
        this.ensureConnected('get');
        const blobFormat = format.toLowerCase();
        if (!isImageFormat(blobFormat)) {
            return null;
        }

        try {
            return await fs.readFile(this.blobPath(this.requireGuid(guid), blobFormat));
        } catch (error) {
            if (isNotFoundError(error)) {
                return null;
            }
            throw StorageError.readFailed('blob get', error, { guid, format: blobFormat });
        }
    }

    async exists(guid: string): Promise<boolean> {
        this.ensureConnected('exists');
        return (await this.getFormat(guid)) !== null;
    }

    async delete(guid: string, format?: string): Promise<boolean> {
        this.ensureConnected('delete');
        const id = this.requireGuid(guid);
        const formats = format === undefined ? IMAGE_FORMATS : [format.toLowerCase()];

        let deleted = false;
        for (const candidate of formats) {
            if (!isImageFormat(candidate)) {
                continue;
            }
            try {
                await fs.unlink(this.blobPath(id, candidate));
                deleted = true;
                this.logger.debug(`Deleted blob ${id}.${candidate}`);
            } catch (error) {
                if (!isNotFoundError(error)) {
                    throw StorageError.deleteFailed('blob delete', error, {
                        guid: id,
                        format: candidate,
                    });
                }
            }
        }
        return deleted;
    }

    async listAll(): Promise<Set<string>> {
        this.ensureConnected('listAll');

        let entries: string[];
        try {
            entries = await fs.readdir(this.storePath);
        } catch (error) {
            throw StorageError.readFailed('blob list', error, { path: this.storePath });
        }

        const guids = new Set<string>();
        for (const entry of entries) {
            const parsed = parseBlobFileName(entry);
            if (parsed) {
                guids.add(parsed.guid);
            }
        }
        return guids;
    }

    async getFormat(guid: string): Promise<ImageFormat | null> {
        this.ensureConnected('getFormat');
        const id = this.requireGuid(guid);

        for (const format of IMAGE_FORMATS) {
            if ((await this.statBlob(id, format)) !== null) {
                return format;
            }
        }
        return null;
    }

    async getModifiedTime(guid: string, format?: string): Promise<Date | null> {
        this.ensureConnected('getModifiedTime');
        const id = this.requireGuid(guid);
        const blobFormat = format === undefined ? await this.getFormat(id) : format.toLowerCase();
        if (blobFormat === null || !isImageFormat(blobFormat)) {
            return null;
        }
        const stat = await this.statBlob(id, blobFormat);
        return stat ? stat.mtime : null;
    }

    private async statBlob(guid: string, format: ImageFormat) {
        try {
            const stat = await fs.stat(this.blobPath(guid, format));
            return stat.isFile() ? stat : null;
        } catch (error) {
            if (isNotFoundError(error)) {
                return null;
            }
            throw StorageError.readFailed('blob stat', error, { guid, format });
        }
    }

    private blobPath(guid: string, format: ImageFormat): string {
        return path.join(this.storePath, `${guid}.${format}`);
    }

    /**
     * GUIDs become file names, so anything else is rejected before touching the disk
     */
    private requireGuid(guid: string): string {
        if (!isGuid(guid)) {
            throw StorageError.invalidGuid(guid);
        }
        return guid;
    }

    private requireFormat(format: string): ImageFormat {
        const normalized = format.toLowerCase();
        if (!isImageFormat(normalized)) {
            throw StorageError.unsupportedFormat(format, IMAGE_FORMATS);
        }
        return normalized;
    }

    private ensureConnected(method: string): void {
        if (!this.connected) {
            throw StorageError.notConnected('FileBlobRepository', method);
        }
    }
}
