import {
    ChartVaultLogComponent,
    IMAGE_FORMATS,
    StorageError,
    isGuid,
    isImageFormat,
} from '@chartvault/core';
import type { BlobRepository, ImageFormat, Logger } from '@chartvault/core';

interface MemoryBlob {
    data: Buffer;
    modifiedAt: Date;
}

/**
 * In-memory blob repository.
 *
 * Same contract as the filesystem repository, minus persistence. Used by the
 * `in-memory` backend and by tests that exercise orchestration only.
 */
export class MemoryBlobRepository implements BlobRepository {
    private blobs = new Map<string, MemoryBlob>();
    private connected = false;
    private readonly logger: Logger;

    constructor(logger: Logger) {
        this.logger = logger.createChild(ChartVaultLogComponent.BLOB);
    }

    async connect(): Promise<void> {
        this.connected = true;
        this.logger.debug('MemoryBlobRepository connected');
    }

    async disconnect(): Promise<void> {
        this.blobs.clear();
        this.connected = false;
        this.logger.debug('MemoryBlobRepository disconnected');
    }

    isConnected(): boolean {
        return this.connected;
    }

    getStoragePath(): undefined {
        return undefined;
    }

    async save(guid: string, data: Uint8Array, format: string): Promise<void> {
        this.ensureConnected('save');
        const blobFormat = format.toLowerCase();
        if (!isGuid(guid)) {
            throw StorageError.invalidGuid(guid);
        }
        if (!isImageFormat(blobFormat)) {
            throw StorageError.unsupportedFormat(format, IMAGE_FORMATS);
        }
        // Copy so later mutation of the caller's buffer cannot change the stored blob
        this.blobs.set(this.key(guid, blobFormat), {
            data: Buffer.from(data),
            modifiedAt: new Date(),
        });
    }

    async get(guid: string, format: string): Promise<Buffer | null> {
        this.ensureConnected('get');
        const blob = this.blobs.get(this.key(guid, format.toLowerCase()));
        return blob ? Buffer.from(blob.data) : null;
    }

    async exists(guid: string): Promise<boolean> {
        this.ensureConnected('exists');
        return (await this.getFormat(guid)) !== null;
    }

    async delete(guid: string, format?: string): Promise<boolean> {
        this.ensureConnected('delete');
        const formats = format === undefined ? IMAGE_FORMATS : [format.toLowerCase()];
        let deleted = false;
        for (const candidate of formats) {
            deleted = this.blobs.delete(this.key(guid, candidate)) || deleted;
        }
        return deleted;
    }

    async listAll(): Promise<Set<string>> {
        this.ensureConnected('listAll');
        const guids = new Set<string>();
        for (const key of this.blobs.keys()) {
            guids.add(key.slice(0, key.lastIndexOf('.')));
        }
        return guids;
    }

    async getFormat(guid: string): Promise<ImageFormat | null> {
        this.ensureConnected('getFormat');
        return IMAGE_FORMATS.find((format) => this.blobs.has(this.key(guid, format))) ?? null;
    }

    async getModifiedTime(guid: string, format?: string): Promise<Date | null> {
        this.ensureConnected('getModifiedTime');
        const blobFormat = format === undefined ? await this.getFormat(guid) : format.toLowerCase();
        if (blobFormat === null) {
            return null;
        }
        return this.blobs.get(this.key(guid, blobFormat))?.modifiedAt ?? null;
    }

    /**
     * Backdate a blob; lets retention tests age entries without waiting
     */
    setModifiedTime(guid: string, format: string, modifiedAt: Date): void {
        const blob = this.blobs.get(this.key(guid, format.toLowerCase()));
        if (blob) {
            blob.modifiedAt = modifiedAt;
        }
    }

    private key(guid: string, format: string): string {
        return `${guid}.${format}`;
    }

    private ensureConnected(method: string): void {
        if (!this.connected) {
            throw StorageError.notConnected('MemoryBlobRepository', method);
        }
    }
}
