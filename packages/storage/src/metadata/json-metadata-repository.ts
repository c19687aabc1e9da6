import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { ChartVaultLogComponent, StorageError, isNotFoundError } from '@chartvault/core';
import type { BlobTimestampLookup, ImageRecord, Logger } from '@chartvault/core';
import { BaseMetadataRepository } from './base-metadata-repository.js';
import { parseMetadataDocument, serializeMetadataDocument } from './record.js';

export interface JsonMetadataRepositoryOptions {
    /** Location of the metadata document */
    filePath: string;
    /**
     * Write through a temp file + fsync + rename (default). When false the document
     * is rewritten in place, which is faster but can be torn by a crash.
     */
    atomicWrites?: boolean | undefined;
    /** Age fallback for records without a usable `createdAt` */
    blobTimestamps?: BlobTimestampLookup | undefined;
}

function createCorruptBackupPath(filePath: string): string {
    const ts = new Date().toISOString().replace(/[:.]/g, '-');
    return `${filePath}.corrupt.${ts}`;
}

/**
 * Metadata repository backed by a single JSON document.
 *
 * The document is loaded once on connect and cached; every mutation rewrites it
 * whole. A document that cannot be parsed is moved aside and replaced with an
 * empty one rather than failing startup.
 */
export class JsonMetadataRepository extends BaseMetadataRepository {
    private readonly filePath: string;
    private readonly atomicWrites: boolean;

    constructor(options: JsonMetadataRepositoryOptions, logger: Logger) {
        super(logger.createChild(ChartVaultLogComponent.METADATA), options.blobTimestamps);
        this.filePath = path.resolve(options.filePath);
        this.atomicWrites = options.atomicWrites ?? true;
    }

    getFilePath(): string {
        return this.filePath;
    }

    async connect(): Promise<void> {
        if (this.connected) return;

        try {
            await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        } catch (error) {
            throw StorageError.writeFailed('create metadata directory', error, {
                path: this.filePath,
            });
        }

        this.records = await this.load();
        this.connected = true;
        this.logger.debug(
            `JsonMetadataRepository loaded ${this.records.size} records from ${this.filePath}`
        );
    }

    async disconnect(): Promise<void> {
        await super.disconnect();
        this.records = new Map();
        this.logger.debug('JsonMetadataRepository disconnected');
    }

    private async load(): Promise<Map<string, ImageRecord>> {
        let content: string;
        try {
            content = await fs.readFile(this.filePath, 'utf-8');
        } catch (error) {
            if (isNotFoundError(error)) {
                return new Map();
            }
            throw StorageError.readFailed('metadata load', error, { path: this.filePath });
        }

        if (content.trim() === '') {
            return new Map();
        }

        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (error) {
            await this.resetCorruptDocument(
                `invalid JSON: ${error instanceof Error ? error.message : String(error)}`
            );
            return new Map();
        }

        const parsed = parseMetadataDocument(raw);
        if (!parsed) {
            await this.resetCorruptDocument('document root is not an object');
            return new Map();
        }

        if (parsed.skipped.length > 0) {
            this.logger.warn(
                `Ignoring ${parsed.skipped.length} unreadable metadata entries in ${this.filePath}`,
                { guids: parsed.skipped }
            );
        }
        return parsed.records;
    }

    /**
     * Move the unreadable document aside so it can be inspected later
     */
    private async resetCorruptDocument(reason: string): Promise<void> {
        const backupPath = createCorruptBackupPath(this.filePath);
        try {
            await fs.rename(this.filePath, backupPath);
            this.logger.warn(
                `Metadata document ${this.filePath} is corrupt (${reason}); moved to ${backupPath} and starting empty`
            );
        } catch (error) {
            this.logger.warn(
                `Metadata document ${this.filePath} is corrupt (${reason}) and could not be backed up: ${String(error)}; starting empty`
            );
        }
    }

    protected async persist(records: Map<string, ImageRecord>): Promise<void> {
        const content = serializeMetadataDocument(records.values());

        if (!this.atomicWrites) {
            try {
                await fs.writeFile(this.filePath, content, 'utf-8');
            } catch (error) {
                throw StorageError.writeFailed('metadata save', error, { path: this.filePath });
            }
            return;
        }

        const tempPath = `${this.filePath}.${randomUUID()}.tmp`;
        try {
            const handle = await fs.open(tempPath, 'wx');
            try {
                await handle.writeFile(content, 'utf-8');
                await handle.sync();
            } finally {
                await handle.close();
            }
            await fs.rename(tempPath, this.filePath);
        } catch (error) {
            await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
                this.logger.warn(`Failed to remove temp metadata file ${tempPath}: ${String(cleanupError)}`);
            });
            throw StorageError.writeFailed('metadata save', error, { path: this.filePath });
        }
    }
}
