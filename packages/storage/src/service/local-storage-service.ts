import path from 'path';
import type { Logger } from '@chartvault/core';
import { FileBlobRepository } from '../blob/index.js';
import { JsonMetadataRepository } from '../metadata/index.js';
import type { LocalStorageConfig } from '../schemas.js';
import { BaseStorageService } from './base-storage-service.js';

export const METADATA_FILE_NAME = 'metadata.json';

/**
 * Consolidated backend: blobs and `metadata.json` share one directory.
 *
 * ```
 * {storePath}/metadata.json
 * {storePath}/{guid}.{format}
 * ```
 */
export class LocalStorageService extends BaseStorageService {
    private readonly storePath: string;

    constructor(config: LocalStorageConfig, logger: Logger) {
        const storePath = path.resolve(config.storePath);
        const blobs = new FileBlobRepository(storePath, logger);
        const metadata = new JsonMetadataRepository(
            {
                filePath: path.join(storePath, METADATA_FILE_NAME),
                atomicWrites: config.atomicMetadataWrites,
                blobTimestamps: (guid, format) => blobs.getModifiedTime(guid, format),
            },
            logger
        );
        super(blobs, metadata, logger, { legacyAliases: config.legacyAliases });
        this.storePath = storePath;
    }

    getStoreType(): string {
        return 'local';
    }

    getStorePath(): string {
        return this.storePath;
    }
}
