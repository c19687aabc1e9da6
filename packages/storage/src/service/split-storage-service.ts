import type { BlobRepository, Logger, MetadataRepository } from '@chartvault/core';
import { BaseStorageService } from './base-storage-service.js';
import type { StorageServiceOptions } from './base-storage-service.js';

export interface SplitStorageServiceOptions extends StorageServiceOptions {
    /** Reported by `getStoreType()`; defaults to `split` */
    storeType?: string | undefined;
}

/**
 * Backend over independently supplied repositories, so blob and metadata
 * storage can be replaced separately (filesystem, memory, or a custom pair).
 */
export class SplitStorageService extends BaseStorageService {
    private readonly storeType: string;

    constructor(
        blobs: BlobRepository,
        metadata: MetadataRepository,
        logger: Logger,
        options: SplitStorageServiceOptions = {}
    ) {
        super(blobs, metadata, logger, options);
        this.storeType = options.storeType ?? 'split';
    }

    getStoreType(): string {
        return this.storeType;
    }
}
