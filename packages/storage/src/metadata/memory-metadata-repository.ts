import { ChartVaultLogComponent } from '@chartvault/core';
import type { BlobTimestampLookup, Logger } from '@chartvault/core';
import { BaseMetadataRepository } from './base-metadata-repository.js';

/**
 * Metadata repository held entirely in process memory; contents are lost on disconnect.
 */
export class MemoryMetadataRepository extends BaseMetadataRepository {
    constructor(logger: Logger, blobTimestamps?: BlobTimestampLookup) {
        super(logger.createChild(ChartVaultLogComponent.METADATA), blobTimestamps);
    }

    async connect(): Promise<void> {
        this.connected = true;
        this.logger.debug('MemoryMetadataRepository connected');
    }

    async disconnect(): Promise<void> {
        await super.disconnect();
        this.records = new Map();
        this.logger.debug('MemoryMetadataRepository disconnected');
    }

    protected async persist(): Promise<void> {}
}
