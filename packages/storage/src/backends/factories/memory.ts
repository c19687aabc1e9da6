import { MemoryBlobRepository } from '../../blob/index.js';
import { MemoryMetadataRepository } from '../../metadata/index.js';
import { InMemoryStorageSchema } from '../../schemas.js';
import type { InMemoryStorageConfig } from '../../schemas.js';
import { SplitStorageService } from '../../service/index.js';
import type { StorageBackendFactory } from '../factory.js';

/**
 * Factory for volatile in-memory storage.
 *
 * Data is lost on disconnect. Suited to tests and development.
 */
export const inMemoryStorageFactory: StorageBackendFactory<'in-memory', InMemoryStorageConfig> = {
    type: 'in-memory',
    configSchema: InMemoryStorageSchema,
    create: (_config, logger) => {
        const blobs = new MemoryBlobRepository(logger);
        const metadata = new MemoryMetadataRepository(logger, (guid, format) =>
            blobs.getModifiedTime(guid, format)
        );
        return new SplitStorageService(blobs, metadata, logger, { storeType: 'in-memory' });
    },
    metadata: {
        displayName: 'In-Memory',
        description: 'Store images in process memory (volatile)',
        requiresNetwork: false,
    },
};
