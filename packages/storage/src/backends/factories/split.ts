import { FileBlobRepository } from '../../blob/index.js';
import { JsonMetadataRepository } from '../../metadata/index.js';
import { SplitStorageSchema } from '../../schemas.js';
import type { SplitStorageConfig } from '../../schemas.js';
import { SplitStorageService } from '../../service/index.js';
import type { StorageBackendFactory } from '../factory.js';

export const splitStorageFactory: StorageBackendFactory<'split', SplitStorageConfig> = {
    type: 'split',
    configSchema: SplitStorageSchema,
    create: (config, logger) => {
        const blobs = new FileBlobRepository(config.blobPath, logger);
        const metadata = new JsonMetadataRepository(
            {
                filePath: config.metadataPath,
                blobTimestamps: (guid, format) => blobs.getModifiedTime(guid, format),
            },
            logger
        );
        return new SplitStorageService(blobs, metadata, logger);
    },
    metadata: {
        displayName: 'Split Filesystem',
        description: 'Blob directory and metadata document configured independently',
        requiresNetwork: false,
    },
};
