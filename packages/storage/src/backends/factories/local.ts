import { LocalStorageSchema } from '../../schemas.js';
import type { LocalStorageConfig } from '../../schemas.js';
import { LocalStorageService } from '../../service/index.js';
import type { StorageBackendFactory } from '../factory.js';

/**
 * Factory for the consolidated filesystem backend.
 *
 * Blobs and `metadata.json` live in one directory; the default for single-machine
 * deployments.
 */
export const localStorageFactory: StorageBackendFactory<'local', LocalStorageConfig> = {
    type: 'local',
    configSchema: LocalStorageSchema,
    create: (config, logger) => new LocalStorageService(config, logger),
    metadata: {
        displayName: 'Local Filesystem',
        description: 'Store images and metadata.json in a single local directory',
        requiresNetwork: false,
    },
};
