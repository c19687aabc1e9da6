/**
 * @chartvault/storage
 *
 * Filesystem and in-memory backends for the `StorageService` contract defined in
 * `@chartvault/core`.
 */

export { createStorageService } from './storage-service-factory.js';

export {
    STORAGE_BACKEND_TYPES,
    BuiltInStorageConfigSchema,
    InMemoryStorageSchema,
    LocalStorageSchema,
    SplitStorageSchema,
    StorageConfigSchema,
    resolveStorageConfig,
} from './schemas.js';
export type {
    BuiltInStorageConfig,
    InMemoryStorageConfig,
    LocalStorageConfig,
    SplitStorageConfig,
    StorageBackendType,
    StorageConfig,
} from './schemas.js';

export {
    StorageBackendRegistry,
    createDefaultBackendRegistry,
    inMemoryStorageFactory,
    localStorageFactory,
    splitStorageFactory,
} from './backends/index.js';
export type { StorageBackendFactory } from './backends/index.js';

export {
    BaseStorageService,
    LocalStorageService,
    SplitStorageService,
    METADATA_FILE_NAME,
} from './service/index.js';
export type { SplitStorageServiceOptions, StorageServiceOptions } from './service/index.js';

export { AliasIndex } from './alias/index.js';
export type { AliasIndexOptions } from './alias/index.js';

export { FileBlobRepository, MemoryBlobRepository, parseBlobFileName } from './blob/index.js';
export {
    BaseMetadataRepository,
    JsonMetadataRepository,
    MemoryMetadataRepository,
    parseTimestamp,
} from './metadata/index.js';
export type { JsonMetadataRepositoryOptions } from './metadata/index.js';
