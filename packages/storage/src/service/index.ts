export { BaseStorageService } from './base-storage-service.js';
export type { StorageServiceOptions } from './base-storage-service.js';
export { LocalStorageService, METADATA_FILE_NAME } from './local-storage-service.js';
export { SplitStorageService } from './split-storage-service.js';
export type { SplitStorageServiceOptions } from './split-storage-service.js';
