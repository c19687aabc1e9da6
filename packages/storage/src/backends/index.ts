export type { StorageBackendFactory } from './factory.js';
export { StorageBackendRegistry, createDefaultBackendRegistry } from './registry.js';
export { inMemoryStorageFactory, localStorageFactory, splitStorageFactory } from './factories/index.js';
