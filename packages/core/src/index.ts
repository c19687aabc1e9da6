/**
 * @chartvault/core
 *
 * Error model, logger and the storage contracts. Concrete backends live in
 * `@chartvault/storage`; callers depend on the `StorageService` interface only.
 */

export * from './errors/index.js';
export * from './logger/index.js';
export * from './storage/index.js';
export * from './utils/index.js';
