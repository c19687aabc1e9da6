import type { Logger, StorageService } from '@chartvault/core';
import { createDefaultBackendRegistry } from './backends/index.js';
import type { StorageBackendRegistry } from './backends/index.js';

/**
 * Composition root for storage: pick the backend named by `config.type`, build it
 * and connect it.
 *
 * The returned service is meant to be passed explicitly to render and retrieval
 * handlers.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: getDefaultLogLevel() });
 * const storage = await createStorageService(resolveStorageConfig(), logger);
 * const guid = await storage.saveImage(png, 'png', 'sales');
 * ```
 */
export async function createStorageService(
    config: unknown,
    logger: Logger,
    registry: StorageBackendRegistry = createDefaultBackendRegistry()
): Promise<StorageService> {
    const service = registry.create(config, logger);
    await service.connect();
    return service;
}
