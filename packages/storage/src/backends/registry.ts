import { z } from 'zod';
import { StorageError } from '@chartvault/core';
import type { Logger, StorageService } from '@chartvault/core';
import type { StorageBackendFactory } from './factory.js';
import { inMemoryStorageFactory, localStorageFactory, splitStorageFactory } from './factories/index.js';

interface RegisteredBackend {
    type: string;
    metadata: StorageBackendFactory['metadata'];
    build(config: unknown, logger: Logger): StorageService;
}

const TypeOnlySchema = z.object({ type: z.string() }).passthrough();

/**
 * Name -> factory mapping consulted once at startup.
 *
 * A plain value constructed by the composition root; there is no process-wide
 * instance. Custom backends can be registered before the service is created.
 */
export class StorageBackendRegistry {
    private backends = new Map<string, RegisteredBackend>();

    /**
     * @throws when a factory with the same type is already registered
     */
    register<TType extends string, TConfig extends { type: TType }>(
        factory: StorageBackendFactory<TType, TConfig>
    ): void {
        if (this.backends.has(factory.type)) {
            throw StorageError.backendAlreadyRegistered(factory.type);
        }
        this.backends.set(factory.type, {
            type: factory.type,
            metadata: factory.metadata,
            build: (config, logger) => {
                const parsed = factory.configSchema.safeParse(config);
                if (!parsed.success) {
                    throw StorageError.backendInvalidConfig(
                        `Invalid configuration for storage backend '${factory.type}': ${parsed.error.issues
                            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
                            .join('; ')}`,
                        { type: factory.type, issues: parsed.error.issues }
                    );
                }
                return factory.create(parsed.data, logger);
            },
        });
    }

    /**
     * @returns true if the backend was registered
     */
    unregister(type: string): boolean {
        return this.backends.delete(type);
    }

    has(type: string): boolean {
        return this.backends.has(type);
    }

    getTypes(): string[] {
        return Array.from(this.backends.keys());
    }

    getMetadata(type: string): StorageBackendFactory['metadata'] {
        return this.backends.get(type)?.metadata;
    }

    /**
     * Validate `config` against its backend's schema and build an unconnected service.
     *
     * @throws ChartVaultRuntimeError `storage_backend_unknown` for an unregistered type
     * @throws ChartVaultValidationError when the configuration does not match the schema
     */
    create(config: unknown, logger: Logger): StorageService {
        const typed = TypeOnlySchema.safeParse(config);
        if (!typed.success) {
            throw StorageError.backendInvalidConfig('Storage configuration must be an object with a string "type"', {
                issues: typed.error.issues,
            });
        }

        const backend = this.backends.get(typed.data.type);
        if (!backend) {
            throw StorageError.unknownBackend(typed.data.type, this.getTypes());
        }
        return backend.build(config, logger);
    }
}

/**
 * Registry holding the built-in backends: `local`, `split` and `in-memory`
 */
export function createDefaultBackendRegistry(): StorageBackendRegistry {
    const registry = new StorageBackendRegistry();
    registry.register(localStorageFactory);
    registry.register(splitStorageFactory);
    registry.register(inMemoryStorageFactory);
    return registry;
}
