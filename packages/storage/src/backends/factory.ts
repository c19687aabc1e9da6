import type { Logger, StorageService } from '@chartvault/core';
import type { z } from 'zod';

/**
 * Factory interface for creating storage service instances.
 *
 * Factories are plain values; a {@link StorageBackendRegistry} decides which ones
 * a process can select by name.
 */
export interface StorageBackendFactory<TType extends string = string, TConfig extends { type: TType } = { type: TType }> {
    /** Name used in configuration (`type` field) */
    type: TType;

    /**
     * Zod schema for validating backend-specific configuration.
     * The schema must output the `TConfig` type.
     */
    configSchema: z.ZodType<TConfig, z.ZodTypeDef, unknown>;

    /**
     * Build an unconnected service from validated configuration
     */
    create(config: TConfig, logger: Logger): StorageService;

    /**
     * Optional metadata for documentation and discovery
     */
    metadata?: {
        /** Human-readable name (e.g., "Local Filesystem") */
        displayName: string;
        description: string;
        /** Whether this backend requires network connectivity */
        requiresNetwork?: boolean;
    };
}
