import path from 'path';
import { z } from 'zod';
import { getStorageDir } from '@chartvault/core';

/**
 * Built-in storage backend types
 */
export const STORAGE_BACKEND_TYPES = ['local', 'split', 'in-memory'] as const;
export type StorageBackendType = (typeof STORAGE_BACKEND_TYPES)[number];

/**
 * Consolidated backend: blobs and the metadata document in one directory
 */
export const LocalStorageSchema = z
    .object({
        type: z.literal('local').describe('Storage backend type identifier'),
        storePath: z.string().min(1).describe('Directory holding blobs and metadata.json'),
        legacyAliases: z
            .boolean()
            .optional()
            .default(false)
            .describe('Allow aliases on GUIDs without a metadata record (not persisted)'),
        atomicMetadataWrites: z
            .boolean()
            .optional()
            .default(true)
            .describe('Write metadata.json through temp file + fsync + rename'),
    })
    .strict();

export type LocalStorageConfig = z.output<typeof LocalStorageSchema>;

/**
 * Split backend: blob directory and metadata document configured separately
 */
export const SplitStorageSchema = z
    .object({
        type: z.literal('split').describe('Storage backend type identifier'),
        blobPath: z.string().min(1).describe('Directory holding blob files'),
        metadataPath: z.string().min(1).describe('File path of the metadata document'),
    })
    .strict();

export type SplitStorageConfig = z.output<typeof SplitStorageSchema>;

/**
 * Volatile backend for tests and development
 */
export const InMemoryStorageSchema = z
    .object({
        type: z.literal('in-memory').describe('Storage backend type identifier'),
    })
    .strict();

export type InMemoryStorageConfig = z.output<typeof InMemoryStorageSchema>;

/**
 * Any built-in backend configuration
 */
export const BuiltInStorageConfigSchema = z.discriminatedUnion('type', [
    LocalStorageSchema,
    SplitStorageSchema,
    InMemoryStorageSchema,
]);

export type BuiltInStorageConfig = z.output<typeof BuiltInStorageConfigSchema>;

/**
 * Storage configuration as accepted at the outer boundary.
 *
 * Only checks that `type` is a string; the registered factory validates the rest,
 * so custom backends can carry their own fields.
 */
export const StorageConfigSchema = z
    .object({
        type: z.string().describe('Storage backend type'),
    })
    .passthrough()
    .describe('Storage backend configuration');

export type StorageConfig = z.output<typeof StorageConfigSchema>;

/**
 * Build a storage configuration from environment variables.
 *
 * - `CHARTVAULT_STORAGE_BACKEND`: `local` (default), `split` or `in-memory`
 * - `CHARTVAULT_STORAGE_DIR` / `CHARTVAULT_DATA_DIR`: storage directory (see `getStorageDir`)
 * - `CHARTVAULT_METADATA_PATH`: metadata document for `split` (default `<dir>/metadata.json`)
 */
export function resolveStorageConfig(
    env: NodeJS.ProcessEnv = process.env,
    cwd: string = process.cwd()
): StorageConfig {
    const type = env.CHARTVAULT_STORAGE_BACKEND?.trim() || 'local';
    const storePath = getStorageDir(env, cwd);

    switch (type) {
        case 'local':
            return { type, storePath };
        case 'split': {
            const metadataPath = env.CHARTVAULT_METADATA_PATH?.trim();
            return {
                type,
                blobPath: storePath,
                metadataPath: metadataPath
                    ? path.resolve(cwd, metadataPath)
                    : path.join(storePath, 'metadata.json'),
            };
        }
        default:
            // Unknown names are rejected by the registry with the list of available backends
            return { type };
    }
}
