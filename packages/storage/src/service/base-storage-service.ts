import { randomUUID } from 'crypto';
import {
    AsyncMutex,
    ChartVaultLogComponent,
    IMAGE_FORMATS,
    StorageError,
    isImageFormat,
    normalizeGroup,
} from '@chartvault/core';
import type {
    BlobRepository,
    GroupToken,
    ImageRecord,
    Logger,
    MetadataRepository,
    StorageService,
    StoredImage,
} from '@chartvault/core';
import { AliasIndex } from '../alias/index.js';
import { parseTimestamp } from '../metadata/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const DEFAULT_FORMAT = 'png';

export interface StorageServiceOptions {
    /** Permit aliases on GUIDs without a metadata record (index-only, not persisted) */
    legacyAliases?: boolean | undefined;
}

/**
 * Orchestrates a blob repository, a metadata repository and the alias index.
 *
 * Group isolation is enforced here: a record with a non-null group is visible
 * only to callers presenting that exact group. Record-level mutations (delete,
 * alias changes, purge) share one lock with the alias index; saves write a
 * fresh GUID and need no lock beyond the metadata repository's own.
 */
export abstract class BaseStorageService implements StorageService {
    protected readonly logger: Logger;
    protected readonly aliases: AliasIndex;
    private readonly mutationLock = new AsyncMutex();
    /** GUIDs whose blob is written but whose record may not be yet */
    private readonly pendingGuids = new Set<string>();
    private connected = false;

    protected constructor(
        protected readonly blobs: BlobRepository,
        protected readonly metadata: MetadataRepository,
        logger: Logger,
        options: StorageServiceOptions = {}
    ) {
        this.logger = logger.createChild(ChartVaultLogComponent.STORAGE);
        this.aliases = new AliasIndex(metadata, logger, {
            allowOrphanAliases: options.legacyAliases,
            lock: this.mutationLock,
        });
    }

    abstract getStoreType(): string;

    async connect(): Promise<void> {
        if (this.connected) return;

        await this.blobs.connect();
        await this.metadata.connect();
        await this.aliases.rebuild();
        this.connected = true;

        const location = this.blobs.getStoragePath();
        this.logger.info(
            location
                ? `${this.getStoreType()} storage initialized at ${location}`
                : `${this.getStoreType()} storage initialized`
        );
    }

    async disconnect(): Promise<void> {
        if (!this.connected) return;

        this.connected = false;
        this.aliases.clear();
        await this.metadata.disconnect();
        await this.blobs.disconnect();
        this.logger.info(`${this.getStoreType()} storage disconnected`);
    }

    isConnected(): boolean {
        return this.connected;
    }

    async saveImage(data: Uint8Array, format: string = DEFAULT_FORMAT, group?: GroupToken): Promise<string> {
        this.ensureConnected('saveImage');
        const normalizedFormat = format.toLowerCase();
        if (!isImageFormat(normalizedFormat)) {
            throw StorageError.unsupportedFormat(format, IMAGE_FORMATS);
        }

        const guid = randomUUID();
        const owner = normalizeGroup(group);
        this.pendingGuids.add(guid);
        try {
            await this.blobs.save(guid, data, normalizedFormat);

            const record: ImageRecord = {
                guid,
                format: normalizedFormat,
                size: data.byteLength,
                createdAt: new Date().toISOString(),
                group: owner,
                alias: null,
            };
            try {
                await this.metadata.save(record);
            } catch (error) {
                await this.blobs.delete(guid, normalizedFormat).catch((cleanupError: unknown) => {
                    this.logger.warn(`Failed to remove orphaned blob ${guid}: ${String(cleanupError)}`);
                });
                this.logger.error(`Failed to save metadata for ${guid}`, {
                    error: error instanceof Error ? error.message : String(error),
                });
                throw error;
            }
        } finally {
            this.pendingGuids.delete(guid);
        }

        this.logger.info(`Saved image ${guid}.${normalizedFormat} (${data.byteLength} bytes)`, {
            group: owner,
        });
        return guid;
    }

    async getImage(identifier: string, group?: GroupToken): Promise<StoredImage | null> {
        this.ensureConnected('getImage');
        const requested = normalizeGroup(group);
        const guid = this.resolveForAccess(identifier, requested);
        if (guid === null) {
            return null;
        }

        const record = await this.metadata.get(guid);
        this.assertAccess(identifier, record, requested);

        if (record) {
            const data = await this.blobs.get(guid, record.format);
            if (data) {
                return { data, format: record.format.toLowerCase() };
            }
        }

        const detected = await this.blobs.getFormat(guid);
        if (detected) {
            const data = await this.blobs.get(guid, detected);
            if (data) {
                return { data, format: detected };
            }
        }

        this.logger.debug(`No blob found for ${guid}`);
        return null;
    }

    async deleteImage(identifier: string, group?: GroupToken): Promise<boolean> {
        this.ensureConnected('deleteImage');
        const requested = normalizeGroup(group);

        return this.mutationLock.runExclusive(async () => {
            const guid = this.resolveForAccess(identifier, requested);
            if (guid === null) {
                return false;
            }
            const record = await this.metadata.get(guid);
            this.assertAccess(identifier, record, requested);

            const deleted = await this.removeImage(guid);
            if (deleted) {
                this.logger.info(`Deleted image ${guid}`, { group: requested });
            }
            return deleted;
        });
    }

    async listImages(group?: GroupToken): Promise<string[]> {
        this.ensureConnected('listImages');
        return this.metadata.listAll(group);
    }

    async exists(identifier: string, group?: GroupToken): Promise<boolean> {
        this.ensureConnected('exists');
        const requested = normalizeGroup(group);
        const guid = this.aliases.resolveIdentifier(identifier, requested);
        if (guid === null) {
            return false;
        }
        const record = await this.metadata.get(guid);
        if (record && record.group !== null && record.group !== requested) {
            return false;
        }
        return this.blobs.exists(guid);
    }

    async purge(ageDays = 0, group?: GroupToken): Promise<number> {
        this.ensureConnected('purge');
        if (!Number.isFinite(ageDays) || ageDays < 0) {
            throw StorageError.invalidPurgeAge(ageDays);
        }

        return this.mutationLock.runExclusive(async () => {
            try {
                const removed = await this.purgeLocked(ageDays, group);
                this.logger.info(`Purged ${removed} images`, { ageDays, group });
                return removed;
            } catch (error) {
                throw StorageError.purgeFailed(error, { ageDays, group });
            }
        });
    }

    resolveIdentifier(identifier: string, group?: GroupToken): string | null {
        this.ensureConnected('resolveIdentifier');
        return this.aliases.resolveIdentifier(identifier, group);
    }

    async registerAlias(alias: string, guid: string, group?: GroupToken): Promise<void> {
        this.ensureConnected('registerAlias');
        await this.aliases.registerAlias(alias, guid, group);
    }

    async unregisterAlias(alias: string, group?: GroupToken): Promise<boolean> {
        this.ensureConnected('unregisterAlias');
        return this.aliases.unregisterAlias(alias, group);
    }

    getAlias(guid: string): string | null {
        this.ensureConnected('getAlias');
        return this.aliases.getAlias(guid);
    }

    listAliases(group?: GroupToken): Record<string, string> {
        this.ensureConnected('listAliases');
        return this.aliases.listAliases(group);
    }

    /**
     * Snapshot candidates first, then delete. Runs under the mutation lock.
     *
     * 1. records older than the cutoff (every in-scope record for `ageDays` 0)
     * 2. in-scope records whose blob is missing, when old enough or of unknown age
     * 3. blobs with no record and no save in flight, checked per blob just before
     *    its delete; only for an unscoped purge, since an orphan blob has no group
     */
    private async purgeLocked(ageDays: number, group: GroupToken): Promise<number> {
        const cutoff = Date.now() - ageDays * DAY_MS;
        const expired = await this.metadata.filterByAge(ageDays, group);
        const blobGuids = await this.blobs.listAll();
        const inScope = await this.metadata.listAll(group);

        const removed = new Set<string>();
        for (const record of expired) {
            await this.removeImage(record.guid);
            removed.add(record.guid);
        }

        for (const guid of inScope) {
            if (removed.has(guid) || blobGuids.has(guid)) {
                continue;
            }
            const record = await this.metadata.get(guid);
            if (!record) {
                continue;
            }
            const createdAt = parseTimestamp(record.createdAt);
            if (ageDays === 0 || createdAt === null || createdAt < cutoff) {
                await this.removeImage(guid);
                removed.add(guid);
                this.logger.debug(`Purged orphaned record ${guid}`);
            }
        }

        if (group === undefined) {
            const recorded = new Set(await this.metadata.listAll());
            for (const guid of blobGuids) {
                if (removed.has(guid) || recorded.has(guid)) {
                    continue;
                }
                if (ageDays > 0) {
                    const modified = await this.blobs.getModifiedTime(guid);
                    if (modified === null || modified.getTime() >= cutoff) {
                        continue;
                    }
                }
                // A save may have finished since the snapshot; re-check right before deleting
                if (this.pendingGuids.has(guid) || (await this.metadata.exists(guid))) {
                    continue;
                }
                if (await this.blobs.delete(guid)) {
                    removed.add(guid);
                    this.logger.debug(`Purged orphaned blob ${guid}`);
                }
            }
        }

        return removed.size;
    }

    /**
     * Remove blob, record and alias of one GUID. Callers hold the mutation lock.
     */
    private async removeImage(guid: string): Promise<boolean> {
        const blobDeleted = await this.blobs.delete(guid);
        const recordDeleted = await this.metadata.delete(guid);
        this.aliases.forget(guid);
        return blobDeleted || recordDeleted;
    }

    /**
     * Resolve an identifier for a read or delete. An alias that only exists in a
     * scope the caller cannot see is reported as forbidden rather than missing.
     */
    private resolveForAccess(identifier: string, requested: string | null): string | null {
        const guid = this.aliases.resolveIdentifier(identifier, requested);
        if (guid !== null) {
            return guid;
        }
        const owner = this.aliases.findForeignScope(identifier, requested);
        if (owner !== null) {
            this.logger.warn(`Alias '${identifier}' belongs to group '${owner}', requested '${requested ?? 'public'}'`);
            throw StorageError.permissionDenied(identifier, owner, requested);
        }
        return null;
    }

    private assertAccess(identifier: string, record: ImageRecord | null, requested: string | null): void {
        if (record && record.group !== null && record.group !== requested) {
            this.logger.warn(
                `Group mismatch for ${record.guid}: stored '${record.group}', requested '${requested ?? 'public'}'`
            );
            throw StorageError.permissionDenied(identifier, record.group, requested);
        }
    }

    protected ensureConnected(method: string): void {
        if (!this.connected) {
            throw StorageError.notConnected(this.getStoreType(), method);
        }
    }
}
