import { AsyncMutex, StorageError, normalizeGroup } from '@chartvault/core';
import type { BlobTimestampLookup, GroupToken, ImageRecord, Logger, MetadataRepository } from '@chartvault/core';
import { parseTimestamp } from './record.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Shared in-process view of the metadata document.
 *
 * Reads are served from the cached map. Every mutation runs under a write lock,
 * builds a new map, hands it to {@link persist}, and only swaps it in once the
 * write succeeded, so a failed write leaves the previous state visible.
 */
export abstract class BaseMetadataRepository implements MetadataRepository {
    protected records = new Map<string, ImageRecord>();
    protected connected = false;
    private readonly writeLock = new AsyncMutex();

    protected constructor(
        protected readonly logger: Logger,
        private readonly blobTimestamps?: BlobTimestampLookup
    ) {}

    abstract connect(): Promise<void>;

    /**
     * Durably store the full document
     */
    protected abstract persist(records: Map<string, ImageRecord>): Promise<void>;

    async disconnect(): Promise<void> {
        this.connected = false;
    }

    isConnected(): boolean {
        return this.connected;
    }

    async save(record: ImageRecord): Promise<void> {
        this.ensureConnected('save');
        await this.commit((draft) => {
            draft.set(record.guid, { ...record });
            return true;
        });
    }

    async get(guid: string): Promise<ImageRecord | null> {
        this.ensureConnected('get');
        const record = this.records.get(guid);
        return record ? { ...record } : null;
    }

    async delete(guid: string): Promise<boolean> {
        this.ensureConnected('delete');
        return this.commit((draft) => draft.delete(guid));
    }

    async listAll(group?: GroupToken): Promise<string[]> {
        this.ensureConnected('listAll');
        return this.inScope(group).map((record) => record.guid);
    }

    async exists(guid: string): Promise<boolean> {
        this.ensureConnected('exists');
        return this.records.has(guid);
    }

    async filterByAge(ageDays: number, group?: GroupToken): Promise<ImageRecord[]> {
        this.ensureConnected('filterByAge');
        if (!Number.isFinite(ageDays) || ageDays < 0) {
            throw StorageError.invalidPurgeAge(ageDays);
        }

        const candidates = this.inScope(group);
        if (ageDays === 0) {
            return candidates.map((record) => ({ ...record }));
        }

        const cutoff = Date.now() - ageDays * DAY_MS;
        const expired: ImageRecord[] = [];
        for (const record of candidates) {
            const createdAt = await this.resolveAge(record);
            if (createdAt === null) {
                this.logger.debug(`Skipping ${record.guid}: age cannot be determined`);
                continue;
            }
            if (createdAt < cutoff) {
                expired.push({ ...record });
            }
        }
        return expired;
    }

    async update(
        guid: string,
        mutate: (current: ImageRecord) => ImageRecord | null
    ): Promise<ImageRecord | null> {
        this.ensureConnected('update');
        return this.writeLock.runExclusive(async () => {
            const current = this.records.get(guid);
            if (!current) {
                return null;
            }
            const next = mutate({ ...current });
            if (next === null) {
                return { ...current };
            }
            const draft = new Map(this.records);
            draft.set(guid, { ...next, guid });
            await this.persist(draft);
            this.records = draft;
            return { ...next, guid };
        });
    }

    /**
     * Every record, or only those whose stored group equals a given group
     */
    private inScope(group: GroupToken): ImageRecord[] {
        const all = [...this.records.values()];
        if (group === undefined) {
            return all;
        }
        const wanted = normalizeGroup(group);
        return all.filter((record) => record.group === wanted);
    }

    private async resolveAge(record: ImageRecord): Promise<number | null> {
        const createdAt = parseTimestamp(record.createdAt);
        if (createdAt !== null) {
            return createdAt;
        }
        if (!this.blobTimestamps) {
            return null;
        }
        const modified = await this.blobTimestamps(record.guid, record.format);
        return modified ? modified.getTime() : null;
    }

    /**
     * Apply `change` to a copy of the document and persist it.
     * A change returning false made no modification and skips the write.
     */
    private async commit(change: (draft: Map<string, ImageRecord>) => boolean): Promise<boolean> {
        return this.writeLock.runExclusive(async () => {
            const draft = new Map(this.records);
            const result = change(draft);
            if (!result) {
                return false;
            }
            await this.persist(draft);
            this.records = draft;
            return result;
        });
    }

    protected ensureConnected(method: string): void {
        if (!this.connected) {
            throw StorageError.notConnected(this.constructor.name, method);
        }
    }
}
