/**
 * Storage contracts for rendered chart artifacts.
 *
 * Implementations live in `@chartvault/storage`; render and retrieval handlers
 * depend only on `StorageService`.
 */

/**
 * Formats the renderer produces, in the order blob lookups probe them
 */
export const IMAGE_FORMATS = ['png', 'jpg', 'jpeg', 'svg', 'pdf'] as const;
export type ImageFormat = (typeof IMAGE_FORMATS)[number];

/**
 * Group token supplied by the authentication layer.
 * `null`/`undefined` means the public scope; storage never inspects the contents.
 */
export type GroupToken = string | null | undefined;

/**
 * Structured attributes of one stored blob.
 *
 * `format` stays a plain string because documents written by older versions may
 * carry anything; `createdAt` is the raw ISO-8601 text and may be missing.
 */
export interface ImageRecord {
    guid: string;
    format: string;
    size: number;
    createdAt: string | null;
    group: string | null;
    alias: string | null;
}

/**
 * Bytes plus the format they were found under
 */
export interface StoredImage {
    data: Buffer;
    format: string;
}

/**
 * Resolves a blob's last-modified time; used when a record has no usable `createdAt`.
 */
export type BlobTimestampLookup = (guid: string, format: string) => Promise<Date | null>;

interface Connectable {
    connect(): Promise<void>;
    disconnect(): Promise<void>;
    isConnected(): boolean;
}

/**
 * Raw bytes keyed by GUID + format.
 */
export interface BlobRepository extends Connectable {
    /**
     * Write bytes for `(guid, format)`. A failed write never leaves a readable partial blob.
     */
    save(guid: string, data: Uint8Array, format: string): Promise<void>;

    /**
     * @returns the bytes, or null when no blob exists under that format
     */
    get(guid: string, format: string): Promise<Buffer | null>;

    /**
     * True when a blob exists under any supported format
     */
    exists(guid: string): Promise<boolean>;

    /**
     * Delete one format, or every supported format when `format` is omitted.
     * @returns true if anything was removed
     */
    delete(guid: string, format?: string): Promise<boolean>;

    /**
     * GUIDs of every well-formed blob entry; unrelated entries are ignored
     */
    listAll(): Promise<Set<string>>;

    /**
     * First supported format a blob exists under, independent of metadata
     */
    getFormat(guid: string): Promise<ImageFormat | null>;

    getModifiedTime(guid: string, format?: string): Promise<Date | null>;

    /**
     * Local directory holding the blobs, or undefined for non-filesystem stores
     */
    getStoragePath(): string | undefined;
}

/**
 * Structured records keyed by GUID, persisted as one document.
 */
export interface MetadataRepository extends Connectable {
    /**
     * Upsert by GUID
     */
    save(record: ImageRecord): Promise<void>;

    get(guid: string): Promise<ImageRecord | null>;

    delete(guid: string): Promise<boolean>;

    /**
     * Every GUID, or only those whose stored group equals `group` when one is given
     */
    listAll(group?: GroupToken): Promise<string[]>;

    exists(guid: string): Promise<boolean>;

    /**
     * Records older than `now - ageDays` (all in-scope records when `ageDays` is 0).
     * Age comes from `createdAt`, else from the blob's modification time; records
     * whose age cannot be determined are not returned.
     */
    filterByAge(ageDays: number, group?: GroupToken): Promise<ImageRecord[]>;

    /**
     * Read-modify-write one record under the repository's write lock.
     * `mutate` returns the replacement record, or null to leave it unchanged.
     * @returns the stored record after the update, or null when absent
     */
    update(
        guid: string,
        mutate: (current: ImageRecord) => ImageRecord | null
    ): Promise<ImageRecord | null>;
}

/**
 * The storage surface consumed by render, API and MCP-tool handlers.
 */
export interface StorageService extends Connectable {
    getStoreType(): string;

    saveImage(data: Uint8Array, format?: string, group?: GroupToken): Promise<string>;

    /**
     * @returns the image, or null when the identifier does not resolve
     * @throws PermissionDenied when the record belongs to another group
     */
    getImage(identifier: string, group?: GroupToken): Promise<StoredImage | null>;

    deleteImage(identifier: string, group?: GroupToken): Promise<boolean>;

    listImages(group?: GroupToken): Promise<string[]>;

    exists(identifier: string, group?: GroupToken): Promise<boolean>;

    /**
     * Delete records older than `ageDays` (everything in scope for 0), plus orphans.
     * @returns number of records and orphan blobs removed
     */
    purge(ageDays?: number, group?: GroupToken): Promise<number>;

    resolveIdentifier(identifier: string, group?: GroupToken): string | null;

    registerAlias(alias: string, guid: string, group?: GroupToken): Promise<void>;

    unregisterAlias(alias: string, group?: GroupToken): Promise<boolean>;

    getAlias(guid: string): string | null;

    listAliases(group?: GroupToken): Record<string, string>;
}
