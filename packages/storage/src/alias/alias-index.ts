import {
    AsyncMutex,
    ChartVaultLogComponent,
    StorageError,
    isGuid,
    isValidAlias,
    normalizeGroup,
} from '@chartvault/core';
import type { GroupToken, ImageRecord, Logger, MetadataRepository } from '@chartvault/core';

export interface AliasIndexOptions {
    /**
     * Allow aliases for GUIDs that have no metadata record. Such aliases live in
     * the in-memory index only and are gone after a restart.
     */
    allowOrphanAliases?: boolean | undefined;
    /**
     * Lock shared with the owning service so alias changes, deletes and purges
     * of the same records never interleave
     */
    lock?: AsyncMutex | undefined;
}

type Scope = string | null;

/**
 * Human-readable names for GUIDs, unique per group scope.
 *
 * The metadata records are the source of truth; this index is rebuilt from them
 * on connect and kept in step with every alias write. Lookups are synchronous.
 */
export class AliasIndex {
    private readonly byScope = new Map<Scope, Map<string, string>>();
    private readonly byGuid = new Map<string, { alias: string; scope: Scope }>();
    private readonly logger: Logger;
    private readonly allowOrphanAliases: boolean;
    readonly lock: AsyncMutex;

    constructor(
        private readonly metadata: MetadataRepository,
        logger: Logger,
        options: AliasIndexOptions = {}
    ) {
        this.logger = logger.createChild(ChartVaultLogComponent.ALIAS);
        this.allowOrphanAliases = options.allowOrphanAliases ?? false;
        this.lock = options.lock ?? new AsyncMutex();
    }

    /**
     * Reload the index from every metadata record carrying an alias.
     * Duplicate or malformed aliases in stored data are skipped with a warning.
     */
    async rebuild(): Promise<void> {
        const records: ImageRecord[] = [];
        for (const guid of await this.metadata.listAll()) {
            const record = await this.metadata.get(guid);
            if (record) {
                records.push(record);
            }
        }

        this.byScope.clear();
        this.byGuid.clear();
        for (const record of records) {
            if (record.alias === null) {
                continue;
            }
            if (!isValidAlias(record.alias)) {
                this.logger.warn(`Ignoring malformed stored alias '${record.alias}' for ${record.guid}`);
                continue;
            }
            const owner = this.lookup(record.alias, record.group);
            if (owner !== null) {
                this.logger.warn(
                    `Duplicate alias '${record.alias}' in group '${record.group ?? 'public'}': keeping ${owner}, ignoring ${record.guid}`
                );
                continue;
            }
            this.link(record.alias, record.guid, record.group);
        }
        this.logger.debug(`Alias index rebuilt with ${this.byGuid.size} aliases`);
    }

    /**
     * Map a GUID or alias to a GUID.
     * A well-formed GUID is returned as-is. An alias is looked up in the caller's
     * scope first, then in the public scope.
     */
    resolveIdentifier(identifier: string, group?: GroupToken): string | null {
        if (isGuid(identifier)) {
            return identifier;
        }
        const scope = normalizeGroup(group);
        const own = this.lookup(identifier, scope);
        if (own !== null || scope === null) {
            return own;
        }
        return this.lookup(identifier, null);
    }

    /**
     * Group of the scope holding an alias the caller cannot resolve, if any
     */
    findForeignScope(alias: string, group?: GroupToken): string | null {
        if (this.resolveIdentifier(alias, group) !== null) {
            return null;
        }
        for (const [scope, aliases] of this.byScope) {
            if (scope !== null && aliases.has(alias)) {
                return scope;
            }
        }
        return null;
    }

    /**
     * Name a GUID. The alias is scoped by the record's stored group, not by the
     * caller: naming a public record puts the alias in the public scope, where
     * every group resolves it and `listAliases(null)` lists it. The alias text is
     * then taken for all public records.
     * Re-registering the same pair is a no-op; a GUID carries at most one alias,
     * so a new one replaces the old.
     */
    async registerAlias(alias: string, guid: string, group?: GroupToken): Promise<void> {
        if (!isValidAlias(alias)) {
            throw StorageError.invalidAlias(alias);
        }
        if (!isGuid(guid)) {
            throw StorageError.invalidGuid(guid);
        }
        const requested = normalizeGroup(group);

        await this.lock.runExclusive(async () => {
            const record = await this.metadata.get(guid);
            let scope: Scope;
            if (record) {
                if (record.group !== null && record.group !== requested) {
                    throw StorageError.permissionDenied(guid, record.group, requested);
                }
                scope = record.group;
            } else if (this.allowOrphanAliases) {
                scope = requested;
            } else {
                throw StorageError.aliasTargetNotFound(alias, guid);
            }

            const owner = this.lookup(alias, scope);
            if (owner === guid) {
                return;
            }
            if (owner !== null) {
                throw StorageError.aliasAlreadyExists(alias, scope, owner);
            }

            if (record) {
                const updated = await this.metadata.update(guid, (current) => ({
                    ...current,
                    alias,
                }));
                if (!updated) {
                    throw StorageError.aliasTargetNotFound(alias, guid);
                }
            } else {
                this.logger.warn(
                    `Registering alias '${alias}' for ${guid} without a metadata record; it will not survive a restart`
                );
            }

            this.forget(guid);
            this.link(alias, guid, scope);
            this.logger.info(`Registered alias '${alias}' -> ${guid}`, { group: scope });
        });
    }

    /**
     * Remove an alias the caller can resolve: its own scope first, then the
     * public scope, so a group can undo an alias it put on a public record.
     * @returns false when neither scope holds the alias
     */
    async unregisterAlias(alias: string, group?: GroupToken): Promise<boolean> {
        const requested = normalizeGroup(group);

        return this.lock.runExclusive(async () => {
            let scope: Scope = requested;
            let guid = this.lookup(alias, scope);
            if (guid === null && scope !== null) {
                scope = null;
                guid = this.lookup(alias, scope);
            }
            if (guid === null) {
                return false;
            }
            await this.metadata.update(guid, (current) =>
                current.alias === alias ? { ...current, alias: null } : null
            );
            this.forget(guid);
            this.logger.info(`Unregistered alias '${alias}' (was ${guid})`, { group: scope });
            return true;
        });
    }

    getAlias(guid: string): string | null {
        return this.byGuid.get(guid)?.alias ?? null;
    }

    /**
     * Aliases of one scope as `alias -> guid`. Aliases of public records are in
     * the `null` scope whichever group registered them.
     */
    listAliases(group?: GroupToken): Record<string, string> {
        const aliases = this.byScope.get(normalizeGroup(group));
        return aliases ? Object.fromEntries(aliases) : {};
    }

    /**
     * Drop whatever alias a GUID has from the index only. Callers hold {@link lock}
     * and have already removed or rewritten the record.
     */
    forget(guid: string): void {
        const entry = this.byGuid.get(guid);
        if (!entry) {
            return;
        }
        this.byGuid.delete(guid);
        const aliases = this.byScope.get(entry.scope);
        aliases?.delete(entry.alias);
        if (aliases && aliases.size === 0) {
            this.byScope.delete(entry.scope);
        }
    }

    clear(): void {
        this.byScope.clear();
        this.byGuid.clear();
    }

    private lookup(alias: string, scope: Scope): string | null {
        return this.byScope.get(scope)?.get(alias) ?? null;
    }

    private link(alias: string, guid: string, scope: Scope): void {
        let aliases = this.byScope.get(scope);
        if (!aliases) {
            aliases = new Map();
            this.byScope.set(scope, aliases);
        }
        aliases.set(alias, guid);
        this.byGuid.set(guid, { alias, scope });
    }
}
