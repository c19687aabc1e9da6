import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { tmpdir } from 'os';
import { StorageErrorCode } from '@chartvault/core';
import type { ImageRecord } from '@chartvault/core';
import { createMockLogger, createSilentMockLogger } from '@chartvault/core/test-utils';
import { JsonMetadataRepository } from './json-metadata-repository.js';

const GUID_A = '11111111-2222-4333-8444-555555555555';
const GUID_B = '66666666-7777-4888-9999-aaaaaaaaaaaa';
const GUID_C = 'bbbbbbbb-cccc-4ddd-8eee-ffffffffffff';

function record(guid: string, overrides: Partial<ImageRecord> = {}): ImageRecord {
    return {
        guid,
        format: 'png',
        size: 10,
        createdAt: new Date().toISOString(),
        group: null,
        alias: null,
        ...overrides,
    };
}

describe('JsonMetadataRepository', () => {
    let dir: string;
    let filePath: string;
    let repo: JsonMetadataRepository;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(tmpdir(), 'chartvault-metadata-test-'));
        filePath = path.join(dir, 'metadata.json');
        repo = new JsonMetadataRepository({ filePath }, createSilentMockLogger());
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await fs.rm(dir, { recursive: true, force: true });
    });

    describe('persistence', () => {
        it('starts empty when the document does not exist', async () => {
            await repo.connect();

            expect(await repo.listAll()).toEqual([]);
        });

        it('writes the document in its on-disk shape', async () => {
            await repo.connect();
            await repo.save(
                record(GUID_A, { createdAt: '2024-03-01T12:00:00.000Z', group: 'sales', size: 99 })
            );

            const onDisk = JSON.parse(await fs.readFile(filePath, 'utf-8'));
            expect(onDisk).toEqual({
                [GUID_A]: {
                    format: 'png',
                    size: 99,
                    created_at: '2024-03-01T12:00:00.000Z',
                    group: 'sales',
                    alias: null,
                },
            });
        });

        it('reloads saved records in a new instance', async () => {
            await repo.connect();
            const saved = record(GUID_A, { alias: 'weekly', group: 'ops' });
            await repo.save(saved);
            await repo.disconnect();

            const reopened = new JsonMetadataRepository({ filePath }, createSilentMockLogger());
            await reopened.connect();

            expect(await reopened.get(GUID_A)).toEqual(saved);
        });

        it('leaves no temp files behind', async () => {
            await repo.connect();
            await repo.save(record(GUID_A));
            await repo.save(record(GUID_B));

            expect(await fs.readdir(dir)).toEqual(['metadata.json']);
        });

        it('keeps the previous state when the write fails', async () => {
            await repo.connect();
            await repo.save(record(GUID_A));
            const before = await fs.readFile(filePath, 'utf-8');
            vi.spyOn(fs, 'rename').mockRejectedValueOnce(
                Object.assign(new Error('no space left on device'), { code: 'ENOSPC' })
            );

            await expect(repo.save(record(GUID_B))).rejects.toMatchObject({
                code: StorageErrorCode.WRITE_FAILED,
                context: expect.objectContaining({ errno: 'ENOSPC' }),
            });
            expect(await repo.exists(GUID_B)).toBe(false);
            expect(await fs.readFile(filePath, 'utf-8')).toBe(before);
            expect(await fs.readdir(dir)).toEqual(['metadata.json']);
        });

        it('overwrites in place when atomic writes are disabled', async () => {
            const direct = new JsonMetadataRepository(
                { filePath, atomicWrites: false },
                createSilentMockLogger()
            );
            await direct.connect();
            const rename = vi.spyOn(fs, 'rename');

            await direct.save(record(GUID_A));

            expect(rename).not.toHaveBeenCalled();
            expect(Object.keys(JSON.parse(await fs.readFile(filePath, 'utf-8')))).toEqual([GUID_A]);
        });

        it('loses no updates under concurrent saves', async () => {
            await repo.connect();
            const guids = Array.from({ length: 50 }, (_, i) => `00000000-0000-4000-8000-${String(i).padStart(12, '0')}`);

            await Promise.all(guids.map((guid) => repo.save(record(guid))));

            const reopened = new JsonMetadataRepository({ filePath }, createSilentMockLogger());
            await reopened.connect();
            expect((await reopened.listAll()).sort()).toEqual([...guids].sort());
        });

        it('propagates read failures other than a missing file', async () => {
            await fs.writeFile(filePath, '{}');
            vi.spyOn(fs, 'readFile').mockRejectedValueOnce(
                Object.assign(new Error('permission denied'), { code: 'EACCES' })
            );

            await expect(repo.connect()).rejects.toMatchObject({
                code: StorageErrorCode.READ_FAILED,
                context: expect.objectContaining({ errno: 'EACCES' }),
            });
        });
    });

    describe('corruption recovery', () => {
        it('backs up unparsable JSON and starts empty', async () => {
            await fs.writeFile(filePath, '{not-json');
            const logger = createMockLogger();
            const recovering = new JsonMetadataRepository({ filePath }, logger);

            await recovering.connect();

            expect(await recovering.listAll()).toEqual([]);
            const entries = await fs.readdir(dir);
            const backups = entries.filter((entry) => entry.startsWith('metadata.json.corrupt.'));
            expect(backups).toHaveLength(1);
            expect(entries).not.toContain('metadata.json');
            expect(await fs.readFile(path.join(dir, backups[0] ?? ''), 'utf-8')).toBe('{not-json');
            expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining('is corrupt (invalid JSON'));
        });

        it('treats a non-object root as corrupt', async () => {
            await fs.writeFile(filePath, JSON.stringify([{ format: 'png' }]));
            const logger = createMockLogger();
            const recovering = new JsonMetadataRepository({ filePath }, logger);

            await recovering.connect();

            expect(await recovering.listAll()).toEqual([]);
            expect(logger.warn).toHaveBeenCalledWith(
                expect.stringContaining('document root is not an object')
            );
        });

        it('accepts new writes after a reset', async () => {
            await fs.writeFile(filePath, 'garbage');
            await repo.connect();
            await repo.save(record(GUID_A));

            expect(Object.keys(JSON.parse(await fs.readFile(filePath, 'utf-8')))).toEqual([GUID_A]);
        });

        it('treats an empty file as an empty document without a backup', async () => {
            await fs.writeFile(filePath, '  \n');
            await repo.connect();

            expect(await repo.listAll()).toEqual([]);
            expect(await fs.readdir(dir)).toEqual(['metadata.json']);
        });

        it('loads legacy entries and drops unreadable ones with a warning', async () => {
            await fs.writeFile(
                filePath,
                JSON.stringify({
                    [GUID_A]: { format: 'png', size: 5 },
                    [GUID_B]: { size: 5 },
                })
            );
            const logger = createMockLogger();
            const lenient = new JsonMetadataRepository({ filePath }, logger);

            await lenient.connect();

            expect(await lenient.get(GUID_A)).toEqual({
                guid: GUID_A,
                format: 'png',
                size: 5,
                createdAt: null,
                group: null,
                alias: null,
            });
            expect(await lenient.exists(GUID_B)).toBe(false);
            expect(logger.warn).toHaveBeenCalledWith(
                expect.stringContaining('Ignoring 1 unreadable metadata entries'),
                { guids: [GUID_B] }
            );
        });
    });

    describe('queries', () => {
        beforeEach(async () => {
            await repo.connect();
            await repo.save(record(GUID_A, { group: 'sales' }));
            await repo.save(record(GUID_B, { group: 'marketing' }));
            await repo.save(record(GUID_C));
        });

        it('lists all records or one group', async () => {
            expect(await repo.listAll()).toEqual([GUID_A, GUID_B, GUID_C]);
            expect(await repo.listAll('sales')).toEqual([GUID_A]);
            expect(await repo.listAll(null)).toEqual([GUID_C]);
            expect(await repo.listAll('finance')).toEqual([]);
        });

        it('deletes and reports whether anything was removed', async () => {
            expect(await repo.delete(GUID_A)).toBe(true);
            expect(await repo.delete(GUID_A)).toBe(false);
            expect(await repo.get(GUID_A)).toBeNull();
        });

        it('returns copies that do not alias the cache', async () => {
            const fetched = await repo.get(GUID_A);
            if (fetched) {
                fetched.group = 'tampered';
            }

            expect((await repo.get(GUID_A))?.group).toBe('sales');
        });

        it('updates a record under the lock', async () => {
            const updated = await repo.update(GUID_A, (current) => ({ ...current, alias: 'q1' }));

            expect(updated?.alias).toBe('q1');
            expect((await repo.get(GUID_A))?.alias).toBe('q1');
        });

        it('leaves a record untouched when the mutation declines', async () => {
            const result = await repo.update(GUID_A, () => null);

            expect(result?.alias).toBeNull();
        });

        it('returns null when updating a missing record', async () => {
            expect(await repo.update('99999999-9999-4999-8999-999999999999', (c) => c)).toBeNull();
        });
    });

    describe('filterByAge', () => {
        const old = '2020-01-01T00:00:00';

        it('returns every in-scope record for age 0', async () => {
            await repo.connect();
            await repo.save(record(GUID_A, { group: 'sales' }));
            await repo.save(record(GUID_B));

            expect((await repo.filterByAge(0)).map((r) => r.guid)).toEqual([GUID_A, GUID_B]);
            expect((await repo.filterByAge(0, 'sales')).map((r) => r.guid)).toEqual([GUID_A]);
        });

        it('returns only records older than the cutoff', async () => {
            await repo.connect();
            await repo.save(record(GUID_A, { createdAt: old }));
            await repo.save(record(GUID_B));

            expect((await repo.filterByAge(30)).map((r) => r.guid)).toEqual([GUID_A]);
        });

        it('falls back to the blob timestamp when createdAt is unusable', async () => {
            const lookup = vi.fn(async (guid: string) =>
                guid === GUID_A ? new Date('2019-05-05T00:00:00Z') : null
            );
            const withLookup = new JsonMetadataRepository(
                { filePath, blobTimestamps: lookup },
                createSilentMockLogger()
            );
            await withLookup.connect();
            await withLookup.save(record(GUID_A, { createdAt: null, format: 'svg' }));
            await withLookup.save(record(GUID_B, { createdAt: 'not a date' }));

            expect((await withLookup.filterByAge(1)).map((r) => r.guid)).toEqual([GUID_A]);
            expect(lookup).toHaveBeenCalledWith(GUID_A, 'svg');
        });

        it('rejects negative ages', async () => {
            await repo.connect();

            await expect(repo.filterByAge(-1)).rejects.toMatchObject({
                issues: [expect.objectContaining({ code: StorageErrorCode.PURGE_INVALID_AGE })],
            });
        });
    });
});
