import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { StorageErrorCode } from '@chartvault/core';
import { createMockLogger, createSilentMockLogger } from '@chartvault/core/test-utils';
import { MemoryBlobRepository } from '../blob/index.js';
import { MemoryMetadataRepository } from '../metadata/index.js';
import { SplitStorageService } from './split-storage-service.js';

const CHART = Buffer.from('split-chart');

describe('SplitStorageService', () => {
    let blobs: MemoryBlobRepository;
    let metadata: MemoryMetadataRepository;
    let storage: SplitStorageService;

    beforeEach(async () => {
        const logger = createSilentMockLogger();
        blobs = new MemoryBlobRepository(logger);
        metadata = new MemoryMetadataRepository(logger, (guid, format) => blobs.getModifiedTime(guid, format));
        storage = new SplitStorageService(blobs, metadata, logger);
        await storage.connect();
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await storage.disconnect();
    });

    it('reports the configured store type', () => {
        const custom = new SplitStorageService(blobs, metadata, createSilentMockLogger(), {
            storeType: 'in-memory',
        });

        expect(storage.getStoreType()).toBe('split');
        expect(custom.getStoreType()).toBe('in-memory');
    });

    describe('saveImage failures', () => {
        it('deletes the orphaned blob and rethrows the original error', async () => {
            const original = new Error('metadata unavailable');
            vi.spyOn(metadata, 'save').mockRejectedValueOnce(original);

            await expect(storage.saveImage(CHART, 'png')).rejects.toBe(original);
            expect(await blobs.listAll()).toEqual(new Set());
        });

        it('does not mask the original error when cleanup also fails', async () => {
            const original = new Error('metadata unavailable');
            const logger = createMockLogger();
            const failing = new SplitStorageService(blobs, metadata, logger);
            await failing.connect();
            vi.spyOn(metadata, 'save').mockRejectedValueOnce(original);
            vi.spyOn(blobs, 'delete').mockRejectedValueOnce(new Error('blob store offline'));

            await expect(failing.saveImage(CHART, 'png')).rejects.toBe(original);
            expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining('blob store offline'));
        });

        it('propagates blob write failures without writing metadata', async () => {
            const original = new Error('disk full');
            vi.spyOn(blobs, 'save').mockRejectedValueOnce(original);

            await expect(storage.saveImage(CHART, 'png')).rejects.toBe(original);
            expect(await metadata.listAll()).toEqual([]);
        });
    });

    describe('purge', () => {
        it('does not sweep the blob of a save still in flight', async () => {
            let release: () => void = () => {};
            const gate = new Promise<void>((resolve) => {
                release = resolve;
            });
            const save = metadata.save.bind(metadata);
            vi.spyOn(metadata, 'save').mockImplementationOnce(async (record) => {
                await gate;
                await save(record);
            });

            const pending = storage.saveImage(CHART, 'png');
            await vi.waitFor(async () => {
                expect((await blobs.listAll()).size).toBe(1);
            });

            expect(await storage.purge(0)).toBe(0);
            release();
            const guid = await pending;

            expect(await storage.getImage(guid)).toEqual({ data: CHART, format: 'png' });
        });

        it('keeps the blob of a save that completes while orphans are swept', async () => {
            const orphan = 'abcdefab-1234-4321-8abc-abcdefabcdef';
            await blobs.save(orphan, CHART, 'svg');

            let release: () => void = () => {};
            const gate = new Promise<void>((resolve) => {
                release = resolve;
            });
            const save = metadata.save.bind(metadata);
            vi.spyOn(metadata, 'save').mockImplementationOnce(async (record) => {
                await gate;
                await save(record);
            });

            const saving = storage.saveImage(CHART, 'png');
            await vi.waitFor(async () => {
                expect((await blobs.listAll()).size).toBe(2);
            });

            const remove = blobs.delete.bind(blobs);
            vi.spyOn(blobs, 'delete').mockImplementationOnce(async (guid, format) => {
                release();
                await saving;
                return remove(guid, format);
            });

            expect(await storage.purge(0)).toBe(1);
            const guid = await saving;

            expect(await storage.getImage(guid)).toEqual({ data: CHART, format: 'png' });
            expect(await blobs.listAll()).toEqual(new Set([guid]));
        });

        it('counts orphan records and orphan blobs', async () => {
            const guid = await storage.saveImage(CHART, 'png');
            await blobs.delete(guid);
            await blobs.save('abcdefab-1234-4321-8abc-abcdefabcdef', CHART, 'svg');

            expect(await storage.purge(0)).toBe(2);
            expect(await blobs.listAll()).toEqual(new Set());
            expect(await metadata.listAll()).toEqual([]);
        });

        it('ages orphan blobs by modification time', async () => {
            const stale = 'abcdefab-1234-4321-8abc-000000000001';
            const fresh = 'abcdefab-1234-4321-8abc-000000000002';
            await blobs.save(stale, CHART, 'png');
            await blobs.save(fresh, CHART, 'png');
            blobs.setModifiedTime(stale, 'png', new Date('2020-06-01T00:00:00.000Z'));

            expect(await storage.purge(7)).toBe(1);
            expect(await blobs.listAll()).toEqual(new Set([fresh]));
        });

        it('wraps internal failures instead of returning a partial count', async () => {
            await storage.saveImage(CHART, 'png');
            await storage.saveImage(CHART, 'png');
            vi.spyOn(blobs, 'delete').mockRejectedValueOnce(new Error('device busy'));

            await expect(storage.purge(0)).rejects.toMatchObject({
                code: StorageErrorCode.PURGE_FAILED,
                message: 'Failed to purge images: device busy',
            });
        });
    });

    it('reconnects over the same repositories and rebuilds aliases', async () => {
        const guid = await storage.saveImage(CHART, 'png', 'ops');
        await storage.registerAlias('uptime', guid, 'ops');

        const second = new SplitStorageService(blobs, metadata, createSilentMockLogger());
        await second.connect();

        expect(second.resolveIdentifier('uptime', 'ops')).toBe(guid);
        expect(second.getAlias(guid)).toBe('uptime');
    });
});
