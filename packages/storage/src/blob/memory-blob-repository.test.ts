import { beforeEach, describe, expect, it } from 'vitest';
import { StorageErrorCode } from '@chartvault/core';
import { createSilentMockLogger } from '@chartvault/core/test-utils';
import { MemoryBlobRepository } from './memory-blob-repository.js';

const GUID = '0d9c8b7a-6f5e-4d3c-8b2a-19f8e7d6c5b4';

describe('MemoryBlobRepository', () => {
    let repo: MemoryBlobRepository;

    beforeEach(async () => {
        repo = new MemoryBlobRepository(createSilentMockLogger());
        await repo.connect();
    });

    it('round-trips bytes and keeps its own copy', async () => {
        const bytes = Buffer.from('chart');
        await repo.save(GUID, bytes, 'PNG');
        bytes.write('XXXXX');

        expect(await repo.get(GUID, 'png')).toEqual(Buffer.from('chart'));
        expect(await repo.getFormat(GUID)).toBe('png');
        expect(await repo.listAll()).toEqual(new Set([GUID]));
    });

    it('deletes every format when none is given', async () => {
        await repo.save(GUID, Buffer.from('a'), 'png');
        await repo.save(GUID, Buffer.from('b'), 'pdf');

        expect(await repo.delete(GUID)).toBe(true);
        expect(await repo.exists(GUID)).toBe(false);
        expect(await repo.delete(GUID)).toBe(false);
    });

    it('tracks modification time', async () => {
        await repo.save(GUID, Buffer.from('a'), 'svg');
        const old = new Date('2021-06-01T00:00:00.000Z');
        repo.setModifiedTime(GUID, 'svg', old);

        expect(await repo.getModifiedTime(GUID)).toEqual(old);
    });

    it('validates GUID and format on save', async () => {
        await expect(repo.save('not-a-guid', Buffer.from('a'), 'png')).rejects.toMatchObject({
            issues: [expect.objectContaining({ code: StorageErrorCode.GUID_INVALID })],
        });
        await expect(repo.save(GUID, Buffer.from('a'), 'bmp')).rejects.toMatchObject({
            issues: [expect.objectContaining({ code: StorageErrorCode.FORMAT_UNSUPPORTED })],
        });
    });

    it('drops contents on disconnect', async () => {
        await repo.save(GUID, Buffer.from('a'), 'png');
        await repo.disconnect();
        await repo.connect();

        expect(await repo.listAll()).toEqual(new Set());
    });
});
