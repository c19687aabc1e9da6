import { describe, expect, it } from 'vitest';
import path from 'path';
import { getDataDir, getStorageDir } from './path.js';

describe('path utilities', () => {
    const cwd = path.resolve('/opt/chartvault');

    it('defaults to <cwd>/data and <cwd>/data/storage', () => {
        expect(getDataDir({}, cwd)).toBe(path.join(cwd, 'data'));
        expect(getStorageDir({}, cwd)).toBe(path.join(cwd, 'data', 'storage'));
    });

    it('resolves relative overrides against cwd', () => {
        expect(getDataDir({ CHARTVAULT_DATA_DIR: 'state' }, cwd)).toBe(path.join(cwd, 'state'));
        expect(getStorageDir({ CHARTVAULT_STORAGE_DIR: './images' }, cwd)).toBe(path.join(cwd, 'images'));
    });

    it('prefers the storage override over the data directory', () => {
        const env = { CHARTVAULT_DATA_DIR: '/var/data', CHARTVAULT_STORAGE_DIR: '/mnt/images' };

        expect(getStorageDir(env, cwd)).toBe(path.resolve('/mnt/images'));
    });

    it('ignores blank overrides', () => {
        expect(getStorageDir({ CHARTVAULT_STORAGE_DIR: '   ', CHARTVAULT_DATA_DIR: '' }, cwd)).toBe(
            path.join(cwd, 'data', 'storage')
        );
    });
});
