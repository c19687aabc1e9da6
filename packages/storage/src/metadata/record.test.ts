import { describe, expect, it } from 'vitest';
import { parseMetadataDocument, parseTimestamp, serializeMetadataDocument } from './record.js';

describe('parseTimestamp', () => {
    it('reads UTC timestamps with and without an explicit offset', () => {
        const expected = Date.UTC(2024, 0, 15, 10, 30, 0);
        expect(parseTimestamp('2024-01-15T10:30:00Z')).toBe(expected);
        expect(parseTimestamp('2024-01-15T10:30:00')).toBe(expected);
        expect(parseTimestamp('2024-01-15T10:30:00+00:00')).toBe(expected);
    });

    it('truncates sub-millisecond precision', () => {
        expect(parseTimestamp('2024-01-15T10:30:00.123456')).toBe(Date.UTC(2024, 0, 15, 10, 30, 0, 123));
    });

    it('applies offsets', () => {
        expect(parseTimestamp('2024-01-15T12:30:00+02:00')).toBe(Date.UTC(2024, 0, 15, 10, 30, 0));
        expect(parseTimestamp('2024-01-15T12:30:00+0200')).toBe(Date.UTC(2024, 0, 15, 10, 30, 0));
    });

    it('returns null for missing or unparsable values', () => {
        expect(parseTimestamp(null)).toBeNull();
        expect(parseTimestamp('')).toBeNull();
        expect(parseTimestamp('yesterday')).toBeNull();
        expect(parseTimestamp('2024-13-45T99:99:99')).toBeNull();
    });
});

describe('parseMetadataDocument', () => {
    const guid = '6e5d4c3b-2a19-4f8e-b7d6-c5b4a3928170';

    it('maps snake_case entries to records with defaults for missing fields', () => {
        const parsed = parseMetadataDocument({
            [guid]: { format: 'png', size: 42, created_at: '2024-01-15T10:30:00' },
        });

        expect(parsed?.records.get(guid)).toEqual({
            guid,
            format: 'png',
            size: 42,
            createdAt: '2024-01-15T10:30:00',
            group: null,
            alias: null,
        });
        expect(parsed?.skipped).toEqual([]);
    });

    it('tolerates mistyped optional fields', () => {
        const parsed = parseMetadataDocument({
            [guid]: { format: 'svg', size: 'big', created_at: 17, alias: 5, group: 'sales' },
        });

        expect(parsed?.records.get(guid)).toEqual({
            guid,
            format: 'svg',
            size: 0,
            createdAt: null,
            group: 'sales',
            alias: null,
        });
    });

    it('skips entries without a format or with an unreadable group', () => {
        const parsed = parseMetadataDocument({
            a: { size: 1 },
            b: 'not an object',
            c: { format: 'png', group: 7 },
        });

        expect(parsed?.records.size).toBe(0);
        expect(parsed?.skipped).toEqual(['a', 'b', 'c']);
    });

    it('returns null when the root is not an object', () => {
        expect(parseMetadataDocument([])).toBeNull();
        expect(parseMetadataDocument('text')).toBeNull();
        expect(parseMetadataDocument(null)).toBeNull();
    });
});

describe('serializeMetadataDocument', () => {
    it('writes the on-disk shape keyed by GUID', () => {
        const json = serializeMetadataDocument([
            {
                guid: 'g1',
                format: 'pdf',
                size: 3,
                createdAt: '2024-02-01T00:00:00.000Z',
                group: null,
                alias: 'report',
            },
        ]);

        expect(JSON.parse(json)).toEqual({
            g1: {
                format: 'pdf',
                size: 3,
                created_at: '2024-02-01T00:00:00.000Z',
                group: null,
                alias: 'report',
            },
        });
    });
});
