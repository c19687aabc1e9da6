import { z } from 'zod';
import type { ImageRecord } from '@chartvault/core';

/**
 * One entry of the metadata document as written to disk (snake_case keys).
 *
 * Parsing is lenient: missing or mistyped optional fields fall back to defaults.
 * `group` is the exception, since an unreadable owner must not turn a private
 * record into a public one.
 */
export const StoredRecordSchema = z.object({
    format: z.string().min(1),
    size: z.number().int().nonnegative().catch(0),
    created_at: z.string().nullable().catch(null),
    group: z.string().nullable().default(null),
    alias: z.string().nullable().catch(null),
});

export type StoredRecord = z.output<typeof StoredRecordSchema>;

/**
 * Document root: GUID -> record
 */
export const MetadataDocumentSchema = z.record(z.string(), z.unknown());

export function toImageRecord(guid: string, stored: StoredRecord): ImageRecord {
    return {
        guid,
        format: stored.format,
        size: stored.size,
        createdAt: stored.created_at,
        group: stored.group,
        alias: stored.alias,
    };
}

export function toStoredRecord(record: ImageRecord): StoredRecord {
    return {
        format: record.format,
        size: record.size,
        created_at: record.createdAt,
        group: record.group,
        alias: record.alias,
    };
}

export interface ParsedDocument {
    records: Map<string, ImageRecord>;
    /** GUIDs whose entries could not be read */
    skipped: string[];
}

/**
 * Reads every entry of an already-JSON-decoded document.
 * @returns null when the root is not a JSON object
 */
export function parseMetadataDocument(raw: unknown): ParsedDocument | null {
    const root = MetadataDocumentSchema.safeParse(raw);
    if (!root.success) {
        return null;
    }

    const records = new Map<string, ImageRecord>();
    const skipped: string[] = [];
    for (const [guid, entry] of Object.entries(root.data)) {
        const parsed = StoredRecordSchema.safeParse(entry);
        if (parsed.success) {
            records.set(guid, toImageRecord(guid, parsed.data));
        } else {
            skipped.push(guid);
        }
    }
    return { records, skipped };
}

export function serializeMetadataDocument(records: Iterable<ImageRecord>): string {
    const document: Record<string, StoredRecord> = {};
    for (const record of records) {
        document[record.guid] = toStoredRecord(record);
    }
    return JSON.stringify(document, null, 2);
}

const ISO_TIMESTAMP =
    /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2})(?::(\d{2}))?(?:\.(\d+))?(Z|([+-]\d{2}):?(\d{2}))?$/;

/**
 * Parses an ISO-8601 timestamp. A value without an offset is read as UTC, and
 * fractional seconds beyond milliseconds are truncated.
 * @returns epoch milliseconds, or null when the value is not a timestamp
 */
export function parseTimestamp(value: string | null): number | null {
    if (value === null) {
        return null;
    }
    const match = ISO_TIMESTAMP.exec(value.trim());
    if (!match) {
        return null;
    }
    const [, date, hoursMinutes, seconds, fraction, zone, offsetHours, offsetMinutes] = match;
    const millis = (fraction ?? '').slice(0, 3).padEnd(3, '0');
    const offset = zone === undefined || zone === 'Z' ? 'Z' : `${offsetHours}:${offsetMinutes}`;
    const parsed = Date.parse(`${date}T${hoursMinutes}:${seconds ?? '00'}.${millis}${offset}`);
    return Number.isFinite(parsed) ? parsed : null;
}
