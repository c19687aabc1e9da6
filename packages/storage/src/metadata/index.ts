export { BaseMetadataRepository } from './base-metadata-repository.js';
export { JsonMetadataRepository } from './json-metadata-repository.js';
export type { JsonMetadataRepositoryOptions } from './json-metadata-repository.js';
export { MemoryMetadataRepository } from './memory-metadata-repository.js';
export {
    StoredRecordSchema,
    parseMetadataDocument,
    parseTimestamp,
    serializeMetadataDocument,
} from './record.js';
export type { ParsedDocument, StoredRecord } from './record.js';
