export { IMAGE_FORMATS } from './types.js';
export type {
    BlobRepository,
    BlobTimestampLookup,
    GroupToken,
    ImageFormat,
    ImageRecord,
    MetadataRepository,
    StorageService,
    StoredImage,
} from './types.js';
export { StorageError, isStorageIOError, isPermissionDenied } from './errors.js';
export { StorageErrorCode } from './error-codes.js';
export { ALIAS_PATTERN, isGuid, isValidAlias, isImageFormat, normalizeGroup } from './identifiers.js';
