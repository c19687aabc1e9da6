export { FileBlobRepository, parseBlobFileName } from './file-blob-repository.js';
export { MemoryBlobRepository } from './memory-blob-repository.js';
