export { AsyncMutex } from './mutex.js';
export { errnoOf, isNotFoundError } from './fs-errors.js';
export { getDataDir, getStorageDir } from './path.js';
