export { localStorageFactory } from './local.js';
export { splitStorageFactory } from './split.js';
export { inMemoryStorageFactory } from './memory.js';
