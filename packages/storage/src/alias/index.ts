export { AliasIndex } from './alias-index.js';
export type { AliasIndexOptions } from './alias-index.js';
