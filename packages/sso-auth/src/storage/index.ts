export { createMemoryTokenStore, copyToken } from './memory-token-store.js';
export { createJsonFileTokenStore } from './json-file-token-store.js';
export type { TokenStore } from './types.js';
