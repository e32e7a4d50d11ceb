export { deriveCacheKey, isCacheKey } from './cache-key.ts';
export { FileClassificationStore, MemoryClassificationStore } from './store.ts';
export type { ClassificationStore, CacheStats } from './store.ts';
