export { EnfoldCache, type EnfoldCacheOptions } from './enfold-cache.js';
export { GuardCache, DEFAULT_GUARD_CACHE_SIZE, type GuardCacheOptions } from './guard-cache.js';
