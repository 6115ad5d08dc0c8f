// @tessera/repositories
// Storage contract and backends for policies.
//
// The decision engine depends only on the Storage interface. Backends
// (memory, Postgres, or a cache in front of another storage) fulfil it.

export * from './interfaces/index.js';
export { MemoryStorage, createMemoryStorage } from './in-memory/index.js';
export { feedPolicies, DEFAULT_FEED_BATCH_SIZE } from './feed.js';
export { withChangeNotifications } from './notifications.js';
export { assertValidPage } from './pagination.js';
export * as postgres from './postgres/index.js';
