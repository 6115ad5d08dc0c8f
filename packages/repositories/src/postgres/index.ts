// Postgres Storage (drizzle-orm over postgres.js)
export { createDatabase, type Database, type DatabaseConfig } from './db.js';
export { PgStorage, isUniqueViolation, filterConditions } from './storage.js';
export { createInquiryFilter, type InquiryFilter } from './filters.js';
export { policyToRow, rowToPolicy } from './mapping.js';
export * as schema from './schema/index.js';
