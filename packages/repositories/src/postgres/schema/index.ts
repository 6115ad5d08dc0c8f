// Re-export all schema tables
export * from './policies.js';
