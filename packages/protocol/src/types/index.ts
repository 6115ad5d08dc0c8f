// Re-export all protocol types

export * from './common.js';
export * from './rules.js';
export * from './inquiry.js';
export * from './policies.js';
export * from './checkers.js';
