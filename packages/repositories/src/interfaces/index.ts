// Re-export all storage interfaces
export * from './storage.js';
