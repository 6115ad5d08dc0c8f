// In-memory Storage implementation
export { MemoryStorage, createMemoryStorage } from './memory-storage.js';
