export * from './store';
export { createMemoryStore } from './memory-store';
