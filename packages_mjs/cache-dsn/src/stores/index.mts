export { MemoryStore, createMemoryStore } from './memory.mjs';
