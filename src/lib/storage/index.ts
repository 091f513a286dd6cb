export * from './types';
export { MemoryStore } from './memory-store';
export { FileStore } from './file-store';
