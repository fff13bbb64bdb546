export type { DocumentStore } from './store';
export { MemoryDocumentStore } from './memory-store';
export { PgDocumentStore } from './pg-store';
