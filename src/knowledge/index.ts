/**
 * Knowledge module exports.
 */

export { KnowledgeStore, createKnowledgeStore } from './knowledge-store.js';
export { loadKnowledgeDirectory, typeFromFileName } from './knowledge-loader.js';
export type { KnowledgeLoadReport } from './knowledge-loader.js';
export { FALLBACK_ENTRIES } from './fallback-entries.js';
export {
  knowledgeEntryFileSchema,
  memorySnapshotSchema,
  toKnowledgeEntry,
  toMemoryStats,
} from './schema.js';
export type { KnowledgeEntryFile, MemorySnapshot } from './schema.js';
