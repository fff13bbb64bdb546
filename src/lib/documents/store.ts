/**
 * Document storage contract.
 *
 * Holds document records and the chunk records of each document's current
 * revision. Vectors live in the VectorIndex, never here.
 */

import type { Chunk, DocumentRecord } from '@/types/rag';

export interface DocumentStore {
  /** Insert or replace a document record. */
  save(document: DocumentRecord): Promise<void>;
  get(documentId: string): Promise<DocumentRecord | null>;
  /** All documents, oldest first. */
  list(): Promise<DocumentRecord[]>;
  /** Remove a document and its chunks. Returns false if it did not exist. */
  delete(documentId: string): Promise<boolean>;

  /** Replace every chunk of a document. */
  saveChunks(documentId: string, chunks: Chunk[]): Promise<void>;
  getChunk(chunkId: string): Promise<Chunk | null>;
  /** Chunks of a document in sequence order. */
  getChunks(documentId: string): Promise<Chunk[]>;
  deleteChunks(documentId: string): Promise<number>;
}

export function compareDocuments(a: DocumentRecord, b: DocumentRecord): number {
  const byTime = a.createdAt.getTime() - b.createdAt.getTime();
  if (byTime !== 0) return byTime;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
