/**
 * In-process document store.
 */

import type { Chunk, DocumentRecord } from '@/types/rag';
import { compareDocuments, type DocumentStore } from './store';

function copyDocument(document: DocumentRecord): DocumentRecord {
  return {
    ...document,
    chunkIds: [...document.chunkIds],
    failure: document.failure ? { ...document.failure } : null,
    createdAt: new Date(document.createdAt),
    updatedAt: new Date(document.updatedAt),
  };
}

export class MemoryDocumentStore implements DocumentStore {
  private documents = new Map<string, DocumentRecord>();
  private chunks = new Map<string, Chunk>();
  private chunksByDocument = new Map<string, string[]>();

  async save(document: DocumentRecord): Promise<void> {
    this.documents.set(document.id, copyDocument(document));
  }

  async get(documentId: string): Promise<DocumentRecord | null> {
    const document = this.documents.get(documentId);
    return document ? copyDocument(document) : null;
  }

  async list(): Promise<DocumentRecord[]> {
    return Array.from(this.documents.values()).map(copyDocument).sort(compareDocuments);
  }

  async delete(documentId: string): Promise<boolean> {
    await this.deleteChunks(documentId);
    return this.documents.delete(documentId);
  }

  async saveChunks(documentId: string, chunks: Chunk[]): Promise<void> {
    await this.deleteChunks(documentId);
    for (const chunk of chunks) {
      this.chunks.set(chunk.id, { ...chunk });
    }
    this.chunksByDocument.set(
      documentId,
      chunks.map((chunk) => chunk.id)
    );
  }

  async getChunk(chunkId: string): Promise<Chunk | null> {
    const chunk = this.chunks.get(chunkId);
    return chunk ? { ...chunk } : null;
  }

  async getChunks(documentId: string): Promise<Chunk[]> {
    const ids = this.chunksByDocument.get(documentId) ?? [];
    const found: Chunk[] = [];
    for (const id of ids) {
      const chunk = this.chunks.get(id);
      if (chunk) found.push({ ...chunk });
    }
    return found.sort((a, b) => a.index - b.index);
  }

  async deleteChunks(documentId: string): Promise<number> {
    const ids = this.chunksByDocument.get(documentId) ?? [];
    for (const id of ids) {
      this.chunks.delete(id);
    }
    this.chunksByDocument.delete(documentId);
    return ids.length;
  }
}
