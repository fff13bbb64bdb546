/**
 * PostgreSQL document store.
 */

import { asc, eq } from 'drizzle-orm';
import type { Database } from '@/db';
import {
  documents,
  documentChunks,
  type DocumentRow,
  type DocumentChunkRow,
  type NewDocumentRow,
} from '@/db/schema';
import type { Chunk, DocumentRecord } from '@/types/rag';
import { logger, logDbOperation, Timer } from '@/lib/logger';
import type { DocumentStore } from './store';

const log = logger.child({ layer: 'db', service: 'PgDocumentStore' });

// =============================================================================
// Row Mapping
// =============================================================================

function toRecord(row: DocumentRow): DocumentRecord {
  return {
    id: row.id,
    filename: row.filename,
    status: row.status,
    revision: row.revision,
    chunkIds: row.chunkIds,
    failure:
      row.failureStage !== null
        ? { stage: row.failureStage, reason: row.failureReason ?? '' }
        : null,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toRow(document: DocumentRecord): NewDocumentRow {
  return {
    id: document.id,
    filename: document.filename,
    status: document.status,
    revision: document.revision,
    chunkIds: document.chunkIds,
    failureStage: document.failure?.stage ?? null,
    failureReason: document.failure?.reason ?? null,
    createdAt: document.createdAt,
    updatedAt: document.updatedAt,
  };
}

function toChunk(row: DocumentChunkRow): Chunk {
  return {
    id: row.id,
    documentId: row.documentId,
    text: row.content,
    startOffset: row.startOffset,
    endOffset: row.endOffset,
    index: row.chunkIndex,
    embeddingId: row.embeddingId,
  };
}

// =============================================================================
// Store
// =============================================================================

export class PgDocumentStore implements DocumentStore {
  private db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  async save(document: DocumentRecord): Promise<void> {
    const row = toRow(document);
    await this.db
      .insert(documents)
      .values(row)
      .onConflictDoUpdate({
        target: documents.id,
        set: {
          filename: row.filename,
          status: row.status,
          revision: row.revision,
          chunkIds: row.chunkIds,
          failureStage: row.failureStage,
          failureReason: row.failureReason,
          updatedAt: row.updatedAt,
        },
      });
  }

  async get(documentId: string): Promise<DocumentRecord | null> {
    const [row] = await this.db.select().from(documents).where(eq(documents.id, documentId)).limit(1);
    return row ? toRecord(row) : null;
  }

  async list(): Promise<DocumentRecord[]> {
    const rows = await this.db.select().from(documents).orderBy(asc(documents.createdAt), asc(documents.id));
    return rows.map(toRecord);
  }

  async delete(documentId: string): Promise<boolean> {
    // document_chunks rows go with it (on delete cascade)
    const removed = await this.db
      .delete(documents)
      .where(eq(documents.id, documentId))
      .returning({ id: documents.id });
    return removed.length > 0;
  }

  async saveChunks(documentId: string, chunks: Chunk[]): Promise<void> {
    const timer = new Timer();

    await this.db.transaction(async (tx) => {
      await tx.delete(documentChunks).where(eq(documentChunks.documentId, documentId));
      if (chunks.length === 0) return;

      await tx.insert(documentChunks).values(
        chunks.map((chunk) => ({
          id: chunk.id,
          documentId,
          chunkIndex: chunk.index,
          content: chunk.text,
          startOffset: chunk.startOffset,
          endOffset: chunk.endOffset,
          embeddingId: chunk.embeddingId,
        }))
      );
    });

    logDbOperation(log, 'save_chunks', {
      table: 'document_chunks',
      rows: chunks.length,
      duration_ms: timer.elapsed(),
    });
  }

  async getChunk(chunkId: string): Promise<Chunk | null> {
    const [row] = await this.db
      .select()
      .from(documentChunks)
      .where(eq(documentChunks.id, chunkId))
      .limit(1);
    return row ? toChunk(row) : null;
  }

  async getChunks(documentId: string): Promise<Chunk[]> {
    const rows = await this.db
      .select()
      .from(documentChunks)
      .where(eq(documentChunks.documentId, documentId))
      .orderBy(asc(documentChunks.chunkIndex));
    return rows.map(toChunk);
  }

  async deleteChunks(documentId: string): Promise<number> {
    const removed = await this.db
      .delete(documentChunks)
      .where(eq(documentChunks.documentId, documentId))
      .returning({ id: documentChunks.id });
    return removed.length;
  }
}
