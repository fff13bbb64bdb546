/**
 * Database Schema (Drizzle ORM)
 *
 * documents        one row per document id, current revision only
 * document_chunks  chunk records of the current revision
 * chunk_vectors    pgvector storage owned by the vector index
 */

import {
  pgTable,
  text,
  varchar,
  integer,
  timestamp,
  jsonb,
  index,
  customType,
} from 'drizzle-orm/pg-core';
import type { DocumentStatus, IngestionStage } from '@/types/rag';

// =============================================================================
// Custom Type: pgvector
// =============================================================================

/**
 * Custom type for pgvector embeddings.
 * Stores vectors as float arrays, serializes to/from pgvector format.
 */
export const vector = customType<{
  data: number[];
  driverData: string;
  config: { dimensions: number };
}>({
  dataType(config) {
    return `vector(${config?.dimensions ?? 1536})`;
  },
  toDriver(value: number[]): string {
    return `[${value.join(',')}]`;
  },
  fromDriver(value: string): number[] {
    // Parse pgvector format: [0.1,0.2,0.3,...]
    return value
      .slice(1, -1)
      .split(',')
      .map(Number);
  },
});

/**
 * Width of the embedding column when the table is created.
 * Must match `embedding.dimensions` of the running config.
 */
export const VECTOR_DIMENSIONS = Number(process.env.EMBEDDING_DIMENSIONS ?? 1536);

// =============================================================================
// Documents Table
// =============================================================================

export const documents = pgTable('documents', {
  id: text('id').primaryKey(),
  filename: varchar('filename', { length: 255 }).notNull(),
  status: varchar('status', { length: 20 }).notNull().$type<DocumentStatus>(),
  revision: integer('revision').notNull().default(1),
  chunkIds: jsonb('chunk_ids').$type<string[]>().notNull().default([]),

  // Set only when status is 'failed'
  failureStage: varchar('failure_stage', { length: 20 }).$type<IngestionStage>(),
  failureReason: text('failure_reason'),

  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  statusIdx: index('idx_documents_status').on(table.status),
  createdAtIdx: index('idx_documents_created_at').on(table.createdAt),
}));

// =============================================================================
// Document Chunks Table
// =============================================================================

export const documentChunks = pgTable('document_chunks', {
  id: text('id').primaryKey(),
  documentId: text('document_id')
    .notNull()
    .references(() => documents.id, { onDelete: 'cascade' }),
  chunkIndex: integer('chunk_index').notNull(),
  content: text('content').notNull(),
  startOffset: integer('start_offset').notNull(),
  endOffset: integer('end_offset').notNull(),
  embeddingId: text('embedding_id'),
}, (table) => ({
  documentIdx: index('idx_chunks_document_id').on(table.documentId),
}));

// =============================================================================
// Chunk Vectors Table
// =============================================================================

export const chunkVectors = pgTable('chunk_vectors', {
  chunkId: text('chunk_id').primaryKey(),
  documentId: text('document_id').notNull(),
  embedding: vector('embedding', { dimensions: VECTOR_DIMENSIONS }).notNull(),
}, (table) => ({
  documentIdx: index('idx_chunk_vectors_document_id').on(table.documentId),
}));

// =============================================================================
// Type Exports
// =============================================================================

export type DocumentRow = typeof documents.$inferSelect;
export type NewDocumentRow = typeof documents.$inferInsert;
export type DocumentChunkRow = typeof documentChunks.$inferSelect;
export type NewDocumentChunkRow = typeof documentChunks.$inferInsert;
export type ChunkVectorRow = typeof chunkVectors.$inferSelect;
