/**
 * Core domain types for documents, chunks and conversations.
 */

// =============================================================================
// Documents
// =============================================================================

/**
 * Ingestion status. Ordered: a document only ever moves forward through
 * this list, or to 'failed' from any non-terminal status.
 */
export const DOCUMENT_STATUSES = [
  'uploaded',
  'extracting',
  'chunking',
  'embedding',
  'indexed',
  'failed',
] as const;

export type DocumentStatus = (typeof DOCUMENT_STATUSES)[number];

export type IngestionStage = 'extraction' | 'chunking' | 'embedding' | 'indexing' | 'cancelled';

export interface DocumentFailure {
  stage: IngestionStage;
  reason: string;
}

export interface DocumentRecord {
  id: string;
  filename: string;
  status: DocumentStatus;
  /** Incremented each time the same document id is ingested again. */
  revision: number;
  chunkIds: string[];
  failure: DocumentFailure | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface Chunk {
  /** `${documentId}:${index}` */
  id: string;
  documentId: string;
  text: string;
  /** Inclusive start offset in the extracted text. */
  startOffset: number;
  /** Exclusive end offset in the extracted text. */
  endOffset: number;
  index: number;
  /** Identifier of the stored vector; null until the chunk is indexed. */
  embeddingId: string | null;
}

export interface RetrievedChunk extends Chunk {
  score: number;
}

// =============================================================================
// Conversations
// =============================================================================

export type TurnRole = 'user' | 'assistant';

export interface SourceCitation {
  /** Marker index used in the prompt, e.g. 2 for "[2]". */
  marker: number;
  documentId: string;
  chunkId: string;
  score: number;
}

export type TurnStatus =
  | { state: 'ok' }
  | { state: 'failed'; reason: string };

export interface Turn {
  id: string;
  conversationId: string;
  role: TurnRole;
  text: string;
  citations: SourceCitation[];
  status: TurnStatus;
  createdAt: Date;
}

/** What a caller supplies when appending; id and timestamp are assigned. */
export interface TurnDraft {
  role: TurnRole;
  text: string;
  citations?: SourceCitation[];
  status?: TurnStatus;
}

export interface Conversation {
  id: string;
  createdAt: Date;
  turns: Turn[];
}

export type ExportFormat = 'json' | 'text' | 'markdown';
