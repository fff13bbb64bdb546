/**
 * Retriever
 *
 * Runs similarity search on the vector index and resolves the hits to
 * chunk records. Index entries without a chunk record are dropped with a
 * warning rather than failing the query.
 */

import type { RetrievedChunk } from '@/types/rag';
import type { DocumentStore } from '@/lib/documents';
import type { ConsistencyCheck } from '@/lib/concurrency';
import { ChunkNotFoundError } from '@/lib/errors';
import { logger, logRagStep, Timer, type Logger } from '@/lib/logger';
import type { VectorIndex } from './vector-index';

const log = logger.child({ layer: 'rag', service: 'Retriever' });

// =============================================================================
// Types
// =============================================================================

export interface RetrieveOptions {
  scoreThreshold: number;
}

export interface RetrievalResult {
  /** Best first; equal scores by ascending chunk id. */
  chunks: RetrievedChunk[];
  /** Hits whose chunk record is missing from document storage. */
  missingChunkIds: string[];
  /** Hits dropped because their document was being rewritten. */
  unstableChunkIds: string[];
}

export interface RetrieverOptions {
  consistency?: ConsistencyCheck;
  log?: Logger;
}

// =============================================================================
// Retriever
// =============================================================================

export class Retriever {
  private index: VectorIndex;
  private store: DocumentStore;
  private consistency?: ConsistencyCheck;
  private log: Logger;

  constructor(index: VectorIndex, store: DocumentStore, options: RetrieverOptions = {}) {
    this.index = index;
    this.store = store;
    this.consistency = options.consistency;
    this.log = options.log ?? log;
  }

  async retrieve(queryVector: number[], k: number, options: RetrieveOptions): Promise<RetrievalResult> {
    const timer = new Timer();
    const since = this.consistency?.snapshot() ?? 0;

    const matches = await this.index.search(queryVector, k, options.scoreThreshold);
    const resolved = await Promise.all(matches.map((match) => this.store.getChunk(match.chunkId)));

    const chunks: RetrievedChunk[] = [];
    const missingChunkIds: string[] = [];
    const unstableChunkIds: string[] = [];

    matches.forEach((match, i) => {
      const chunk = resolved[i];

      if (this.consistency && !this.consistency.isStable(match.documentId, since)) {
        unstableChunkIds.push(match.chunkId);
        return;
      }

      if (!chunk) {
        const error = new ChunkNotFoundError(match.chunkId);
        this.log.warn(
          { event: 'chunk_not_found', chunkId: match.chunkId, documentId: match.documentId, code: error.code },
          error.message
        );
        missingChunkIds.push(match.chunkId);
        return;
      }

      chunks.push({ ...chunk, score: match.score });
    });

    logRagStep(this.log, 'retrieval', {
      duration_ms: timer.elapsed(),
      chunks: chunks.length,
      dropped: missingChunkIds.length + unstableChunkIds.length,
    });

    return { chunks, missingChunkIds, unstableChunkIds };
  }
}
