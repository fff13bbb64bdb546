/**
 * In-process vector index.
 *
 * Brute-force scan over every stored vector. Suitable for tests, scripts
 * and corpora that fit in memory.
 */

import type { VectorMetric } from '../config';
import {
  assertDimensions,
  rankMatches,
  scoreVectors,
  type VectorIndex,
  type VectorMatch,
  type VectorMetadata,
} from '../vector-index';

interface StoredVector {
  vector: number[];
  documentId: string;
}

export class MemoryVectorIndex implements VectorIndex {
  readonly dimensions: number;
  readonly metric: VectorMetric;
  private vectors = new Map<string, StoredVector>();

  constructor(dimensions: number, metric: VectorMetric = 'cosine') {
    this.dimensions = dimensions;
    this.metric = metric;
  }

  async insert(chunkId: string, vector: number[], metadata: VectorMetadata): Promise<void> {
    assertDimensions(this.dimensions, vector, 'Vector index insert');
    this.vectors.set(chunkId, { vector: [...vector], documentId: metadata.documentId });
  }

  async search(vector: number[], k: number, scoreThreshold: number): Promise<VectorMatch[]> {
    assertDimensions(this.dimensions, vector, 'Vector index search');

    const matches: VectorMatch[] = [];
    for (const [chunkId, stored] of this.vectors) {
      matches.push({
        chunkId,
        documentId: stored.documentId,
        score: scoreVectors(this.metric, vector, stored.vector),
      });
    }

    return rankMatches(matches, k, scoreThreshold);
  }

  async delete(documentId: string): Promise<number> {
    let removed = 0;
    for (const [chunkId, stored] of this.vectors) {
      if (stored.documentId === documentId) {
        this.vectors.delete(chunkId);
        removed++;
      }
    }
    return removed;
  }

  async count(documentId?: string): Promise<number> {
    if (documentId === undefined) {
      return this.vectors.size;
    }
    let total = 0;
    for (const stored of this.vectors.values()) {
      if (stored.documentId === documentId) total++;
    }
    return total;
  }
}
