/**
 * Vector Index contract and similarity scoring.
 *
 * A VectorIndex owns vector storage for the whole corpus. Vectors are keyed
 * by chunk id and tagged with their document id so a document can be
 * removed in one call.
 */

import { DimensionMismatchError } from '@/lib/errors';
import type { VectorMetric } from './config';

// =============================================================================
// Types
// =============================================================================

export interface VectorMetadata {
  documentId: string;
}

export interface VectorMatch {
  chunkId: string;
  documentId: string;
  score: number;
}

export interface VectorIndex {
  readonly dimensions: number;
  readonly metric: VectorMetric;

  /** Insert or replace the vector stored under `chunkId`. */
  insert(chunkId: string, vector: number[], metadata: VectorMetadata): Promise<void>;

  /**
   * At most `k` matches scoring at least `scoreThreshold`, best first.
   * Equal scores are ordered by ascending chunk id.
   */
  search(vector: number[], k: number, scoreThreshold: number): Promise<VectorMatch[]>;

  /** Remove every vector of a document; returns how many were removed. */
  delete(documentId: string): Promise<number>;

  count(documentId?: string): Promise<number>;
}

// =============================================================================
// Scoring
// =============================================================================

/**
 * Cosine similarity in [-1, 1]. A zero vector scores 0 against anything.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function euclideanDistance(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}

/**
 * Similarity in (0, 1]: 1 for identical vectors, falling with distance.
 */
export function inverseDistance(a: number[], b: number[]): number {
  return 1 / (1 + euclideanDistance(a, b));
}

export function scoreVectors(metric: VectorMetric, a: number[], b: number[]): number {
  return metric === 'cosine' ? cosineSimilarity(a, b) : inverseDistance(a, b);
}

// =============================================================================
// Ranking
// =============================================================================

/**
 * Descending score, then ascending chunk id.
 */
export function compareMatches(a: VectorMatch, b: VectorMatch): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.chunkId === b.chunkId) {
    return 0;
  }
  return a.chunkId < b.chunkId ? -1 : 1;
}

export function rankMatches(matches: VectorMatch[], k: number, scoreThreshold: number): VectorMatch[] {
  if (k <= 0) {
    return [];
  }
  return matches
    .filter((match) => match.score >= scoreThreshold)
    .sort(compareMatches)
    .slice(0, k);
}

export function assertDimensions(expected: number, vector: number[], where: string): void {
  if (vector.length !== expected) {
    throw new DimensionMismatchError(expected, vector.length, where);
  }
}
