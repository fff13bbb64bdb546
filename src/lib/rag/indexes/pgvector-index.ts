/**
 * PostgreSQL vector index backed by the pgvector extension.
 *
 * Cosine similarity uses the `<=>` operator (distance = 1 - similarity);
 * inverse distance uses the Euclidean `<->` operator.
 */

import { asc, count, desc, eq, gte, sql, type SQL } from 'drizzle-orm';
import type { Database } from '@/db';
import { chunkVectors } from '@/db/schema';
import { logger, logDbOperation, Timer } from '@/lib/logger';
import type { VectorMetric } from '../config';
import {
  assertDimensions,
  rankMatches,
  type VectorIndex,
  type VectorMatch,
  type VectorMetadata,
} from '../vector-index';

const log = logger.child({ layer: 'db', service: 'PgVectorIndex' });

/**
 * pgvector's text form: [0.1,0.2,0.3]
 */
export function toVectorLiteral(vector: number[]): string {
  return `[${vector.join(',')}]`;
}

export class PgVectorIndex implements VectorIndex {
  readonly dimensions: number;
  readonly metric: VectorMetric;
  private db: Database;

  constructor(db: Database, dimensions: number, metric: VectorMetric = 'cosine') {
    this.db = db;
    this.dimensions = dimensions;
    this.metric = metric;
  }

  async insert(chunkId: string, vector: number[], metadata: VectorMetadata): Promise<void> {
    assertDimensions(this.dimensions, vector, 'Vector index insert');

    await this.db
      .insert(chunkVectors)
      .values({ chunkId, documentId: metadata.documentId, embedding: vector })
      .onConflictDoUpdate({
        target: chunkVectors.chunkId,
        set: { documentId: metadata.documentId, embedding: vector },
      });
  }

  async search(vector: number[], k: number, scoreThreshold: number): Promise<VectorMatch[]> {
    assertDimensions(this.dimensions, vector, 'Vector index search');
    if (k <= 0) {
      return [];
    }

    const timer = new Timer();
    const score = this.scoreExpression(toVectorLiteral(vector));

    const rows = await this.db
      .select({
        chunkId: chunkVectors.chunkId,
        documentId: chunkVectors.documentId,
        score,
      })
      .from(chunkVectors)
      .where(gte(score, scoreThreshold))
      .orderBy(desc(score), asc(sql`${chunkVectors.chunkId} collate "C"`))
      .limit(k);

    logDbOperation(log, 'vector_search', {
      table: 'chunk_vectors',
      rows: rows.length,
      duration_ms: timer.elapsed(),
    });

    // Re-rank in process so ties break exactly as the other backends do.
    return rankMatches(rows, k, scoreThreshold);
  }

  async delete(documentId: string): Promise<number> {
    const removed = await this.db
      .delete(chunkVectors)
      .where(eq(chunkVectors.documentId, documentId))
      .returning({ chunkId: chunkVectors.chunkId });
    return removed.length;
  }

  async count(documentId?: string): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(chunkVectors)
      .where(documentId === undefined ? undefined : eq(chunkVectors.documentId, documentId));
    return row?.value ?? 0;
  }

  private scoreExpression(literal: string): SQL<number> {
    if (this.metric === 'cosine') {
      return sql<number>`1 - (${chunkVectors.embedding} <=> ${literal}::vector)`.mapWith(Number);
    }
    return sql<number>`1 / (1 + (${chunkVectors.embedding} <-> ${literal}::vector))`.mapWith(Number);
  }
}
