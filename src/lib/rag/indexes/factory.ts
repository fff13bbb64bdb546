/**
 * Vector index registry.
 *
 * Creates the backend named by `vectorIndex.backend`.
 */

import type { Database } from '@/db';
import { InvalidConfigError } from '@/lib/errors';
import type { VectorIndexBackend, VectorMetric } from '../config';
import type { VectorIndex } from '../vector-index';
import { MemoryVectorIndex } from './memory-index';
import { PgVectorIndex } from './pgvector-index';

export interface VectorIndexOptions {
  dimensions: number;
  metric: VectorMetric;
  db?: Database;
}

type VectorIndexFactory = (options: VectorIndexOptions) => VectorIndex;

const indexRegistry = new Map<VectorIndexBackend, VectorIndexFactory>([
  ['memory', ({ dimensions, metric }) => new MemoryVectorIndex(dimensions, metric)],
  [
    'pgvector',
    ({ dimensions, metric, db }) => {
      if (!db) {
        throw new InvalidConfigError(['the pgvector index needs a database connection']);
      }
      return new PgVectorIndex(db, dimensions, metric);
    },
  ],
]);

export function createVectorIndex(backend: VectorIndexBackend, options: VectorIndexOptions): VectorIndex {
  const factory = indexRegistry.get(backend);

  if (!factory) {
    throw new InvalidConfigError([
      `Unsupported vector index backend: ${backend}. Supported backends: ${getSupportedIndexBackends().join(', ')}`,
    ]);
  }

  return factory(options);
}

export function getSupportedIndexBackends(): VectorIndexBackend[] {
  return Array.from(indexRegistry.keys());
}
