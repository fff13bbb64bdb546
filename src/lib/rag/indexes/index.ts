export { MemoryVectorIndex } from './memory-index';
export { PgVectorIndex, toVectorLiteral } from './pgvector-index';
export {
  createVectorIndex,
  getSupportedIndexBackends,
  type VectorIndexOptions,
} from './factory';
