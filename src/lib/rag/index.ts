/**
 * RAG Module Exports
 *
 * Provides the retrieval-augmented pipeline:
 * - Document chunking
 * - Embedding gateway
 * - Vector indexes and retrieval
 * - Context assembly and citations
 * - Orchestrator and context bootstrap
 */

// Configuration
export {
  ragConfigSchema,
  loadRAGConfig,
  validateRAGConfig,
  DEFAULT_RAG_CONFIG,
  type RAGConfig,
  type RAGConfigInput,
  type RetryConfig,
  type VectorMetric,
  type VectorIndexBackend,
} from './config';

// Chunker
export {
  chunkText,
  chunkDocument,
  chunkIdFor,
  estimateTokens,
  validateChunkOptions,
  type TextSpan,
  type ChunkOptions,
} from './chunker';

// Embeddings & generation
export {
  EmbeddingGateway,
  OpenAIEmbedder,
  type Embedder,
  type EmbedOptions,
  type EmbeddingGatewayOptions,
} from './embeddings';
export {
  OpenAIGenerator,
  type Generator,
  type GenerateOptions,
  type OpenAIGeneratorConfig,
} from './generator';

// Vector index
export {
  cosineSimilarity,
  inverseDistance,
  euclideanDistance,
  rankMatches,
  compareMatches,
  type VectorIndex,
  type VectorMatch,
  type VectorMetadata,
} from './vector-index';
export * from './indexes';

// Retrieval & assembly
export { Retriever, type RetrievalResult, type RetrieveOptions } from './retrieval';
export { assembleContext, formatContextBlock, type AssemblyResult } from './assembler';
export {
  parseCitationMarkers,
  validateCitations,
  formatSourcesSection,
  type CitationCheck,
} from './citations';

// Orchestration
export { canTransition, isTerminalStatus } from './lifecycle';
export {
  RAGOrchestrator,
  queryFailureReason,
  type IngestRequest,
  type IngestionHandle,
  type QueryOptions,
} from './orchestrator';
export { createRAGContext, type RAGContext, type RAGContextOverrides } from './context';
