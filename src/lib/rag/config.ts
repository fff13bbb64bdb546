/**
 * RAG Configuration
 *
 * Defaults, schema and environment loading for every tunable of the
 * pipeline. Invalid combinations are rejected here so they fail startup
 * instead of failing per document.
 */

import { z } from 'zod';
import { InvalidConfigError } from '@/lib/errors';

// =============================================================================
// Chunking
// =============================================================================

/**
 * Default chunk size in characters for document splitting.
 */
export const DEFAULT_CHUNK_SIZE = 500;

/**
 * Default overlap between consecutive chunks in characters.
 */
export const DEFAULT_CHUNK_OVERLAP = 50;

// =============================================================================
// Retrieval & Assembly
// =============================================================================

export const DEFAULT_TOP_K = 5;

/**
 * Minimum similarity for a search hit to be kept.
 * Applies to whichever metric the vector index uses.
 */
export const DEFAULT_SCORE_THRESHOLD = 0.2;

/**
 * Upper bound on the estimated token size of the assembled context.
 */
export const DEFAULT_CONTEXT_TOKEN_BUDGET = 1500;

// =============================================================================
// Retry
// =============================================================================

export const DEFAULT_RETRY_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_BASE_DELAY_MS = 250;
export const DEFAULT_RETRY_MAX_DELAY_MS = 4000;
export const DEFAULT_RETRY_JITTER = 0.2;

// =============================================================================
// Models
// =============================================================================

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
export const DEFAULT_EMBEDDING_DIMENSIONS = 1536;

/**
 * Texts sent per embeddings request.
 */
export const DEFAULT_EMBEDDING_BATCH_SIZE = 64;
const MAX_EMBEDDING_BATCH_SIZE = 2048; // OpenAI limit

export const DEFAULT_LLM_MODEL = 'gpt-4o-mini';
export const DEFAULT_RAG_MAX_TOKENS = 1024;

/**
 * Lower values = more focused/deterministic answers.
 */
export const DEFAULT_RAG_TEMPERATURE = 0.3;
export const DEFAULT_GENERATION_TIMEOUT_MS = 30_000;

// =============================================================================
// Backends & Pool
// =============================================================================

export const VECTOR_INDEX_BACKENDS = ['memory', 'pgvector'] as const;
export const VECTOR_METRICS = ['cosine', 'inverse-distance'] as const;
export const DOCUMENT_STORE_BACKENDS = ['memory', 'postgres'] as const;
export const CONVERSATION_STORE_BACKENDS = ['memory', 'redis'] as const;

export const DEFAULT_INGEST_CONCURRENCY = 4;

// =============================================================================
// Schema
// =============================================================================

const retrySchema = z.object({
  maxAttempts: z.number().int().min(1).default(DEFAULT_RETRY_MAX_ATTEMPTS),
  baseDelayMs: z.number().int().min(0).default(DEFAULT_RETRY_BASE_DELAY_MS),
  maxDelayMs: z.number().int().min(0).default(DEFAULT_RETRY_MAX_DELAY_MS),
  jitter: z.number().min(0).max(1).default(DEFAULT_RETRY_JITTER),
});

const embeddingSchema = z.object({
  provider: z.enum(['openai']).default('openai'),
  model: z.string().min(1).default(DEFAULT_EMBEDDING_MODEL),
  dimensions: z.number().int().positive().default(DEFAULT_EMBEDDING_DIMENSIONS),
  batchSize: z
    .number()
    .int()
    .positive()
    .max(MAX_EMBEDDING_BATCH_SIZE)
    .default(DEFAULT_EMBEDDING_BATCH_SIZE),
});

const generationSchema = z.object({
  provider: z.enum(['openai']).default('openai'),
  model: z.string().min(1).default(DEFAULT_LLM_MODEL),
  maxTokens: z.number().int().positive().default(DEFAULT_RAG_MAX_TOKENS),
  temperature: z.number().min(0).max(2).default(DEFAULT_RAG_TEMPERATURE),
  timeoutMs: z.number().int().positive().default(DEFAULT_GENERATION_TIMEOUT_MS),
});

export const ragConfigSchema = z
  .object({
    chunkSize: z.number().int().positive().default(DEFAULT_CHUNK_SIZE),
    chunkOverlap: z.number().int().min(0).default(DEFAULT_CHUNK_OVERLAP),
    topK: z.number().int().positive().default(DEFAULT_TOP_K),
    scoreThreshold: z.number().min(-1).max(1).default(DEFAULT_SCORE_THRESHOLD),
    contextTokenBudget: z.number().int().positive().default(DEFAULT_CONTEXT_TOKEN_BUDGET),
    retry: retrySchema.default({}),
    embedding: embeddingSchema.default({}),
    generation: generationSchema.default({}),
    vectorIndex: z
      .object({
        backend: z.enum(VECTOR_INDEX_BACKENDS).default('memory'),
        metric: z.enum(VECTOR_METRICS).default('cosine'),
      })
      .default({}),
    documentStore: z
      .object({ backend: z.enum(DOCUMENT_STORE_BACKENDS).default('memory') })
      .default({}),
    conversationStore: z
      .object({ backend: z.enum(CONVERSATION_STORE_BACKENDS).default('memory') })
      .default({}),
    ingestConcurrency: z.number().int().positive().default(DEFAULT_INGEST_CONCURRENCY),
    databaseUrl: z.string().min(1).optional(),
    redisUrl: z.string().min(1).optional(),
    openaiApiKey: z.string().min(1).optional(),
  })
  .superRefine((config, ctx) => {
    if (config.chunkOverlap >= config.chunkSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['chunkOverlap'],
        message: `must be smaller than chunkSize (${config.chunkSize})`,
      });
    }
    if (config.retry.maxDelayMs < config.retry.baseDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['retry', 'maxDelayMs'],
        message: 'must be at least retry.baseDelayMs',
      });
    }
    const needsDatabase =
      config.vectorIndex.backend === 'pgvector' || config.documentStore.backend === 'postgres';
    if (needsDatabase && !config.databaseUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['databaseUrl'],
        message: 'is required by the pgvector index and the postgres document store',
      });
    }
    if (config.conversationStore.backend === 'redis' && !config.redisUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['redisUrl'],
        message: 'is required by the redis conversation store',
      });
    }
  });

export type RAGConfig = z.infer<typeof ragConfigSchema>;
export type RAGConfigInput = z.input<typeof ragConfigSchema>;
export type VectorMetric = RAGConfig['vectorIndex']['metric'];
export type VectorIndexBackend = RAGConfig['vectorIndex']['backend'];
export type RetryConfig = RAGConfig['retry'];

// =============================================================================
// Validation & Loading
// =============================================================================

/**
 * Parse and validate a config object, filling in defaults.
 * Throws InvalidConfigError listing every problem found.
 */
export function validateRAGConfig(input: unknown): RAGConfig {
  const result = ragConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new InvalidConfigError(issues);
  }
  return result.data;
}

/**
 * Env values are strings; anything that does not parse as a number is
 * passed through so the schema reports it.
 */
function readNumber(value: string | undefined): number | string | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? value : parsed;
}

function readString(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Build the config from environment variables.
 */
export function loadRAGConfig(env: NodeJS.ProcessEnv = process.env): RAGConfig {
  return validateRAGConfig({
    chunkSize: readNumber(env.RAG_CHUNK_SIZE),
    chunkOverlap: readNumber(env.RAG_CHUNK_OVERLAP),
    topK: readNumber(env.RAG_TOP_K),
    scoreThreshold: readNumber(env.RAG_SCORE_THRESHOLD),
    contextTokenBudget: readNumber(env.RAG_CONTEXT_TOKEN_BUDGET),
    retry: {
      maxAttempts: readNumber(env.RAG_RETRY_MAX_ATTEMPTS),
      baseDelayMs: readNumber(env.RAG_RETRY_BASE_DELAY_MS),
      maxDelayMs: readNumber(env.RAG_RETRY_MAX_DELAY_MS),
      jitter: readNumber(env.RAG_RETRY_JITTER),
    },
    embedding: {
      provider: readString(env.EMBEDDING_PROVIDER),
      model: readString(env.EMBEDDING_MODEL),
      dimensions: readNumber(env.EMBEDDING_DIMENSIONS),
      batchSize: readNumber(env.RAG_EMBEDDING_BATCH_SIZE),
    },
    generation: {
      provider: readString(env.LLM_PROVIDER),
      model: readString(env.LLM_MODEL),
      timeoutMs: readNumber(env.RAG_GENERATION_TIMEOUT_MS),
    },
    vectorIndex: {
      backend: readString(env.VECTOR_INDEX_BACKEND),
      metric: readString(env.VECTOR_METRIC),
    },
    documentStore: { backend: readString(env.DOCUMENT_STORE_BACKEND) },
    conversationStore: { backend: readString(env.CONVERSATION_STORE_BACKEND) },
    ingestConcurrency: readNumber(env.RAG_INGEST_CONCURRENCY),
    databaseUrl: readString(env.DATABASE_URL),
    redisUrl: readString(env.REDIS_URL),
    openaiApiKey: readString(env.OPENAI_API_KEY),
  });
}

/**
 * Configuration with every default applied.
 */
export const DEFAULT_RAG_CONFIG: RAGConfig = validateRAGConfig({});
