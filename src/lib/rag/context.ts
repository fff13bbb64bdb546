/**
 * RAG Context
 *
 * Everything the orchestrator works with, built once at startup from the
 * config. Each collaborator can be overridden, which is how tests inject
 * fakes. `close()` releases the connections the context opened itself.
 */

import { createDatabase, type DatabaseConnection } from '@/db';
import { createLLMAdapter, getApiKeyForProvider } from '@/lib/llm';
import type { LLMAdapter, LLMProvider } from '@/types/llm';
import { connectRedis, type RedisConnection } from '@/lib/redis';
import { MemoryDocumentStore, PgDocumentStore, type DocumentStore } from '@/lib/documents';
import {
  ConversationManager,
  MemoryConversationStore,
  RedisConversationStore,
  redisCommands,
  type ConversationStore,
} from '@/lib/conversations';
import { FileTextExtractor, type TextExtractor } from '@/lib/parsers';
import { RetryPolicy, type Sleep } from '@/lib/retry';
import { InvalidConfigError, getErrorMessage } from '@/lib/errors';
import { logger as rootLogger, type Logger } from '@/lib/logger';
import type { RAGConfig } from './config';
import { EmbeddingGateway, OpenAIEmbedder, type Embedder } from './embeddings';
import { OpenAIGenerator, type Generator } from './generator';
import { createVectorIndex } from './indexes';
import type { VectorIndex } from './vector-index';

// =============================================================================
// Types
// =============================================================================

export interface RAGContext {
  config: RAGConfig;
  extractor: TextExtractor;
  gateway: EmbeddingGateway;
  index: VectorIndex;
  documents: DocumentStore;
  conversations: ConversationManager;
  generator: Generator;
  logger: Logger;
  close(): Promise<void>;
}

export interface RAGContextOverrides {
  extractor?: TextExtractor;
  embedder?: Embedder;
  generator?: Generator;
  adapter?: LLMAdapter;
  index?: VectorIndex;
  documentStore?: DocumentStore;
  conversationStore?: ConversationStore;
  logger?: Logger;
  /** Replaces the wait between retries. */
  sleep?: Sleep;
}

// =============================================================================
// Bootstrap
// =============================================================================

function requireSetting(value: string | undefined, name: string): string {
  if (!value) {
    throw new InvalidConfigError([`${name} is required`]);
  }
  return value;
}

/**
 * Build a context from config, opening only the connections that the
 * selected backends need and the overrides do not replace.
 */
export async function createRAGContext(
  config: RAGConfig,
  overrides: RAGContextOverrides = {}
): Promise<RAGContext> {
  const log = overrides.logger ?? rootLogger;
  const contextLog = log.child({ layer: 'rag', service: 'RAGContext' });
  const closers: Array<() => Promise<void>> = [];

  const close = async (): Promise<void> => {
    const errors: string[] = [];
    for (const closer of closers.splice(0).reverse()) {
      try {
        await closer();
      } catch (error) {
        errors.push(getErrorMessage(error));
      }
    }
    if (errors.length > 0) {
      contextLog.error({ event: 'context_close_failed', errors }, 'Failed to close some connections');
      throw new Error(`Failed to close RAG context: ${errors.join('; ')}`);
    }
  };

  try {
    // Database, shared by the pgvector index and the postgres document store
    const needsDatabase =
      (!overrides.index && config.vectorIndex.backend === 'pgvector') ||
      (!overrides.documentStore && config.documentStore.backend === 'postgres');
    let database: DatabaseConnection | undefined;
    if (needsDatabase) {
      database = createDatabase(requireSetting(config.databaseUrl, 'DATABASE_URL'));
      closers.push(database.close);
    }

    // Model services: one adapter per provider, shared when embedding and
    // generation name the same one
    const adapters = new Map<LLMProvider, LLMAdapter>();
    const getAdapter = (provider: LLMProvider): LLMAdapter => {
      if (overrides.adapter) {
        return overrides.adapter;
      }
      let adapter = adapters.get(provider);
      if (!adapter) {
        adapter = createLLMAdapter(provider, {
          apiKey:
            provider === 'openai' && config.openaiApiKey
              ? config.openaiApiKey
              : getApiKeyForProvider(provider),
          defaultModel: config.generation.model,
          defaultEmbeddingModel: config.embedding.model,
        });
        adapters.set(provider, adapter);
      }
      return adapter;
    };

    const embedder =
      overrides.embedder ??
      new OpenAIEmbedder(getAdapter(config.embedding.provider), {
        model: config.embedding.model,
        dimensions: config.embedding.dimensions,
      });

    const gateway = new EmbeddingGateway(embedder, {
      batchSize: config.embedding.batchSize,
      retry: new RetryPolicy(config.retry, {
        sleep: overrides.sleep,
        log: log.child({ layer: 'external', service: 'RetryPolicy' }),
      }),
      log: log.child({ layer: 'rag', service: 'EmbeddingGateway' }),
    });

    // Failed answers are not retried; the user re-asks.
    const generator =
      overrides.generator ??
      new OpenAIGenerator(getAdapter(config.generation.provider), config.generation, RetryPolicy.once());

    const index =
      overrides.index ??
      createVectorIndex(config.vectorIndex.backend, {
        dimensions: config.embedding.dimensions,
        metric: config.vectorIndex.metric,
        db: database?.db,
      });

    const documents =
      overrides.documentStore ??
      (config.documentStore.backend === 'postgres' && database
        ? new PgDocumentStore(database.db)
        : new MemoryDocumentStore());

    let conversationStore = overrides.conversationStore;
    if (!conversationStore) {
      if (config.conversationStore.backend === 'redis') {
        const redis: RedisConnection = await connectRedis(requireSetting(config.redisUrl, 'REDIS_URL'));
        closers.push(redis.close);
        conversationStore = new RedisConversationStore(redisCommands(redis.client));
      } else {
        conversationStore = new MemoryConversationStore();
      }
    }

    contextLog.info(
      {
        event: 'context_created',
        vectorIndex: config.vectorIndex.backend,
        documentStore: config.documentStore.backend,
        conversationStore: config.conversationStore.backend,
        embeddingModel: embedder.model,
        generationModel: generator.model,
      },
      'RAG context created'
    );

    return {
      config,
      extractor: overrides.extractor ?? new FileTextExtractor(),
      gateway,
      index,
      documents,
      conversations: new ConversationManager(conversationStore, {
        log: log.child({ layer: 'conversation', service: 'ConversationManager' }),
      }),
      generator,
      logger: log,
      close,
    };
  } catch (error) {
    try {
      await close();
    } catch (closeError) {
      contextLog.warn(
        { event: 'context_cleanup_failed', error: getErrorMessage(closeError) },
        'Cleanup after failed startup did not complete'
      );
    }
    throw error;
  }
}
