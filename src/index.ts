/**
 * docqa-core public API.
 */

export * from './lib/rag';
export * from './lib/errors';
export * from './types/rag';
export { ConversationManager, MemoryConversationStore, RedisConversationStore, redisCommands } from './lib/conversations';
export type { ConversationStore, ConversationHeader, ConversationRedis } from './lib/conversations';
export { MemoryDocumentStore, PgDocumentStore } from './lib/documents';
export type { DocumentStore } from './lib/documents';
export { FileTextExtractor } from './lib/parsers';
export type { TextExtractor } from './lib/parsers';
export { RetryPolicy } from './lib/retry';
export type { RetryOptions } from './lib/retry';
export { KeyedMutex, DocumentWriteGuard } from './lib/concurrency';
export { logger } from './lib/logger';
