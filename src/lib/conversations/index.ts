export { ConversationManager, type ConversationManagerOptions } from './manager';
export type { ConversationHeader, ConversationStore } from './store';
export { MemoryConversationStore } from './memory-store';
export { RedisConversationStore, redisCommands, type ConversationRedis } from './redis-store';
export { renderConversation, renderJson, renderMarkdown, renderText } from './export';
export { conversationSchema, parseTurn, serializeConversation, serializeTurn } from './serialize';
