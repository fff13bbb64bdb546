/**
 * Redis conversation store.
 *
 * Keys:
 *   conversation:{id}        JSON header, written once
 *   conversation:{id}:turns  list of JSON turns in append order
 *
 * A conversation and any imported turns are created by one script, so a
 * failed import leaves neither key behind.
 */

import { z } from 'zod';
import type { RedisClient } from '@/lib/redis';
import type { Turn } from '@/types/rag';
import { logger, logExternalCall, Timer } from '@/lib/logger';
import { parseTurn, serializeTurn } from './serialize';
import type { ConversationHeader, ConversationStore } from './store';

const log = logger.child({ layer: 'conversation', service: 'RedisConversationStore' });

const KEY_PREFIX = 'conversation';

const headerSchema = z.object({
  id: z.string().min(1),
  createdAt: z.string().transform((value) => new Date(value)),
});

// KEYS[1] header, KEYS[2] turns; ARGV[1] header JSON, ARGV[2..] turn JSON.
// RPUSH in slices to stay under Lua's unpack limit.
const CREATE_CONVERSATION_SCRIPT = `
if redis.call('EXISTS', KEYS[1], KEYS[2]) > 0 then
  return 0
end
redis.call('SET', KEYS[1], ARGV[1])
for i = 2, #ARGV, 1000 do
  redis.call('RPUSH', KEYS[2], unpack(ARGV, i, math.min(i + 999, #ARGV)))
end
return 1
`;

/**
 * The Redis commands the store uses.
 */
export interface ConversationRedis {
  /**
   * Write the header and the turns in one step, unless either key exists.
   * True if written.
   */
  createConversation(headerKey: string, header: string, turnsKey: string, turns: string[]): Promise<boolean>;
  get(key: string): Promise<string | null>;
  exists(key: string): Promise<boolean>;
  pushAll(key: string, values: string[]): Promise<void>;
  range(key: string): Promise<string[]>;
}

export function redisCommands(client: RedisClient): ConversationRedis {
  return {
    async createConversation(headerKey, header, turnsKey, turns) {
      const reply = await client.eval(CREATE_CONVERSATION_SCRIPT, {
        keys: [headerKey, turnsKey],
        arguments: [header, ...turns],
      });
      return reply === 1;
    },
    get: (key) => client.get(key),
    async exists(key) {
      return (await client.exists(key)) > 0;
    },
    async pushAll(key, values) {
      if (values.length > 0) {
        await client.rPush(key, values);
      }
    },
    range: (key) => client.lRange(key, 0, -1),
  };
}

function headerKey(conversationId: string): string {
  return `${KEY_PREFIX}:${conversationId}`;
}

function turnsKey(conversationId: string): string {
  return `${KEY_PREFIX}:${conversationId}:turns`;
}

export class RedisConversationStore implements ConversationStore {
  private redis: ConversationRedis;

  constructor(redis: ConversationRedis) {
    this.redis = redis;
  }

  async create(header: ConversationHeader, turns: Turn[] = []): Promise<boolean> {
    const timer = new Timer();
    const created = await this.redis.createConversation(
      headerKey(header.id),
      JSON.stringify({ id: header.id, createdAt: header.createdAt.toISOString() }),
      turnsKey(header.id),
      turns.map((turn) => JSON.stringify(serializeTurn(turn)))
    );
    logExternalCall(log, 'redis', 'create_conversation', { duration_ms: timer.elapsed() });
    return created;
  }

  async get(conversationId: string): Promise<ConversationHeader | null> {
    const raw = await this.redis.get(headerKey(conversationId));
    return raw === null ? null : headerSchema.parse(JSON.parse(raw));
  }

  async exists(conversationId: string): Promise<boolean> {
    return this.redis.exists(headerKey(conversationId));
  }

  async appendTurn(turn: Turn): Promise<void> {
    const timer = new Timer();
    await this.redis.pushAll(turnsKey(turn.conversationId), [JSON.stringify(serializeTurn(turn))]);
    logExternalCall(log, 'redis', 'rpush', { duration_ms: timer.elapsed() });
  }

  async listTurns(conversationId: string): Promise<Turn[]> {
    const raw = await this.redis.range(turnsKey(conversationId));
    return raw.map(parseTurn);
  }
}
