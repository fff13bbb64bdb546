/**
 * Shared fixtures for conversation tests.
 */

import type { Conversation, Turn } from '@/types/rag';
import type { ConversationRedis } from '../redis-store';

export const CREATED_AT = new Date('2024-05-01T10:00:00.000Z');

export function sequentialIds(prefix: string): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

export function turn(overrides: Partial<Turn> & Pick<Turn, 'id' | 'role' | 'text'>): Turn {
  return {
    conversationId: 'conv-1',
    citations: [],
    status: { state: 'ok' },
    createdAt: CREATED_AT,
    ...overrides,
  };
}

export const SAMPLE_CONVERSATION: Conversation = {
  id: 'conv-1',
  createdAt: CREATED_AT,
  turns: [
    turn({ id: 't-1', role: 'user', text: 'What color is the sky?' }),
    turn({
      id: 't-2',
      role: 'assistant',
      text: 'The sky is blue [1].',
      citations: [{ marker: 1, documentId: 'sky', chunkId: 'sky:0', score: 0.5 }],
    }),
    turn({ id: 't-3', role: 'assistant', text: '', status: { state: 'failed', reason: 'Timeout' } }),
  ],
};

/**
 * In-process stand-in for the Redis commands the store issues.
 */
export class FakeRedis implements ConversationRedis {
  strings = new Map<string, string>();
  lists = new Map<string, string[]>();

  async createConversation(
    headerKey: string,
    header: string,
    turnsKey: string,
    turns: string[]
  ): Promise<boolean> {
    if ([headerKey, turnsKey].some((key) => this.strings.has(key) || this.lists.has(key))) {
      return false;
    }
    this.strings.set(headerKey, header);
    if (turns.length > 0) {
      this.lists.set(turnsKey, [...turns]);
    }
    return true;
  }

  async get(key: string): Promise<string | null> {
    return this.strings.get(key) ?? null;
  }

  async exists(key: string): Promise<boolean> {
    return this.strings.has(key) || this.lists.has(key);
  }

  async pushAll(key: string, values: string[]): Promise<void> {
    if (values.length === 0) return;
    this.lists.set(key, [...(this.lists.get(key) ?? []), ...values]);
  }

  async range(key: string): Promise<string[]> {
    return [...(this.lists.get(key) ?? [])];
  }
}
