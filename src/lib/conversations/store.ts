/**
 * Conversation persistence contract.
 *
 * Append-only: a store never rewrites or removes a turn.
 */

import type { Turn } from '@/types/rag';

export interface ConversationHeader {
  id: string;
  createdAt: Date;
}

export interface ConversationStore {
  /**
   * Create a conversation, optionally with turns already in it (import).
   * Returns false and changes nothing if the id is taken.
   */
  create(header: ConversationHeader, turns?: Turn[]): Promise<boolean>;
  get(conversationId: string): Promise<ConversationHeader | null>;
  exists(conversationId: string): Promise<boolean>;
  appendTurn(turn: Turn): Promise<void>;
  /** Turns in append order. */
  listTurns(conversationId: string): Promise<Turn[]>;
}
