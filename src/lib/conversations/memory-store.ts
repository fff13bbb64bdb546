/**
 * In-process conversation store.
 */

import type { Turn } from '@/types/rag';
import type { ConversationHeader, ConversationStore } from './store';

interface StoredConversation {
  header: ConversationHeader;
  turns: Turn[];
}

function copyTurn(turn: Turn): Turn {
  return {
    ...turn,
    citations: turn.citations.map((citation) => ({ ...citation })),
    status: { ...turn.status },
    createdAt: new Date(turn.createdAt),
  };
}

export class MemoryConversationStore implements ConversationStore {
  private conversations = new Map<string, StoredConversation>();

  async create(header: ConversationHeader, turns: Turn[] = []): Promise<boolean> {
    if (this.conversations.has(header.id)) {
      return false;
    }
    this.conversations.set(header.id, {
      header: { id: header.id, createdAt: new Date(header.createdAt) },
      turns: turns.map(copyTurn),
    });
    return true;
  }

  async get(conversationId: string): Promise<ConversationHeader | null> {
    const stored = this.conversations.get(conversationId);
    return stored ? { id: stored.header.id, createdAt: new Date(stored.header.createdAt) } : null;
  }

  async exists(conversationId: string): Promise<boolean> {
    return this.conversations.has(conversationId);
  }

  async appendTurn(turn: Turn): Promise<void> {
    const stored = this.conversations.get(turn.conversationId);
    if (!stored) {
      throw new Error(`Conversation ${turn.conversationId} does not exist`);
    }
    stored.turns.push(copyTurn(turn));
  }

  async listTurns(conversationId: string): Promise<Turn[]> {
    return (this.conversations.get(conversationId)?.turns ?? []).map(copyTurn);
  }
}
