/**
 * Conversation Manager
 *
 * Append-only turn log per conversation. Appends to one conversation are
 * serialized; different conversations never wait on each other.
 */

import { randomUUID } from 'crypto';
import { ZodError } from 'zod';
import type { Conversation, ExportFormat, Turn, TurnDraft } from '@/types/rag';
import { KeyedMutex } from '@/lib/concurrency';
import {
  ConversationExistsError,
  ConversationNotFoundError,
  InvalidImportError,
  getErrorMessage,
} from '@/lib/errors';
import { logger, type Logger } from '@/lib/logger';
import { renderConversation } from './export';
import { conversationSchema } from './serialize';
import type { ConversationStore } from './store';

const log = logger.child({ layer: 'conversation', service: 'ConversationManager' });

export interface ConversationManagerOptions {
  generateId?: () => string;
  now?: () => Date;
  log?: Logger;
}

export class ConversationManager {
  private store: ConversationStore;
  private mutex = new KeyedMutex();
  private generateId: () => string;
  private now: () => Date;
  private log: Logger;

  constructor(store: ConversationStore, options: ConversationManagerOptions = {}) {
    this.store = store;
    this.generateId = options.generateId ?? randomUUID;
    this.now = options.now ?? (() => new Date());
    this.log = options.log ?? log;
  }

  async create(): Promise<Conversation> {
    const conversation: Conversation = { id: this.generateId(), createdAt: this.now(), turns: [] };
    const created = await this.store.create({ id: conversation.id, createdAt: conversation.createdAt });
    if (!created) {
      throw new ConversationExistsError(conversation.id);
    }
    this.log.info({ event: 'conversation_created', conversationId: conversation.id }, 'Conversation created');
    return conversation;
  }

  /**
   * @throws ConversationNotFoundError
   */
  async get(conversationId: string): Promise<Conversation> {
    const header = await this.store.get(conversationId);
    if (!header) {
      throw new ConversationNotFoundError(conversationId);
    }
    const turns = await this.store.listTurns(conversationId);
    return { id: header.id, createdAt: header.createdAt, turns };
  }

  async exists(conversationId: string): Promise<boolean> {
    return this.store.exists(conversationId);
  }

  /**
   * Record a turn. The turn is either fully stored or not at all.
   */
  async append(conversationId: string, draft: TurnDraft): Promise<Turn> {
    return this.mutex.runExclusive(conversationId, async () => {
      if (!(await this.store.exists(conversationId))) {
        throw new ConversationNotFoundError(conversationId);
      }

      const turn: Turn = {
        id: this.generateId(),
        conversationId,
        role: draft.role,
        text: draft.text,
        citations: (draft.citations ?? []).map((citation) => ({ ...citation })),
        status: draft.status ?? { state: 'ok' },
        createdAt: this.now(),
      };

      await this.store.appendTurn(turn);

      this.log.debug(
        {
          event: 'turn_appended',
          conversationId,
          turnId: turn.id,
          role: turn.role,
          state: turn.status.state,
          citations: turn.citations.length,
        },
        'Turn appended'
      );

      return turn;
    });
  }

  /**
   * Turns appended before the call began, in append order.
   */
  async history(conversationId: string): Promise<Turn[]> {
    return (await this.get(conversationId)).turns;
  }

  async export(conversationId: string, format: ExportFormat): Promise<Buffer> {
    return renderConversation(await this.get(conversationId), format);
  }

  /**
   * Import a conversation from the JSON export format, keeping its id.
   *
   * @throws InvalidImportError if the payload is not a valid export
   * @throws ConversationExistsError if the id is already in use
   */
  async import(bytes: Buffer | string): Promise<Conversation> {
    const raw = typeof bytes === 'string' ? bytes : bytes.toString('utf8');

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      throw new InvalidImportError(`not valid JSON (${getErrorMessage(error)})`, error);
    }

    let conversation: Conversation;
    try {
      const parsed = conversationSchema.parse(payload);
      conversation = { id: parsed.id, createdAt: parsed.createdAt, turns: parsed.turns };
    } catch (error) {
      if (error instanceof ZodError) {
        const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new InvalidImportError(issues.join('; '), error);
      }
      throw error;
    }

    return this.mutex.runExclusive(conversation.id, async () => {
      const created = await this.store.create(
        { id: conversation.id, createdAt: conversation.createdAt },
        conversation.turns
      );
      if (!created) {
        throw new ConversationExistsError(conversation.id);
      }
      this.log.info(
        { event: 'conversation_imported', conversationId: conversation.id, turns: conversation.turns.length },
        'Conversation imported'
      );
      return conversation;
    });
  }
}
