/**
 * Conversation serialization.
 *
 * The JSON export format is also what the Redis store keeps per turn, so
 * both go through the same zod schemas.
 */

import { z } from 'zod';
import type { Conversation, Turn } from '@/types/rag';

export const EXPORT_FORMAT_VERSION = 1;

// =============================================================================
// Schemas
// =============================================================================

const citationSchema = z.object({
  marker: z.number().int().positive(),
  documentId: z.string().min(1),
  chunkId: z.string().min(1),
  score: z.number(),
});

const statusSchema = z.discriminatedUnion('state', [
  z.object({ state: z.literal('ok') }),
  z.object({ state: z.literal('failed'), reason: z.string() }),
]);

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

export const turnSchema = z.object({
  id: z.string().min(1),
  conversationId: z.string().min(1),
  role: z.enum(['user', 'assistant']),
  text: z.string(),
  citations: z.array(citationSchema),
  status: statusSchema,
  createdAt: isoDate,
});

export const conversationSchema = z
  .object({
    version: z.literal(EXPORT_FORMAT_VERSION),
    id: z.string().min(1),
    createdAt: isoDate,
    turns: z.array(turnSchema),
  })
  .superRefine((conversation, ctx) => {
    conversation.turns.forEach((turn, index) => {
      if (turn.conversationId !== conversation.id) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['turns', index, 'conversationId'],
          message: `must equal the conversation id "${conversation.id}"`,
        });
      }
    });
  });

// =============================================================================
// Turns
// =============================================================================

export interface SerializedTurn {
  id: string;
  conversationId: string;
  role: Turn['role'];
  text: string;
  citations: Turn['citations'];
  status: Turn['status'];
  createdAt: string;
}

export function serializeTurn(turn: Turn): SerializedTurn {
  return {
    id: turn.id,
    conversationId: turn.conversationId,
    role: turn.role,
    text: turn.text,
    citations: turn.citations.map((citation) => ({ ...citation })),
    status: turn.status.state === 'ok' ? { state: 'ok' } : { state: 'failed', reason: turn.status.reason },
    createdAt: turn.createdAt.toISOString(),
  };
}

/**
 * Parse a turn as stored by serializeTurn. Throws ZodError on malformed input.
 */
export function parseTurn(json: string): Turn {
  return turnSchema.parse(JSON.parse(json));
}

// =============================================================================
// Conversations
// =============================================================================

export interface SerializedConversation {
  version: typeof EXPORT_FORMAT_VERSION;
  id: string;
  createdAt: string;
  turns: SerializedTurn[];
}

export function serializeConversation(conversation: Conversation): SerializedConversation {
  return {
    version: EXPORT_FORMAT_VERSION,
    id: conversation.id,
    createdAt: conversation.createdAt.toISOString(),
    turns: conversation.turns.map(serializeTurn),
  };
}
