/**
 * Conversation export formats.
 *
 * Each renderer is a pure function of the conversation.
 */

import type { Conversation, ExportFormat, Turn } from '@/types/rag';
import { formatSourcesSection } from '@/lib/rag/citations';
import { serializeConversation } from './serialize';

function statusLabel(turn: Turn): string {
  return turn.status.state === 'failed' ? ` (failed: ${turn.status.reason})` : '';
}

function roleTitle(turn: Turn): string {
  return turn.role === 'user' ? 'User' : 'Assistant';
}

export function renderJson(conversation: Conversation): string {
  return `${JSON.stringify(serializeConversation(conversation), null, 2)}\n`;
}

export function renderText(conversation: Conversation): string {
  const lines = [`Conversation ${conversation.id}`, `Created: ${conversation.createdAt.toISOString()}`, ''];

  for (const turn of conversation.turns) {
    lines.push(`[${turn.createdAt.toISOString()}] ${turn.role}${statusLabel(turn)}: ${turn.text}`);
    if (turn.citations.length > 0) {
      const sources = turn.citations
        .map((citation) => `[${citation.marker}] ${citation.chunkId} (${citation.score.toFixed(3)})`)
        .join(', ');
      lines.push(`  Sources: ${sources}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

export function renderMarkdown(conversation: Conversation): string {
  const sections = [`# Conversation ${conversation.id}`, `_Created ${conversation.createdAt.toISOString()}_`];

  for (const turn of conversation.turns) {
    sections.push(`## ${roleTitle(turn)}${statusLabel(turn)}`);
    if (turn.text) {
      sections.push(turn.text);
    } else if (turn.status.state === 'failed') {
      sections.push('_No answer was generated._');
    }
    const sources = formatSourcesSection(turn.citations);
    if (sources) {
      sections.push(sources);
    }
  }

  return `${sections.join('\n\n')}\n`;
}

export function renderConversation(conversation: Conversation, format: ExportFormat): Buffer {
  switch (format) {
    case 'json':
      return Buffer.from(renderJson(conversation), 'utf8');
    case 'text':
      return Buffer.from(renderText(conversation), 'utf8');
    case 'markdown':
      return Buffer.from(renderMarkdown(conversation), 'utf8');
  }
}
