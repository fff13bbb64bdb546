/**
 * Context Assembler
 *
 * Packs ranked chunks into a bounded prompt context. Each included chunk
 * becomes a block labeled with its citation marker:
 *
 *   [1] (Source: handbook.md)
 *   chunk text
 *
 * Blocks are separated by a blank line.
 */

import type { RetrievedChunk, SourceCitation } from '@/types/rag';
import { escapePromptText } from '@/lib/llm/sanitize';
import { estimateTokens } from './chunker';

const BLOCK_SEPARATOR = '\n\n';

export interface AssemblyResult {
  context: string;
  /** One per included block, in inclusion order. */
  citations: SourceCitation[];
  /** Estimated tokens of `context`. */
  tokens: number;
  /** Chunks skipped because their text was already included. */
  duplicates: number;
  /** Chunks left out once the budget was reached. */
  truncated: number;
}

export function formatContextBlock(marker: number, source: string, text: string): string {
  return `[${marker}] (Source: ${escapePromptText(source)})\n${escapePromptText(text)}`;
}

/**
 * Assemble chunks in the given order until the next block would exceed
 * `tokenBudget`.
 *
 * A chunk whose text occurs inside text already included from the same
 * document is skipped. `sources` maps document ids to the name shown in
 * the block; unknown ids show the id itself.
 */
export function assembleContext(
  chunks: RetrievedChunk[],
  tokenBudget: number,
  sources: ReadonlyMap<string, string> = new Map()
): AssemblyResult {
  const included = new Map<string, string[]>();
  const citations: SourceCitation[] = [];
  let context = '';
  let duplicates = 0;
  let truncated = 0;

  for (let i = 0; i < chunks.length; i++) {
    const chunk = chunks[i];
    const seen = included.get(chunk.documentId) ?? [];

    if (seen.some((text) => text.includes(chunk.text))) {
      duplicates++;
      continue;
    }

    const marker = citations.length + 1;
    const block = formatContextBlock(marker, sources.get(chunk.documentId) ?? chunk.documentId, chunk.text);
    const candidate = context ? `${context}${BLOCK_SEPARATOR}${block}` : block;

    if (estimateTokens(candidate) > tokenBudget) {
      truncated = chunks.length - i;
      break;
    }

    context = candidate;
    seen.push(chunk.text);
    included.set(chunk.documentId, seen);
    citations.push({
      marker,
      documentId: chunk.documentId,
      chunkId: chunk.id,
      score: chunk.score,
    });
  }

  return { context, citations, tokens: estimateTokens(context), duplicates, truncated };
}
