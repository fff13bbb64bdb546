/**
 * Document Chunker
 *
 * Splits extracted text into overlapping fixed-size windows. Sizes count
 * code points, so a surrogate pair is never split. Offsets are string
 * indexes into the text exactly as given; nothing is normalized, so a
 * chunk's text is always `text.slice(startOffset, endOffset)`.
 */

import { InvalidConfigError } from '@/lib/errors';
import type { Chunk } from '@/types/rag';

// =============================================================================
// Types
// =============================================================================

export interface TextSpan {
  text: string;
  startOffset: number;
  endOffset: number;
}

export interface ChunkOptions {
  size: number;
  overlap: number;
}

// =============================================================================
// Chunking Functions
// =============================================================================

export function validateChunkOptions(size: number, overlap: number): void {
  const issues: string[] = [];
  if (!Number.isInteger(size) || size <= 0) {
    issues.push(`chunk size must be a positive integer, got ${size}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    issues.push(`chunk overlap must be a non-negative integer, got ${overlap}`);
  } else if (overlap >= size) {
    issues.push(`chunk overlap (${overlap}) must be smaller than chunk size (${size})`);
  }
  if (issues.length > 0) {
    throw new InvalidConfigError(issues);
  }
}

/**
 * String index of every code point, followed by the text length.
 */
function codePointBoundaries(text: string): number[] {
  const boundaries: number[] = [];
  let offset = 0;
  for (const char of text) {
    boundaries.push(offset);
    offset += char.length;
  }
  boundaries.push(offset);
  return boundaries;
}

/**
 * Slide a window of `size` characters over `text`, advancing by
 * `size - overlap`. Every window start below the text length yields a span,
 * so the last span may be shorter than `size`.
 */
export function chunkText(text: string, size: number, overlap: number): TextSpan[] {
  validateChunkOptions(size, overlap);

  if (text.trim().length === 0) {
    return [];
  }

  const boundaries = codePointBoundaries(text);
  const length = boundaries.length - 1;
  const step = size - overlap;
  const spans: TextSpan[] = [];

  for (let start = 0; start < length; start += step) {
    const startOffset = boundaries[start];
    const endOffset = boundaries[Math.min(start + size, length)];
    spans.push({ text: text.slice(startOffset, endOffset), startOffset, endOffset });
  }

  return spans;
}

/**
 * Chunk a document's text into Chunk records with ids derived from the
 * document id and sequence index.
 */
export function chunkDocument(documentId: string, text: string, options: ChunkOptions): Chunk[] {
  return chunkText(text, options.size, options.overlap).map((span, index) => ({
    id: chunkIdFor(documentId, index),
    documentId,
    text: span.text,
    startOffset: span.startOffset,
    endOffset: span.endOffset,
    index,
    embeddingId: null,
  }));
}

export function chunkIdFor(documentId: string, index: number): string {
  return `${documentId}:${index}`;
}

/**
 * Estimate token count (rough approximation: ~4 chars per token for English).
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
