/**
 * Citation Utilities
 *
 * Reads citation markers back out of generated answers and renders source
 * lists for exports.
 */

import type { SourceCitation } from '@/types/rag';

// Match both [Citation N] and [N] formats
const CITATION_REGEX = /\[Citation\s*(\d+)\]|\[(\d+)\]/gi;

function* markerNumbers(answer: string): Generator<number> {
  const regex = new RegExp(CITATION_REGEX.source, CITATION_REGEX.flags);
  let match: RegExpExecArray | null;
  while ((match = regex.exec(answer)) !== null) {
    // match[1] is from [Citation N], match[2] is from [N]
    yield parseInt(match[1] ?? match[2], 10);
  }
}

/**
 * Markers in `answer` that refer to one of `count` passages, ascending and
 * without repeats.
 */
export function parseCitationMarkers(answer: string, count: number): number[] {
  const used = new Set<number>();
  for (const num of markerNumbers(answer)) {
    if (num > 0 && num <= count) {
      used.add(num);
    }
  }
  return Array.from(used).sort((a, b) => a - b);
}

export interface CitationCheck {
  isValid: boolean;
  hasCitations: boolean;
  /** Markers that point at no passage, in order of appearance. */
  invalidMarkers: number[];
  /** Passages the answer never cites. */
  unusedMarkers: number[];
}

/**
 * Check how an answer uses the citations it was given.
 */
export function validateCitations(answer: string, citations: SourceCitation[]): CitationCheck {
  const known = new Set(citations.map((citation) => citation.marker));
  const used = new Set<number>();
  const invalidMarkers: number[] = [];

  for (const num of markerNumbers(answer)) {
    if (known.has(num)) {
      used.add(num);
    } else {
      invalidMarkers.push(num);
    }
  }

  return {
    isValid: invalidMarkers.length === 0,
    hasCitations: used.size > 0,
    invalidMarkers,
    unusedMarkers: citations.map((citation) => citation.marker).filter((marker) => !used.has(marker)),
  };
}

/**
 * Generate a Markdown sources section for a turn.
 */
export function formatSourcesSection(citations: SourceCitation[]): string {
  if (citations.length === 0) {
    return '';
  }

  const lines = ['**Sources:**'];
  for (const citation of citations) {
    lines.push(
      `- [${citation.marker}] ${citation.documentId} (chunk ${citation.chunkId}, score ${citation.score.toFixed(3)})`
    );
  }
  return lines.join('\n');
}
