/**
 * Prompt Input Sanitization
 *
 * Neutralizes sequences in user questions and document text that could be
 * mistaken for prompt structure, and flags common injection phrasing.
 */

import { logger, truncateText as logTruncate } from '@/lib/logger';

const log = logger.child({ layer: 'rag', service: 'sanitize' });

// =============================================================================
// Configuration
// =============================================================================

export const MAX_LENGTHS = {
  USER_QUESTION: 2000,
} as const;

/**
 * Phrasing that often signals an injection attempt.
 * Flagged for logging; the system prompt carries the actual defense.
 */
const INJECTION_PATTERNS: Array<{ name: string; pattern: RegExp }> = [
  { name: 'instruction_override', pattern: /(ignore|disregard)\s+(all\s+)?(previous|prior|above)\s+(instructions?|prompts?|rules?)/i },
  { name: 'role_change', pattern: /you\s+are\s+(now|actually)\s+(a|an|the)\b/i },
  { name: 'pretend', pattern: /pretend\s+(to\s+be|you('re| are))/i },
  { name: 'prompt_extraction', pattern: /(reveal|print|show|output)\s+(me\s+)?(your|the)\s+(system\s+)?(prompt|instructions)/i },
  { name: 'boundary_marker', pattern: /<<<\s*(system|end|user|context)/i },
];

/**
 * Sequences rewritten before text is placed in a prompt.
 */
const ESCAPE_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  // Boundary markers used by prompts.ts
  { pattern: /<<<+/g, replacement: '< < <' },
  { pattern: />>>+/g, replacement: '> > >' },
  { pattern: /<\/?(system|instruction|prompt)>/gi, replacement: '[$1]' },
  // Control characters except tab and newline
  { pattern: /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, replacement: '' },
];

// =============================================================================
// Functions
// =============================================================================

/**
 * Names of the injection patterns found in `text`.
 */
export function detectInjectionPatterns(text: string): string[] {
  return INJECTION_PATTERNS.filter(({ pattern }) => pattern.test(text)).map(({ name }) => name);
}

/**
 * Rewrite prompt-structure sequences. Pure; used on document text.
 */
export function escapePromptText(text: string): string {
  let result = text;
  for (const { pattern, replacement } of ESCAPE_PATTERNS) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

/**
 * Truncate text to a maximum length, preferring a word boundary.
 */
export function truncateText(text: string, maxLength: number): { text: string; truncated: boolean } {
  if (text.length <= maxLength) {
    return { text, truncated: false };
  }

  let truncated = text.slice(0, maxLength);
  const lastSpace = truncated.lastIndexOf(' ');

  if (lastSpace > maxLength * 0.8) {
    truncated = truncated.slice(0, lastSpace);
  }

  return { text: `${truncated}...`, truncated: true };
}

/**
 * Sanitize a user question for the prompt.
 */
export function sanitizeQuestion(question: string): string {
  const trimmed = question.trim();
  const detected = detectInjectionPatterns(trimmed);

  if (detected.length > 0) {
    log.warn(
      { event: 'injection_patterns_detected', patterns: detected, input: logTruncate(trimmed, 100) },
      'Potential injection patterns detected'
    );
  }

  return truncateText(escapePromptText(trimmed), MAX_LENGTHS.USER_QUESTION).text;
}
