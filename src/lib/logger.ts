/**
 * Structured Logging System
 *
 * Pino-based logging with:
 * - Operation tracing via traceId
 * - Environment-based configuration
 * - Sensitive data sanitization
 * - Layer-specific child loggers
 * - Timing utilities
 */

import pino, { Logger, LoggerOptions } from 'pino';
import { randomUUID } from 'crypto';

// =============================================================================
// Configuration
// =============================================================================

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const IS_PRODUCTION = process.env.NODE_ENV === 'production';
const IS_TEST = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

/**
 * Pino configuration options
 */
const pinoOptions: LoggerOptions = {
  level: LOG_LEVEL,
  // JSON in production and tests, pretty print in development
  ...(IS_PRODUCTION || IS_TEST
    ? {
        formatters: {
          level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.isoTime,
      }
    : {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
          },
        },
      }),
};

// =============================================================================
// Main Logger Instance
// =============================================================================

/**
 * Root logger instance.
 * Use child loggers for specific contexts.
 */
export const logger: Logger = pino(pinoOptions);

// =============================================================================
// Operation Context
// =============================================================================

/**
 * Context for tracing one ingestion job or one question through the pipeline.
 */
export interface RequestContext {
  traceId: string;
  documentId?: string;
  conversationId?: string;
  operation?: string;
  startTime: number;
}

/**
 * Generate a new operation context with unique traceId
 */
export function createRequestContext(options?: {
  documentId?: string;
  conversationId?: string;
  operation?: string;
}): RequestContext {
  return {
    traceId: randomUUID(),
    documentId: options?.documentId,
    conversationId: options?.conversationId,
    operation: options?.operation,
    startTime: Date.now(),
  };
}

/**
 * Create a child logger bound to an operation context
 */
export function createRequestLogger(ctx: RequestContext, base: Logger = logger): Logger {
  return base.child({
    traceId: ctx.traceId,
    ...(ctx.documentId && { documentId: ctx.documentId }),
    ...(ctx.conversationId && { conversationId: ctx.conversationId }),
    ...(ctx.operation && { operation: ctx.operation }),
  });
}

// =============================================================================
// Layer-Specific Loggers
// =============================================================================

export type LogLayer = 'rag' | 'ingest' | 'db' | 'external' | 'conversation' | 'cache';

/**
 * Create a child logger for a specific layer
 */
export function createLayerLogger(
  layer: LogLayer,
  ctx?: RequestContext,
  base: Logger = logger
): Logger {
  const parent = ctx ? createRequestLogger(ctx, base) : base;
  return parent.child({ layer });
}

// =============================================================================
// Sanitization Utilities
// =============================================================================

const MAX_TEXT_LENGTH = 200;
const MAX_EMBEDDING_PREVIEW = 5;

/**
 * Patterns for detecting sensitive data
 */
const SENSITIVE_PATTERNS = [
  /sk-[a-zA-Z0-9_-]{20,}/g, // OpenAI API keys
  /postgres(ql)?:\/\/[^@\s]+@/g, // Database URLs with credentials
  /redis:\/\/[^@\s]+@/g, // Redis URLs with credentials
  /Bearer [a-zA-Z0-9._-]+/g, // Bearer tokens
  /password[=:]\s*["']?[^"'\s]+/gi, // Password values
  /api[_-]?key[=:]\s*["']?[^"'\s]+/gi, // API key values
];

/**
 * Sanitize a string by redacting sensitive patterns
 */
export function sanitizeString(value: string): string {
  let sanitized = value;
  for (const pattern of SENSITIVE_PATTERNS) {
    sanitized = sanitized.replace(pattern, '[REDACTED]');
  }
  return sanitized;
}

/**
 * Truncate text content for logging
 */
export function truncateText(text: string, maxLength = MAX_TEXT_LENGTH): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength)}... (${text.length} chars total)`;
}

/**
 * Sanitize embedding vectors (show only preview)
 */
export function sanitizeEmbedding(
  embedding: number[]
): { preview: number[]; dimensions: number } {
  return {
    preview: embedding.slice(0, MAX_EMBEDDING_PREVIEW),
    dimensions: embedding.length,
  };
}

function isNumberArray(value: unknown[]): value is number[] {
  return value.every((item) => typeof item === 'number');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Sanitize an object for logging
 */
export function sanitizeForLogging(
  obj: Record<string, unknown>,
  options?: {
    truncateKeys?: string[];
    redactKeys?: string[];
  }
): Record<string, unknown> {
  const { truncateKeys = [], redactKeys = [] } = options || {};
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (redactKeys.includes(key)) {
      result[key] = '[REDACTED]';
      continue;
    }

    if (typeof value === 'string') {
      const clean = sanitizeString(value);
      result[key] = truncateKeys.includes(key) ? truncateText(clean) : clean;
    } else if (Array.isArray(value) && value.length > 0 && isNumberArray(value)) {
      // Likely an embedding vector
      result[key] = sanitizeEmbedding(value);
    } else if (isRecord(value)) {
      result[key] = sanitizeForLogging(value, options);
    } else {
      result[key] = value;
    }
  }

  return result;
}

// =============================================================================
// Timing Utilities
// =============================================================================

/**
 * Timing information attached to pipeline results
 */
export interface TimingInfo {
  traceId: string;
  retrieval_ms?: number;
  embedding_ms?: number;
  llm_ms?: number;
  total_ms: number;
  [key: string]: number | string | undefined;
}

/**
 * Timer class for tracking operation durations
 */
export class Timer {
  private startTime: number;
  private marks: Map<string, number> = new Map();
  private durations: Map<string, number> = new Map();

  constructor() {
    this.startTime = Date.now();
  }

  /**
   * Mark the start of an operation
   */
  mark(name: string): void {
    this.marks.set(name, Date.now());
  }

  /**
   * Record the duration since a mark
   */
  measure(name: string): number {
    const markTime = this.marks.get(name);
    if (markTime === undefined) {
      return 0;
    }
    const duration = Date.now() - markTime;
    this.durations.set(name, duration);
    return duration;
  }

  elapsed(): number {
    return Date.now() - this.startTime;
  }

  getAllDurations(): Record<string, number> {
    const result: Record<string, number> = {};
    for (const [key, value] of this.durations) {
      result[`${key}_ms`] = value;
    }
    return result;
  }

  toTimingInfo(traceId: string): TimingInfo {
    return {
      traceId,
      ...this.getAllDurations(),
      total_ms: this.elapsed(),
    };
  }
}

// =============================================================================
// Logging Helpers
// =============================================================================

// Provider and driver errors can echo keys or connection strings.
const FREE_TEXT_KEYS = ['error', 'reason'];

function cleanDetails(details: Record<string, unknown>): Record<string, unknown> {
  return sanitizeForLogging(details, { truncateKeys: FREE_TEXT_KEYS });
}

function cleanError(error: string): string {
  return truncateText(sanitizeString(error));
}

/**
 * Log a database operation
 */
export function logDbOperation(
  log: Logger,
  operation: string,
  details: {
    table?: string;
    rows?: number;
    duration_ms: number;
    error?: string;
  }
): void {
  const fields = { event: 'db_operation', operation, ...cleanDetails(details) };

  if (details.error) {
    log.error(fields, `Database ${operation} failed: ${cleanError(details.error)}`);
  } else {
    log.debug(fields, `Database ${operation} completed`);
  }
}

/**
 * Log an external service call
 */
export function logExternalCall(
  log: Logger,
  service: 'openai' | 'postgres' | 'redis' | 'other',
  operation: string,
  details: {
    duration_ms?: number;
    status?: number | string;
    error?: string;
    tokens?: number;
    model?: string;
    attempt?: number;
  }
): void {
  const baseLog = {
    event: 'external_call',
    service,
    operation,
    ...cleanDetails(details),
  };

  if (details.error) {
    log.error(baseLog, `${service} ${operation} failed: ${cleanError(details.error)}`);
  } else {
    log.debug(baseLog, `${service} ${operation} completed`);
  }
}

/**
 * Log RAG pipeline step
 */
export function logRagStep(
  log: Logger,
  step: 'chunking' | 'embedding' | 'indexing' | 'retrieval' | 'assembly' | 'generation' | 'rollback',
  details: {
    duration_ms?: number;
    chunks?: number;
    tokens?: number;
    dropped?: number;
    model?: string;
    error?: string;
  }
): void {
  const baseLog = {
    event: `rag_${step}`,
    ...cleanDetails(details),
  };

  if (details.error) {
    log.error(baseLog, `RAG ${step} failed: ${cleanError(details.error)}`);
  } else {
    log.debug(baseLog, `RAG ${step} completed`);
  }
}

/**
 * Log a document lifecycle transition
 */
export function logIngestionTransition(
  log: Logger,
  details: {
    documentId: string;
    revision: number;
    from: string;
    to: string;
    reason?: string;
  }
): void {
  const level = details.to === 'failed' ? 'warn' : 'info';
  log[level](
    { event: 'document_transition', ...cleanDetails(details) },
    `Document ${details.documentId} ${details.from} -> ${details.to}`
  );
}

// =============================================================================
// Export Types
// =============================================================================

export type { Logger } from 'pino';
