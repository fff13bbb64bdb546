/**
 * Error taxonomy for the RAG core.
 *
 * Every error the pipeline raises on purpose extends RAGError and carries a
 * stable `code` that callers and logs can switch on.
 */

export type RAGErrorCode =
  | 'INVALID_CONFIG'
  | 'EXTRACTION_FAILED'
  | 'MODEL_UNAVAILABLE'
  | 'DIMENSION_MISMATCH'
  | 'CHUNK_NOT_FOUND'
  | 'GENERATION_FAILED'
  | 'CANCELLED'
  | 'RETRY_EXHAUSTED'
  | 'DOCUMENT_NOT_FOUND'
  | 'CONVERSATION_NOT_FOUND'
  | 'CONVERSATION_EXISTS'
  | 'INVALID_IMPORT';

export class RAGError extends Error {
  public readonly code: RAGErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: RAGErrorCode,
    message: string,
    options: { cause?: unknown; details?: Record<string, unknown> } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'RAGError';
    this.code = code;
    this.details = options.details;
  }
}

export class InvalidConfigError extends RAGError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_CONFIG', `Invalid configuration: ${issues.join('; ')}`, { details: { issues } });
    this.name = 'InvalidConfigError';
    this.issues = issues;
  }
}

export class ExtractionFailedError extends RAGError {
  public readonly reason: string;

  constructor(reason: string, cause?: unknown) {
    super('EXTRACTION_FAILED', `Text extraction failed: ${reason}`, { cause });
    this.name = 'ExtractionFailedError';
    this.reason = reason;
  }
}

export class ModelUnavailableError extends RAGError {
  public readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super('MODEL_UNAVAILABLE', message, { cause: options.cause, details: { status: options.status } });
    this.name = 'ModelUnavailableError';
    this.status = options.status;
  }
}

export class DimensionMismatchError extends RAGError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number, where: string, measure: 'dimension' | 'count' = 'dimension') {
    super(
      'DIMENSION_MISMATCH',
      measure === 'dimension'
        ? `${where}: expected vectors of dimension ${expected}, got ${actual}`
        : `${where}: expected ${expected} vectors, got ${actual}`,
      { details: { expected, actual, measure } }
    );
    this.name = 'DimensionMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class ChunkNotFoundError extends RAGError {
  public readonly chunkId: string;

  constructor(chunkId: string) {
    super('CHUNK_NOT_FOUND', `Chunk ${chunkId} is indexed but missing from document storage`, {
      details: { chunkId },
    });
    this.name = 'ChunkNotFoundError';
    this.chunkId = chunkId;
  }
}

export type GenerationFailureReason = 'Unavailable' | 'Timeout';

export class GenerationFailedError extends RAGError {
  public readonly reason: GenerationFailureReason;

  constructor(reason: GenerationFailureReason, cause?: unknown) {
    super('GENERATION_FAILED', `Answer generation failed: ${reason}`, { cause });
    this.name = 'GenerationFailedError';
    this.reason = reason;
  }
}

export class CancelledError extends RAGError {
  constructor(message = 'Operation cancelled', cause?: unknown) {
    super('CANCELLED', message, { cause });
    this.name = 'CancelledError';
  }
}

export class RetryExhaustedError extends RAGError {
  public readonly attempts: number;

  constructor(attempts: number, lastError: unknown) {
    super('RETRY_EXHAUSTED', `Gave up after ${attempts} attempts: ${getErrorMessage(lastError)}`, {
      cause: lastError,
      details: { attempts },
    });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
  }
}

export class DocumentNotFoundError extends RAGError {
  constructor(documentId: string) {
    super('DOCUMENT_NOT_FOUND', `Document ${documentId} not found`, { details: { documentId } });
    this.name = 'DocumentNotFoundError';
  }
}

export class ConversationNotFoundError extends RAGError {
  constructor(conversationId: string) {
    super('CONVERSATION_NOT_FOUND', `Conversation ${conversationId} not found`, {
      details: { conversationId },
    });
    this.name = 'ConversationNotFoundError';
  }
}

export class ConversationExistsError extends RAGError {
  constructor(conversationId: string) {
    super('CONVERSATION_EXISTS', `Conversation ${conversationId} already exists`, {
      details: { conversationId },
    });
    this.name = 'ConversationExistsError';
  }
}

export class InvalidImportError extends RAGError {
  constructor(message: string, cause?: unknown) {
    super('INVALID_IMPORT', `Cannot import conversation: ${message}`, { cause });
    this.name = 'InvalidImportError';
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function isRAGError(error: unknown): error is RAGError {
  return error instanceof RAGError;
}

/**
 * Render any thrown value as a message.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Wrap a non-Error thrown value.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
