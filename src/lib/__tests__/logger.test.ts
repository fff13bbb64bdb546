/**
 * Tests for Logger Utilities
 */

import { describe, it, expect, vi } from 'vitest';
import {
  logger,
  createRequestContext,
  createRequestLogger,
  createLayerLogger,
  sanitizeString,
  truncateText,
  sanitizeEmbedding,
  sanitizeForLogging,
  Timer,
  logDbOperation,
  logExternalCall,
  logRagStep,
  logIngestionTransition,
} from '../logger';

function spyLogger() {
  const log = logger.child({ test: true });
  return {
    log,
    debug: vi.spyOn(log, 'debug'),
    info: vi.spyOn(log, 'info'),
    warn: vi.spyOn(log, 'warn'),
    error: vi.spyOn(log, 'error'),
  };
}

// =============================================================================
// Context Tests
// =============================================================================

describe('createRequestContext', () => {
  it('should create contexts with unique UUID trace ids', () => {
    const ctx1 = createRequestContext();
    const ctx2 = createRequestContext();
    const uuidRegex = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

    expect(ctx1.traceId).toMatch(uuidRegex);
    expect(ctx1.traceId).not.toBe(ctx2.traceId);
  });

  it('should include optional parameters', () => {
    const ctx = createRequestContext({ documentId: 'doc-1', operation: 'ingest' });

    expect(ctx.documentId).toBe('doc-1');
    expect(ctx.operation).toBe('ingest');
    expect(ctx.conversationId).toBeUndefined();
  });
});

describe('createRequestLogger', () => {
  it('should bind the trace id and the set fields only', () => {
    const ctx = createRequestContext({ conversationId: 'conv-1' });
    const bindings = createRequestLogger(ctx).bindings();

    expect(bindings).toEqual({ traceId: ctx.traceId, conversationId: 'conv-1' });
  });
});

describe('createLayerLogger', () => {
  it('should bind the layer', () => {
    expect(createLayerLogger('ingest').bindings()).toEqual({ layer: 'ingest' });
  });

  it('should include the operation context', () => {
    const ctx = createRequestContext({ documentId: 'doc-1' });

    expect(createLayerLogger('rag', ctx).bindings()).toEqual({
      traceId: ctx.traceId,
      documentId: 'doc-1',
      layer: 'rag',
    });
  });

  it('should derive from a given base logger', () => {
    const base = logger.child({ app: 'cli' });
    expect(createLayerLogger('db', undefined, base).bindings()).toEqual({ app: 'cli', layer: 'db' });
  });
});

// =============================================================================
// Sanitization Tests
// =============================================================================

describe('sanitizeString', () => {
  it('should redact OpenAI API keys', () => {
    expect(sanitizeString('Using key sk-1234567890abcdefghijklmnop')).toBe('Using key [REDACTED]');
  });

  it('should redact credentials in connection URLs', () => {
    expect(sanitizeString('DB: postgres://user:pw@host:5432/db')).toBe('DB: [REDACTED]host:5432/db');
    expect(sanitizeString('redis://:test-secret@localhost:6379')).toBe('[REDACTED]localhost:6379');
  });

  it('should redact Bearer tokens', () => {
    expect(sanitizeString('Authorization: Bearer abc.def')).toBe('Authorization: [REDACTED]');
  });

  it('should redact password values', () => {
    expect(sanitizeString('password=test-secret')).toBe('[REDACTED]');
  });

  it('should leave safe strings unchanged', () => {
    expect(sanitizeString('This is a normal log message')).toBe('This is a normal log message');
  });
});

describe('truncateText', () => {
  it('should not truncate short text', () => {
    expect(truncateText('Short text')).toBe('Short text');
  });

  it('should truncate to the limit and note the length', () => {
    expect(truncateText('abcdefghij', 4)).toBe('abcd... (10 chars total)');
  });
});

describe('sanitizeEmbedding', () => {
  it('should keep a five-value preview and the width', () => {
    expect(sanitizeEmbedding([1, 2, 3, 4, 5, 6, 7])).toEqual({ preview: [1, 2, 3, 4, 5], dimensions: 7 });
  });
});

describe('sanitizeForLogging', () => {
  it('should redact, truncate and summarize nested values', () => {
    const result = sanitizeForLogging(
      {
        apiKey: 'anything',
        chunk: 'x'.repeat(250),
        vector: [0.1, 0.2],
        nested: { url: 'postgres://user:pw@db/app' },
        count: 3,
      },
      { redactKeys: ['apiKey'], truncateKeys: ['chunk'] }
    );

    expect(result).toEqual({
      apiKey: '[REDACTED]',
      chunk: `${'x'.repeat(200)}... (250 chars total)`,
      vector: { preview: [0.1, 0.2], dimensions: 2 },
      nested: { url: '[REDACTED]db/app' },
      count: 3,
    });
  });
});

// =============================================================================
// Timer Tests
// =============================================================================

describe('Timer', () => {
  it('should measure marked operations', () => {
    vi.useFakeTimers();
    try {
      const timer = new Timer();
      timer.mark('embedding');
      vi.advanceTimersByTime(40);

      expect(timer.measure('embedding')).toBe(40);
      expect(timer.measure('unknown')).toBe(0);
      expect(timer.toTimingInfo('trace-1')).toEqual({ traceId: 'trace-1', embedding_ms: 40, total_ms: 40 });
    } finally {
      vi.useRealTimers();
    }
  });
});

// =============================================================================
// Logging Helpers Tests
// =============================================================================

describe('logDbOperation', () => {
  it('should log success at debug and failure at error', () => {
    const spy = spyLogger();

    logDbOperation(spy.log, 'select', { table: 'documents', rows: 2, duration_ms: 5 });
    logDbOperation(spy.log, 'insert', { table: 'documents', duration_ms: 5, error: 'Connection failed' });

    expect(spy.debug).toHaveBeenCalledWith(
      { event: 'db_operation', operation: 'select', table: 'documents', rows: 2, duration_ms: 5 },
      'Database select completed'
    );
    expect(spy.error).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'db_operation', operation: 'insert' }),
      'Database insert failed: Connection failed'
    );
  });
});

describe('logExternalCall', () => {
  it('should tag the service and operation', () => {
    const spy = spyLogger();

    logExternalCall(spy.log, 'openai', 'embeddings', { duration_ms: 20, error: 'timeout' });

    expect(spy.error).toHaveBeenCalledWith(
      { event: 'external_call', service: 'openai', operation: 'embeddings', duration_ms: 20, error: 'timeout' },
      'openai embeddings failed: timeout'
    );
  });

  it('should redact credentials echoed in a provider error', () => {
    const spy = spyLogger();

    logExternalCall(spy.log, 'openai', 'chat', {
      status: 401,
      error: 'Incorrect API key provided: sk-testtesttesttesttesttest',
    });

    expect(spy.error).toHaveBeenCalledWith(
      {
        event: 'external_call',
        service: 'openai',
        operation: 'chat',
        status: 401,
        error: 'Incorrect API key provided: [REDACTED]',
      },
      'openai chat failed: Incorrect API key provided: [REDACTED]'
    );
  });
});

describe('logRagStep', () => {
  it('should name the event after the step', () => {
    const spy = spyLogger();

    logRagStep(spy.log, 'rollback', { chunks: 4 });

    expect(spy.debug).toHaveBeenCalledWith({ event: 'rag_rollback', chunks: 4 }, 'RAG rollback completed');
  });
});

describe('logIngestionTransition', () => {
  it('should log progress at info and failure at warn', () => {
    const spy = spyLogger();

    logIngestionTransition(spy.log, { documentId: 'd', revision: 1, from: 'uploaded', to: 'extracting' });
    logIngestionTransition(spy.log, {
      documentId: 'd',
      revision: 1,
      from: 'extracting',
      to: 'failed',
      reason: 'extraction: empty',
    });

    expect(spy.info).toHaveBeenCalledWith(
      { event: 'document_transition', documentId: 'd', revision: 1, from: 'uploaded', to: 'extracting' },
      'Document d uploaded -> extracting'
    );
    expect(spy.warn).toHaveBeenCalledWith(
      expect.objectContaining({ to: 'failed', reason: 'extraction: empty' }),
      'Document d extracting -> failed'
    );
  });

  it('should truncate a long failure reason', () => {
    const spy = spyLogger();

    logIngestionTransition(spy.log, {
      documentId: 'd',
      revision: 2,
      from: 'embedding',
      to: 'failed',
      reason: 'x'.repeat(250),
    });

    expect(spy.warn).toHaveBeenCalledWith(
      {
        event: 'document_transition',
        documentId: 'd',
        revision: 2,
        from: 'embedding',
        to: 'failed',
        reason: `${'x'.repeat(200)}... (250 chars total)`,
      },
      'Document d embedding -> failed'
    );
  });
});
