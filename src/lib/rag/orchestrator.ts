/**
 * RAG Orchestrator
 *
 * Drives both pipelines and owns document state:
 * - Ingestion: extract -> chunk -> embed -> index, one job per document on a
 *   bounded worker pool. A failed or cancelled job removes every vector of
 *   the document, so a document is never partially indexed.
 * - Query: embed -> retrieve -> assemble -> generate -> record the answer.
 *   Every attempt that is not cancelled ends in exactly one assistant turn.
 */

import { randomUUID } from 'crypto';
import PQueue from 'p-queue';
import type {
  Chunk,
  DocumentFailure,
  DocumentRecord,
  DocumentStatus,
  IngestionStage,
  Turn,
} from '@/types/rag';
import { DocumentWriteGuard, KeyedMutex } from '@/lib/concurrency';
import {
  CancelledError,
  DimensionMismatchError,
  DocumentNotFoundError,
  ExtractionFailedError,
  GenerationFailedError,
  InvalidConfigError,
  ModelUnavailableError,
  RetryExhaustedError,
  getErrorMessage,
} from '@/lib/errors';
import {
  createLayerLogger,
  createRequestContext,
  logIngestionTransition,
  logRagStep,
  Timer,
  type Logger,
} from '@/lib/logger';
import { buildAnswerPrompt } from '@/lib/llm/prompts';
import { assembleContext } from './assembler';
import { chunkDocument } from './chunker';
import { validateCitations } from './citations';
import { validateRAGConfig, type RAGConfig } from './config';
import type { RAGContext } from './context';
import { assertTransition } from './lifecycle';
import { Retriever } from './retrieval';

// =============================================================================
// Types
// =============================================================================

export interface IngestRequest {
  /** Reuse an id to ingest a new revision of an existing document. */
  documentId?: string;
  filename: string;
  bytes: Buffer;
}

export interface IngestionHandle {
  documentId: string;
  revision: number;
  /** Resolves with the document once it is indexed or failed. */
  done: Promise<DocumentRecord>;
  cancel(): void;
}

export interface QueryOptions {
  signal?: AbortSignal;
}

interface ActiveJob {
  revision: number;
  controller: AbortController;
  done: Promise<DocumentRecord>;
}

/**
 * A stage failure with the reason recorded on the document.
 */
class StageFailure extends Error {
  constructor(
    readonly stage: IngestionStage,
    readonly reason: string,
    cause?: unknown
  ) {
    super(`${stage}: ${reason}`, cause === undefined ? undefined : { cause });
    this.name = 'StageFailure';
  }
}

type OrchestratorState = 'created' | 'ready' | 'closed';

// =============================================================================
// Orchestrator
// =============================================================================

export class RAGOrchestrator {
  private context: RAGContext;
  private config: RAGConfig;
  private log: Logger;
  private retriever: Retriever;
  private guard = new DocumentWriteGuard();
  private intake = new KeyedMutex();
  private jobs = new Map<string, ActiveJob>();
  private admissions = new Set<Promise<IngestionHandle>>();
  private queue: PQueue | null = null;
  private state: OrchestratorState = 'created';

  constructor(context: RAGContext) {
    this.context = context;
    this.config = validateRAGConfig(context.config);
    this.log = context.logger.child({ layer: 'rag', service: 'RAGOrchestrator' });
    this.retriever = new Retriever(context.index, context.documents, {
      consistency: this.guard,
      log: context.logger.child({ layer: 'rag', service: 'Retriever' }),
    });
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Check that the embedding model and the index agree on vector width,
   * then open the worker pool. Safe to call more than once.
   */
  async init(): Promise<void> {
    if (this.state === 'ready') return;
    if (this.state === 'closed') {
      throw new Error('Orchestrator has been shut down');
    }

    const { gateway, index } = this.context;
    if (gateway.dimensions !== index.dimensions) {
      throw new InvalidConfigError([
        `embedding model produces ${gateway.dimensions}-dimensional vectors but the index stores ${index.dimensions}`,
      ]);
    }

    this.queue = new PQueue({ concurrency: this.config.ingestConcurrency });
    this.state = 'ready';

    this.log.info(
      {
        event: 'orchestrator_ready',
        concurrency: this.config.ingestConcurrency,
        dimensions: index.dimensions,
        metric: index.metric,
      },
      'RAG orchestrator ready'
    );
  }

  /**
   * Stop accepting work, cancel running ingestions, wait for the pool to
   * drain and close the context.
   */
  async shutdown(): Promise<void> {
    if (this.state === 'closed') return;
    const wasReady = this.state === 'ready';
    this.state = 'closed';

    const running = Array.from(this.jobs.values());
    for (const job of running) {
      job.controller.abort();
    }
    // Ingestions already past the state check still register a job; each
    // sees the closed state and starts cancelled.
    await Promise.allSettled(this.admissions);
    const pending = new Set([...running, ...this.jobs.values()]);
    for (const job of pending) {
      job.controller.abort();
    }
    await Promise.all(Array.from(pending, (job) => job.done));
    if (wasReady && this.queue) {
      await this.queue.onIdle();
    }

    await this.context.close();
    this.log.info({ event: 'orchestrator_shutdown', cancelled: pending.size }, 'RAG orchestrator shut down');
  }

  private requireQueue(): PQueue {
    if (this.state !== 'ready' || !this.queue) {
      throw new Error(
        this.state === 'closed' ? 'Orchestrator has been shut down' : 'Orchestrator not initialized; call init() first'
      );
    }
    return this.queue;
  }

  // ===========================================================================
  // Documents
  // ===========================================================================

  /**
   * Register a document (or a new revision of one) and queue its ingestion.
   */
  async ingest(request: IngestRequest): Promise<IngestionHandle> {
    const queue = this.requireQueue();
    const documentId = request.documentId ?? randomUUID();

    const admission = this.intake.runExclusive(documentId, async () => {
      await this.cancelAndWait(documentId);

      const existing = await this.context.documents.get(documentId);
      if (this.state === 'closed') {
        throw new Error('Orchestrator has been shut down');
      }
      const now = new Date();
      const record: DocumentRecord = {
        id: documentId,
        filename: request.filename,
        status: 'uploaded',
        revision: (existing?.revision ?? 0) + 1,
        chunkIds: existing?.chunkIds ?? [],
        failure: null,
        createdAt: existing?.createdAt ?? now,
        updatedAt: now,
      };
      await this.context.documents.save(record);

      const log = this.jobLogger(documentId);
      logIngestionTransition(log, {
        documentId,
        revision: record.revision,
        from: existing ? existing.status : 'new',
        to: 'uploaded',
      });

      const controller = new AbortController();
      if (this.state === 'closed') {
        // shut down while the record was being written
        controller.abort();
      }
      const done = new Promise<DocumentRecord>((resolve, reject) => {
        queue
          .add(async () => {
            try {
              resolve(await this.runJob(record, request.bytes, controller.signal, log));
            } finally {
              if (this.jobs.get(documentId)?.controller === controller) {
                this.jobs.delete(documentId);
              }
            }
          })
          .catch(reject);
      });

      this.jobs.set(documentId, { revision: record.revision, controller, done });

      return {
        documentId,
        revision: record.revision,
        done,
        cancel: () => controller.abort(),
      };
    });

    this.admissions.add(admission);
    try {
      return await admission;
    } finally {
      this.admissions.delete(admission);
    }
  }

  /**
   * Cancel the running ingestion of a document. Returns false if none runs.
   */
  cancelIngestion(documentId: string): boolean {
    const job = this.jobs.get(documentId);
    if (!job) {
      return false;
    }
    job.controller.abort();
    this.log.info({ event: 'ingestion_cancel_requested', documentId, revision: job.revision }, 'Ingestion cancel requested');
    return true;
  }

  /**
   * Cancel any running ingestion, then delete the document's vectors,
   * chunks and record.
   */
  async removeDocument(documentId: string): Promise<void> {
    await this.intake.runExclusive(documentId, async () => {
      await this.cancelAndWait(documentId);

      const { removedVectors, existed } = await this.guard.runExclusive(documentId, async () => ({
        removedVectors: await this.context.index.delete(documentId),
        existed: await this.context.documents.delete(documentId),
      }));

      if (!existed) {
        throw new DocumentNotFoundError(documentId);
      }
      this.log.info({ event: 'document_removed', documentId, removedVectors }, 'Document removed');
    });
  }

  async getDocument(documentId: string): Promise<DocumentRecord> {
    const document = await this.context.documents.get(documentId);
    if (!document) {
      throw new DocumentNotFoundError(documentId);
    }
    return document;
  }

  async listDocuments(): Promise<DocumentRecord[]> {
    return this.context.documents.list();
  }

  private async cancelAndWait(documentId: string): Promise<void> {
    const job = this.jobs.get(documentId);
    if (job) {
      job.controller.abort();
      await job.done;
    }
  }

  private jobLogger(documentId: string): Logger {
    return createLayerLogger(
      'ingest',
      createRequestContext({ documentId, operation: 'ingest' }),
      this.context.logger
    );
  }

  // ===========================================================================
  // Ingestion Pipeline
  // ===========================================================================

  private async runJob(
    record: DocumentRecord,
    bytes: Buffer,
    signal: AbortSignal,
    log: Logger
  ): Promise<DocumentRecord> {
    const { extractor, gateway, index, documents } = this.context;
    const documentId = record.id;
    const timer = new Timer();
    let current = record;
    let stage: IngestionStage = 'extraction';

    try {
      throwIfAborted(signal);
      current = await this.transition(current, 'extracting', log);

      let text: string;
      try {
        text = await extractor.extract(bytes, record.filename);
      } catch (error) {
        const reason = error instanceof ExtractionFailedError ? error.reason : getErrorMessage(error);
        throw new StageFailure('extraction', reason, error);
      }

      throwIfAborted(signal);
      stage = 'chunking';
      current = await this.transition(current, 'chunking', log);

      const chunks = chunkDocument(documentId, text, {
        size: this.config.chunkSize,
        overlap: this.config.chunkOverlap,
      });
      logRagStep(log, 'chunking', { chunks: chunks.length });
      if (chunks.length === 0) {
        throw new StageFailure('chunking', 'extracted text is empty');
      }

      stage = 'embedding';
      current = await this.transition(current, 'embedding', log);

      timer.mark('embedding');
      const vectors = await gateway.embed(
        chunks.map((chunk) => chunk.text),
        { signal }
      );
      timer.measure('embedding');

      throwIfAborted(signal);
      stage = 'indexing';
      timer.mark('indexing');

      const indexed = await this.guard.runExclusive(documentId, async () => {
        await index.delete(documentId);

        const stored: Chunk[] = [];
        for (let i = 0; i < chunks.length; i++) {
          throwIfAborted(signal);
          await index.insert(chunks[i].id, vectors[i], { documentId });
          stored.push({ ...chunks[i], embeddingId: chunks[i].id });
        }
        await documents.saveChunks(documentId, stored);
        return stored;
      });

      logRagStep(log, 'indexing', { duration_ms: timer.measure('indexing'), chunks: indexed.length });

      current = await this.transition(current, 'indexed', log, {
        chunkIds: indexed.map((chunk) => chunk.id),
      });

      log.info(
        {
          event: 'ingestion_complete',
          revision: current.revision,
          chunks: indexed.length,
          ...timer.getAllDurations(),
          total_ms: timer.elapsed(),
        },
        'Document indexed'
      );
      return current;
    } catch (error) {
      const failure = describeFailure(error, stage, signal);
      await this.rollback(documentId, log);
      return this.markFailed(current, failure, log);
    }
  }

  /**
   * Remove every vector and chunk of a document.
   */
  private async rollback(documentId: string, log: Logger): Promise<void> {
    try {
      const removed = await this.guard.runExclusive(documentId, async () => {
        const vectors = await this.context.index.delete(documentId);
        await this.context.documents.deleteChunks(documentId);
        return vectors;
      });
      logRagStep(log, 'rollback', { chunks: removed });
    } catch (error) {
      logRagStep(log, 'rollback', { error: getErrorMessage(error) });
    }
  }

  private async markFailed(current: DocumentRecord, failure: DocumentFailure, log: Logger): Promise<DocumentRecord> {
    try {
      return await this.transition(current, 'failed', log, { chunkIds: [], failure });
    } catch (error) {
      log.error(
        { event: 'document_status_write_failed', documentId: current.id, error: getErrorMessage(error) },
        'Could not record failed status'
      );
      return { ...current, status: 'failed', chunkIds: [], failure, updatedAt: new Date() };
    }
  }

  private async transition(
    current: DocumentRecord,
    to: DocumentStatus,
    log: Logger,
    changes: Partial<Pick<DocumentRecord, 'chunkIds' | 'failure'>> = {}
  ): Promise<DocumentRecord> {
    assertTransition(current.status, to);
    const next: DocumentRecord = { ...current, ...changes, status: to, updatedAt: new Date() };
    await this.context.documents.save(next);
    logIngestionTransition(log, {
      documentId: current.id,
      revision: current.revision,
      from: current.status,
      to,
      reason: changes.failure ? `${changes.failure.stage}: ${changes.failure.reason}` : undefined,
    });
    return next;
  }

  // ===========================================================================
  // Query Pipeline
  // ===========================================================================

  /**
   * Record the question as a user turn, then answer it.
   */
  async ask(conversationId: string, question: string, options: QueryOptions = {}): Promise<Turn> {
    throwIfAborted(options.signal);
    await this.context.conversations.append(conversationId, { role: 'user', text: question });
    return this.answer(conversationId, question, options);
  }

  /**
   * Answer a question and append exactly one assistant turn: the answer
   * with its citations, or an empty failed turn. A cancelled query records
   * nothing and throws CancelledError.
   */
  async answer(conversationId: string, question: string, options: QueryOptions = {}): Promise<Turn> {
    const { signal } = options;
    const { gateway, generator, conversations } = this.context;
    const requestContext = createRequestContext({ conversationId, operation: 'answer' });
    const log = createLayerLogger('rag', requestContext, this.context.logger);
    const timer = new Timer();

    // Fail fast on an unknown conversation before any model call.
    await conversations.get(conversationId);

    try {
      throwIfAborted(signal);

      timer.mark('embedding');
      const queryVector = await gateway.embedQuery(question, { signal });
      timer.measure('embedding');

      timer.mark('retrieval');
      const retrieval = await this.retriever.retrieve(queryVector, this.config.topK, {
        scoreThreshold: this.config.scoreThreshold,
      });
      timer.measure('retrieval');

      const sources = await this.sourceNames(retrieval.chunks.map((chunk) => chunk.documentId));
      const assembly = assembleContext(retrieval.chunks, this.config.contextTokenBudget, sources);
      logRagStep(log, 'assembly', {
        chunks: assembly.citations.length,
        tokens: assembly.tokens,
        dropped: assembly.duplicates + assembly.truncated,
      });

      timer.mark('llm');
      const text = await generator.generate(buildAnswerPrompt(question, assembly.context), { signal });
      timer.measure('llm');
      throwIfAborted(signal);

      const check = validateCitations(text, assembly.citations);
      if (!check.isValid) {
        log.warn(
          { event: 'invalid_citations', markers: check.invalidMarkers },
          'Answer cites passages that were not provided'
        );
      }

      const turn = await conversations.append(conversationId, {
        role: 'assistant',
        text,
        citations: assembly.citations,
        status: { state: 'ok' },
      });

      log.info(
        { event: 'answer_complete', turnId: turn.id, citations: assembly.citations.length, timing: timer.toTimingInfo(requestContext.traceId) },
        'Answer recorded'
      );
      return turn;
    } catch (error) {
      if (error instanceof CancelledError || signal?.aborted) {
        log.info({ event: 'answer_cancelled' }, 'Query cancelled; no turn recorded');
        throw error instanceof CancelledError ? error : new CancelledError('Query cancelled', error);
      }

      const reason = queryFailureReason(error);
      log.warn({ event: 'answer_failed', reason, error: getErrorMessage(error) }, `Answer failed: ${reason}`);

      return conversations.append(conversationId, {
        role: 'assistant',
        text: '',
        citations: [],
        status: { state: 'failed', reason },
      });
    }
  }

  private async sourceNames(documentIds: string[]): Promise<Map<string, string>> {
    const names = new Map<string, string>();
    for (const documentId of new Set(documentIds)) {
      const document = await this.context.documents.get(documentId);
      if (document) {
        names.set(documentId, document.filename);
      }
    }
    return names;
  }
}

// =============================================================================
// Helpers
// =============================================================================

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

function describeFailure(error: unknown, stage: IngestionStage, signal: AbortSignal): DocumentFailure {
  if (signal.aborted || error instanceof CancelledError) {
    return { stage: 'cancelled', reason: 'cancelled' };
  }
  if (error instanceof StageFailure) {
    return { stage: error.stage, reason: error.reason };
  }
  return { stage, reason: getErrorMessage(error) };
}

/**
 * Reason recorded on a failed assistant turn.
 */
export function queryFailureReason(error: unknown): string {
  if (error instanceof GenerationFailedError) {
    return error.reason;
  }
  if (error instanceof ModelUnavailableError || error instanceof RetryExhaustedError) {
    return 'EmbeddingUnavailable';
  }
  if (error instanceof DimensionMismatchError) {
    return 'DimensionMismatch';
  }
  return 'InternalError';
}
