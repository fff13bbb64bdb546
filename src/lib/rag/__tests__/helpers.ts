/**
 * Shared fakes for RAG tests.
 */

import type { LLMAdapter, LLMCompletionResponse, LLMEmbeddingResponse } from '@/types/llm';
import type { RetrievedChunk } from '@/types/rag';
import type { AnswerPrompt } from '@/lib/llm/prompts';
import type { EmbedOptions, Embedder } from '../embeddings';
import type { GenerateOptions, Generator } from '../generator';

/**
 * Embeds text as keyword counts over a fixed vocabulary, one dimension per
 * word. Deterministic and exact, so cosine scores can be worked out by hand.
 */
export class KeywordEmbedder implements Embedder {
  readonly model = 'keyword-test';
  readonly dimensions: number;
  calls: string[][] = [];
  private vocabulary: string[];

  constructor(vocabulary: string[]) {
    this.vocabulary = vocabulary;
    this.dimensions = vocabulary.length;
  }

  async embed(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    options.signal?.throwIfAborted();
    this.calls.push([...texts]);
    return texts.map((text) => this.vectorFor(text));
  }

  vectorFor(text: string): number[] {
    const words = text.toLowerCase().match(/[a-z]+/g) ?? [];
    return this.vocabulary.map((term) => words.filter((word) => word === term).length);
  }
}

export const COLOR_VOCABULARY = ['sky', 'blue', 'grass', 'green', 'color'];

/**
 * Generator returning a fixed answer, or running a custom handler.
 */
export class FakeGenerator implements Generator {
  readonly model = 'fake-generator';
  prompts: AnswerPrompt[] = [];
  private handler: (prompt: AnswerPrompt, options: GenerateOptions) => Promise<string>;

  constructor(answer: string | ((prompt: AnswerPrompt, options: GenerateOptions) => Promise<string>)) {
    this.handler = typeof answer === 'string' ? async () => answer : answer;
  }

  async generate(prompt: AnswerPrompt, options: GenerateOptions = {}): Promise<string> {
    this.prompts.push(prompt);
    return this.handler(prompt, options);
  }
}

export function retrievedChunk(
  documentId: string,
  index: number,
  text: string,
  score: number
): RetrievedChunk {
  return {
    id: `${documentId}:${index}`,
    documentId,
    text,
    startOffset: 0,
    endOffset: text.length,
    index,
    embeddingId: `${documentId}:${index}`,
    score,
  };
}

/**
 * LLMAdapter whose calls are supplied by the test.
 */
export function fakeAdapter(handlers: {
  complete?: LLMAdapter['complete'];
  embedBatch?: LLMAdapter['embedBatch'];
}): LLMAdapter {
  return {
    provider: 'fake',
    complete:
      handlers.complete ??
      (async (): Promise<LLMCompletionResponse> => {
        throw new Error('complete not expected');
      }),
    embedBatch:
      handlers.embedBatch ??
      (async (): Promise<LLMEmbeddingResponse> => {
        throw new Error('embedBatch not expected');
      }),
  };
}

export function completion(content: string): LLMCompletionResponse {
  return {
    content,
    finishReason: 'stop',
    usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
  };
}
