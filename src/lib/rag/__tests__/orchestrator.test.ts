/**
 * Tests for the chat orchestrator.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ChatOrchestrator, RunTrace, type ChatRequest, type OrchestratorConfig } from '../orchestrator';
import type { Embedder } from '../embeddings';
import { InMemoryVectorIndex } from '../vector-index';
import { InMemoryCuratedAnswerStore } from '../curated-answers';
import { BOUNDARY } from '@/lib/llm/prompts';
import { logger } from '@/lib/logger';
import { CancelledError, IndexUnavailableError, RateLimitedError } from '@/lib/errors';
import type { LLMCompletionOptions, LLMCompletionResponse, LLMMessage, LLMStreamChunk } from '@/types/llm';

// =============================================================================
// Test Setup
// =============================================================================

const config: OrchestratorConfig = {
  topK: 5,
  minSimilarity: 0,
  maxPromptChars: 12000,
  maxHistoryTurns: 10,
  model: 'chat-test',
  maxTokens: 256,
  temperature: 0,
  generationTimeoutMs: 1000,
  generationMaxAttempts: 2,
  retryBaseDelayMs: 1,
  retryMaxDelayMs: 1,
  queryRewrite: false,
  curatedMinSimilarity: 0.8,
};

const completion = (content: string): LLMCompletionResponse => ({
  content,
  finishReason: 'stop',
  usage: { promptTokens: 20, completionTokens: 5, totalTokens: 25 },
});

function createEmbedder() {
  const embedQuery = vi.fn(async (_text: string) => [1, 0]);
  const embedder: Embedder = {
    model: 'embed-test',
    dimensions: 2,
    embedQuery,
    embedBatch: async (texts: string[]) => texts.map(() => [1, 0]),
  };
  return { embedder, embedQuery };
}

function createGenerator(streamParts: string[] = []) {
  const complete = vi.fn(
    async (_messages: LLMMessage[], _options?: LLMCompletionOptions): Promise<LLMCompletionResponse> =>
      completion('Hold the reset button for 10 seconds [Citation 1].')
  );
  const streamComplete = vi.fn(async function* (
    _messages: LLMMessage[],
    _options?: LLMCompletionOptions
  ): AsyncGenerator<LLMStreamChunk, void, unknown> {
    for (const part of streamParts) {
      yield { content: part, finishReason: null };
    }
    yield { content: '', finishReason: 'stop', usage: { promptTokens: 9, completionTokens: 3, totalTokens: 12 } };
  });
  return { generator: { complete, streamComplete }, complete, streamComplete };
}

async function createIndex() {
  const index = new InMemoryVectorIndex(2);
  await index.upsert([
    {
      chunkId: 'guide:0',
      documentId: 'guide',
      ordinal: 0,
      content: 'Reset the router by holding the button for 10 seconds.',
      vector: [1, 0],
      metadata: { filename: 'router-guide.pdf' },
    },
    {
      chunkId: 'guide:1',
      documentId: 'guide',
      ordinal: 1,
      content: 'The warranty lasts two years from the date of purchase.',
      vector: [0.6, 0.8],
      metadata: { filename: 'router-guide.pdf' },
    },
    {
      chunkId: 'notes:0',
      documentId: 'notes',
      ordinal: 0,
      content: 'Office plants are watered on Fridays.',
      vector: [0, 1],
      metadata: { filename: 'notes.md' },
    },
  ]);
  return index;
}

async function createCuratedStore(vector: number[] = [1, 0]) {
  const store = new InMemoryCuratedAnswerStore(2);
  await store.upsert(
    {
      id: 'reset-answer',
      question: 'How can I reset my router?',
      answer: 'Press and hold the reset button for 10 seconds.',
      metadata: {},
      createdAt: new Date('2026-01-05T00:00:00Z'),
    },
    vector
  );
  return store;
}

const request = (overrides: Partial<ChatRequest> = {}): ChatRequest => ({
  query: 'How do I reset the router?',
  history: [],
  mode: 'rag',
  ...overrides,
});

// =============================================================================
// RunTrace Tests
// =============================================================================

describe('RunTrace', () => {
  it('should reject transitions the state machine does not allow', () => {
    const run = new RunTrace(logger);

    expect(() => run.transition('Responded')).toThrow('Invalid orchestrator transition ReceivedQuery -> Responded');
  });

  it('should not leave a terminal state', () => {
    const run = new RunTrace(logger);
    run.transition('Generating');
    run.transition('Responded');
    run.fail();

    expect(run.toArray()).toEqual(['ReceivedQuery', 'Generating', 'Responded']);
  });
});

// =============================================================================
// chat() Tests
// =============================================================================

describe('ChatOrchestrator.chat', () => {
  let index: InMemoryVectorIndex;

  beforeEach(async () => {
    index = await createIndex();
  });

  it('should run the full pipeline in rag mode', async () => {
    const { embedder, embedQuery } = createEmbedder();
    const { generator, complete } = createGenerator();
    const orchestrator = new ChatOrchestrator(embedder, index, generator, config);

    const response = await orchestrator.chat(request());

    expect(embedQuery).toHaveBeenCalledWith('How do I reset the router?', { signal: undefined });
    expect(response.trace).toEqual([
      'ReceivedQuery',
      'Embedding',
      'Retrieving',
      'PromptAssembly',
      'Generating',
      'Responded',
    ]);
    expect(response.sources.map((s) => s.chunkId)).toEqual(['guide:0', 'guide:1', 'notes:0']);
    expect(response.sources[1].similarity).toBeCloseTo(0.6, 10);
    expect(response.citations).toEqual([
      { id: 1, chunkId: 'guide:0', documentId: 'guide', documentTitle: 'router-guide.pdf', similarity: 1 },
    ]);
    expect(response).toMatchObject({ mode: 'rag', degraded: false, usage: { totalTokens: 25 } });
    expect(response.timing.traceId).toMatch(/^[0-9a-f-]{36}$/);

    const [messages, options] = complete.mock.calls[0];
    expect(options).toEqual({ model: 'chat-test', maxTokens: 256, temperature: 0, signal: undefined });
    expect(messages[messages.length - 1].content).toContain('[Document 1]\nTitle: router-guide.pdf');
  });

  it('should respect a per-request topK', async () => {
    const { embedder } = createEmbedder();
    const { generator } = createGenerator();
    const orchestrator = new ChatOrchestrator(embedder, index, generator, config);

    const response = await orchestrator.chat(request({ topK: 1 }));

    expect(response.sources.map((s) => s.chunkId)).toEqual(['guide:0']);
  });

  it('should never touch the embedder or the index in simple mode', async () => {
    const { embedder, embedQuery } = createEmbedder();
    const { generator, complete } = createGenerator();
    const querySpy = vi.spyOn(index, 'query');
    const orchestrator = new ChatOrchestrator(embedder, index, generator, config);

    const response = await orchestrator.chat(
      request({ mode: 'simple', history: [{ role: 'user', content: 'Hi' }, { role: 'assistant', content: 'Hello!' }] })
    );

    expect(embedQuery).not.toHaveBeenCalled();
    expect(querySpy).not.toHaveBeenCalled();
    expect(response.trace).toEqual(['ReceivedQuery', 'Generating', 'Responded']);
    expect(response.sources).toEqual([]);

    const [messages] = complete.mock.calls[0];
    expect(messages.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'user']);
    expect(messages[3].content).not.toContain(BOUNDARY.CONTEXT_START);
  });

  it('should fail with RetrievalUnavailable when embedding fails in rag mode', async () => {
    const { embedder, embedQuery } = createEmbedder();
    embedQuery.mockRejectedValue(new RateLimitedError('Embedding provider rate limit: slow down'));
    const { generator, complete } = createGenerator();
    const orchestrator = new ChatOrchestrator(embedder, index, generator, config);

    const error = await orchestrator.chat(request()).catch((e: unknown) => e);

    expect(error).toMatchObject({
      kind: 'RetrievalUnavailable',
      originKind: 'RateLimited',
      message: 'Retrieval failed: Embedding provider rate limit: slow down',
    });
    expect(complete).not.toHaveBeenCalled();
  });

  it('should fail with RetrievalUnavailable when the index fails in rag mode', async () => {
    const { embedder } = createEmbedder();
    const { generator } = createGenerator();
    vi.spyOn(index, 'query').mockRejectedValue(new IndexUnavailableError('connection refused'));
    const orchestrator = new ChatOrchestrator(embedder, index, generator, config);

    await expect(orchestrator.chat(request())).rejects.toMatchObject({
      kind: 'RetrievalUnavailable',
      originKind: 'IndexUnavailable',
    });
  });

  it('should degrade to simple chat in auto mode when retrieval fails', async () => {
    const { embedder } = createEmbedder();
    const { generator, complete } = createGenerator();
    vi.spyOn(index, 'query').mockRejectedValue(new IndexUnavailableError('connection refused'));
    const orchestrator = new ChatOrchestrator(embedder, index, generator, config);

    const response = await orchestrator.chat(request({ mode: 'auto' }));

    expect(response.degraded).toBe(true);
    expect(response.mode).toBe('auto');
    expect(response.sources).toEqual([]);
    expect(response.citations).toEqual([]);
    expect(response.trace).toEqual(['ReceivedQuery', 'Embedding', 'Retrieving', 'Generating', 'Responded']);
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('should generate with empty context when nothing is retrieved', async () => {
    const { embedder } = createEmbedder();
    const { generator, complete } = createGenerator();
    const orchestrator = new ChatOrchestrator(embedder, new InMemoryVectorIndex(2), generator, config);

    const response = await orchestrator.chat(request());

    expect(response.sources).toEqual([]);
    expect(response.citations).toEqual([]);
    const [messages] = complete.mock.calls[0];
    expect(messages[messages.length - 1].content).toContain('No relevant documents were found.');
  });

  it('should retry generation once and then succeed', async () => {
    const { embedder } = createEmbedder();
    const { generator, complete } = createGenerator();
    complete.mockRejectedValueOnce(new Error('socket hang up'));
    const orchestrator = new ChatOrchestrator(embedder, index, generator, config);

    const response = await orchestrator.chat(request());

    expect(complete).toHaveBeenCalledTimes(2);
    expect(response.answer).toBe('Hold the reset button for 10 seconds [Citation 1].');
  });

  it('should raise GenerationUnavailable after the retry fails too', async () => {
    const { embedder } = createEmbedder();
    const { generator, complete } = createGenerator();
    complete.mockRejectedValue(new Error('upstream 503'));
    const orchestrator = new ChatOrchestrator(embedder, index, generator, config);

    const error = await orchestrator.chat(request()).catch((e: unknown) => e);

    expect(complete).toHaveBeenCalledTimes(2);
    expect(error).toMatchObject({
      kind: 'GenerationUnavailable',
      message: 'Generation failed: upstream 503',
      retryable: true,
    });
  });

  it('should end with Cancelled when the signal is already aborted', async () => {
    const { embedder, embedQuery } = createEmbedder();
    const { generator, complete } = createGenerator();
    const orchestrator = new ChatOrchestrator(embedder, index, generator, config);
    const controller = new AbortController();
    controller.abort();

    await expect(orchestrator.chat(request({ signal: controller.signal }))).rejects.toBeInstanceOf(CancelledError);
    expect(embedQuery).not.toHaveBeenCalled();
    expect(complete).not.toHaveBeenCalled();
  });

  it('should end with Cancelled when aborted during retrieval', async () => {
    const { embedder, embedQuery } = createEmbedder();
    const { generator, complete } = createGenerator();
    const controller = new AbortController();
    embedQuery.mockImplementation(async () => {
      controller.abort();
      return [1, 0];
    });
    const orchestrator = new ChatOrchestrator(embedder, index, generator, config);

    await expect(
      orchestrator.chat(request({ mode: 'auto', signal: controller.signal }))
    ).rejects.toBeInstanceOf(CancelledError);
    expect(complete).not.toHaveBeenCalled();
  });

  it('should time out a hung generation, retry it and then fail', async () => {
    const { embedder } = createEmbedder();
    const { generator, complete } = createGenerator();
    complete.mockImplementation(() => new Promise<LLMCompletionResponse>(() => undefined));
    const orchestrator = new ChatOrchestrator(embedder, index, generator, { ...config, generationTimeoutMs: 20 });

    const error = await orchestrator.chat(request({ mode: 'simple' })).catch((e: unknown) => e);

    expect(complete).toHaveBeenCalledTimes(2);
    expect(error).toMatchObject({
      kind: 'GenerationUnavailable',
      message: "Generation failed: Operation 'generation' timed out after 20ms",
    });
  });

  it('should end with Cancelled when aborted during generation', async () => {
    const { embedder } = createEmbedder();
    const { generator, complete } = createGenerator();
    const controller = new AbortController();
    complete.mockImplementation(() => {
      controller.abort();
      return new Promise<LLMCompletionResponse>(() => undefined);
    });
    const orchestrator = new ChatOrchestrator(embedder, index, generator, config);

    const error = await orchestrator.chat(request({ signal: controller.signal })).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CancelledError);
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('should search with the rewritten question but answer the original', async () => {
    const { embedder, embedQuery } = createEmbedder();
    const { generator, complete } = createGenerator();
    complete.mockResolvedValueOnce(completion('How do I reset the X200 router?'));
    const orchestrator = new ChatOrchestrator(embedder, index, generator, { ...config, queryRewrite: true });

    const response = await orchestrator.chat(
      request({
        query: 'How do I reset it?',
        history: [
          { role: 'user', content: 'Tell me about the X200 router.' },
          { role: 'assistant', content: 'It is our dual-band model.' },
        ],
      })
    );

    expect(embedQuery).toHaveBeenCalledWith('How do I reset the X200 router?', { signal: undefined });
    expect(response.searchQuery).toBe('How do I reset the X200 router?');
    expect(complete).toHaveBeenCalledTimes(2);
    const [messages] = complete.mock.calls[1];
    expect(messages[messages.length - 1].content).toContain('How do I reset it?');
    expect(messages[messages.length - 1].content).not.toContain('X200 router?');
  });

  it('should not rewrite without history', async () => {
    const { embedder, embedQuery } = createEmbedder();
    const { generator, complete } = createGenerator();
    const orchestrator = new ChatOrchestrator(embedder, index, generator, { ...config, queryRewrite: true });

    const response = await orchestrator.chat(request());

    expect(embedQuery).toHaveBeenCalledWith('How do I reset the router?', { signal: undefined });
    expect(response.searchQuery).toBe('How do I reset the router?');
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('should keep only citations that point at prompt chunks', async () => {
    const { embedder } = createEmbedder();
    const { generator, complete } = createGenerator();
    complete.mockResolvedValue(completion('Hold the button [Citation 1]. See also [Citation 9].'));
    const orchestrator = new ChatOrchestrator(embedder, index, generator, config);

    const response = await orchestrator.chat(request());

    expect(response.answer).toBe('Hold the button [Citation 1]. See also [Citation 9].');
    expect(response.citations.map((c) => c.id)).toEqual([1]);
  });

  it('should reject an empty query', async () => {
    const { embedder } = createEmbedder();
    const { generator } = createGenerator();
    const orchestrator = new ChatOrchestrator(embedder, index, generator, config);

    await expect(orchestrator.chat(request({ query: '   ' }))).rejects.toMatchObject({ kind: 'InvalidRequest' });
  });
});

// =============================================================================
// chatStream() Tests
// =============================================================================

describe('ChatOrchestrator.chatStream', () => {
  it('should stream chunks and complete with the full answer', async () => {
    const { embedder } = createEmbedder();
    const { generator } = createGenerator(['Hold the button ', '[Citation 1].']);
    const orchestrator = new ChatOrchestrator(embedder, await createIndex(), generator, config);

    const statuses: string[] = [];
    const chunks: string[] = [];
    const onComplete = vi.fn();
    const onError = vi.fn();

    await orchestrator.chatStream(request(), {
      onStatus: (status) => statuses.push(status),
      onChunk: (chunk) => chunks.push(chunk),
      onComplete,
      onError,
    });

    expect(statuses).toEqual(['retrieving', 'generating']);
    expect(chunks).toEqual(['Hold the button ', '[Citation 1].']);
    expect(onError).not.toHaveBeenCalled();
    expect(onComplete).toHaveBeenCalledTimes(1);
    expect(onComplete.mock.calls[0][0]).toMatchObject({
      answer: 'Hold the button [Citation 1].',
      usage: { totalTokens: 12 },
      citations: [{ id: 1, chunkId: 'guide:0' }],
    });
  });

  it('should report a degraded answer when retrieval fails in auto mode', async () => {
    const { embedder } = createEmbedder();
    const { generator } = createGenerator(['Try turning it off and on.']);
    const failing = await createIndex();
    vi.spyOn(failing, 'query').mockRejectedValue(new IndexUnavailableError('connection refused'));
    const orchestrator = new ChatOrchestrator(embedder, failing, generator, config);

    const statuses: string[] = [];
    const onComplete = vi.fn();
    const onError = vi.fn();

    await orchestrator.chatStream(request({ mode: 'auto' }), {
      onStatus: (status) => statuses.push(status),
      onComplete,
      onError,
    });

    expect(statuses).toEqual(['retrieving', 'generating']);
    expect(onError).not.toHaveBeenCalled();
    expect(onComplete.mock.calls[0][0]).toMatchObject({
      answer: 'Try turning it off and on.',
      degraded: true,
      sources: [],
    });
  });

  it('should send a curated answer as a single chunk', async () => {
    const { embedder } = createEmbedder();
    const { generator, streamComplete } = createGenerator(['unused']);
    const orchestrator = new ChatOrchestrator(
      embedder,
      await createIndex(),
      generator,
      config,
      await createCuratedStore()
    );

    const statuses: string[] = [];
    const chunks: string[] = [];
    const onComplete = vi.fn();

    await orchestrator.chatStream(request(), {
      onStatus: (status) => statuses.push(status),
      onChunk: (chunk) => chunks.push(chunk),
      onComplete,
    });

    expect(streamComplete).not.toHaveBeenCalled();
    expect(statuses).toEqual(['retrieving']);
    expect(chunks).toEqual(['Press and hold the reset button for 10 seconds.']);
    expect(onComplete.mock.calls[0][0]).toMatchObject({ curated: { id: 'reset-answer' }, citations: [] });
  });

  it('should report generation failure through onError', async () => {
    const { embedder } = createEmbedder();
    const { generator, streamComplete } = createGenerator();
    streamComplete.mockImplementation(async function* (): AsyncGenerator<LLMStreamChunk, void, unknown> {
      throw new Error('stream reset');
    });
    const orchestrator = new ChatOrchestrator(embedder, await createIndex(), generator, config);
    const onError = vi.fn();
    const onComplete = vi.fn();

    await orchestrator.chatStream(request({ mode: 'simple' }), { onError, onComplete });

    expect(streamComplete).toHaveBeenCalledTimes(2);
    expect(onComplete).not.toHaveBeenCalled();
    expect(onError.mock.calls[0][0]).toMatchObject({ kind: 'GenerationUnavailable' });
  });

  it('should not retry once text has been streamed', async () => {
    const { embedder } = createEmbedder();
    const { generator, streamComplete } = createGenerator();
    streamComplete.mockImplementation(async function* (): AsyncGenerator<LLMStreamChunk, void, unknown> {
      yield { content: 'Partial', finishReason: null };
      throw new Error('stream reset');
    });
    const orchestrator = new ChatOrchestrator(embedder, await createIndex(), generator, config);
    const onError = vi.fn();
    const chunks: string[] = [];

    await orchestrator.chatStream(request({ mode: 'simple' }), { onError, onChunk: (c) => chunks.push(c) });

    expect(streamComplete).toHaveBeenCalledTimes(1);
    expect(chunks).toEqual(['Partial']);
    expect(onError.mock.calls[0][0]).toMatchObject({ message: 'Generation failed: stream reset' });
  });
});

// =============================================================================
// Curated Answer Tests
// =============================================================================

describe('ChatOrchestrator curated answers', () => {
  let index: InMemoryVectorIndex;

  beforeEach(async () => {
    index = await createIndex();
  });

  it('should answer verbatim from a close curated match without generating', async () => {
    const { embedder } = createEmbedder();
    const { generator, complete } = createGenerator();
    const querySpy = vi.spyOn(index, 'query');
    const orchestrator = new ChatOrchestrator(embedder, index, generator, config, await createCuratedStore());

    const response = await orchestrator.chat(request());

    expect(complete).not.toHaveBeenCalled();
    expect(querySpy).not.toHaveBeenCalled();
    expect(response).toMatchObject({
      answer: 'Press and hold the reset button for 10 seconds.',
      curated: { id: 'reset-answer', question: 'How can I reset my router?', similarity: 1 },
      sources: [],
      citations: [],
      degraded: false,
      usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
    });
    expect(response.trace).toEqual(['ReceivedQuery', 'Embedding', 'Responded']);
  });

  it('should search documents when the match only reaches the threshold', async () => {
    const { embedder } = createEmbedder();
    const { generator, complete } = createGenerator();
    const store = await createCuratedStore([3, 4]);
    const orchestrator = new ChatOrchestrator(
      embedder,
      index,
      generator,
      { ...config, curatedMinSimilarity: 0.6 },
      store
    );

    const response = await orchestrator.chat(request());

    expect(response.curated).toBeNull();
    expect(response.answer).toBe('Hold the reset button for 10 seconds [Citation 1].');
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('should search documents when the match is below the threshold', async () => {
    const { embedder } = createEmbedder();
    const { generator } = createGenerator();
    const orchestrator = new ChatOrchestrator(embedder, index, generator, config, await createCuratedStore([0, 1]));

    const response = await orchestrator.chat(request());

    expect(response.curated).toBeNull();
    expect(response.trace).toContain('Retrieving');
  });

  it('should skip curated answers when the request is limited to documents', async () => {
    const { embedder } = createEmbedder();
    const { generator } = createGenerator();
    const store = await createCuratedStore();
    const matchSpy = vi.spyOn(store, 'match');
    const orchestrator = new ChatOrchestrator(embedder, index, generator, config, store);

    const response = await orchestrator.chat(request({ filter: { documentIds: ['guide'] } }));

    expect(matchSpy).not.toHaveBeenCalled();
    expect(response.curated).toBeNull();
    expect(response.sources.map((s) => s.documentId)).toEqual(['guide', 'guide']);
  });

  it('should search documents when the curated lookup fails', async () => {
    const { embedder } = createEmbedder();
    const { generator, complete } = createGenerator();
    const store = await createCuratedStore();
    vi.spyOn(store, 'match').mockRejectedValue(new IndexUnavailableError('Curated answer store match failed: timeout'));
    const orchestrator = new ChatOrchestrator(embedder, index, generator, config, store);

    const response = await orchestrator.chat(request({ mode: 'rag' }));

    expect(response.curated).toBeNull();
    expect(response.degraded).toBe(false);
    expect(complete).toHaveBeenCalledTimes(1);
  });
});
