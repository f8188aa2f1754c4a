import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OllamaAdapter, translateRequest, translateResponse, translateStream } from './index.js';
import type { LLMRequest, StreamEvent } from '../../types/index.js';
import { NotFoundError, StreamError } from '../../types/index.js';

const request: LLMRequest = {
  model: 'tuxmate',
  system: 'Eres un asistente de Linux.',
  messages: [{ role: 'user', content: '¿cuánta RAM uso?' }],
  sampling: { temperature: 0.7, topK: 40, topP: 0.9, contextLength: 4096 },
};

async function* chunks(values: unknown[]): AsyncIterable<unknown> {
  yield* values;
}

async function collect(events: AsyncIterable<StreamEvent>): Promise<StreamEvent[]> {
  const out: StreamEvent[] = [];
  for await (const event of events) {
    out.push(event);
  }
  return out;
}

describe('translateRequest', () => {
  it('targets /api/chat and moves sampling into options', () => {
    const { url, body } = translateRequest(request, 'http://localhost:11434/', false);

    expect(url).toBe('http://localhost:11434/api/chat');
    expect(body).toEqual({
      model: 'tuxmate',
      messages: [
        { role: 'system', content: 'Eres un asistente de Linux.' },
        { role: 'user', content: '¿cuánta RAM uso?' },
      ],
      stream: false,
      options: { temperature: 0.7, top_k: 40, top_p: 0.9, num_ctx: 4096 },
    });
  });

  it('omits options when no sampling is requested', () => {
    const { body } = translateRequest({ model: 'tuxmate', messages: [] }, 'http://h', true);

    expect(body).toEqual({ model: 'tuxmate', messages: [], stream: true });
  });

  it('merges ollama provider options into the body', () => {
    const { body } = translateRequest(
      { ...request, providerOptions: { ollama: { keep_alive: '10m' } } },
      'http://h',
      false,
    );

    expect(body['keep_alive']).toBe('10m');
  });
});

describe('translateResponse', () => {
  it('reads content, counts and timings', () => {
    const response = translateResponse({
      model: 'tuxmate',
      created_at: '2026-01-01T00:00:00Z',
      message: { role: 'assistant', content: 'Usas 3 GiB.' },
      done: true,
      done_reason: 'stop',
      prompt_eval_count: 20,
      eval_count: 6,
      total_duration: 1500,
    });

    expect(response).toEqual({
      id: '2026-01-01T00:00:00Z',
      model: 'tuxmate',
      content: [{ kind: 'TEXT', text: 'Usas 3 GiB.' }],
      finishReason: 'stop',
      usage: { inputTokens: 20, outputTokens: 6, totalTokens: 26 },
      providerMetadata: { total_duration: 1500 },
    });
  });

  it('maps done_reason length', () => {
    expect(translateResponse({ done: true, done_reason: 'length' }).finishReason).toBe('length');
  });
});

describe('translateStream', () => {
  it('emits deltas and finishes on the done chunk', async () => {
    const events = await collect(
      translateStream(
        chunks([
          { model: 'tuxmate', created_at: 't0', message: { role: 'assistant', content: 'Ho' }, done: false },
          { model: 'tuxmate', created_at: 't1', message: { role: 'assistant', content: 'la' }, done: false },
          { model: 'tuxmate', created_at: 't2', message: { role: 'assistant', content: '' }, done: true, done_reason: 'stop', prompt_eval_count: 5, eval_count: 2 },
        ]),
      ),
    );

    expect(events).toEqual([
      { type: 'STREAM_START', id: 't0', model: 'tuxmate' },
      { type: 'TEXT_DELTA', text: 'Ho' },
      { type: 'TEXT_DELTA', text: 'la' },
      { type: 'FINISH', finishReason: 'stop', usage: { inputTokens: 5, outputTokens: 2, totalTokens: 7 } },
    ]);
  });

  it('fails on an error line', async () => {
    await expect(collect(translateStream(chunks([{ error: 'out of memory' }])))).rejects.toThrow(
      'Ollama stream failed: out of memory',
    );
  });

  it('fails when the stream stops before done', async () => {
    await expect(
      collect(translateStream(chunks([{ model: 'tuxmate', message: { content: 'Ho' }, done: false }]))),
    ).rejects.toThrow(StreamError);
  });
});

describe('OllamaAdapter', () => {
  beforeEach(() => {
    vi.stubGlobal('fetch', vi.fn());
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts to the default local server', async () => {
    vi.mocked(globalThis.fetch).mockResolvedValue(
      new Response(JSON.stringify({ model: 'tuxmate', message: { content: 'hola' }, done: true })),
    );

    const response = await new OllamaAdapter().complete(request);

    expect(vi.mocked(globalThis.fetch).mock.calls[0]?.[0]).toBe('http://localhost:11434/api/chat');
    expect(vi.mocked(globalThis.fetch).mock.calls[0]?.[1]?.method).toBe('POST');
    expect(response.content).toEqual([{ kind: 'TEXT', text: 'hola' }]);
  });

  it('streams NDJSON lines', async () => {
    const ndjson = [
      JSON.stringify({ model: 'tuxmate', created_at: 't0', message: { content: 'hi' }, done: false }),
      JSON.stringify({ model: 'tuxmate', created_at: 't1', message: { content: '' }, done: true }),
      '',
    ].join('\n');
    vi.mocked(globalThis.fetch).mockResolvedValue(new Response(ndjson));

    const events = await collect(new OllamaAdapter({ baseUrl: 'http://gpu-box:11434' }).stream(request));

    expect(vi.mocked(globalThis.fetch).mock.calls[0]?.[0]).toBe('http://gpu-box:11434/api/chat');
    expect(events.map((e) => e.type)).toEqual(['STREAM_START', 'TEXT_DELTA', 'FINISH']);
  });

  it('surfaces a missing model as NotFoundError', async () => {
    vi.mocked(globalThis.fetch).mockResolvedValue(
      new Response(JSON.stringify({ error: "model 'tuxmate' not found" }), { status: 404 }),
    );

    await expect(new OllamaAdapter().complete(request)).rejects.toThrow(NotFoundError);
  });
});
