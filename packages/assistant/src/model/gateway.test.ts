import { describe, it, expect, vi } from 'vitest';
import {
  AbortError,
  Client,
  NetworkError,
  NotFoundError,
  RequestTimeoutError,
  ServerError,
  emptyUsage,
  type LLMRequest,
  type LLMResponse,
  type ProviderAdapter,
  type StreamEvent,
} from '@tuxmate/llm';
import { DEFAULT_MODEL_PROFILES } from '../config/index.js';
import { CancelledByUserError, ModelTimeoutError, ModelUnavailableError } from '../errors.js';
import type { Turn } from '../types/index.js';
import { classifyModelError, createModelGateway, toMessages } from './gateway.js';

function textResponse(text: string): LLMResponse {
  return {
    id: 'r1',
    model: 'tuxmate',
    content: [{ kind: 'TEXT', text }],
    finishReason: 'stop',
    usage: emptyUsage(),
    providerMetadata: {},
  };
}

function createFakeAdapter(reply: string) {
  return {
    name: 'ollama',
    complete: vi.fn(async (_request: LLMRequest) => textResponse(reply)),
    stream: vi.fn(async function* (_request: LLMRequest): AsyncIterable<StreamEvent> {
      yield { type: 'STREAM_START', id: 's1', model: 'tuxmate' };
      yield { type: 'TEXT_DELTA', text: 'Hola, ' };
      yield { type: 'TEXT_DELTA', text: 'amigo' };
      yield { type: 'FINISH', finishReason: 'stop', usage: emptyUsage() };
    }),
  } satisfies ProviderAdapter;
}

const turns: ReadonlyArray<Turn> = [
  { id: 'u1', role: 'user', content: 'how much disk space do I have?', timestamp: 1 },
  { id: 'a1', role: 'assistant', content: '{"tool":"shell","command":"df -h","explanation":"disk"}', timestamp: 2 },
  { id: 't1', role: 'tool', tool: 'shell', content: '$ df -h\nexit code: 0', timestamp: 3 },
];

describe('createModelGateway', () => {
  it('sends the turns with the profile sampling options', async () => {
    const adapter = createFakeAdapter('done');
    const gateway = createModelGateway({
      client: new Client({ providers: { ollama: adapter } }),
      profiles: DEFAULT_MODEL_PROFILES,
      requestTimeoutMs: 120_000,
    });

    const text = await gateway.reply({ model: 'tuxmate', system: 'be brief', turns, instruction: 'summarize' });

    expect(text).toBe('done');
    const sent = adapter.complete.mock.calls[0]?.[0];
    expect(sent).toMatchObject({
      model: 'tuxmate',
      system: 'be brief',
      sampling: { temperature: 0.7, topP: 0.9, topK: 40, contextLength: 4096 },
      timeout: { requestMs: 120_000 },
    });
    expect(sent?.messages).toEqual([
      { role: 'user', content: 'how much disk space do I have?' },
      { role: 'assistant', content: '{"tool":"shell","command":"df -h","explanation":"disk"}' },
      { role: 'user', content: 'Tool output (shell):\n$ df -h\nexit code: 0' },
      { role: 'user', content: 'summarize' },
    ]);
  });

  it('streams text deltas when asked to', async () => {
    const adapter = createFakeAdapter('unused');
    const gateway = createModelGateway({
      client: new Client({ providers: { ollama: adapter } }),
      profiles: DEFAULT_MODEL_PROFILES,
      requestTimeoutMs: 1_000,
    });
    const deltas: string[] = [];

    const text = await gateway.reply({ model: 'tuxmate-lite', system: '', turns: [], onText: (d) => deltas.push(d) });

    expect(text).toBe('Hola, amigo');
    expect(deltas).toEqual(['Hola, ', 'amigo']);
    expect(adapter.complete).not.toHaveBeenCalled();
  });

  it('rejects a model without a profile', async () => {
    const adapter = createFakeAdapter('x');
    const gateway = createModelGateway({
      client: new Client({ providers: { ollama: adapter } }),
      profiles: DEFAULT_MODEL_PROFILES,
      requestTimeoutMs: 1_000,
    });

    await expect(gateway.reply({ model: 'llama3', system: '', turns: [] })).rejects.toThrow(
      "No model profile named 'llama3'",
    );
    expect(adapter.complete).not.toHaveBeenCalled();
  });

  it('classifies a client failure', async () => {
    const adapter = createFakeAdapter('x');
    adapter.complete.mockRejectedValue(new NetworkError('Could not reach http://localhost:11434/api/chat: refused'));
    const gateway = createModelGateway({
      client: new Client({ providers: { ollama: adapter } }),
      profiles: DEFAULT_MODEL_PROFILES,
      requestTimeoutMs: 1_000,
    });

    const error = await gateway.reply({ model: 'tuxmate', system: '', turns: [] }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ModelUnavailableError);
    expect(error).toMatchObject({
      kind: 'model_unavailable',
      message: 'The model server is unavailable: Could not reach http://localhost:11434/api/chat: refused',
    });
  });
});

describe('toMessages', () => {
  it('maps search tool turns to labelled user messages', () => {
    expect(toMessages([{ id: 't', role: 'tool', tool: 'search', content: '1. a', timestamp: 0 }])).toEqual([
      { role: 'user', content: 'Tool output (search):\n1. a' },
    ]);
  });
});

describe('classifyModelError', () => {
  it('maps a request timeout to ModelTimeoutError', () => {
    const error = classifyModelError(new RequestTimeoutError('timed out', 500), 'tuxmate');

    expect(error).toBeInstanceOf(ModelTimeoutError);
    expect(error).toMatchObject({ timeoutMs: 500, message: 'The model did not answer within 500ms' });
  });

  it('maps an abort to CancelledByUserError', () => {
    expect(classifyModelError(new AbortError('Fetch was aborted'), 'tuxmate')).toBeInstanceOf(CancelledByUserError);
  });

  it('treats any failure after the signal aborted as a cancellation', () => {
    const controller = new AbortController();
    controller.abort();

    expect(classifyModelError(new Error('boom'), 'tuxmate', controller.signal)).toBeInstanceOf(CancelledByUserError);
  });

  it('names the model when the server does not have it', () => {
    const error = classifyModelError(new NotFoundError('Not found: model not found', 404, 'ollama'), 'tuxmate');

    expect(error).toMatchObject({
      kind: 'model_unavailable',
      message: "Model 'tuxmate' is not available on the server: Not found: model not found",
    });
  });

  it('maps provider errors to ModelUnavailableError', () => {
    const error = classifyModelError(new ServerError('Server error: overloaded', 503, 'ollama'), 'tuxmate');

    expect(error).toBeInstanceOf(ModelUnavailableError);
  });

  it('passes unknown errors through', () => {
    const bug = new TypeError('undefined is not a function');

    expect(classifyModelError(bug, 'tuxmate')).toBe(bug);
  });
});
