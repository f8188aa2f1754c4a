import { describe, it, expect, vi } from 'vitest';
import {
  ServerError,
  composeComplete,
  composeStream,
  type LLMRequest,
  type LLMResponse,
  type StreamEvent,
} from '@tuxmate/llm';
import type { Logger } from '../logging/index.js';
import { createLoggingMiddleware } from './logging-middleware.js';

function recordingLogger() {
  return {
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
  } satisfies Logger;
}

function ticking(...times: number[]): () => number {
  let idx = 0;
  return () => times[Math.min(idx++, times.length - 1)] ?? 0;
}

const request: LLMRequest = { model: 'tuxmate', messages: [{ role: 'user', content: 'hi' }] };

const response: LLMResponse = {
  id: 'r1',
  model: 'tuxmate',
  content: [{ kind: 'TEXT', text: 'hello' }],
  finishReason: 'stop',
  usage: { inputTokens: 12, outputTokens: 3, totalTokens: 15 },
  providerMetadata: {},
};

describe('createLoggingMiddleware', () => {
  it('logs the request and the response latency', async () => {
    const logger = recordingLogger();
    const handler = composeComplete([createLoggingMiddleware(logger, ticking(1_000, 1_250))], async () => response);

    await expect(handler(request)).resolves.toBe(response);

    expect(logger.debug).toHaveBeenCalledWith('model_request', { model: 'tuxmate', messages: 1, streaming: false });
    expect(logger.info).toHaveBeenCalledWith('model_response', {
      model: 'tuxmate',
      durationMs: 250,
      finishReason: 'stop',
      inputTokens: 12,
      outputTokens: 3,
    });
  });

  it('logs and rethrows failures', async () => {
    const logger = recordingLogger();
    const failure = new ServerError('Server error: busy', 503, 'ollama');
    const handler = composeComplete([createLoggingMiddleware(logger, ticking(0, 40))], async () => {
      throw failure;
    });

    await expect(handler(request)).rejects.toBe(failure);

    expect(logger.warn).toHaveBeenCalledWith('model_request_failed', {
      model: 'tuxmate',
      durationMs: 40,
      error: failure,
    });
  });

  it('passes stream events through and logs the finish', async () => {
    const logger = recordingLogger();
    const events: StreamEvent[] = [
      { type: 'TEXT_DELTA', text: 'hi' },
      { type: 'FINISH', finishReason: 'stop', usage: { inputTokens: 5, outputTokens: 1, totalTokens: 6 } },
    ];
    const handler = composeStream([createLoggingMiddleware(logger, ticking(10, 30))], async function* () {
      yield* events;
    });

    const seen: StreamEvent[] = [];
    for await (const event of handler(request)) {
      seen.push(event);
    }

    expect(seen).toEqual(events);
    expect(logger.debug).toHaveBeenCalledWith('model_request', { model: 'tuxmate', messages: 1, streaming: true });
    expect(logger.info).toHaveBeenCalledWith('model_response', {
      model: 'tuxmate',
      durationMs: 20,
      finishReason: 'stop',
      inputTokens: 5,
      outputTokens: 1,
    });
  });
});
