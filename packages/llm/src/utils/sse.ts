import { EventSourceParserStream } from 'eventsource-parser/stream';
import { StreamError } from '../types/error.js';
import { readStream } from './ndjson.js';

export type SSEEvent = {
  readonly event: string;
  readonly data: string;
  readonly id?: string;
};

/**
 * Yields parsed server-sent events from a Response body.
 * OpenAI-compatible servers end the stream with a `[DONE]` sentinel,
 * which is passed through for the adapter to recognize.
 */
export async function* createSSEStream(response: globalThis.Response): AsyncIterable<SSEEvent> {
  const body = response.body;
  if (!body) {
    throw new StreamError('Response body is null');
  }

  const events = body.pipeThrough(new TextDecoderStream()).pipeThrough(new EventSourceParserStream());

  try {
    for await (const value of readStream(events)) {
      yield {
        event: value.event ?? '',
        data: value.data,
        ...(value.id ? { id: value.id } : {}),
      };
    }
  } catch (err) {
    if (err instanceof StreamError) {
      throw err;
    }
    throw new StreamError(
      `Failed to parse SSE stream: ${err instanceof Error ? err.message : String(err)}`,
      err instanceof Error ? err : undefined,
    );
  }
}
