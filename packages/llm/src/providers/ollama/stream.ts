import type { StreamEvent } from '../../types/index.js';
import { StreamError } from '../../types/index.js';
import { isRecord, readBoolean, readRecord, readString } from '../../utils/json.js';
import { mapDoneReason, translateUsage } from './response.js';

/**
 * Translates NDJSON chat chunks. The final chunk has `done: true` and carries
 * the token counts; an `error` line mid-stream aborts the stream.
 */
export async function* translateStream(chunks: AsyncIterable<unknown>): AsyncIterable<StreamEvent> {
  let started = false;

  for await (const chunk of chunks) {
    if (!isRecord(chunk)) {
      continue;
    }

    const error = readString(chunk, 'error');
    if (error !== undefined) {
      throw new StreamError(`Ollama stream failed: ${error}`);
    }

    if (!started) {
      started = true;
      yield { type: 'STREAM_START', id: readString(chunk, 'created_at') ?? '', model: readString(chunk, 'model') ?? '' };
    }

    const message = readRecord(chunk, 'message');
    const thinking = readString(message, 'thinking');
    if (thinking) {
      yield { type: 'THINKING_DELTA', text: thinking };
    }
    const content = readString(message, 'content');
    if (content) {
      yield { type: 'TEXT_DELTA', text: content };
    }

    if (readBoolean(chunk, 'done') === true) {
      yield { type: 'FINISH', finishReason: mapDoneReason(readString(chunk, 'done_reason')), usage: translateUsage(chunk) };
      return;
    }
  }

  throw new StreamError('Ollama stream ended before the final chunk');
}
