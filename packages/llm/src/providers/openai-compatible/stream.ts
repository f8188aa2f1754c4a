import type { SSEEvent } from '../../utils/sse.js';
import type { StreamEvent, FinishReason } from '../../types/index.js';
import { emptyUsage, StreamError } from '../../types/index.js';
import { isRecord, readArray, readRecord, readString } from '../../utils/json.js';
import { mapFinishReason, translateUsage } from './response.js';

/**
 * Turns chat.completion.chunk events into stream events. FINISH is held back
 * until the stream ends, because with include_usage the usage arrives in a
 * separate chunk after the one carrying finish_reason.
 */
export async function* translateStream(sseStream: AsyncIterable<SSEEvent>): AsyncIterable<StreamEvent> {
  let started = false;
  let finishReason: FinishReason | null = null;
  let usage = emptyUsage();

  for await (const event of sseStream) {
    if (!event.data || event.data === '[DONE]') {
      continue;
    }

    let data: unknown;
    try {
      data = JSON.parse(event.data);
    } catch (err) {
      throw new StreamError(
        `Malformed chunk in completion stream: ${event.data.slice(0, 200)}`,
        err instanceof Error ? err : undefined,
      );
    }
    if (!isRecord(data)) {
      continue;
    }

    if (!started) {
      started = true;
      yield { type: 'STREAM_START', id: readString(data, 'id') ?? '', model: readString(data, 'model') ?? '' };
    }

    const rawUsage = readRecord(data, 'usage');
    if (rawUsage) {
      usage = translateUsage(rawUsage);
    }

    const firstChoice = readArray(data, 'choices').find(isRecord);
    const delta = readRecord(firstChoice, 'delta');

    const reasoning = readString(delta, 'reasoning_content');
    if (reasoning) {
      yield { type: 'THINKING_DELTA', text: reasoning };
    }
    const content = readString(delta, 'content');
    if (content) {
      yield { type: 'TEXT_DELTA', text: content };
    }

    const rawFinish = readString(firstChoice, 'finish_reason');
    if (rawFinish) {
      finishReason = mapFinishReason(rawFinish);
    }
  }

  if (!started) {
    throw new StreamError('Completion stream ended without any chunk');
  }

  yield { type: 'FINISH', finishReason: finishReason ?? 'stop', usage };
}
