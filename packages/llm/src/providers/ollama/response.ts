import type { ContentPart, FinishReason, LLMResponse, Usage } from '../../types/index.js';
import { isRecord, readNumber, readRecord, readString, type JsonRecord } from '../../utils/json.js';

export function mapDoneReason(raw: string | undefined): FinishReason {
  return raw === 'length' ? 'length' : 'stop';
}

export function translateUsage(chunk: JsonRecord): Usage {
  const inputTokens = readNumber(chunk, 'prompt_eval_count') ?? 0;
  const outputTokens = readNumber(chunk, 'eval_count') ?? 0;
  return { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens };
}

/** Timing counters Ollama reports in nanoseconds, kept for diagnostics. */
export function translateMetadata(chunk: JsonRecord): Record<string, unknown> {
  const metadata: Record<string, unknown> = {};
  for (const key of ['total_duration', 'load_duration', 'prompt_eval_duration', 'eval_duration']) {
    const value = readNumber(chunk, key);
    if (value !== undefined) {
      metadata[key] = value;
    }
  }
  return metadata;
}

export function translateResponse(raw: unknown): LLMResponse {
  const root = isRecord(raw) ? raw : {};
  const message = readRecord(root, 'message');

  const content: Array<ContentPart> = [];
  const thinking = readString(message, 'thinking');
  if (thinking) {
    content.push({ kind: 'THINKING', text: thinking });
  }
  const text = readString(message, 'content');
  if (text) {
    content.push({ kind: 'TEXT', text });
  }

  return {
    // Ollama has no response id; created_at is unique enough per model
    id: readString(root, 'created_at') ?? '',
    model: readString(root, 'model') ?? '',
    content,
    finishReason: mapDoneReason(readString(root, 'done_reason')),
    usage: translateUsage(root),
    providerMetadata: translateMetadata(root),
  };
}
