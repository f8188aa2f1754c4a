import type { LLMResponse, FinishReason, ContentPart, Usage } from '../../types/index.js';
import { isRecord, readArray, readNumber, readRecord, readString, type JsonRecord } from '../../utils/json.js';

export function mapFinishReason(raw: string | undefined): FinishReason {
  return raw === 'length' ? 'length' : 'stop';
}

export function translateUsage(rawUsage: JsonRecord | undefined): Usage {
  const inputTokens = readNumber(rawUsage, 'prompt_tokens') ?? 0;
  const outputTokens = readNumber(rawUsage, 'completion_tokens') ?? 0;
  return {
    inputTokens,
    outputTokens,
    totalTokens: readNumber(rawUsage, 'total_tokens') ?? inputTokens + outputTokens,
  };
}

export function translateResponse(raw: unknown): LLMResponse {
  const root = isRecord(raw) ? raw : {};
  const firstChoice = readArray(root, 'choices').find(isRecord);
  const message = readRecord(firstChoice, 'message');

  const content: Array<ContentPart> = [];
  // reasoning_content is how DeepSeek-style servers expose thinking
  const reasoning = readString(message, 'reasoning_content');
  if (reasoning) {
    content.push({ kind: 'THINKING', text: reasoning });
  }
  const text = readString(message, 'content');
  if (text) {
    content.push({ kind: 'TEXT', text });
  }

  return {
    id: readString(root, 'id') ?? '',
    model: readString(root, 'model') ?? '',
    content,
    finishReason: mapFinishReason(readString(firstChoice, 'finish_reason')),
    usage: translateUsage(readRecord(root, 'usage')),
    providerMetadata: {},
  };
}
