import type { ContentPart, TextData, ThinkingData } from './content.js';

export type FinishReason = 'stop' | 'length' | 'error';

export type Usage = {
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly totalTokens: number;
};

export function emptyUsage(): Usage {
  return {
    inputTokens: 0,
    outputTokens: 0,
    totalTokens: 0,
  };
}

export type LLMResponse = {
  readonly id: string;
  readonly model: string;
  readonly content: ReadonlyArray<ContentPart>;
  readonly finishReason: FinishReason;
  readonly usage: Usage;
  readonly providerMetadata: Record<string, unknown>;
};

export function responseText(response: Readonly<LLMResponse>): string {
  return response.content
    .filter((part): part is TextData => part.kind === 'TEXT')
    .map((part) => part.text)
    .join('');
}

export function responseReasoning(response: Readonly<LLMResponse>): string {
  return response.content
    .filter((part): part is ThinkingData => part.kind === 'THINKING')
    .map((part) => part.text)
    .join('');
}
