import type { LLMRequest, Message } from '../../types/index.js';

type RequestOutput = {
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body: Record<string, unknown>;
};

/**
 * Builds a /v1/chat/completions request. The base URL may or may not already
 * end in /v1, as llama.cpp and LM Studio document it both ways.
 */
export function translateRequest(
  request: Readonly<LLMRequest>,
  baseUrl: string,
  apiKey: string | null,
  streaming: boolean = false,
): RequestOutput {
  const trimmed = baseUrl.replace(/\/+$/, '');
  const url = trimmed.endsWith('/v1') ? `${trimmed}/chat/completions` : `${trimmed}/v1/chat/completions`;

  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (apiKey) {
    headers['Authorization'] = `Bearer ${apiKey}`;
  }

  const messages: Array<Message> = [];
  if (request.system) {
    messages.push({ role: 'system', content: request.system });
  }
  messages.push(...request.messages);

  const body: Record<string, unknown> = {
    model: request.model,
    messages: messages.map((m) => ({ role: m.role, content: m.content })),
    stream: streaming,
  };

  const sampling = request.sampling;
  if (sampling?.temperature !== undefined) {
    body['temperature'] = sampling.temperature;
  }
  if (sampling?.topP !== undefined) {
    body['top_p'] = sampling.topP;
  }
  // top_k is a llama.cpp extension; OpenAI-proper servers ignore unknown fields
  if (sampling?.topK !== undefined) {
    body['top_k'] = sampling.topK;
  }
  if (sampling?.maxTokens !== undefined) {
    body['max_tokens'] = sampling.maxTokens;
  }
  if (request.stopSequences && request.stopSequences.length > 0) {
    body['stop'] = request.stopSequences;
  }
  if (streaming) {
    body['stream_options'] = { include_usage: true };
  }

  const compatOptions = request.providerOptions?.['openaiCompatible'];
  if (compatOptions) {
    Object.assign(body, compatOptions);
  }

  return { url, headers, body };
}
