import type { ProviderAdapter, LLMRequest, LLMResponse, StreamEvent } from '../../types/index.js';
import { fetchWithTimeout, fetchStream } from '../../utils/http.js';
import { createSSEStream } from '../../utils/sse.js';
import { translateRequest } from './request.js';
import { translateResponse } from './response.js';
import { translateStream } from './stream.js';

export type OpenAICompatibleOptions = {
  readonly baseUrl: string;
  readonly apiKey?: string;
  readonly name?: string;
};

/** Adapter for llama.cpp, LM Studio and other /v1/chat/completions servers. */
export class OpenAICompatibleAdapter implements ProviderAdapter {
  readonly name: string;
  private readonly apiKey: string | null;
  private readonly baseUrl: string;

  constructor(options: OpenAICompatibleOptions) {
    this.baseUrl = options.baseUrl;
    this.apiKey = options.apiKey ?? null;
    this.name = options.name ?? 'openai-compatible';
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const { url, headers, body } = translateRequest(request, this.baseUrl, this.apiKey, false);

    const result = await fetchWithTimeout({
      url,
      provider: this.name,
      method: 'POST',
      headers,
      body,
      timeout: request.timeout,
      signal: request.signal,
    });

    return translateResponse(result.body);
  }

  async *stream(request: LLMRequest): AsyncIterable<StreamEvent> {
    const { url, headers, body } = translateRequest(request, this.baseUrl, this.apiKey, true);

    const response = await fetchStream({
      url,
      provider: this.name,
      method: 'POST',
      headers,
      body,
      timeout: request.timeout,
      signal: request.signal,
    });

    yield* translateStream(createSSEStream(response));
  }
}

export { translateRequest, translateResponse, translateStream };
