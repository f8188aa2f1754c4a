import type { ProviderAdapter, LLMRequest, LLMResponse, StreamEvent } from '../../types/index.js';
import { fetchWithTimeout, fetchStream } from '../../utils/http.js';
import { createNDJSONStream } from '../../utils/ndjson.js';
import { DEFAULT_OLLAMA_BASE_URL, translateRequest } from './request.js';
import { translateResponse } from './response.js';
import { translateStream } from './stream.js';

export type OllamaOptions = {
  readonly baseUrl?: string;
  readonly name?: string;
};

/** Adapter for the native Ollama chat API. */
export class OllamaAdapter implements ProviderAdapter {
  readonly name: string;
  private readonly baseUrl: string;

  constructor(options: OllamaOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_OLLAMA_BASE_URL;
    this.name = options.name ?? 'ollama';
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const { url, body } = translateRequest(request, this.baseUrl, false);

    const result = await fetchWithTimeout({
      url,
      provider: this.name,
      method: 'POST',
      body,
      timeout: request.timeout,
      signal: request.signal,
    });

    return translateResponse(result.body);
  }

  async *stream(request: LLMRequest): AsyncIterable<StreamEvent> {
    const { url, body } = translateRequest(request, this.baseUrl, true);

    const response = await fetchStream({
      url,
      provider: this.name,
      method: 'POST',
      body,
      timeout: request.timeout,
      signal: request.signal,
    });

    yield* translateStream(createNDJSONStream(response));
  }
}

export { DEFAULT_OLLAMA_BASE_URL, translateRequest, translateResponse, translateStream };
