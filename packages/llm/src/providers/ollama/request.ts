import type { LLMRequest } from '../../types/index.js';

type RequestOutput = {
  readonly url: string;
  readonly body: Record<string, unknown>;
};

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';

/**
 * Builds a native /api/chat request. Sampling knobs travel in `options`
 * under Ollama's own names (num_ctx, num_predict, top_k...).
 */
export function translateRequest(request: Readonly<LLMRequest>, baseUrl: string, streaming: boolean): RequestOutput {
  const url = `${baseUrl.replace(/\/+$/, '')}/api/chat`;

  const messages = request.messages.map((m) => ({ role: m.role, content: m.content }));
  if (request.system) {
    messages.unshift({ role: 'system', content: request.system });
  }

  const options: Record<string, unknown> = {};
  const sampling = request.sampling;
  if (sampling?.temperature !== undefined) options['temperature'] = sampling.temperature;
  if (sampling?.topK !== undefined) options['top_k'] = sampling.topK;
  if (sampling?.topP !== undefined) options['top_p'] = sampling.topP;
  if (sampling?.contextLength !== undefined) options['num_ctx'] = sampling.contextLength;
  if (sampling?.maxTokens !== undefined) options['num_predict'] = sampling.maxTokens;
  if (request.stopSequences && request.stopSequences.length > 0) {
    options['stop'] = [...request.stopSequences];
  }

  const body: Record<string, unknown> = {
    model: request.model,
    messages,
    stream: streaming,
  };
  if (Object.keys(options).length > 0) {
    body['options'] = options;
  }

  // e.g. { ollama: { keep_alive: '10m', think: true } }
  const ollamaOptions = request.providerOptions?.['ollama'];
  if (ollamaOptions) {
    Object.assign(body, ollamaOptions);
  }

  return { url, body };
}
