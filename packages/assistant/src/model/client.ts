import { Client, OllamaAdapter, OpenAICompatibleAdapter, type ProviderAdapter } from '@tuxmate/llm';
import type { AssistantConfig } from '../config/index.js';
import { silentLogger, type Logger } from '../logging/index.js';
import { createLoggingMiddleware } from './logging-middleware.js';

/** A model client for the configured endpoint, with logging and retries. */
export function createModelClient(endpoint: AssistantConfig['endpoint'], logger: Logger = silentLogger): Client {
  const adapter: ProviderAdapter =
    endpoint.kind === 'ollama'
      ? new OllamaAdapter({ baseUrl: endpoint.baseUrl })
      : new OpenAICompatibleAdapter({ baseUrl: endpoint.baseUrl, apiKey: endpoint.apiKey ?? undefined });

  return new Client({
    providers: { [endpoint.kind]: adapter },
    defaultProvider: endpoint.kind,
    middleware: [createLoggingMiddleware(logger)],
    retryPolicy: endpoint.retry,
  });
}
