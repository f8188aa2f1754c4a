export * from './types/index.js';
export { Client, type AdapterFactory } from './client/client.js';
export {
  detectProviders,
  DEFAULT_PROVIDER_OPTION_ENV_CONFIGS,
  type ClientConfig,
  type ProviderEnvSettings,
  type ProviderName,
} from './client/config.js';
export { composeComplete, composeStream } from './client/middleware.js';
export { OllamaAdapter, DEFAULT_OLLAMA_BASE_URL, type OllamaOptions } from './providers/ollama/index.js';
export { OpenAICompatibleAdapter, type OpenAICompatibleOptions } from './providers/openai-compatible/index.js';
export { retry, isRetryable, calculateBackoff, type RetryOptions } from './utils/retry.js';
export { isRecord, readString, type JsonRecord } from './utils/json.js';
