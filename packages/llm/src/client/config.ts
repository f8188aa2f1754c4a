import type { Middleware, ProviderAdapter, RetryPolicy } from '../types/index.js';

export type ClientConfig = {
  readonly providers: Record<string, ProviderAdapter>;
  readonly defaultProvider?: string;
  readonly middleware?: ReadonlyArray<Middleware>;
  /** Applied to complete() only; streams are never replayed once started. */
  readonly retryPolicy?: RetryPolicy;
};

export type ProviderName = 'ollama' | 'openai-compatible';

export type ProviderEnvSettings = {
  readonly baseUrl?: string;
  readonly apiKey?: string;
};

type ProviderOptionEnvConfig = {
  readonly envVar: string;
  readonly providerName: ProviderName;
  readonly option: keyof ProviderEnvSettings;
};

export const DEFAULT_PROVIDER_OPTION_ENV_CONFIGS: ReadonlyArray<ProviderOptionEnvConfig> = [
  { envVar: 'OLLAMA_HOST', providerName: 'ollama', option: 'baseUrl' },
  { envVar: 'OPENAI_BASE_URL', providerName: 'openai-compatible', option: 'baseUrl' },
  { envVar: 'OPENAI_API_KEY', providerName: 'openai-compatible', option: 'apiKey' },
];

/**
 * Reads provider endpoints from the environment. A provider appears in the
 * result only when at least one of its variables is set and non-empty.
 */
export function detectProviders(
  env: Readonly<Record<string, string | undefined>> = process.env,
): Partial<Record<ProviderName, ProviderEnvSettings>> {
  const providers: Partial<Record<ProviderName, ProviderEnvSettings>> = {};

  for (const config of DEFAULT_PROVIDER_OPTION_ENV_CONFIGS) {
    const value = env[config.envVar];
    if (value === undefined || value.length === 0) {
      continue;
    }
    providers[config.providerName] = { ...providers[config.providerName], [config.option]: value };
  }

  return providers;
}
