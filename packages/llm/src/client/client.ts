import type {
  LLMRequest,
  LLMResponse,
  StreamEvent,
  Middleware,
  ProviderAdapter,
  RetryPolicy,
} from '../types/index.js';
import { ConfigurationError } from '../types/index.js';
import { retry } from '../utils/retry.js';
import { composeComplete, composeStream } from './middleware.js';
import { detectProviders, type ClientConfig, type ProviderEnvSettings, type ProviderName } from './config.js';

export type AdapterFactory = (settings: ProviderEnvSettings) => ProviderAdapter;

export class Client {
  private readonly providers: Record<string, ProviderAdapter>;
  private readonly defaultProvider: string | null;
  private readonly middlewares: ReadonlyArray<Middleware>;
  private readonly retryPolicy: RetryPolicy | null;

  constructor(config: ClientConfig) {
    this.providers = config.providers;
    this.middlewares = config.middleware ?? [];
    this.retryPolicy = config.retryPolicy ?? null;

    // a lone provider becomes the default
    if (config.defaultProvider === undefined) {
      const providerNames = Object.keys(config.providers);
      this.defaultProvider = providerNames.length === 1 ? providerNames[0] ?? null : null;
    } else {
      this.defaultProvider = config.defaultProvider;
    }
  }

  static fromEnv(
    factories: Partial<Record<ProviderName, AdapterFactory>>,
    env: Readonly<Record<string, string | undefined>> = process.env,
  ): Client {
    const providers: Record<string, ProviderAdapter> = {};

    for (const [name, settings] of Object.entries(detectProviders(env))) {
      const factory = isProviderName(name) ? factories[name] : undefined;
      if (factory && settings) {
        providers[name] = factory(settings);
      }
    }

    return new Client({ providers });
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const adapter = this.resolveAdapter(request);
    const policy = this.retryPolicy;

    const handler = policy
      ? (req: LLMRequest) => retry(() => adapter.complete(req), { policy, signal: req.signal })
      : (req: LLMRequest) => adapter.complete(req);

    return composeComplete(this.middlewares, handler)(request);
  }

  stream(request: LLMRequest): AsyncIterable<StreamEvent> {
    const adapter = this.resolveAdapter(request);
    return composeStream(this.middlewares, (req) => adapter.stream(req))(request);
  }

  async close(): Promise<void> {
    const closing = Object.values(this.providers).map((adapter) => adapter.close?.());
    await Promise.allSettled(closing);
  }

  private resolveAdapter(request: LLMRequest): ProviderAdapter {
    const provider = request.provider ?? this.defaultProvider;
    if (!provider) {
      throw new ConfigurationError('no provider configured and no default set');
    }

    const adapter = this.providers[provider];
    if (!adapter) {
      throw new ConfigurationError(`provider '${provider}' not configured`);
    }
    return adapter;
  }
}

function isProviderName(name: string): name is ProviderName {
  return name === 'ollama' || name === 'openai-compatible';
}
