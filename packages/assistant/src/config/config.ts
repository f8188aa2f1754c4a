import { ConfigurationError, DEFAULT_RETRY_POLICY, type RetryPolicy } from '@tuxmate/llm';
import { MAX_HISTORY_LIMIT } from '../conversation/index.js';
import { isLogLevel, type LogLevel } from '../logging/index.js';

export type EndpointKind = 'ollama' | 'openai-compatible';

export type ElevationTool = 'pkexec' | 'kdesu' | 'sudo';

/** Sampling parameters forwarded to the model server as opaque options. */
export type ModelProfile = {
  readonly contextLength: number;
  readonly temperature: number;
  readonly topP: number;
  readonly topK: number;
};

export type AssistantConfig = {
  readonly endpoint: {
    readonly kind: EndpointKind;
    readonly baseUrl: string;
    readonly apiKey: string | null;
    readonly requestTimeoutMs: number;
    readonly retry: RetryPolicy;
  };
  readonly models: {
    readonly defaultModel: string;
    readonly profiles: Readonly<Record<string, ModelProfile>>;
  };
  readonly conversation: {
    /** Exchanges kept; the turn bound is twice this. */
    readonly maxHistory: number;
  };
  readonly execution: {
    readonly commandTimeoutMs: number;
    readonly maxOutputBytes: number;
    readonly killGraceMs: number;
    readonly cwd: string | null;
  };
  readonly search: {
    readonly binary: string;
    readonly extraArgs: ReadonlyArray<string>;
    readonly maxResults: number;
    readonly shownResults: number;
    readonly timeoutMs: number;
    readonly maxSearchChars: number;
  };
  readonly safety: {
    readonly requireConfirmation: boolean;
    readonly elevationTool: ElevationTool;
  };
  readonly dispatch: {
    readonly summarizeShellOutput: boolean;
    /** Tool output beyond this is cut before it reaches the model. */
    readonly maxToolOutputChars: number;
  };
  readonly logLevel: LogLevel;
};

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends ReadonlyArray<unknown>
    ? T[K]
    : T[K] extends object
      ? T[K] extends Readonly<Record<string, ModelProfile>>
        ? T[K]
        : DeepPartial<T[K]>
      : T[K];
};

export type AssistantConfigOverrides = DeepPartial<AssistantConfig>;

export const DEFAULT_MODEL_PROFILES: Readonly<Record<string, ModelProfile>> = {
  tuxmate: { contextLength: 4096, temperature: 0.7, topP: 0.9, topK: 40 },
  'tuxmate-lite': { contextLength: 2048, temperature: 0.7, topP: 0.9, topK: 40 },
};

export const DEFAULT_CONFIG: AssistantConfig = {
  endpoint: {
    kind: 'ollama',
    baseUrl: 'http://localhost:11434',
    apiKey: null,
    requestTimeoutMs: 120_000,
    retry: DEFAULT_RETRY_POLICY,
  },
  models: {
    defaultModel: 'tuxmate',
    profiles: DEFAULT_MODEL_PROFILES,
  },
  conversation: {
    maxHistory: 20,
  },
  execution: {
    commandTimeoutMs: 30_000,
    maxOutputBytes: 64 * 1024,
    killGraceMs: 2_000,
    cwd: null,
  },
  search: {
    binary: 'ddgr',
    extraArgs: ['--unsafe'],
    maxResults: 5,
    shownResults: 3,
    timeoutMs: 30_000,
    maxSearchChars: 4_000,
  },
  safety: {
    requireConfirmation: true,
    elevationTool: 'pkexec',
  },
  dispatch: {
    summarizeShellOutput: true,
    maxToolOutputChars: 8_000,
  },
  logLevel: 'info',
};

/**
 * Merges overrides onto the defaults section by section and validates the
 * result. Model profiles replace the default set wholesale when given.
 */
export function resolveConfig(overrides: AssistantConfigOverrides = {}): AssistantConfig {
  const base = DEFAULT_CONFIG;
  const config: AssistantConfig = {
    endpoint: {
      ...base.endpoint,
      ...overrides.endpoint,
      retry: { ...base.endpoint.retry, ...overrides.endpoint?.retry },
    },
    models: { ...base.models, ...overrides.models },
    conversation: { ...base.conversation, ...overrides.conversation },
    execution: { ...base.execution, ...overrides.execution },
    search: { ...base.search, ...overrides.search },
    safety: { ...base.safety, ...overrides.safety },
    dispatch: { ...base.dispatch, ...overrides.dispatch },
    logLevel: overrides.logLevel ?? base.logLevel,
  };

  validateConfig(config);
  return config;
}

export function validateConfig(config: AssistantConfig): void {
  requirePositive('conversation.maxHistory', config.conversation.maxHistory, true);
  if (config.conversation.maxHistory > MAX_HISTORY_LIMIT) {
    throw new ConfigurationError(
      `conversation.maxHistory must not exceed ${MAX_HISTORY_LIMIT}, got ${config.conversation.maxHistory}`,
    );
  }
  requirePositive('endpoint.requestTimeoutMs', config.endpoint.requestTimeoutMs);
  requirePositive('execution.commandTimeoutMs', config.execution.commandTimeoutMs);
  requirePositive('execution.maxOutputBytes', config.execution.maxOutputBytes, true);
  requirePositive('search.maxResults', config.search.maxResults, true);
  requirePositive('search.shownResults', config.search.shownResults, true);
  requirePositive('search.timeoutMs', config.search.timeoutMs);
  requirePositive('search.maxSearchChars', config.search.maxSearchChars, true);
  requirePositive('dispatch.maxToolOutputChars', config.dispatch.maxToolOutputChars, true);

  if (config.execution.killGraceMs < 0) {
    throw new ConfigurationError(`execution.killGraceMs must not be negative, got ${config.execution.killGraceMs}`);
  }
  if (config.endpoint.retry.maxRetries < 0) {
    throw new ConfigurationError('endpoint.retry.maxRetries must not be negative');
  }
  if (config.endpoint.kind !== 'ollama' && config.endpoint.kind !== 'openai-compatible') {
    throw new ConfigurationError(`unknown endpoint kind '${String(config.endpoint.kind)}'`);
  }
  if (!['pkexec', 'kdesu', 'sudo'].includes(config.safety.elevationTool)) {
    throw new ConfigurationError(`unknown elevation tool '${config.safety.elevationTool}'`);
  }
  if (!isLogLevel(config.logLevel)) {
    throw new ConfigurationError(`unknown log level '${String(config.logLevel)}'`);
  }
  if (config.search.binary.trim() === '') {
    throw new ConfigurationError('search.binary must not be empty');
  }

  const profiles = Object.keys(config.models.profiles);
  if (profiles.length === 0) {
    throw new ConfigurationError('at least one model profile is required');
  }
  if (!profiles.includes(config.models.defaultModel)) {
    throw new ConfigurationError(
      `default model '${config.models.defaultModel}' is not one of the configured profiles: ${profiles.join(', ')}`,
    );
  }
}

function requirePositive(path: string, value: number, integer: boolean = false): void {
  if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    throw new ConfigurationError(`${path} must be a positive ${integer ? 'integer' : 'number'}, got ${value}`);
  }
}
