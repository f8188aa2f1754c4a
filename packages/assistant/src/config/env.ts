import { ConfigurationError } from '@tuxmate/llm';
import { isLogLevel, LOG_LEVELS } from '../logging/index.js';
import type { AssistantConfigOverrides, ElevationTool, EndpointKind } from './config.js';

type Env = Readonly<Record<string, string | undefined>>;

export const ENV_VARS = {
  baseUrl: 'TUXMATE_BASE_URL',
  endpoint: 'TUXMATE_ENDPOINT',
  apiKey: 'TUXMATE_API_KEY',
  model: 'TUXMATE_MODEL',
  maxHistory: 'TUXMATE_MAX_HISTORY',
  commandTimeoutMs: 'TUXMATE_COMMAND_TIMEOUT_MS',
  searchBinary: 'TUXMATE_SEARCH_BINARY',
  elevationTool: 'TUXMATE_ELEVATION_TOOL',
  logLevel: 'TUXMATE_LOG_LEVEL',
} as const;

/**
 * Maps TUXMATE_* variables onto config overrides. Unset or empty variables
 * leave the default in place; malformed values throw ConfigurationError.
 */
export function configFromEnv(env: Env = process.env): AssistantConfigOverrides {
  const read = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  const baseUrl = read(ENV_VARS.baseUrl);
  const endpoint = read(ENV_VARS.endpoint);
  const apiKey = read(ENV_VARS.apiKey);
  const model = read(ENV_VARS.model);
  const maxHistory = read(ENV_VARS.maxHistory);
  const commandTimeoutMs = read(ENV_VARS.commandTimeoutMs);
  const searchBinary = read(ENV_VARS.searchBinary);
  const elevationTool = read(ENV_VARS.elevationTool);
  const logLevel = read(ENV_VARS.logLevel);

  const overrides: {
    -readonly [K in keyof AssistantConfigOverrides]: AssistantConfigOverrides[K];
  } = {};

  if (baseUrl !== undefined || endpoint !== undefined || apiKey !== undefined) {
    overrides.endpoint = {
      ...(baseUrl !== undefined ? { baseUrl } : {}),
      ...(endpoint !== undefined ? { kind: parseEndpointKind(endpoint) } : {}),
      ...(apiKey !== undefined ? { apiKey } : {}),
    };
  }
  if (model !== undefined) {
    overrides.models = { defaultModel: model };
  }
  if (maxHistory !== undefined) {
    overrides.conversation = { maxHistory: parseInteger(ENV_VARS.maxHistory, maxHistory) };
  }
  if (commandTimeoutMs !== undefined) {
    overrides.execution = { commandTimeoutMs: parseInteger(ENV_VARS.commandTimeoutMs, commandTimeoutMs) };
  }
  if (searchBinary !== undefined) {
    overrides.search = { binary: searchBinary };
  }
  if (elevationTool !== undefined) {
    overrides.safety = { elevationTool: parseElevationTool(elevationTool) };
  }
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigurationError(`${ENV_VARS.logLevel} must be one of ${LOG_LEVELS.join(', ')}`);
    }
    overrides.logLevel = logLevel;
  }

  return overrides;
}

function parseInteger(name: string, raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(`${name} must be a whole number, got '${raw}'`);
  }
  return Number(raw);
}

function parseEndpointKind(raw: string): EndpointKind {
  if (raw === 'ollama' || raw === 'openai-compatible') {
    return raw;
  }
  throw new ConfigurationError(`${ENV_VARS.endpoint} must be 'ollama' or 'openai-compatible', got '${raw}'`);
}

function parseElevationTool(raw: string): ElevationTool {
  if (raw === 'pkexec' || raw === 'kdesu' || raw === 'sudo') {
    return raw;
  }
  throw new ConfigurationError(`${ENV_VARS.elevationTool} must be pkexec, kdesu or sudo, got '${raw}'`);
}
