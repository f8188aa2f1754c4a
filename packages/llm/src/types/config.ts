export type TimeoutConfig = {
  readonly requestMs?: number;
};

export type RetryPolicy = {
  readonly maxRetries: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoffMultiplier: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  initialDelayMs: 1000,
  maxDelayMs: 10_000,
  backoffMultiplier: 2,
};

/**
 * Sampling knobs understood by local inference servers. Adapters forward the
 * ones their wire format supports and ignore the rest.
 */
export type SamplingOptions = {
  readonly temperature?: number;
  readonly topP?: number;
  readonly topK?: number;
  readonly contextLength?: number;
  readonly maxTokens?: number;
};
