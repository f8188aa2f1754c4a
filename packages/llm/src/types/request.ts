import type { Message } from './message.js';
import type { SamplingOptions, TimeoutConfig } from './config.js';

export type LLMRequest = {
  readonly model: string;
  readonly provider?: string;
  readonly messages: ReadonlyArray<Message>;
  readonly system?: string;
  readonly sampling?: SamplingOptions;
  readonly stopSequences?: ReadonlyArray<string>;
  readonly timeout?: TimeoutConfig;
  readonly signal?: AbortSignal;
  readonly providerOptions?: Record<string, Record<string, unknown>>;
};
