import type { LLMRequest } from './request.js';
import type { LLMResponse } from './response.js';
import type { StreamEvent } from './stream.js';

export type CompleteHandler = (request: LLMRequest) => Promise<LLMResponse>;
export type StreamHandler = (request: LLMRequest) => AsyncIterable<StreamEvent>;

/**
 * Wraps client calls onion-style. A middleware may intercept either call
 * shape; the one it leaves out is passed straight through.
 */
export type Middleware = {
  readonly name: string;
  readonly complete?: (request: LLMRequest, next: CompleteHandler) => Promise<LLMResponse>;
  readonly stream?: (request: LLMRequest, next: StreamHandler) => AsyncIterable<StreamEvent>;
};
