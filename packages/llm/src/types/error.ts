export class SDKError extends Error {
  override name: string;
  override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
  }
}

export class ConfigurationError extends SDKError {}

export class AbortError extends SDKError {}

export class RequestTimeoutError extends SDKError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.timeoutMs = timeoutMs;
  }
}

/** The server could not be reached at all (refused, DNS, reset). */
export class NetworkError extends SDKError {}

export class StreamError extends SDKError {}

export class ProviderError extends SDKError {
  readonly statusCode: number;
  readonly retryable: boolean;
  readonly retryAfter: number | null;
  readonly provider: string;
  readonly raw: unknown;

  constructor(
    message: string,
    statusCode: number,
    retryable: boolean,
    provider: string,
    raw: unknown = null,
    retryAfter: number | null = null,
  ) {
    super(message);
    this.statusCode = statusCode;
    this.retryable = retryable;
    this.retryAfter = retryAfter;
    this.provider = provider;
    this.raw = raw;
  }
}

export class AuthenticationError extends ProviderError {
  constructor(message: string, statusCode: number, provider: string, raw: unknown = null) {
    super(message, statusCode, false, provider, raw);
  }
}

/** Usually a model that has not been pulled on the local server. */
export class NotFoundError extends ProviderError {
  constructor(message: string, statusCode: number, provider: string, raw: unknown = null) {
    super(message, statusCode, false, provider, raw);
  }
}

export class InvalidRequestError extends ProviderError {
  constructor(message: string, statusCode: number, provider: string, raw: unknown = null) {
    super(message, statusCode, false, provider, raw);
  }
}

export class ContextLengthError extends ProviderError {
  constructor(message: string, statusCode: number, provider: string, raw: unknown = null) {
    super(message, statusCode, false, provider, raw);
  }
}

export class RateLimitError extends ProviderError {
  constructor(
    message: string,
    statusCode: number,
    provider: string,
    raw: unknown = null,
    retryAfter: number | null = null,
  ) {
    super(message, statusCode, true, provider, raw, retryAfter);
  }
}

export class ServerError extends ProviderError {
  constructor(
    message: string,
    statusCode: number,
    provider: string,
    raw: unknown = null,
    retryAfter: number | null = null,
  ) {
    super(message, statusCode, true, provider, raw, retryAfter);
  }
}
