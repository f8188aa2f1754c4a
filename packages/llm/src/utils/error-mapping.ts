import {
  AuthenticationError,
  NotFoundError,
  InvalidRequestError,
  ContextLengthError,
  RateLimitError,
  ServerError,
  ProviderError,
} from '../types/error.js';

export type MapHttpErrorOptions = {
  readonly statusCode: number;
  readonly body: string;
  readonly provider: string;
  readonly headers: Headers;
};

/**
 * Parses the Retry-After header from response headers.
 * Returns milliseconds, or null if header is not present.
 *
 * - Numeric value (seconds): parsed as int and converted to ms
 * - HTTP date string: computed as delta from now in ms
 */
export function parseRetryAfter(headers: Headers): number | null {
  const retryAfter = headers.get('Retry-After');
  if (!retryAfter) {
    return null;
  }

  if (/^\d+$/.test(retryAfter)) {
    return Number(retryAfter) * 1000;
  }

  const retryDate = new Date(retryAfter);
  if (!isNaN(retryDate.getTime())) {
    return Math.max(0, retryDate.getTime() - Date.now());
  }

  return null;
}

/**
 * Pulls the human-readable message out of an error body.
 * Ollama sends `{"error": "..."}`, OpenAI-style servers `{"error": {"message": "..."}}`.
 */
export function extractErrorMessage(body: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return body;
  }

  if (typeof parsed !== 'object' || parsed === null || !('error' in parsed)) {
    return body;
  }

  const error = parsed.error;
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return body;
}

/**
 * Maps HTTP status codes and response bodies to ProviderError subclasses.
 * Status code decides first; 400 bodies are sniffed for context-length failures.
 */
export function mapHttpError(options: MapHttpErrorOptions): ProviderError {
  const { statusCode, body, provider, headers } = options;
  const retryAfter = parseRetryAfter(headers);
  const message = extractErrorMessage(body);

  switch (statusCode) {
    case 400:
      return classifyHttp400(message, provider, body, statusCode);

    case 401:
    case 403:
      return new AuthenticationError(`Authentication failed: ${message}`, statusCode, provider, body);

    case 404:
      return new NotFoundError(`Not found: ${message}`, statusCode, provider, body);

    case 413:
      return new ContextLengthError(`Context length exceeded: ${message}`, statusCode, provider, body);

    case 422:
      return new InvalidRequestError(`Unprocessable entity: ${message}`, statusCode, provider, body);

    case 429:
      return new RateLimitError(`Rate limit exceeded: ${message}`, statusCode, provider, body, retryAfter);

    default:
      if (statusCode >= 500) {
        return new ServerError(`Server error: ${message}`, statusCode, provider, body, retryAfter);
      }

      return new ProviderError(`HTTP ${statusCode}: ${message}`, statusCode, false, provider, body);
  }
}

function classifyHttp400(
  message: string,
  provider: string,
  raw: string,
  statusCode: number,
): ProviderError {
  const lower = message.toLowerCase();

  if (
    lower.includes('context_length') ||
    lower.includes('context length') ||
    lower.includes('too many tokens') ||
    lower.includes('maximum context')
  ) {
    return new ContextLengthError(`Context length exceeded: ${message}`, statusCode, provider, raw);
  }

  return new InvalidRequestError(`Invalid request: ${message}`, statusCode, provider, raw);
}
