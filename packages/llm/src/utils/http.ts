import { AbortError, NetworkError, RequestTimeoutError } from '../types/error.js';
import type { TimeoutConfig } from '../types/config.js';
import { mapHttpError } from './error-mapping.js';

export type FetchOptions = {
  readonly url: string;
  readonly provider: string;
  readonly method?: string;
  readonly headers?: Record<string, string>;
  readonly body?: unknown;
  readonly timeout?: TimeoutConfig;
  readonly signal?: AbortSignal;
};

export type FetchResult = {
  readonly response: globalThis.Response;
  readonly body: unknown;
};

/**
 * Fetches with timeout support, header merging, and JSON body serialization.
 * Returns both the raw response and parsed JSON body.
 */
export async function fetchWithTimeout(options: FetchOptions): Promise<FetchResult> {
  const guard = createTimeoutGuard(options);
  try {
    const response = await send(options, guard);
    const body: unknown = await response.json();
    return { response, body };
  } catch (err) {
    throw translateFetchError(err, options, guard);
  } finally {
    guard.dispose();
  }
}

/**
 * Fetches and returns the raw Response object for streaming.
 * The request timeout covers the time to response headers only.
 */
export async function fetchStream(options: FetchOptions): Promise<globalThis.Response> {
  const guard = createTimeoutGuard(options);
  try {
    return await send(options, guard);
  } catch (err) {
    throw translateFetchError(err, options, guard);
  } finally {
    guard.dispose();
  }
}

type TimeoutGuard = {
  readonly signal: AbortSignal;
  readonly timedOut: () => boolean;
  readonly dispose: () => void;
};

function createTimeoutGuard(options: FetchOptions): TimeoutGuard {
  const { timeout, signal: externalSignal } = options;

  if (externalSignal?.aborted) {
    throw new AbortError('Signal was already aborted');
  }

  const timeoutController = new AbortController();
  let fired = false;
  let timeoutId: ReturnType<typeof setTimeout> | null = null;

  if (timeout?.requestMs) {
    timeoutId = setTimeout(() => {
      fired = true;
      timeoutController.abort();
    }, timeout.requestMs);
  }

  return {
    signal: linkSignals(externalSignal, timeoutController.signal),
    timedOut: () => fired,
    dispose: () => {
      if (timeoutId !== null) {
        clearTimeout(timeoutId);
      }
    },
  };
}

async function send(options: FetchOptions, guard: TimeoutGuard): Promise<globalThis.Response> {
  const { url, method = 'GET', headers: customHeaders = {}, body: bodyData, provider } = options;

  const mergedHeaders: Record<string, string> = {
    'Content-Type': 'application/json',
    ...customHeaders,
  };

  const body = bodyData !== undefined ? JSON.stringify(bodyData) : undefined;

  const response = await fetch(url, {
    method,
    headers: mergedHeaders,
    body,
    signal: guard.signal,
  });

  if (!response.ok) {
    const text = await response.text();
    throw mapHttpError({
      statusCode: response.status,
      body: text,
      provider,
      headers: response.headers,
    });
  }

  return response;
}

function translateFetchError(err: unknown, options: FetchOptions, guard: TimeoutGuard): unknown {
  if (err instanceof globalThis.Error && err.name === 'AbortError') {
    if (guard.timedOut()) {
      const timeoutMs = options.timeout?.requestMs ?? 0;
      return new RequestTimeoutError(`Request to ${options.url} timed out after ${timeoutMs}ms`, timeoutMs);
    }
    return new AbortError('Fetch was aborted');
  }

  // undici reports connection failures as a TypeError('fetch failed') with the cause attached
  if (err instanceof TypeError) {
    const cause = err.cause instanceof Error ? err.cause : err;
    return new NetworkError(`Could not reach ${options.url}: ${cause.message}`, cause);
  }

  return err;
}

/**
 * Links two abort signals so that either one being aborted triggers the target.
 */
function linkSignals(externalSignal: AbortSignal | undefined, targetSignal: AbortSignal): AbortSignal {
  if (!externalSignal) {
    return targetSignal;
  }

  if (externalSignal.aborted) {
    return externalSignal;
  }

  const controller = new AbortController();

  externalSignal.addEventListener('abort', () => controller.abort());
  targetSignal.addEventListener('abort', () => controller.abort());

  return controller.signal;
}
