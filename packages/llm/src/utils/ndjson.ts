import { StreamError } from '../types/error.js';

/**
 * Iterates a web ReadableStream, cancelling it when the consumer stops early
 * so the underlying HTTP connection is released.
 */
export async function* readStream<T>(stream: ReadableStream<T>): AsyncIterable<T> {
  const reader = stream.getReader();
  let finished = false;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        return;
      }
      yield value;
    }
  } finally {
    if (!finished) {
      await reader.cancel().catch(() => undefined);
    }
    reader.releaseLock();
  }
}

/**
 * Yields one parsed JSON value per line of a newline-delimited JSON body,
 * the streaming format of the native Ollama API. Blank lines are skipped and
 * a trailing line without a newline is still parsed.
 */
export async function* createNDJSONStream(response: globalThis.Response): AsyncIterable<unknown> {
  const body = response.body;
  if (!body) {
    throw new StreamError('Response body is null');
  }

  let buffer = '';
  for await (const chunk of readStream(body.pipeThrough(new TextDecoderStream()))) {
    buffer += chunk;
    let newline = buffer.indexOf('\n');
    while (newline !== -1) {
      const line = buffer.slice(0, newline);
      buffer = buffer.slice(newline + 1);
      const parsed = parseLine(line);
      if (parsed !== undefined) {
        yield parsed;
      }
      newline = buffer.indexOf('\n');
    }
  }

  const rest = parseLine(buffer);
  if (rest !== undefined) {
    yield rest;
  }
}

function parseLine(line: string): unknown {
  const trimmed = line.trim();
  if (trimmed === '') {
    return undefined;
  }
  try {
    return JSON.parse(trimmed);
  } catch (err) {
    throw new StreamError(
      `Malformed NDJSON line: ${trimmed.slice(0, 200)}`,
      err instanceof Error ? err : undefined,
    );
  }
}
