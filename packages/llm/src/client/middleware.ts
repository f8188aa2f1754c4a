import type { CompleteHandler, Middleware, StreamHandler } from '../types/index.js';

/**
 * Builds the complete() chain from the inside out, so the first registered
 * middleware sees the request first and the response last.
 */
export function composeComplete(middlewares: ReadonlyArray<Middleware>, handler: CompleteHandler): CompleteHandler {
  let chain = handler;
  for (const mw of [...middlewares].reverse()) {
    const hook = mw.complete;
    if (!hook) continue;
    const next = chain;
    chain = (request) => hook(request, next);
  }
  return chain;
}

export function composeStream(middlewares: ReadonlyArray<Middleware>, handler: StreamHandler): StreamHandler {
  let chain = handler;
  for (const mw of [...middlewares].reverse()) {
    const hook = mw.stream;
    if (!hook) continue;
    const next = chain;
    chain = (request) => hook(request, next);
  }
  return chain;
}
