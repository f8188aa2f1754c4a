import type { LLMRequest, Middleware, StreamEvent, StreamHandler } from '@tuxmate/llm';
import type { Logger } from '../logging/index.js';

/** Records model, message count, latency and failures of every model call. */
export function createLoggingMiddleware(logger: Logger, now: () => number = Date.now): Middleware {
  return {
    name: 'logging',

    async complete(request, next) {
      const started = now();
      logger.debug('model_request', requestFields(request, false));
      try {
        const response = await next(request);
        logger.info('model_response', {
          model: request.model,
          durationMs: now() - started,
          finishReason: response.finishReason,
          inputTokens: response.usage.inputTokens,
          outputTokens: response.usage.outputTokens,
        });
        return response;
      } catch (error) {
        logger.warn('model_request_failed', { model: request.model, durationMs: now() - started, error });
        throw error;
      }
    },

    stream(request, next) {
      return loggedStream(request, next, logger, now);
    },
  };
}

async function* loggedStream(
  request: LLMRequest,
  next: StreamHandler,
  logger: Logger,
  now: () => number,
): AsyncIterable<StreamEvent> {
  const started = now();
  logger.debug('model_request', requestFields(request, true));
  try {
    for await (const event of next(request)) {
      if (event.type === 'FINISH') {
        logger.info('model_response', {
          model: request.model,
          durationMs: now() - started,
          finishReason: event.finishReason,
          inputTokens: event.usage.inputTokens,
          outputTokens: event.usage.outputTokens,
        });
      }
      yield event;
    }
  } catch (error) {
    logger.warn('model_request_failed', { model: request.model, durationMs: now() - started, error });
    throw error;
  }
}

function requestFields(request: LLMRequest, streaming: boolean) {
  return { model: request.model, messages: request.messages.length, streaming };
}
