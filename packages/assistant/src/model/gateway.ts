import {
  AbortError,
  NotFoundError,
  ProviderError,
  RequestTimeoutError,
  SDKError,
  assistantMessage,
  responseText,
  userMessage,
  type Client,
  type LLMRequest,
  type Message,
} from '@tuxmate/llm';
import type { ModelProfile } from '../config/index.js';
import { CancelledByUserError, ModelTimeoutError, ModelUnavailableError } from '../errors.js';
import type { Turn } from '../types/index.js';

export type ModelRequest = {
  readonly model: string;
  readonly system: string;
  readonly turns: ReadonlyArray<Turn>;
  /** A trailing user message that is sent but never stored as a turn. */
  readonly instruction?: string;
  readonly signal?: AbortSignal;
  /** When set the reply is streamed and each text delta is passed here. */
  readonly onText?: (delta: string) => void;
};

export type ModelGateway = {
  /** Resolves with the reply text; rejects with an AssistantError. */
  readonly reply: (request: ModelRequest) => Promise<string>;
};

export type GatewayOptions = {
  readonly client: Client;
  readonly profiles: Readonly<Record<string, ModelProfile>>;
  readonly requestTimeoutMs: number;
  readonly provider?: string;
};

export function createModelGateway(options: GatewayOptions): ModelGateway {
  return {
    async reply(request) {
      const profile = options.profiles[request.model];
      if (!profile) {
        throw new ModelUnavailableError(`No model profile named '${request.model}'`);
      }

      const llmRequest: LLMRequest = {
        model: request.model,
        provider: options.provider,
        system: request.system,
        messages: toMessages(request.turns, request.instruction),
        sampling: {
          temperature: profile.temperature,
          topP: profile.topP,
          topK: profile.topK,
          contextLength: profile.contextLength,
        },
        timeout: { requestMs: options.requestTimeoutMs },
        signal: request.signal,
      };

      try {
        if (request.onText) {
          return await collectStream(options.client, llmRequest, request.onText);
        }
        return responseText(await options.client.complete(llmRequest));
      } catch (error) {
        throw classifyModelError(error, request.model, request.signal);
      }
    },
  };
}

/** Tool turns reach the model as user messages labelled with the tool. */
export function toMessages(turns: ReadonlyArray<Turn>, instruction?: string): ReadonlyArray<Message> {
  const messages = turns.map((turn): Message => {
    switch (turn.role) {
      case 'user':
        return userMessage(turn.content);
      case 'assistant':
        return assistantMessage(turn.content);
      case 'tool':
        return userMessage(`Tool output (${turn.tool}):\n${turn.content}`);
    }
  });
  return instruction === undefined ? messages : [...messages, userMessage(instruction)];
}

async function collectStream(client: Client, request: LLMRequest, onText: (delta: string) => void): Promise<string> {
  let text = '';
  for await (const event of client.stream(request)) {
    if (event.type === 'TEXT_DELTA') {
      text += event.text;
      onText(event.text);
    }
  }
  return text;
}

/**
 * Maps model client failures onto the assistant's error kinds. Anything
 * that is not a client error is returned unchanged.
 */
export function classifyModelError(error: unknown, model: string, signal?: AbortSignal): unknown {
  if (signal?.aborted || error instanceof AbortError) {
    return new CancelledByUserError();
  }
  if (error instanceof RequestTimeoutError) {
    return new ModelTimeoutError(`The model did not answer within ${error.timeoutMs}ms`, error.timeoutMs, error);
  }
  if (error instanceof NotFoundError) {
    return new ModelUnavailableError(`Model '${model}' is not available on the server: ${error.message}`, error);
  }
  if (error instanceof ProviderError) {
    return new ModelUnavailableError(`The model server rejected the request: ${error.message}`, error);
  }
  if (error instanceof SDKError) {
    return new ModelUnavailableError(`The model server is unavailable: ${error.message}`, error);
  }
  return error;
}
