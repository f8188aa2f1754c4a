import { nanoid } from 'nanoid';
import { ConfigurationError, type Client } from '@tuxmate/llm';
import type { AssistantConfig } from '../config/index.js';
import { createConversationState, type ConversationSnapshot } from '../conversation/index.js';
import { createDispatcher } from '../dispatch/index.js';
import {
  createProcessRunner,
  createSearchClient,
  type ProcessRunner,
  type SearchClient,
} from '../execution/index.js';
import { silentLogger, type Logger } from '../logging/index.js';
import { createModelClient, createModelGateway } from '../model/index.js';
import { buildSystemPrompt, getSystemInfo, type SystemInfo } from '../prompts/index.js';
import type { ConfirmationHandler, Turn } from '../types/index.js';
import { createConfirmationGate, type ConfirmationGate } from './confirmation-gate.js';
import { startWorker, type ExecutionWorker } from './worker.js';

export type SessionOptions = {
  readonly config: AssistantConfig;
  readonly logger?: Logger;
  /** Defaults to a client for `config.endpoint`. */
  readonly client?: Client;
  /** Defaults to the session's own confirmation gate. */
  readonly confirm?: ConfirmationHandler;
  readonly runner?: ProcessRunner;
  readonly search?: SearchClient;
  /** Read from the running system when omitted. */
  readonly systemInfo?: SystemInfo;
};

export type Session = {
  readonly id: string;
  /** Starts a dispatch cycle in the background; cycles run in submission order. */
  readonly submit: (input: string) => ExecutionWorker;
  readonly clear: () => void;
  readonly model: () => string;
  /** Must name one of the configured model profiles. */
  readonly setModel: (id: string) => void;
  readonly history: () => ReadonlyArray<Turn>;
  readonly toJSON: () => ConversationSnapshot;
  readonly confirmations: ConfirmationGate;
  /** Cancels in-flight work, denies pending confirmations and refuses new input. */
  readonly close: () => Promise<void>;
};

export async function createSession(options: SessionOptions): Promise<Session> {
  const { config } = options;
  const sessionId = nanoid();
  const logger = options.logger ?? silentLogger;
  const client = options.client ?? createModelClient(config.endpoint, logger);
  const confirmations = createConfirmationGate();
  const systemInfo = options.systemInfo ?? (await getSystemInfo());

  const conversation = createConversationState({
    maxHistory: config.conversation.maxHistory,
    model: config.models.defaultModel,
  });

  const runner =
    options.runner ??
    createProcessRunner(
      {
        timeoutMs: config.execution.commandTimeoutMs,
        maxOutputBytes: config.execution.maxOutputBytes,
        killGraceMs: config.execution.killGraceMs,
        cwd: config.execution.cwd,
      },
      logger,
    );

  const dispatcher = createDispatcher({
    conversation,
    gateway: createModelGateway({
      client,
      profiles: config.models.profiles,
      requestTimeoutMs: config.endpoint.requestTimeoutMs,
      provider: config.endpoint.kind,
    }),
    runner,
    search: options.search ?? createSearchClient(runner, config.search),
    confirm: options.confirm ?? confirmations.handler,
    systemPrompt: (model) => buildSystemPrompt(systemInfo, model),
    settings: {
      requireConfirmation: config.safety.requireConfirmation,
      elevationTool: config.safety.elevationTool,
      summarizeShellOutput: config.dispatch.summarizeShellOutput,
      maxToolOutputChars: config.dispatch.maxToolOutputChars,
    },
    logger,
  });

  const active = new Set<ExecutionWorker>();
  let closed = false;

  logger.info('session_started', { sessionId, model: conversation.model(), endpoint: config.endpoint.kind });

  return {
    id: sessionId,

    submit: (input) => {
      if (closed) {
        throw new Error('Session is closed');
      }
      const worker = startWorker(dispatcher, input, logger);
      active.add(worker);
      void worker.finished.then(() => active.delete(worker));
      return worker;
    },

    clear: () => {
      conversation.clear();
      logger.info('history_cleared', { sessionId });
    },

    model: () => conversation.model(),

    setModel: (id) => {
      const profiles = Object.keys(config.models.profiles);
      if (!profiles.includes(id)) {
        throw new ConfigurationError(`unknown model '${id}', expected one of: ${profiles.join(', ')}`);
      }
      conversation.setModel(id);
      logger.info('model_changed', { sessionId, model: id });
    },

    history: () => conversation.snapshot(),

    toJSON: () => conversation.toJSON(),

    confirmations,

    close: async () => {
      if (closed) {
        return;
      }
      closed = true;
      const workers = [...active];
      for (const worker of workers) {
        worker.cancel();
      }
      confirmations.denyAll();
      await Promise.all(workers.map((worker) => worker.finished));
      await client.close();
      logger.info('session_closed', { sessionId, cancelledWorkers: workers.length });
    },
  };
}
