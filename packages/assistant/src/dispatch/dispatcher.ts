import { createAssistantTurn, createToolTurn, createUserTurn, type Clock } from '../conversation/index.js';
import type { ConversationState } from '../conversation/index.js';
import type { ElevationTool } from '../config/index.js';
import {
  CancelledByUserError,
  CommandBlockedError,
  ConfirmationDeniedError,
  LaunchError,
  ModelTimeoutError,
  ModelUnavailableError,
} from '../errors.js';
import type { ProcessRunner, SearchClient, SearchOutcome } from '../execution/index.js';
import { silentLogger, type Logger } from '../logging/index.js';
import type { ModelGateway } from '../model/index.js';
import { parseReply } from '../parser/index.js';
import { buildSummaryInstruction } from '../prompts/index.js';
import { truncateToolOutput } from '../truncation/index.js';
import type {
  ConfirmationHandler,
  DispatchOutcome,
  DispatchStage,
  ExecutionResult,
  SearchCall,
  ShellCall,
  ToolCall,
  Turn,
} from '../types/index.js';
import { rewriteElevation, validateCommand } from '../validation/index.js';
import { formatBlocked, formatDenied, formatExecution, formatLaunchFailure } from './format.js';

export type DispatchSettings = {
  readonly requireConfirmation: boolean;
  readonly elevationTool: ElevationTool;
  readonly summarizeShellOutput: boolean;
  readonly maxToolOutputChars: number;
};

export type DispatcherDeps = {
  readonly conversation: ConversationState;
  readonly gateway: ModelGateway;
  readonly runner: ProcessRunner;
  readonly search: SearchClient;
  readonly confirm: ConfirmationHandler;
  /** Built per cycle so it names the model selected at the time. */
  readonly systemPrompt: (model: string) => string;
  readonly settings: DispatchSettings;
  readonly logger?: Logger;
  readonly now?: Clock;
};

export type DispatchOptions = {
  readonly signal?: AbortSignal;
  readonly onProgress?: (stage: DispatchStage) => void;
};

export type Dispatcher = {
  /** Runs one cycle; cycles for the same dispatcher run one after another. */
  readonly dispatch: (input: string, options?: DispatchOptions) => Promise<DispatchOutcome>;
};

type ToolRun = {
  readonly result: ExecutionResult;
  /** What the TOOL turn holds, already bounded for the model. */
  readonly toolText: string;
};

type StepResult =
  | { readonly kind: 'ran'; readonly run: ToolRun }
  | Extract<DispatchOutcome, { readonly kind: 'rejected' }>;

export function createDispatcher(deps: DispatcherDeps): Dispatcher {
  const logger = deps.logger ?? silentLogger;
  const now = deps.now ?? Date.now;
  const { conversation, gateway, settings } = deps;
  let tail: Promise<unknown> = Promise.resolve();

  async function cycle(input: string, options: DispatchOptions): Promise<DispatchOutcome> {
    const signal = options.signal;
    const progress = (stage: DispatchStage) => {
      logger.debug('dispatch_stage', { stage });
      options.onProgress?.(stage);
    };

    if (signal?.aborted) {
      progress('cancelled');
      return { kind: 'cancelled' };
    }

    conversation.append(createUserTurn(input, now));
    // turns of this cycle, committed together at the end
    const staged: Turn[] = [];

    try {
      const outcome = await runCycle(signal, progress, staged);
      conversation.appendAll(staged);
      return outcome;
    } catch (error) {
      if (error instanceof CancelledByUserError) {
        logger.info('dispatch_cancelled', { discardedTurns: staged.length });
        progress('cancelled');
        return { kind: 'cancelled' };
      }
      if (error instanceof ModelUnavailableError || error instanceof ModelTimeoutError) {
        logger.error('model_failed', { error });
        progress('done');
        return { kind: 'rejected', reason: error.message, failure: error.kind };
      }
      throw error;
    }
  }

  async function runCycle(
    signal: AbortSignal | undefined,
    progress: (stage: DispatchStage) => void,
    staged: Turn[],
  ): Promise<DispatchOutcome> {
    progress('awaiting_model_reply');
    const model = conversation.model();
    const raw = await gateway.reply({
      model,
      system: deps.systemPrompt(model),
      turns: conversation.snapshot(),
      signal,
    });
    throwIfCancelled(signal);

    progress('parsing');
    const parsed = parseReply(raw);
    if (parsed.kind === 'plain_text') {
      if (parsed.malformed !== null) {
        logger.warn('malformed_tool_payload', { reason: parsed.malformed });
      }
      staged.push(createAssistantTurn(parsed.text, now));
      progress('plain_text_done');
      return { kind: 'displayed', text: parsed.text };
    }

    const call = parsed.call;
    logger.info('tool_call', { tool: call.tool });
    // the structured reply stays in history so the model sees what it asked for
    staged.push(createAssistantTurn(raw.trim(), now));

    let run: ToolRun;
    if (call.tool === 'shell') {
      const shell = await runShellCall(call, signal, progress, staged);
      if (shell.kind === 'rejected') {
        progress('done');
        return shell;
      }
      run = shell.run;
    } else {
      const search = await runSearchCall(call, signal, progress, staged);
      if (search.kind === 'rejected') {
        progress('done');
        return search;
      }
      run = search.run;
    }
    throwIfCancelled(signal);

    let summary: string | null = null;
    if (call.tool === 'search' || settings.summarizeShellOutput) {
      progress('summarizing');
      summary = await summarize(call, run, signal, staged);
      staged.push(createAssistantTurn(summary, now));
    }

    progress('done');
    return { kind: 'executed', call, result: run.result, summary };
  }

  async function runShellCall(
    call: ShellCall,
    signal: AbortSignal | undefined,
    progress: (stage: DispatchStage) => void,
    staged: Turn[],
  ): Promise<StepResult> {
    progress('validating');
    const verdict = validateCommand(call.command);

    if (verdict.kind === 'blocked') {
      logger.warn('command_blocked', { error: new CommandBlockedError(call.command, verdict.reason) });
      staged.push(createToolTurn('shell', formatBlocked(call.command, verdict.reason), now));
      return { kind: 'rejected', reason: verdict.reason, failure: 'command_blocked' };
    }

    if (verdict.kind === 'requires_confirmation' && settings.requireConfirmation) {
      progress('awaiting_confirmation');
      const approved = await untilAborted(
        deps.confirm({ command: call.command, explanation: call.explanation, reason: verdict.reason }, signal),
        signal,
      );
      if (!approved) {
        const denied = new ConfirmationDeniedError(call.command);
        logger.info('confirmation_denied', { command: call.command });
        staged.push(createToolTurn('shell', formatDenied(call.command), now));
        return { kind: 'rejected', reason: denied.message, failure: denied.kind };
      }
    }
    throwIfCancelled(signal);

    const command = rewriteElevation(call.command, settings.elevationTool);
    progress('executing');
    logger.info('command_started', { command, advisory: verdict.kind === 'safe' && verdict.advisory });

    let result: ExecutionResult;
    try {
      result = await deps.runner.runShell(command, { signal });
    } catch (error) {
      return launchFailure(error, staged, 'shell');
    }
    throwIfCancelled(signal);

    const toolText = truncateToolOutput(formatExecution(command, result), 'shell', {
      maxChars: settings.maxToolOutputChars,
    });
    staged.push(createToolTurn('shell', toolText, now));
    return { kind: 'ran', run: { result, toolText } };
  }

  async function runSearchCall(
    call: SearchCall,
    signal: AbortSignal | undefined,
    progress: (stage: DispatchStage) => void,
    staged: Turn[],
  ): Promise<StepResult> {
    progress('executing');
    logger.info('search_started', { query: call.query });

    let outcome: SearchOutcome;
    try {
      outcome = await deps.search.search(call.query, { signal });
    } catch (error) {
      return launchFailure(error, staged, 'search');
    }
    throwIfCancelled(signal);

    const toolText = truncateToolOutput(outcome.text, 'search', { maxChars: settings.maxToolOutputChars });
    staged.push(createToolTurn('search', toolText, now));
    return { kind: 'ran', run: { result: outcome.result, toolText } };
  }

  function launchFailure(error: unknown, staged: Turn[], tool: 'shell' | 'search'): StepResult {
    if (!(error instanceof LaunchError)) {
      throw error;
    }
    logger.error('launch_failed', { error, code: error.code });
    staged.push(createToolTurn(tool, formatLaunchFailure(error.message), now));
    return { kind: 'rejected', reason: error.message, failure: error.kind };
  }

  /**
   * Asks the model to turn the tool output into an answer. Falls back to the
   * raw tool output when the model fails or answers with another tool call.
   */
  async function summarize(
    call: ToolCall,
    run: ToolRun,
    signal: AbortSignal | undefined,
    staged: ReadonlyArray<Turn>,
  ): Promise<string> {
    const model = conversation.model();
    let reply: string;
    try {
      reply = await gateway.reply({
        model,
        system: deps.systemPrompt(model),
        turns: [...conversation.snapshot(), ...staged],
        instruction: buildSummaryInstruction(call, run.result),
        signal,
      });
    } catch (error) {
      if (error instanceof ModelUnavailableError || error instanceof ModelTimeoutError) {
        logger.warn('summary_failed', { error });
        return run.toolText;
      }
      throw error;
    }
    throwIfCancelled(signal);

    const parsed = parseReply(reply);
    if (parsed.kind === 'tool_call') {
      logger.warn('summary_was_tool_call', { tool: parsed.call.tool });
      return run.toolText;
    }
    return parsed.text;
  }

  return {
    dispatch(input, options = {}) {
      const run = tail.then(() => cycle(input, options));
      // a failed cycle must not stall the ones queued behind it
      tail = run.catch(() => undefined);
      return run;
    },
  };
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledByUserError();
  }
}

function untilAborted<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledByUserError());
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
