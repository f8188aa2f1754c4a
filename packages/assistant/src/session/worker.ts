import { nanoid } from 'nanoid';
import type { Dispatcher } from '../dispatch/index.js';
import { silentLogger, type Logger } from '../logging/index.js';
import type { DispatchOutcome, DispatchStage } from '../types/index.js';
import { createEventChannel } from './events.js';

export type WorkerEvent =
  | { readonly type: 'progress'; readonly stage: DispatchStage }
  | { readonly type: 'result'; readonly outcome: Exclude<DispatchOutcome, { readonly kind: 'cancelled' }> }
  | { readonly type: 'cancelled' }
  | { readonly type: 'error'; readonly error: Error };

export type ExecutionWorker = {
  readonly id: string;
  readonly input: string;
  /** progress events, then exactly one of result, cancelled or error. */
  readonly events: () => AsyncIterable<WorkerEvent>;
  /** Settles when the cycle ends; null when it failed unexpectedly. */
  readonly finished: Promise<DispatchOutcome | null>;
  /** Cooperative: aborts the model request or child process in flight. */
  readonly cancel: () => void;
};

/** Runs one dispatch cycle in the background. */
export function startWorker(dispatcher: Dispatcher, input: string, logger: Logger = silentLogger): ExecutionWorker {
  const id = nanoid();
  const controller = new AbortController();
  const channel = createEventChannel<WorkerEvent>();

  const finished = dispatcher
    .dispatch(input, {
      signal: controller.signal,
      onProgress: (stage) => channel.emit({ type: 'progress', stage }),
    })
    .then(
      (outcome): DispatchOutcome => {
        if (outcome.kind === 'cancelled') {
          channel.emit({ type: 'cancelled' });
        } else {
          channel.emit({ type: 'result', outcome });
        }
        return outcome;
      },
      (err: unknown): null => {
        const error = err instanceof Error ? err : new Error(String(err));
        logger.error('worker_failed', { workerId: id, error });
        channel.emit({ type: 'error', error });
        return null;
      },
    )
    .finally(() => channel.complete());

  return {
    id,
    input,
    events: () => channel.iterator(),
    finished,
    cancel: () => {
      if (!controller.signal.aborted) {
        logger.info('worker_cancel_requested', { workerId: id });
        controller.abort();
      }
    },
  };
}
