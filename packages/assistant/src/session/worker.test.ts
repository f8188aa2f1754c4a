import { describe, it, expect } from 'vitest';
import type { Dispatcher } from '../dispatch/index.js';
import type { DispatchOutcome } from '../types/index.js';
import { startWorker, type WorkerEvent } from './worker.js';

async function collect(events: AsyncIterable<WorkerEvent>): Promise<WorkerEvent[]> {
  const seen: WorkerEvent[] = [];
  for await (const event of events) {
    seen.push(event);
  }
  return seen;
}

describe('startWorker', () => {
  it('publishes progress then exactly one result', async () => {
    const dispatcher: Dispatcher = {
      dispatch: async (_input, options) => {
        options?.onProgress?.('awaiting_model_reply');
        options?.onProgress?.('parsing');
        options?.onProgress?.('plain_text_done');
        return { kind: 'displayed', text: 'hola' };
      },
    };

    const worker = startWorker(dispatcher, 'hi');

    await expect(collect(worker.events())).resolves.toEqual([
      { type: 'progress', stage: 'awaiting_model_reply' },
      { type: 'progress', stage: 'parsing' },
      { type: 'progress', stage: 'plain_text_done' },
      { type: 'result', outcome: { kind: 'displayed', text: 'hola' } },
    ]);
    await expect(worker.finished).resolves.toEqual({ kind: 'displayed', text: 'hola' });
    expect(worker.input).toBe('hi');
  });

  it('publishes cancelled once when cancel is honoured', async () => {
    const dispatcher: Dispatcher = {
      dispatch: (_input, options) =>
        new Promise<DispatchOutcome>((resolve) => {
          options?.signal?.addEventListener('abort', () => resolve({ kind: 'cancelled' }));
        }),
    };

    const worker = startWorker(dispatcher, 'slow');
    worker.cancel();
    worker.cancel();

    const events = await collect(worker.events());
    expect(events).toEqual([{ type: 'cancelled' }]);
    await expect(worker.finished).resolves.toEqual({ kind: 'cancelled' });
  });

  it('publishes an error event for an unexpected failure', async () => {
    const failure = new TypeError('boom');
    const dispatcher: Dispatcher = { dispatch: () => Promise.reject(failure) };

    const worker = startWorker(dispatcher, 'hi');

    await expect(collect(worker.events())).resolves.toEqual([{ type: 'error', error: failure }]);
    await expect(worker.finished).resolves.toBeNull();
  });
});
