import { nanoid } from 'nanoid';
import type { ConfirmationHandler, ConfirmationRequest } from '../types/index.js';

export type PendingConfirmation = ConfirmationRequest & { readonly id: string };

/**
 * Holds confirmation requests until a UI settles them by id. The dispatcher
 * sees only `handler`.
 */
export type ConfirmationGate = {
  readonly handler: ConfirmationHandler;
  readonly pending: () => ReadonlyArray<PendingConfirmation>;
  /** false when the id is unknown or already settled. */
  readonly approve: (id: string) => boolean;
  readonly deny: (id: string) => boolean;
  /** Denies everything outstanding; returns how many were denied. */
  readonly denyAll: () => number;
  /** Returns an unsubscribe function. */
  readonly onRequest: (listener: (request: PendingConfirmation) => void) => () => void;
};

export function createConfirmationGate(): ConfirmationGate {
  const waiting = new Map<string, { readonly request: PendingConfirmation; readonly settle: (ok: boolean) => void }>();
  const listeners = new Set<(request: PendingConfirmation) => void>();

  const settle = (id: string, approved: boolean): boolean => {
    const entry = waiting.get(id);
    if (!entry) {
      return false;
    }
    waiting.delete(id);
    entry.settle(approved);
    return true;
  };

  return {
    handler: (request, signal) =>
      new Promise<boolean>((resolve) => {
        if (signal?.aborted) {
          resolve(false);
          return;
        }
        const pending: PendingConfirmation = Object.freeze({ ...request, id: nanoid() });
        // a cancelled cycle no longer waits for an answer
        const onAbort = () => settle(pending.id, false);
        signal?.addEventListener('abort', onAbort, { once: true });
        waiting.set(pending.id, {
          request: pending,
          settle: (approved) => {
            signal?.removeEventListener('abort', onAbort);
            resolve(approved);
          },
        });
        for (const listener of listeners) {
          listener(pending);
        }
      }),
    pending: () => [...waiting.values()].map((entry) => entry.request),
    approve: (id) => settle(id, true),
    deny: (id) => settle(id, false),
    denyAll: () => {
      const ids = [...waiting.keys()];
      for (const id of ids) {
        settle(id, false);
      }
      return ids.length;
    },
    onRequest: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
