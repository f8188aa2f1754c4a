/**
 * Single-consumer async channel. Events pushed before anyone iterates are
 * buffered; `complete` ends iteration once the buffer is drained.
 */
export type EventChannel<T> = {
  readonly emit: (event: T) => void;
  readonly complete: () => void;
  readonly iterator: () => AsyncIterable<T>;
};

type Waiter<T> = (result: IteratorResult<T>) => void;

export function createEventChannel<T>(): EventChannel<T> {
  const buffer: T[] = [];
  let waiter: Waiter<T> | null = null;
  let done = false;

  const takeWaiter = (): Waiter<T> | null => {
    const w = waiter;
    waiter = null;
    return w;
  };

  const asyncIterator: AsyncIterator<T> = {
    next: async (): Promise<IteratorResult<T>> => {
      if (buffer.length > 0) {
        const [event] = buffer.splice(0, 1);
        if (event !== undefined) {
          return { value: event, done: false };
        }
      }

      if (done) {
        return { done: true, value: undefined };
      }

      return new Promise<IteratorResult<T>>((resolve) => {
        waiter = resolve;
      });
    },
  };

  return {
    emit: (event) => {
      if (done) {
        return;
      }
      const w = takeWaiter();
      if (w) {
        w({ value: event, done: false });
      } else {
        buffer.push(event);
      }
    },

    complete: () => {
      done = true;
      takeWaiter()?.({ done: true, value: undefined });
    },

    iterator: () => ({
      [Symbol.asyncIterator]: () => asyncIterator,
    }),
  };
}
