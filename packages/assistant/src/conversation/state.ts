import type { Turn } from '../types/index.js';

export type ConversationSnapshot = {
  readonly model: string;
  readonly maxHistory: number;
  readonly turns: ReadonlyArray<Turn>;
};

/**
 * Bounded, ordered conversation history. Holds at most `2 * maxHistory`
 * turns; appending past the bound evicts the oldest first.
 */
export type ConversationState = {
  readonly append: (turn: Turn) => void;
  /** Commits several turns in one step. */
  readonly appendAll: (turns: ReadonlyArray<Turn>) => void;
  /** Oldest first. */
  readonly snapshot: () => ReadonlyArray<Turn>;
  readonly clear: () => void;
  readonly model: () => string;
  readonly setModel: (id: string) => void;
  readonly size: () => number;
  readonly capacity: number;
  readonly toJSON: () => ConversationSnapshot;
};

export type ConversationOptions = {
  /** Exchanges retained; one exchange is a user turn and its reply. */
  readonly maxHistory: number;
  readonly model: string;
};

/** Upper bound on retained exchanges; the ring buffer allocates twice this up front. */
export const MAX_HISTORY_LIMIT = 10_000;

export function createConversationState(options: ConversationOptions): ConversationState {
  if (!Number.isInteger(options.maxHistory) || options.maxHistory <= 0) {
    throw new RangeError(`maxHistory must be a positive integer, got ${options.maxHistory}`);
  }
  if (options.maxHistory > MAX_HISTORY_LIMIT) {
    throw new RangeError(`maxHistory must not exceed ${MAX_HISTORY_LIMIT}, got ${options.maxHistory}`);
  }

  const capacity = options.maxHistory * 2;
  // ring buffer: `start` is the oldest slot, `count` the live length
  let slots: Array<Turn | undefined> = new Array<Turn | undefined>(capacity).fill(undefined);
  let start = 0;
  let count = 0;
  let model = options.model;

  const append = (turn: Turn) => {
    const frozen = Object.isFrozen(turn) ? turn : Object.freeze({ ...turn });
    slots[(start + count) % capacity] = frozen;
    if (count < capacity) {
      count++;
    } else {
      start = (start + 1) % capacity;
    }
  };

  const snapshot = (): ReadonlyArray<Turn> => {
    const turns: Turn[] = [];
    for (let i = 0; i < count; i++) {
      const turn = slots[(start + i) % capacity];
      if (turn !== undefined) {
        turns.push(turn);
      }
    }
    return Object.freeze(turns);
  };

  return {
    append,
    appendAll: (turns) => {
      for (const turn of turns) {
        append(turn);
      }
    },
    snapshot,
    clear: () => {
      slots = new Array<Turn | undefined>(capacity).fill(undefined);
      start = 0;
      count = 0;
    },
    model: () => model,
    setModel: (id) => {
      model = id;
    },
    size: () => count,
    capacity,
    toJSON: () => ({ model, maxHistory: options.maxHistory, turns: snapshot() }),
  };
}
