import { describe, it, expect } from 'vitest';
import { createEventChannel } from './events.js';

type Ping = { readonly n: number };

async function drain<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const seen: T[] = [];
  for await (const event of iterable) {
    seen.push(event);
  }
  return seen;
}

function tick(ms: number = 10): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('createEventChannel', () => {
  it('delivers events emitted later to a waiting consumer in order', async () => {
    const channel = createEventChannel<Ping>();
    const consumer = drain(channel.iterator());

    await tick();
    channel.emit({ n: 1 });
    await tick();
    channel.emit({ n: 2 });
    channel.complete();

    await expect(consumer).resolves.toEqual([{ n: 1 }, { n: 2 }]);
  });

  it('buffers events emitted before the consumer starts', async () => {
    const channel = createEventChannel<Ping>();
    for (let n = 0; n < 5; n++) {
      channel.emit({ n });
    }
    channel.complete();

    const seen = await drain(channel.iterator());

    expect(seen.map((e) => e.n)).toEqual([0, 1, 2, 3, 4]);
  });

  it('ends a waiting consumer on complete', async () => {
    const channel = createEventChannel<Ping>();
    const consumer = drain(channel.iterator());

    await tick();
    channel.complete();

    await expect(consumer).resolves.toEqual([]);
  });

  it('ignores events emitted after completion', async () => {
    const channel = createEventChannel<Ping>();
    channel.emit({ n: 1 });
    channel.complete();
    channel.emit({ n: 2 });

    await expect(drain(channel.iterator())).resolves.toEqual([{ n: 1 }]);
  });
});
