import { describe, it, expect, vi } from 'vitest';

import { BroadcastReply } from './broadcast-reply.js';
import { Envelope } from './envelope.js';
import { Reply } from './reply.js';

type StatsReply = Reply<'network_statistics'>;

function createChildren(count: number): StatsReply[] {
  return Array.from(
    { length: count },
    (_, index) => new Reply(Envelope.request('network_statistics', {}).withId(index + 1)),
  );
}

function createBroadcast(children: StatsReply[]): BroadcastReply<'network_statistics'> {
  return new BroadcastReply(Envelope.request('network_statistics', {}), children);
}

/** Every ordering of 0..n-1. */
function permutations(n: number): number[][] {
  if (n === 0) return [[]];
  return permutations(n - 1).flatMap((rest) =>
    Array.from({ length: n }, (_, at) => [...rest.slice(0, at), n - 1, ...rest.slice(at)]),
  );
}

/** Every success/failure assignment for n children. */
function outcomes(n: number): boolean[][] {
  return Array.from({ length: 2 ** n }, (_, mask) =>
    Array.from({ length: n }, (_, bit) => (mask & (1 << bit)) === 0),
  );
}

describe('BroadcastReply', () => {
  it('finishes immediately and unsuccessfully with no children', async () => {
    const reply = createBroadcast([]);

    expect(reply.isEmpty).toBe(true);
    expect(reply.isFinished()).toBe(true);
    expect(reply.isSuccessful()).toBe(false);
    await expect(reply.waitForFinished()).resolves.toBe(false);
    expect(reply.responses()).toEqual([]);
  });

  it('follows a single child', async () => {
    const [child] = createChildren(1);
    const reply = createBroadcast([child]);
    expect(reply.isFinished()).toBe(false);

    await child.finish(true);

    expect(reply.isFinished()).toBe(true);
    expect(reply.isSuccessful()).toBe(true);
  });

  it('stays pending until the last of three children finishes', async () => {
    const children = createChildren(3);
    const reply = createBroadcast(children);

    await children[0].finish(true);
    await children[2].finish(true);
    expect(reply.isFinished()).toBe(false);

    await children[1].finish(true);
    expect(reply.isFinished()).toBe(true);
  });

  describe.each([1, 3])('with %i children', (count) => {
    it('is successful exactly when every child succeeded, in any finish order', async () => {
      for (const order of permutations(count)) {
        for (const results of outcomes(count)) {
          const children = createChildren(count);
          const reply = createBroadcast(children);
          const listener = vi.fn();
          reply.onFinished(listener);

          for (const index of order) {
            expect(reply.isFinished()).toBe(false);
            await children[index].finish(results[index]);
          }

          const expected = results.every(Boolean);
          expect(reply.isFinished()).toBe(true);
          expect(reply.isSuccessful()).toBe(expected);
          expect(reply.successCount).toBe(results.filter(Boolean).length);
          expect(listener).toHaveBeenCalledTimes(1);
          expect(listener).toHaveBeenCalledWith(expected);
        }
      }
    });
  });

  it('keeps the child order given at construction', () => {
    const children = createChildren(3);
    const reply = createBroadcast(children);
    children.pop();

    expect(reply.replies.map((child) => child.id)).toEqual([1, 2, 3]);
  });

  it('returns the responses of successful children in child order', async () => {
    const children = createChildren(3);
    const reply = createBroadcast(children);

    children[2].message.setResponse({ entry: [{ url: 'http://c.test/', bytes_received: 3 }] });
    await children[2].finish(true);
    await children[1].finish(false);
    children[0].message.setResponse({ entry: [{ url: 'http://a.test/', bytes_received: 1 }] });
    await children[0].finish(true);

    expect(reply.isSuccessful()).toBe(false);
    expect(reply.responses()).toEqual([
      { entry: [{ url: 'http://a.test/', bytes_received: 1 }] },
      { entry: [{ url: 'http://c.test/', bytes_received: 3 }] },
    ]);
  });

  it('release releases every child', () => {
    const children = createChildren(2);
    const reply = createBroadcast(children);

    reply.release();

    expect(reply.isReleased).toBe(true);
    expect(children.every((child) => child.isReleased)).toBe(true);
  });
});
