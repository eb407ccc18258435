import { describe, it, expect } from 'vitest';
import type { Context } from 'telegraf';
import { SerialQueue } from '../../adapters/telegram/SerialQueue';

// Promise plus its resolver, to hold a task open
function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('SerialQueue', () => {
  it('starts a task only after the previous one finished', async () => {
    const queue = new SerialQueue();
    const events: string[] = [];
    const gate = deferred();

    const first = queue.run(async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = queue.run(async () => {
      events.push('second:start');
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('keeps going after a failed task and still reports the failure', async () => {
    const queue = new SerialQueue();

    const failed = queue.run(async () => {
      throw new Error('boom');
    });
    const next = queue.run(async () => 'done');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('done');
  });

  it('serialises middleware calls', async () => {
    const queue = new SerialQueue();
    const middleware = queue.middleware<Context>();
    const ctx = {} as unknown as Context;
    const order: number[] = [];
    const gate = deferred();

    const first = middleware(ctx, async () => {
      await gate.promise;
      order.push(1);
    });
    const second = middleware(ctx, async () => {
      order.push(2);
    });

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual([1, 2]);
  });
});
