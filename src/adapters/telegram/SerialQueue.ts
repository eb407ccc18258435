import type { Context, MiddlewareFn } from 'telegraf';

/**
 * Runs tasks one at a time in arrival order.
 * Telegraf handles the updates of one polling batch concurrently; session
 * and questionnaire transitions expect them one after another.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // A failed task must not block the ones queued behind it; its caller still sees the rejection
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  middleware<C extends Context>(): MiddlewareFn<C> {
    return (_ctx, next) => this.run(next);
  }
}
