import { describe, expect, it } from 'vitest';

import { KeyedSerialQueue } from './serialQueue';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('KeyedSerialQueue', () => {
  it('runs tasks sharing a key one after the other', async () => {
    const queue = new KeyedSerialQueue();
    const events: string[] = [];

    await Promise.all([
      queue.run(['a'], async () => {
        events.push('start first');
        await delay(10);
        events.push('end first');
      }),
      queue.run(['a', 'b'], () => {
        events.push('second');
        return Promise.resolve();
      }),
    ]);

    expect(events).toEqual(['start first', 'end first', 'second']);
  });

  it('keeps going after a task fails', async () => {
    const queue = new KeyedSerialQueue();

    const failed = queue.run(['a'], () => Promise.reject(new Error('boom')));
    const next = queue.run(['a'], () => Promise.resolve('ran'));

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ran');
  });
});
