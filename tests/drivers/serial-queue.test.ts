import { describe, it, expect } from 'vitest';
import { SerialTaskQueue } from '../../src/drivers/serial-queue.js';
import { Deferred } from '../helpers/fake-driver.js';

describe('SerialTaskQueue', () => {
  it('should run one task at a time in submission order', async () => {
    const queue = new SerialTaskQueue();
    const log: string[] = [];
    const gate = new Deferred<void>();

    const first = queue.run(async () => {
      log.push('first:start');
      await gate.promise;
      log.push('first:end');
      return 1;
    });
    const second = queue.run(async () => {
      log.push('second');
      return 2;
    });

    await Promise.resolve();
    expect(queue.pendingCount).toBe(1);
    gate.resolve();

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(log).toEqual(['first:start', 'first:end', 'second']);
    expect(queue.pendingCount).toBe(0);
  });

  it('should hand a failure to its own caller and keep going', async () => {
    const queue = new SerialTaskQueue();
    const failed = queue.run(async () => {
      throw new Error('boom');
    });
    const next = queue.run(async () => 'after');

    await expect(failed).rejects.toThrow('boom');
    expect(await next).toBe('after');
  });
});
