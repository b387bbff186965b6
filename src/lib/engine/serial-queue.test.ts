import { describe, it, expect } from 'vitest';
import { SerialQueue } from './serial-queue';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe('SerialQueue', () => {
  it('runs tasks one after another in submission order', async () => {
    const queue = new SerialQueue();
    const log: string[] = [];

    const slow = queue.run(async () => {
      log.push('slow:start');
      await tick();
      await tick();
      log.push('slow:end');
      return 1;
    });
    const fast = queue.run(() => {
      log.push('fast');
      return 2;
    });

    expect(queue.pending).toBe(2);
    expect(await Promise.all([slow, fast])).toEqual([1, 2]);
    expect(log).toEqual(['slow:start', 'slow:end', 'fast']);
    expect(queue.pending).toBe(0);
  });

  it('keeps going after a task fails', async () => {
    const queue = new SerialQueue();
    const failing = queue.run(() => {
      throw new Error('boom');
    });
    const next = queue.run(() => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('idle waits for queued work', async () => {
    const queue = new SerialQueue();
    let finished = false;
    void queue.run(async () => {
      await tick();
      finished = true;
    });
    await queue.idle();
    expect(finished).toBe(true);
  });
});
