import { describe, it, expect, vi } from 'vitest';
import { Scheduler, sleep } from '../src/scheduler.js';

describe('Scheduler', () => {
  it('repeats the task until the signal aborts', async () => {
    const controller = new AbortController();
    let runs = 0;
    const scheduler = new Scheduler(async () => {
      runs += 1;
      if (runs === 3) controller.abort();
    }, 0);

    const cycles = await scheduler.start(controller.signal);

    expect(cycles).toBe(3);
    expect(runs).toBe(3);
    expect(scheduler.running).toBe(false);
  });

  it('never starts a cycle on an aborted signal', async () => {
    const task = vi.fn(async () => undefined);
    const scheduler = new Scheduler(task, 0);

    expect(await scheduler.start(AbortSignal.abort())).toBe(0);
    expect(task).not.toHaveBeenCalled();
  });

  it('stops on stop() after the cycle in flight', async () => {
    let scheduler: Scheduler | null = null;
    const task = vi.fn(async () => {
      scheduler?.stop();
    });
    scheduler = new Scheduler(task, 3600);

    expect(await scheduler.start()).toBe(1);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('does not run twice at once', async () => {
    const controller = new AbortController();
    const nested: Promise<number>[] = [];
    const scheduler: Scheduler = new Scheduler(async () => {
      nested.push(scheduler.start(controller.signal));
      controller.abort();
    }, 0);

    await scheduler.start(controller.signal);

    expect(await Promise.all(nested)).toEqual([0]);
  });

  it('ends the loop when the task throws', async () => {
    const scheduler = new Scheduler(async () => {
      throw new Error('fatal');
    }, 0);

    await expect(scheduler.start()).rejects.toThrowError('fatal');
    expect(scheduler.running).toBe(false);
  });
});

describe('sleep', () => {
  it('wakes early when the signal aborts', async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = sleep(60_000, controller.signal);

    controller.abort();
    await pending;

    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('waits out the delay otherwise', async () => {
    vi.useFakeTimers();
    try {
      let done = false;
      const pending = sleep(5000, new AbortController().signal).then(() => {
        done = true;
      });

      await vi.advanceTimersByTimeAsync(4999);
      expect(done).toBe(false);
      await vi.advanceTimersByTimeAsync(1);
      await pending;
      expect(done).toBe(true);
    } finally {
      vi.useRealTimers();
    }
  });
});
