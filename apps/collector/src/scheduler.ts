/**
 * Scheduler
 *
 * Runs the poll task, waits the polling interval, and repeats until the
 * abort signal fires. Cycles never overlap: the wait starts when a cycle ends.
 */
export class Scheduler {
  private task: () => Promise<unknown>;
  private controller: AbortController | null = null;
  private pollingIntervalSeconds: number;

  constructor(task: () => Promise<unknown>, pollingIntervalSeconds = 43200) {
    this.task = task;
    this.pollingIntervalSeconds = pollingIntervalSeconds; // 12 hours default
  }

  get running(): boolean {
    return this.controller !== null;
  }

  /**
   * Start the loop; resolves with the number of completed cycles once
   * stopped. A task error ends the loop and rejects.
   */
  async start(signal?: AbortSignal): Promise<number> {
    if (this.controller) {
      console.log('[Scheduler] Already running');
      return 0;
    }

    const controller = new AbortController();
    this.controller = controller;
    const onAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    console.log(`[Scheduler] Starting (polling every ${this.pollingIntervalSeconds}s)`);

    let cycles = 0;
    try {
      while (!controller.signal.aborted) {
        await this.task();
        cycles += 1;
        await sleep(this.pollingIntervalSeconds * 1000, controller.signal);
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      this.controller = null;
      console.log(`[Scheduler] Stopped after ${cycles} cycles`);
    }

    return cycles;
  }

  /**
   * Stop the loop; an in-flight cycle finishes first
   */
  stop(): void {
    this.controller?.abort();
  }
}

/**
 * Wait `ms`, or less if the signal aborts first
 */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }

    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}
