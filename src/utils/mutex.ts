/**
 * Promise-chain mutex: callers run strictly one after another in arrival order.
 */
export class Mutex {
  private queue: Promise<void> = Promise.resolve();

  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const prev = this.queue;
    let release: () => void = () => undefined;
    this.queue = new Promise<void>((resolve) => {
      release = resolve;
    });
    await prev;
    try {
      return await task();
    } finally {
      release();
    }
  }
}

/**
 * Collapses concurrent calls into one execution; late callers receive the
 * result of the run already in progress.
 */
export class SingleFlight<T> {
  private inFlight: Promise<T> | null = null;

  get running() {
    return this.inFlight !== null;
  }

  run(task: () => Promise<T>): Promise<T> {
    if (this.inFlight) return this.inFlight;
    const current = task().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = current;
    return current;
  }
}

/** Drops calls arriving sooner than `intervalMs` after the last accepted one. */
export class TickThrottle {
  private last = Number.NEGATIVE_INFINITY;

  constructor(private readonly intervalMs: number) {}

  tryAcquire(now: number) {
    if (now - this.last < this.intervalMs) return false;
    this.last = now;
    return true;
  }
}
