export type ReleaseLock = () => void;

/**
 * Non-reentrant FIFO lock for the single-threaded event loop. `acquire` queues
 * behind the current holder; `tryAcquire` refuses instead of queueing.
 */
export class AsyncLock {
  readonly #name: string;
  #locked = false;
  #queue: Array<() => void> = [];
  #idleWaiters: Array<() => void> = [];

  constructor(name: string) {
    this.#name = name;
  }

  get name(): string {
    return this.#name;
  }

  isLocked(): boolean {
    return this.#locked;
  }

  /** Number of callers waiting behind the current holder. */
  get pending(): number {
    return this.#queue.length;
  }

  acquire(): Promise<ReleaseLock> {
    if (!this.#locked) {
      this.#locked = true;
      return Promise.resolve(this.#createRelease());
    }
    return new Promise((resolve) => {
      this.#queue.push(() => resolve(this.#createRelease()));
    });
  }

  tryAcquire(): ReleaseLock | null {
    if (this.#locked) {
      return null;
    }
    this.#locked = true;
    return this.#createRelease();
  }

  /** Resolves once the lock is free and nobody is queued. Does not take the lock. */
  waitUntilFree(): Promise<void> {
    if (!this.#locked) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.#idleWaiters.push(resolve);
    });
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  #createRelease(): ReleaseLock {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.#release();
    };
  }

  #release(): void {
    const next = this.#queue.shift();
    if (next) {
      next();
      return;
    }
    this.#locked = false;
    const waiters = this.#idleWaiters;
    this.#idleWaiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}
