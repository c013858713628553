/**
 * Small promise-based synchronization primitives.
 */

/**
 * FIFO mutual exclusion. `acquire` resolves with a release function.
 */
export class AsyncMutex {
  private locked = false;
  private queue: (() => void)[] = [];

  get isLocked(): boolean {
    return this.locked;
  }

  async acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const tryAcquire = () => {
        if (!this.locked) {
          this.locked = true;
          let released = false;
          resolve(() => {
            if (released) return;
            released = true;
            this.locked = false;
            const next = this.queue.shift();
            if (next) next();
          });
        } else {
          this.queue.push(tryAcquire);
        }
      };
      tryAcquire();
    });
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

interface Waiter<T> {
  resolve: (value: T) => void;
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error("Aborted");
}

/**
 * Single-slot mailbox with one reader at a time.
 *
 * `put` hands the value to the waiting reader, or stores it in place of any
 * value nobody picked up yet. Older values are superseded, never queued.
 */
export class Mailbox<T> {
  private slot: { value: T } | null = null;
  private waiter: Waiter<T> | null = null;

  get hasValue(): boolean {
    return this.slot !== null;
  }

  put(value: T): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.resolve(value);
      return;
    }
    this.slot = { value };
  }

  take(signal?: AbortSignal): Promise<T> {
    if (this.slot) {
      const { value } = this.slot;
      this.slot = null;
      return Promise.resolve(value);
    }
    if (this.waiter) {
      return Promise.reject(new Error("Mailbox already has a reader"));
    }
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }

    return new Promise<T>((resolve, reject) => {
      const waiter: Waiter<T> = { resolve };
      this.waiter = waiter;
      if (!signal) return;

      const abortSignal = signal;
      const onAbort = () => {
        if (this.waiter === waiter) this.waiter = null;
        reject(abortReason(abortSignal));
      };
      abortSignal.addEventListener("abort", onAbort, { once: true });
      waiter.resolve = (value) => {
        abortSignal.removeEventListener("abort", onAbort);
        resolve(value);
      };
    });
  }
}

/**
 * Settle with `promise`, or reject with the signal's reason once aborted.
 * The underlying operation keeps running; only the wait is abandoned.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(abortReason(signal));

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}
