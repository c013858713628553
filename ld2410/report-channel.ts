/**
 * Latest-value broadcast for asynchronous device reports.
 */

interface ReportWaiter<T> {
  resolve: (value: T) => void;
}

/**
 * Keeps only the most recent value. Readers get independent copies, waiters
 * only ever see the value recorded after they started waiting.
 */
export class ReportChannel<T> {
  private latest: T | undefined;
  private waiters = new Set<ReportWaiter<T>>();
  private _version = 0;

  /** Incremented on every record */
  get version(): number {
    return this._version;
  }

  get waiting(): number {
    return this.waiters.size;
  }

  /**
   * Overwrite the latest value and wake every current waiter.
   */
  record(value: T): void {
    this.latest = value;
    this._version++;

    const waiters = [...this.waiters];
    this.waiters.clear();
    for (const waiter of waiters) {
      waiter.resolve(structuredClone(value));
    }
  }

  getLatest(): T | undefined {
    return this.latest === undefined ? undefined : structuredClone(this.latest);
  }

  /**
   * Wait for the next recorded value.
   */
  waitNext(signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    return new Promise<T>((resolve, reject) => {
      const waiter: ReportWaiter<T> = { resolve };
      this.waiters.add(waiter);
      if (!signal) return;

      const abortSignal = signal;
      const onAbort = () => {
        this.waiters.delete(waiter);
        reject(abortSignal.reason);
      };
      abortSignal.addEventListener("abort", onAbort, { once: true });
      waiter.resolve = (value) => {
        abortSignal.removeEventListener("abort", onAbort);
        resolve(value);
      };
    });
  }
}
