// ---------------------------------------------------------------------------
// AsyncQueue – single-reader queue with per-read timeouts
// ---------------------------------------------------------------------------
// Bridges event emitters (socket "data", datagram "message") to sequential
// awaits. Items queued before fail() are still handed out; after that every
// read rejects with the failure.
// ---------------------------------------------------------------------------

type Waiter<T> = {
  resolve: (item: T | undefined) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
};

export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private waiter: Waiter<T> | null = null;
  private failure: Error | null = null;

  get size(): number {
    return this.items.length;
  }

  get failed(): Error | null {
    return this.failure;
  }

  push(item: T): void {
    if (this.failure) {
      return;
    }
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      clearTimeout(waiter.timer);
      waiter.resolve(item);
      return;
    }
    this.items.push(item);
  }

  fail(err: Error): void {
    if (this.failure) {
      return;
    }
    this.failure = err;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      clearTimeout(waiter.timer);
      waiter.reject(err);
    }
  }

  /** Resolves with the next item, or `undefined` once `timeoutMs` elapses. */
  next(timeoutMs: number): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.waiter) {
      return Promise.reject(new Error("AsyncQueue supports a single pending reader"));
    }
    return new Promise<T | undefined>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(undefined);
      }, timeoutMs);
      this.waiter = { resolve, reject, timer };
    });
  }

  /** Remove and return everything currently queued. */
  drain(): T[] {
    return this.items.splice(0);
  }
}
