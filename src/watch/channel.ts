export type TakeResult<T> =
  | { kind: "event"; value: T }
  | { kind: "timeout" }
  | { kind: "aborted" }
  | { kind: "closed" };

/**
 * Unbounded single-consumer queue. Producers push from callbacks; one
 * coordinator loop awaits `take`, optionally with a timeout.
 */
export class EventChannel<T> {
  private readonly queue: T[] = [];
  private waiter: ((result: TakeResult<T>) => void) | null = null;
  private closed = false;

  get pending(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Returns false when the channel is closed and the value was dropped. */
  push(value: T): boolean {
    if (this.closed) return false;
    if (this.waiter !== null) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ kind: "event", value });
    } else {
      this.queue.push(value);
    }
    return true;
  }

  /** Queued values are still delivered; then `take` reports closed. */
  close(): void {
    this.closed = true;
    if (this.waiter !== null && this.queue.length === 0) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ kind: "closed" });
    }
  }

  take(timeoutMs?: number, signal?: AbortSignal): Promise<TakeResult<T>> {
    if (this.waiter !== null) {
      return Promise.reject(new Error("EventChannel supports a single consumer"));
    }
    const queued = this.queue.shift();
    if (queued !== undefined) return Promise.resolve({ kind: "event", value: queued });
    if (this.closed) return Promise.resolve({ kind: "closed" });
    if (signal?.aborted) return Promise.resolve({ kind: "aborted" });

    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined;

      const onAbort = (): void => finish({ kind: "aborted" });

      const finish = (result: TakeResult<T>): void => {
        if (timer !== undefined) clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        if (this.waiter === deliver) this.waiter = null;
        resolve(result);
      };

      const deliver = (result: TakeResult<T>): void => finish(result);
      this.waiter = deliver;

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => finish({ kind: "timeout" }), timeoutMs);
      }
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
