import { ConnectionError, TransportTimeoutError } from "../errors.ts";

interface Waiter {
  resolve: (value: Uint8Array) => void;
  reject: (reason: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Buffers notifications from one connection until someone waits for them, so
 * a response arriving before `next()` is called is not lost.
 */
export class NotificationQueue {
  private readonly buffered: Uint8Array[] = [];
  private readonly waiters: Waiter[] = [];
  private closedWith: Error | null = null;

  /** Number of notifications received but not yet consumed */
  get size(): number {
    return this.buffered.length;
  }

  get closed(): boolean {
    return this.closedWith !== null;
  }

  push(data: Uint8Array): void {
    if (this.closedWith) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(data);
    } else {
      this.buffered.push(data);
    }
  }

  /** Drops buffered notifications, returning how many there were */
  discard(): number {
    return this.buffered.splice(0).length;
  }

  /**
   * Resolves with the oldest buffered notification, or the next one to arrive.
   *
   * @throws TransportTimeoutError if nothing arrives within `timeoutMs`
   * @throws ConnectionError if the queue is or gets closed
   */
  next(timeoutMs: number): Promise<Uint8Array> {
    if (this.closedWith) return Promise.reject(this.closedWith);

    const data = this.buffered.shift();
    if (data) return Promise.resolve(data);

    return new Promise<Uint8Array>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) this.waiters.splice(index, 1);
          reject(new TransportTimeoutError(`No notification within ${timeoutMs}ms`));
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  /**
   * Fails every pending and future wait. Buffered notifications are dropped.
   */
  close(reason: Error = new ConnectionError("Connection closed")): void {
    if (this.closedWith) return;

    this.closedWith = reason;
    this.buffered.length = 0;
    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(reason);
    }
  }
}
