const DEFAULT_CAPACITY = 256;

export interface EventChannelOptions<T> {
  capacity?: number;
  /** Events that may be discarded first when the queue is full. */
  isDroppable?: (event: T) => boolean;
  onOverflow?: (dropped: T) => void;
}

type Reader<T> = (event: T | undefined) => void;

/**
 * Bounded FIFO between background workers and the single presentation loop.
 * Producers never block; exactly one reader drains it, either by polling
 * {@link drain} or by awaiting {@link next}.
 */
export class EventChannel<T> {
  private readonly capacity: number;
  private readonly queue: T[] = [];
  private reader: Reader<T> | undefined;
  private closed = false;

  constructor(private readonly options: EventChannelOptions<T> = {}) {
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_CAPACITY);
  }

  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Returns false once the channel is closed. */
  post(event: T): boolean {
    if (this.closed) {
      return false;
    }

    if (this.reader) {
      const reader = this.reader;
      this.reader = undefined;
      reader(event);
      return true;
    }

    if (this.queue.length >= this.capacity) {
      this.dropOne();
    }
    this.queue.push(event);
    return true;
  }

  drain(max = Number.POSITIVE_INFINITY): T[] {
    const count = Math.min(this.queue.length, Math.max(0, max));
    return this.queue.splice(0, count);
  }

  /** Resolves with the next event, or undefined once closed and empty or when `signal` aborts. */
  next(signal?: AbortSignal): Promise<T | undefined> {
    const queued = this.queue.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }

    if (this.closed || signal?.aborted) {
      return Promise.resolve(undefined);
    }

    if (this.reader) {
      return Promise.reject(new Error("EventChannel already has a pending reader"));
    }

    return new Promise<T | undefined>((resolve) => {
      const onAbort = (): void => {
        this.reader = undefined;
        resolve(undefined);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.reader = (event) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(event);
      };
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const reader = this.reader;
    this.reader = undefined;
    reader?.(undefined);
  }

  private dropOne(): void {
    const { isDroppable } = this.options;
    let index = isDroppable ? this.queue.findIndex((event) => isDroppable(event)) : -1;
    if (index < 0) {
      index = 0;
    }

    const [dropped] = this.queue.splice(index, 1);
    if (dropped !== undefined) {
      this.options.onOverflow?.(dropped);
    }
  }
}
