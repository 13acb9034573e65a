/**
 * Unbounded promise-based queues used as the transport under the wire.
 *
 * `AsyncQueue` is a single-consumer FIFO: `put` never blocks, `get` suspends until an
 * item arrives. After `shutdown()` queued items still drain (unless the shutdown is
 * immediate) and then every `get` rejects with `QueueShutDownError`.
 *
 * `BroadcastQueue` fans each published item out to one `AsyncQueue` per subscriber.
 */

export class QueueShutDownError extends Error {
  constructor() {
    super('Queue is shut down');
    this.name = 'QueueShutDownError';
  }
}

interface Waiter<T> {
  resolve: (item: T) => void;
  reject: (error: Error) => void;
}

export class AsyncQueue<T> {
  private readonly items: Array<{ value: T }> = [];
  private readonly waiters: Array<Waiter<T>> = [];
  private closed = false;

  get isShutDown(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.items.length;
  }

  put(item: T): void {
    if (this.closed) {
      throw new QueueShutDownError();
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
      return;
    }
    this.items.push({ value: item });
  }

  get(signal?: AbortSignal): Promise<T> {
    const next = this.items.shift();
    if (next) {
      return Promise.resolve(next.value);
    }
    if (this.closed) {
      return Promise.reject(new QueueShutDownError());
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(signal?.reason);
      };
      const waiter: Waiter<T> = {
        resolve: (item) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(item);
        },
        reject: (error) => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        },
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  shutdown(immediate = false): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (immediate) {
      this.items.length = 0;
    }
    const waiters = this.waiters.splice(0);
    for (const waiter of waiters) {
      waiter.reject(new QueueShutDownError());
    }
  }
}

export class BroadcastQueue<T> {
  private readonly subscribers = new Set<AsyncQueue<T>>();
  private closed = false;

  get isShutDown(): boolean {
    return this.closed;
  }

  subscribe(): AsyncQueue<T> {
    const queue = new AsyncQueue<T>();
    if (this.closed) {
      queue.shutdown();
    } else {
      this.subscribers.add(queue);
    }
    return queue;
  }

  unsubscribe(queue: AsyncQueue<T>): void {
    this.subscribers.delete(queue);
  }

  publish(item: T): void {
    if (this.closed) {
      throw new QueueShutDownError();
    }
    for (const queue of this.subscribers) {
      queue.put(item);
    }
  }

  shutdown(immediate = false): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const queue of this.subscribers) {
      queue.shutdown(immediate);
    }
    this.subscribers.clear();
  }
}
