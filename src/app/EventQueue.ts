/**
 * Unbounded multi-producer / single-consumer queue.
 *
 * Producers enqueue without waiting; the consumer awaits `recv()`, which
 * resolves `undefined` once the sender is closed and the backlog is drained.
 */

export interface EventSender<T> {
  /** Enqueue an item. Returns false when the sender is already closed. */
  send(item: T): boolean;
  close(): void;
  readonly closed: boolean;
}

export interface EventReceiver<T> extends AsyncIterable<T> {
  recv(): Promise<T | undefined>;
  readonly pending: number;
}

export interface EventQueue<T> {
  sender: EventSender<T>;
  receiver: EventReceiver<T>;
}

class QueueState<T> {
  readonly items: T[] = [];
  closed = false;
  waiter: ((item: T | undefined) => void) | null = null;

  push(item: T): boolean {
    if (this.closed) return false;

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(undefined);
    }
  }

  next(): Promise<T | undefined> {
    if (this.waiter) {
      return Promise.reject(new Error('EventQueue already has a pending receiver'));
    }
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }
}

export function createEventQueue<T>(): EventQueue<T> {
  const state = new QueueState<T>();

  const sender: EventSender<T> = {
    send: (item) => state.push(item),
    close: () => state.close(),
    get closed() {
      return state.closed;
    },
  };

  const receiver: EventReceiver<T> = {
    recv: () => state.next(),
    get pending() {
      return state.items.length;
    },
    async *[Symbol.asyncIterator]() {
      for (;;) {
        const item = await state.next();
        if (item === undefined) return;
        yield item;
      }
    },
  };

  return { sender, receiver };
}
