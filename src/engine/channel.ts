/**
 * Sending side of a channel. Any number of producers may share one.
 */
export interface ChannelSender<T> {
  /**
   * Enqueue a value. Returns false when the channel is full or closed;
   * the value is dropped in both cases.
   */
  send(value: T): boolean;
  isClosed(): boolean;
}

/**
 * Receiving side of a channel. Exactly one consumer is expected.
 */
export interface ChannelReceiver<T> extends AsyncIterable<T> {
  /**
   * Next value, or null once the channel is closed and drained
   */
  recv(): Promise<T | null>;
}

/**
 * Multi-producer single-consumer async queue
 */
export interface Channel<T> extends ChannelSender<T>, ChannelReceiver<T> {
  close(): void;
}

/**
 * Create a channel holding at most `capacity` undelivered values
 */
export function createChannel<T>(capacity: number = Number.POSITIVE_INFINITY): Channel<T> {
  const buffer: T[] = [];
  const waiters: Array<(value: T | null) => void> = [];
  let closed = false;

  const recv = (): Promise<T | null> => {
    if (buffer.length > 0) {
      const [value] = buffer.splice(0, 1);
      return Promise.resolve(value);
    }
    if (closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      waiters.push(resolve);
    });
  };

  return {
    send(value: T): boolean {
      if (closed) {
        return false;
      }

      // Hand straight to a waiting consumer
      const waiter = waiters.shift();
      if (waiter) {
        waiter(value);
        return true;
      }

      if (buffer.length < capacity) {
        buffer.push(value);
        return true;
      }

      return false;
    },

    recv,

    close(): void {
      if (closed) return;
      closed = true;
      for (const waiter of waiters) {
        waiter(null);
      }
      waiters.length = 0;
    },

    isClosed(): boolean {
      return closed;
    },

    async *[Symbol.asyncIterator](): AsyncIterator<T> {
      for (;;) {
        const value = await recv();
        if (value === null) return;
        yield value;
      }
    },
  };
}
