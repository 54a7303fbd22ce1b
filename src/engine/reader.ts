import type { Readable } from 'node:stream';
import { decodeFrame } from '../codec/index.js';
import { concatBytes, utf8Encode } from '../crypto/utils.js';
import { describeError, type Logger } from '../logger.js';
import { spawn, type Task } from './task.js';
import type { ClientEvent, EventSink } from './types.js';

/**
 * Pull-based view of the receive half of a stream. The handshake reads
 * from it first, then hands the same source to the inbound reader.
 */
export class ByteSource {
  private readonly chunks: AsyncIterator<unknown>;

  constructor(private readonly stream: Readable) {
    this.chunks = stream[Symbol.asyncIterator]();
  }

  /**
   * Next chunk, or null once the peer has closed the stream
   */
  async next(): Promise<Uint8Array | null> {
    const { value, done } = await this.chunks.next();
    if (done) {
      return null;
    }
    if (typeof value === 'string') {
      return utf8Encode(value);
    }
    if (value instanceof Uint8Array) {
      return value;
    }
    throw new Error(`unexpected chunk type: ${typeof value}`);
  }

  /**
   * Release the receive half; a pending next() settles promptly
   */
  cancel(): void {
    this.stream.destroy();
  }
}

/**
 * Spawn the inbound reader.
 *
 * Decodes every complete frame in the buffer (seeded with bytes left over
 * from the handshake) and republishes it, then waits for more bytes. A hard
 * decode error drops the whole buffer and reading continues. A read failure
 * or the peer closing ends the task with a `disconnected` event. The task
 * stops silently when aborted or when the event consumer is gone.
 */
export function spawnReader(
  source: ByteSource,
  buffered: Uint8Array,
  events: EventSink,
  logger: Logger
): Task {
  return spawn(
    'frame reader',
    async (signal) => {
      signal.addEventListener('abort', () => source.cancel(), { once: true });

      const publish = (event: ClientEvent): boolean => {
        if (signal.aborted) {
          return false;
        }
        // A full queue drops the event; a closed one means nobody listens
        return events.send(event) || !events.isClosed();
      };

      let buffer = buffered;
      for (;;) {
        let draining = true;
        while (draining) {
          const result = decodeFrame(buffer);
          switch (result.status) {
            case 'frame':
              buffer = buffer.subarray(result.consumed);
              if (!publish({ kind: 'frame', frame: result.frame })) {
                return;
              }
              break;
            case 'incomplete':
              draining = false;
              break;
            case 'error':
              logger.warn(`dropping receive buffer: ${result.reason}`);
              buffer = new Uint8Array(0);
              if (!publish({ kind: 'error', detail: `decode error: ${result.reason}` })) {
                return;
              }
              draining = false;
              break;
          }
        }

        let chunk: Uint8Array | null;
        try {
          chunk = await source.next();
        } catch (error) {
          if (signal.aborted) {
            return;
          }
          const detail = `receive failed: ${describeError(error)}`;
          publish({ kind: 'error', detail });
          publish({ kind: 'disconnected', reason: detail });
          return;
        }

        if (signal.aborted) {
          return;
        }
        if (chunk === null) {
          publish({ kind: 'disconnected', reason: 'remote closed' });
          return;
        }
        buffer = concatBytes(buffer, chunk);
      }
    },
    logger
  );
}
