import type { Writable } from 'node:stream';
import { encodeFrame, type Frame } from '../codec/index.js';
import { EngineError } from './errors.js';

/**
 * Suspend until the stream has room for more data.
 * Rejects when the stream closes or errors while we wait.
 */
function awaitCapacity(stream: Writable): Promise<void> {
  return new Promise((resolve, reject) => {
    const cleanup = () => {
      stream.off('drain', onDrain);
      stream.off('close', onClose);
      stream.off('error', onError);
    };
    const onDrain = () => {
      cleanup();
      resolve();
    };
    const onClose = () => {
      cleanup();
      reject(new EngineError('stream', 'stream closed'));
    };
    const onError = (error: Error) => {
      cleanup();
      reject(EngineError.wrap('stream', 'capacity error', error));
    };
    stream.on('drain', onDrain);
    stream.on('close', onClose);
    stream.on('error', onError);
  });
}

/**
 * Flow-controlled frame writer over the outbound half of a stream.
 *
 * Each write first waits for transmit capacity, so a slow peer suspends
 * the writer rather than growing the buffer without bound.
 */
export class FrameWriter {
  constructor(private readonly stream: Writable) {}

  get closed(): boolean {
    return this.stream.destroyed || this.stream.writableEnded;
  }

  async send(frame: Frame): Promise<void> {
    let bytes: Uint8Array;
    try {
      bytes = encodeFrame(frame);
    } catch (error) {
      throw EngineError.wrap('stream', 'encode frame', error);
    }
    await this.sendRaw(bytes);
  }

  async sendRaw(bytes: Uint8Array): Promise<void> {
    if (this.closed) {
      throw new EngineError('stream', 'stream closed');
    }
    if (this.stream.writableNeedDrain) {
      await awaitCapacity(this.stream);
    }
    if (this.closed) {
      throw new EngineError('stream', 'stream closed');
    }
    try {
      this.stream.write(bytes);
    } catch (error) {
      throw EngineError.wrap('stream', 'send failed', error);
    }
  }

  /**
   * Empty, stream-terminating write: tells the peer we are done
   */
  finish(): void {
    if (!this.closed) {
      this.stream.end();
    }
  }
}
