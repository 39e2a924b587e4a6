import { once } from 'events';
import type { Writable } from 'stream';
import { SinkClosedError } from '../errors.js';

/** Destination of a channel's outbound bytes. Written only by that channel's render loop. */
export interface OutputSink {
  write(data: Buffer): Promise<void>;
}

/**
 * Sink over an SSH channel stream.
 *
 * The PTY request arrives before the shell request that opens the data stream,
 * so writes wait until `bind()` supplies the stream.
 */
export class ChannelOutput implements OutputSink {
  private stream: Writable | null = null;
  private closed = false;
  private readonly closing = new AbortController();
  private ready: Promise<Writable | null>;
  private resolveReady: (stream: Writable | null) => void = () => {};

  constructor() {
    this.ready = new Promise((resolve) => {
      this.resolveReady = resolve;
    });
  }

  get bound(): boolean {
    return this.stream !== null;
  }

  bind(stream: Writable): void {
    if (this.stream || this.closed) {
      throw new Error('Channel output is already bound');
    }
    this.stream = stream;
    stream.once('close', () => this.close());
    this.resolveReady(stream);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.closing.abort();
    this.resolveReady(null);
  }

  async write(data: Buffer): Promise<void> {
    const stream = this.stream ?? (await this.ready);
    if (this.closed || !stream || stream.destroyed || stream.writableEnded) {
      throw new SinkClosedError();
    }

    if (!stream.write(data)) {
      await this.drained(stream);
    }
  }

  /**
   * Waits for `drain`, or for the stream or this sink to close.
   * No timeout: a live peer that never drains stalls this channel's render loop.
   */
  private async drained(stream: Writable): Promise<void> {
    const waiting = new AbortController();
    const stopWaiting = () => waiting.abort();
    this.closing.signal.addEventListener('abort', stopWaiting, { once: true });

    try {
      await Promise.race([
        once(stream, 'drain', { signal: waiting.signal }),
        once(stream, 'close', { signal: waiting.signal }),
      ]);
    } catch (error) {
      // Aborted by close(); anything else is a stream error
      if (!waiting.signal.aborted) throw error;
    } finally {
      waiting.abort();
      this.closing.signal.removeEventListener('abort', stopWaiting);
    }

    if (this.closed || stream.destroyed) {
      throw new SinkClosedError();
    }
  }
}
