// src/transport/node-transports/duplex-stream.ts

import type { Duplex } from 'node:stream';
import { headsetLogger } from '../../logger.js';
import type { ByteStream } from '../../types/headset-types.js';

const logger = headsetLogger.createLogger('DuplexByteStream');

interface ReadWaiter {
  resolve: (chunk: Uint8Array | null) => void;
  reject: (error: Error) => void;
}

/**
 * Pull-style `ByteStream` over any Node `Duplex`: `net.Socket`, an open
 * `SerialPort`, a `PassThrough` in tests.
 *
 * Incoming chunks are buffered until read. A stream error is delivered to
 * the next read once; after that reads resolve with null.
 */
export class DuplexByteStream implements ByteStream {
  private readonly duplex: Duplex;
  private chunks: Uint8Array[] = [];
  private waiters: ReadWaiter[] = [];
  private pendingError: Error | null = null;
  private ended: boolean = false;

  constructor(duplex: Duplex) {
    this.duplex = duplex;
    this.duplex.on('data', this.onData);
    this.duplex.once('end', this.onEnd);
    this.duplex.once('close', this.onEnd);
    this.duplex.on('error', this.onError);
  }

  private readonly onData = (data: Buffer | string): void => {
    const chunk =
      typeof data === 'string'
        ? new TextEncoder().encode(data)
        : new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(chunk);
    } else {
      this.chunks.push(chunk);
    }
  };

  private readonly onEnd = (): void => {
    if (this.ended) return;
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve(null);
    }
  };

  private readonly onError = (err: Error): void => {
    logger.warn('Stream error', { reason: err.message });
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.reject(err);
    } else {
      this.pendingError = err;
    }
  };

  read(): Promise<Uint8Array | null> {
    const chunk = this.chunks.shift();
    if (chunk) return Promise.resolve(chunk);

    if (this.pendingError) {
      const err = this.pendingError;
      this.pendingError = null;
      return Promise.reject(err);
    }
    if (this.ended) return Promise.resolve(null);

    return new Promise<Uint8Array | null>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  write(data: Uint8Array): Promise<void> {
    if (this.ended || this.duplex.destroyed || !this.duplex.writable) {
      return Promise.reject(new Error('Stream is not writable'));
    }
    return new Promise<void>((resolve, reject) => {
      this.duplex.write(data, (err?: Error | null) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  close(): Promise<void> {
    if (this.duplex.destroyed) {
      this.onEnd();
      return Promise.resolve();
    }
    return new Promise<void>(resolve => {
      this.duplex.once('close', () => {
        this.detach();
        resolve();
      });
      this.duplex.destroy();
    });
  }

  private detach(): void {
    this.duplex.off('data', this.onData);
    this.onEnd();
  }
}
