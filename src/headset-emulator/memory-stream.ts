// src/headset-emulator/memory-stream.ts

import type { ByteStream } from '../types/headset-types.js';

interface ReadWaiter {
  resolve: (chunk: Uint8Array | null) => void;
  reject: (error: Error) => void;
}

/**
 * One end of an in-process byte pipe. What one end writes, the other reads.
 * Closing either end ends both.
 */
export class MemoryByteStream implements ByteStream {
  private peer: MemoryByteStream | null = null;
  private chunks: Uint8Array[] = [];
  private waiters: ReadWaiter[] = [];
  private pendingError: Error | null = null;
  private writeError: Error | null = null;
  private ended: boolean = false;

  /** Everything written through this end, in order */
  readonly written: Uint8Array[] = [];

  link(peer: MemoryByteStream): void {
    this.peer = peer;
  }

  get isClosed(): boolean {
    return this.ended;
  }

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
    if (this.writeError) return Promise.reject(this.writeError);
    if (this.ended || !this.peer) return Promise.reject(new Error('Memory stream is closed'));

    const copy = data.slice();
    this.written.push(copy);
    this.peer.inject(copy);
    return Promise.resolve();
  }

  close(): Promise<void> {
    this.end();
    this.peer?.end();
    return Promise.resolve();
  }

  /**
   * Makes bytes readable on this end as if the peer had written them.
   */
  inject(bytes: Uint8Array): void {
    if (this.ended) return;
    const waiter = this.waiters.shift();
    if (waiter) waiter.resolve(bytes);
    else this.chunks.push(bytes);
  }

  /**
   * Fails the next read on this end, as an I/O error would.
   */
  failRead(error: Error): void {
    const waiter = this.waiters.shift();
    if (waiter) waiter.reject(error);
    else this.pendingError = error;
  }

  /**
   * Makes every following write on this end fail; null restores writing.
   */
  failWrites(error: Error | null): void {
    this.writeError = error;
  }

  /**
   * Ends this end only: pending and later reads resolve with null.
   */
  end(): void {
    if (this.ended) return;
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve(null);
    }
  }
}

export interface MemoryStreamPair {
  /** End handed to the client */
  client: MemoryByteStream;
  /** End the emulated device sits on */
  device: MemoryByteStream;
}

export function createMemoryStreamPair(): MemoryStreamPair {
  const client = new MemoryByteStream();
  const device = new MemoryByteStream();
  client.link(device);
  device.link(client);
  return { client, device };
}
