// src/transport/frame-queue.ts

import type { Frame } from '../types/headset-types.js';

interface PendingResolver {
  resolve: (frame: Frame | null) => void;
  timeoutId: ReturnType<typeof setTimeout> | null;
}

/**
 * Hands frames from the session's read pump to whoever consumes them.
 *
 * Frames that arrive before anyone asks are buffered; consumers that ask
 * before a frame arrives wait, optionally with a deadline. Once closed,
 * every waiting and future `dequeue` resolves with null.
 */
export class FrameQueue {
  private queue: Frame[] = [];
  private pendingResolvers: PendingResolver[] = [];
  private closed: boolean = false;

  enqueue(frame: Frame): void {
    if (this.closed) return;

    const pending = this.pendingResolvers.shift();
    if (pending) {
      if (pending.timeoutId) clearTimeout(pending.timeoutId);
      pending.resolve(frame);
    } else {
      this.queue.push(frame);
    }
  }

  /**
   * Takes the next frame, waiting for one if none is buffered.
   * @param timeoutMs - Give up after this long; waits indefinitely when omitted
   * @param timeoutError - Builds the rejection used when the deadline passes
   * @returns The frame, or null once the queue is closed
   */
  dequeue(timeoutMs?: number, timeoutError?: () => Error): Promise<Frame | null> {
    const buffered = this.queue.shift();
    if (buffered) return Promise.resolve(buffered);
    if (this.closed) return Promise.resolve(null);

    return new Promise<Frame | null>((resolve, reject) => {
      const pending: PendingResolver = { resolve, timeoutId: null };

      if (timeoutMs !== undefined) {
        pending.timeoutId = setTimeout(() => {
          const index = this.pendingResolvers.indexOf(pending);
          if (index !== -1) {
            this.pendingResolvers.splice(index, 1);
            reject(
              timeoutError
                ? timeoutError()
                : new Error(`No frame received within ${timeoutMs}ms`)
            );
          }
        }, timeoutMs);
      }

      this.pendingResolvers.push(pending);
    });
  }

  /**
   * Drops buffered frames and releases every waiting consumer with null.
   */
  close(): void {
    this.closed = true;
    this.queue = [];

    for (const pending of this.pendingResolvers) {
      if (pending.timeoutId) clearTimeout(pending.timeoutId);
      pending.resolve(null);
    }
    this.pendingResolvers = [];
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.queue.length;
  }

  get pendingCount(): number {
    return this.pendingResolvers.length;
  }
}
