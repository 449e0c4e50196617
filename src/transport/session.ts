// src/transport/session.ts

import { Mutex } from 'async-mutex';
import { DEFAULTS, FrameType, HANDSHAKE_FRAME } from '../constants/constants.js';
import {
  HandshakeError,
  HeadsetError,
  NotConnectedError,
  TransportLostError,
} from '../errors.js';
import { HeadsetFramer } from '../framers/headset-framer.js';
import { headsetLogger } from '../logger.js';
import type {
  ByteStream,
  Frame,
  FrameErrorHandler,
  SessionOptions,
  SessionState,
  SessionStateHandler,
  TransportLostHandler,
} from '../types/headset-types.js';
import { FrameQueue } from './frame-queue.js';

const logger = headsetLogger.createLogger('TransportSession');

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  connecting: ['ready', 'draining'],
  ready: ['draining'],
  draining: ['closed'],
  closed: [],
};

export interface SessionStats {
  state: SessionState;
  bytesSent: number;
  bytesReceived: number;
  bufferedBytes: number;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * One connected lifetime of the control channel.
 *
 * - Sole reader and writer of the byte stream
 * - Frames the incoming bytes and recovers from framing errors locally
 * - State machine: connecting → ready → draining → closed
 *
 * Never reconnects: once closed, a new session has to be built on a new stream.
 */
export class TransportSession {
  private _state: SessionState = 'connecting';
  private readonly stream: ByteStream;
  private readonly framer: HeadsetFramer;
  private readonly queue = new FrameQueue();
  private readonly writeMutex = new Mutex();
  private readonly handshakeTimeoutMs: number;

  private pump: Promise<void> | null = null;
  private closing: Promise<void> | null = null;

  private bytesSent: number = 0;
  private bytesReceived: number = 0;

  private stateHandler: SessionStateHandler | null = null;
  private transportLostHandler: TransportLostHandler | null = null;
  private frameErrorHandler: FrameErrorHandler | null = null;

  constructor(stream: ByteStream, options: SessionOptions = {}) {
    this.stream = stream;
    this.framer = new HeadsetFramer(options.maxFrameSize ?? DEFAULTS.MAX_FRAME_SIZE);
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? DEFAULTS.HANDSHAKE_TIMEOUT_MS;
  }

  get state(): SessionState {
    return this._state;
  }

  get isReady(): boolean {
    return this._state === 'ready';
  }

  setStateHandler(handler: SessionStateHandler | null): void {
    this.stateHandler = handler;
  }

  setTransportLostHandler(handler: TransportLostHandler | null): void {
    this.transportLostHandler = handler;
  }

  setFrameErrorHandler(handler: FrameErrorHandler | null): void {
    this.frameErrorHandler = handler;
  }

  /**
   * Starts reading, performs the handshake and moves the session to `ready`.
   * On failure the session is closed and the error rethrown.
   * @throws HandshakeError when the device does not acknowledge in time
   */
  async open(): Promise<void> {
    if (this._state !== 'connecting' || this.pump) {
      throw new HandshakeError(`Session cannot be opened in state ${this._state}`);
    }

    this.pump = this.runPump();
    try {
      await this.write(HANDSHAKE_FRAME);
      await this.awaitHandshake();
      this.transition('ready');
      logger.info('Session ready');
    } catch (err: unknown) {
      await this.shutdown();
      if (err instanceof HeadsetError) throw err;
      throw new HandshakeError(`Handshake failed: ${errorMessage(err)}`);
    }
  }

  private async awaitHandshake(): Promise<void> {
    const deadline = Date.now() + this.handshakeTimeoutMs;
    for (;;) {
      const remaining = Math.max(0, deadline - Date.now());
      const frame = await this.queue.dequeue(
        remaining,
        () => new HandshakeError(`No handshake acknowledgement within ${this.handshakeTimeoutMs}ms`)
      );
      if (frame === null) {
        throw new HandshakeError('Stream closed before the handshake was acknowledged');
      }
      if (frame.type === FrameType.HANDSHAKE) return;
      logger.warn('Dropping data frame received before the handshake', {
        bytes: frame.payload.length,
      });
    }
  }

  /**
   * Data frames in arrival order. Ends when the session closes.
   */
  async *frames(): AsyncGenerator<Frame, void, undefined> {
    for (;;) {
      const frame = await this.queue.dequeue();
      if (frame === null) return;
      if (frame.type === FrameType.HANDSHAKE) {
        logger.debug('Ignoring repeated handshake frame');
        continue;
      }
      yield frame;
    }
  }

  /**
   * Writes one complete frame. Concurrent writers are serialized.
   * @throws NotConnectedError unless the session is ready
   * @throws TransportLostError when the stream rejects the write
   */
  async writeFrame(frame: Uint8Array): Promise<void> {
    if (this._state !== 'ready') {
      throw new NotConnectedError(this._state);
    }
    await this.write(frame);
  }

  private async write(data: Uint8Array): Promise<void> {
    const release = await this.writeMutex.acquire();
    try {
      if (this._state === 'draining' || this._state === 'closed') {
        throw new NotConnectedError(this._state);
      }
      await this.stream.write(data);
      this.bytesSent += data.length;
      logger.trace('Frame written', { bytes: data.length });
    } catch (err: unknown) {
      if (err instanceof HeadsetError) throw err;
      const lost = new TransportLostError(
        `Stream write failed: ${errorMessage(err)}`,
        err instanceof Error ? err : undefined
      );
      await this.shutdown(lost);
      throw lost;
    } finally {
      release();
    }
  }

  /**
   * Graceful close: draining, then the stream is closed, then closed.
   */
  async close(): Promise<void> {
    await this.shutdown();
    if (this.pump) await this.pump;
  }

  getStats(): SessionStats {
    return {
      state: this._state,
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
      bufferedBytes: this.framer.bufferedBytes,
    };
  }

  private async runPump(): Promise<void> {
    try {
      for (;;) {
        const chunk = await this.stream.read();
        if (chunk === null) break;
        this.bytesReceived += chunk.length;
        this.consume(chunk);
      }
      if (!this.closing) {
        await this.shutdown(new TransportLostError('Stream ended'));
      }
    } catch (err: unknown) {
      if (this.closing) {
        logger.debug('Read failed while closing', { reason: errorMessage(err) });
        return;
      }
      await this.shutdown(
        new TransportLostError(
          `Stream read failed: ${errorMessage(err)}`,
          err instanceof Error ? err : undefined
        )
      );
    }
  }

  private consume(chunk: Uint8Array): void {
    for (const event of this.framer.push(chunk)) {
      if (event.kind === 'frame') {
        this.queue.enqueue(event.frame);
        continue;
      }
      logger.warn('Framing error, recovering', { reason: event.error.message });
      this.frameErrorHandler?.(event.error);
    }
  }

  private shutdown(lost?: TransportLostError): Promise<void> {
    if (!this.closing) {
      this.closing = this.runShutdown(lost);
    }
    return this.closing;
  }

  private async runShutdown(lost?: TransportLostError): Promise<void> {
    this.transition('draining');
    this.queue.close();

    try {
      await this.stream.close();
    } catch (err: unknown) {
      logger.warn('Failed to close stream', { reason: errorMessage(err) });
    }

    this.transition('closed');
    if (lost) {
      logger.error('Transport lost', { reason: lost.message });
      this.transportLostHandler?.(lost);
    } else {
      logger.info('Session closed');
    }
  }

  private transition(next: SessionState): void {
    const previous = this._state;
    if (previous === next) return;
    if (!TRANSITIONS[previous].includes(next)) {
      throw new HeadsetError(`Invalid session transition: ${previous} → ${next}`);
    }
    this._state = next;
    logger.debug(`State ${previous} → ${next}`);
    this.stateHandler?.(next, previous);
  }
}
