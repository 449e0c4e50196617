// src/correlator/request-correlator.ts

import { decodeMessage, describeMessage, encodeMessage } from '../codec/message-codec.js';
import { DEFAULTS, FRAME_HEADER_SIZE, MAX_TOKEN, MIN_TOKEN } from '../constants/constants.js';
import {
  DecodingError,
  DeviceRejectedError,
  HeadsetError,
  NotConnectedError,
  RequestCancelledError,
  RequestTimedOutError,
  SessionClosedError,
} from '../errors.js';
import { headsetLogger } from '../logger.js';
import type { TransportSession } from '../transport/session.js';
import type {
  CorrelatorOptions,
  DecodeErrorHandler,
  Frame,
  Message,
  OutgoingMessage,
  ReplyMessage,
  SendOptions,
  UnsolicitedHandler,
} from '../types/headset-types.js';
import type { Diagnostics } from '../utils/diagnostics.js';

const logger = headsetLogger.createLogger('RequestCorrelator');

/** A reply together with the times the exchange started and ended */
export interface RequestOutcome {
  reply: ReplyMessage;
  createdAt: number;
  receivedAt: number;
}

interface PendingRequest {
  token: number;
  path: string;
  createdAt: number;
  timer: ReturnType<typeof setTimeout>;
  resolve: (outcome: RequestOutcome) => void;
  reject: (error: Error) => void;
  detachSignal: (() => void) | null;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new HeadsetError(String(err));
}

/**
 * Request/response on top of the session's frame sequence.
 *
 * Every request gets a token that no other in-flight request holds.
 * Replies are matched by token alone; anything that matches nothing is
 * handed to the unsolicited handler. The correlator never retries.
 */
export class RequestCorrelator {
  private readonly session: TransportSession;
  private readonly diagnostics: Diagnostics | null;
  private readonly requestTimeoutMs: number;
  private readonly maxFrameSize: number;
  private readonly now: () => number;

  private readonly pending = new Map<number, PendingRequest>();
  private nextToken: number = MIN_TOKEN;

  private readerLoop: Promise<void> | null = null;
  private readerLoopError: Error | null = null;

  private unsolicitedHandler: UnsolicitedHandler | null = null;
  private decodeErrorHandler: DecodeErrorHandler | null = null;

  constructor(
    session: TransportSession,
    options: CorrelatorOptions = {},
    diagnostics: Diagnostics | null = null
  ) {
    this.session = session;
    this.diagnostics = diagnostics;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULTS.REQUEST_TIMEOUT_MS;
    this.maxFrameSize = options.maxFrameSize ?? DEFAULTS.MAX_FRAME_SIZE;
    this.now = options.now ?? Date.now;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  hasPending(token: number): boolean {
    return this.pending.has(token);
  }

  setUnsolicitedHandler(handler: UnsolicitedHandler | null): void {
    this.unsolicitedHandler = handler;
  }

  setDecodeErrorHandler(handler: DecodeErrorHandler | null): void {
    this.decodeErrorHandler = handler;
  }

  /**
   * Starts consuming the session's frames. The loop ends, and every
   * pending request fails with `SessionClosedError`, when the session
   * leaves `ready`.
   */
  start(): void {
    if (this.readerLoop) return;
    this.readerLoop = this.runReaderLoop();
  }

  /**
   * Fails every pending request and waits for the reader loop to finish.
   * The loop finishes once the session is closed.
   */
  async stop(): Promise<void> {
    this.rejectAll(new SessionClosedError('Correlator stopped'));
    if (this.readerLoop) await this.readerLoop;
    if (this.readerLoopError) {
      const error = this.readerLoopError;
      this.readerLoopError = null;
      throw error;
    }
  }

  /**
   * Sends a query or command and waits for its reply.
   * @throws NotConnectedError when the session is not ready
   * @throws RequestTimedOutError when no reply arrives before the deadline
   * @throws RequestCancelledError when `signal` aborts first
   * @throws DeviceRejectedError when the device answers with an error
   * @throws SessionClosedError when the session closes first
   */
  async send(message: OutgoingMessage, options: SendOptions = {}): Promise<ReplyMessage> {
    const { reply } = await this.request(message, options);
    return reply;
  }

  /**
   * Same as `send`, also reporting when the request was created and when
   * its reply arrived.
   */
  request(message: OutgoingMessage, options: SendOptions = {}): Promise<RequestOutcome> {
    if (!this.session.isReady) {
      return Promise.reject(new NotConnectedError(this.session.state));
    }
    if (options.signal?.aborted) {
      return Promise.reject(new RequestCancelledError(0, message.path));
    }

    let prepared: { token: number; frame: Uint8Array };
    try {
      prepared = this.prepare(message);
    } catch (err: unknown) {
      return Promise.reject(toError(err));
    }
    const { token, frame } = prepared;

    const timeoutMs = options.timeoutMs ?? this.requestTimeoutMs;
    return new Promise<RequestOutcome>((resolve, reject) => {
      const entry: PendingRequest = {
        token,
        path: message.path,
        createdAt: this.now(),
        timer: setTimeout(
          () => this.fail(token, new RequestTimedOutError(token, message.path, timeoutMs)),
          timeoutMs
        ),
        resolve,
        reject,
        detachSignal: null,
      };

      const { signal } = options;
      if (signal) {
        const onAbort = (): void =>
          this.fail(token, new RequestCancelledError(token, message.path));
        signal.addEventListener('abort', onAbort, { once: true });
        entry.detachSignal = () => signal.removeEventListener('abort', onAbort);
      }

      this.pending.set(token, entry);
      this.diagnostics?.recordRequest(message.path);
      logger.debug('Request sent', { token, path: message.path, kind: message.kind });

      void this.session.writeFrame(frame).then(
        () => this.diagnostics?.recordDataSent(frame.length),
        (err: unknown) => this.fail(token, toError(err))
      );
    });
  }

  private prepare(message: OutgoingMessage): { token: number; frame: Uint8Array } {
    const token = this.allocateToken();
    const request: Message = { ...message, token };
    return { token, frame: encodeMessage(request, { maxFrameSize: this.maxFrameSize }) };
  }

  /**
   * Next token after the last one issued, wrapping past 65535 and skipping
   * 0 and every token still in flight.
   */
  private allocateToken(): number {
    for (let attempt = MIN_TOKEN; attempt <= MAX_TOKEN; attempt++) {
      const token = this.nextToken;
      this.nextToken = token >= MAX_TOKEN ? MIN_TOKEN : token + 1;
      if (!this.pending.has(token)) return token;
    }
    throw new HeadsetError(`All ${MAX_TOKEN} correlation tokens are in flight`);
  }

  private take(token: number): PendingRequest | undefined {
    const entry = this.pending.get(token);
    if (!entry) return undefined;
    this.pending.delete(token);
    clearTimeout(entry.timer);
    entry.detachSignal?.();
    return entry;
  }

  private fail(token: number, error: Error): void {
    const entry = this.take(token);
    if (!entry) return;
    this.diagnostics?.recordError(error, entry.path);
    logger.debug(`Request failed: ${error.message}`, { token, path: entry.path });
    entry.reject(error);
  }

  private fulfil(reply: ReplyMessage, receivedAt: number): void {
    const entry = this.take(reply.token);
    if (!entry) return;

    if (reply.path !== entry.path) {
      logger.debug(`Reply path ${reply.path} differs from request`, {
        token: reply.token,
        path: entry.path,
      });
    }

    if (reply.error) {
      const error = new DeviceRejectedError(entry.path);
      this.diagnostics?.recordError(error, entry.path);
      entry.reject(error);
      return;
    }

    const responseTime = receivedAt - entry.createdAt;
    this.diagnostics?.recordSuccess(responseTime, entry.path);
    logger.debug('Reply received', { token: reply.token, path: entry.path, responseTime });
    entry.resolve({ reply, createdAt: entry.createdAt, receivedAt });
  }

  private rejectAll(error: Error): void {
    for (const token of [...this.pending.keys()]) {
      this.fail(token, error);
    }
  }

  private async runReaderLoop(): Promise<void> {
    try {
      for await (const frame of this.session.frames()) {
        this.dispatch(frame);
      }
    } catch (err: unknown) {
      this.readerLoopError = toError(err);
      logger.error('Reader loop failed', { reason: this.readerLoopError.message });
    } finally {
      this.rejectAll(new SessionClosedError());
    }
  }

  private dispatch(frame: Frame): void {
    const receivedAt = this.now();
    this.diagnostics?.recordDataReceived(FRAME_HEADER_SIZE + frame.payload.length);

    let message: Message;
    try {
      message = decodeMessage(frame);
    } catch (err: unknown) {
      if (!(err instanceof DecodingError)) throw err;
      logger.warn('Dropping undecodable frame', { reason: err.message });
      this.diagnostics?.recordDecodeError(err);
      this.decodeErrorHandler?.(err, frame);
      return;
    }

    if (message.kind === 'reply' && this.pending.has(message.token)) {
      this.fulfil(message, receivedAt);
      return;
    }

    if (message.kind === 'reply' || message.kind === 'notification') {
      this.diagnostics?.recordUnsolicited(message.path);
      logger.debug('Unsolicited message', { token: message.token, path: message.path });
      this.unsolicitedHandler?.(message, receivedAt);
      return;
    }

    logger.warn(`Ignoring ${describeMessage(message)} sent by the device`);
  }
}
