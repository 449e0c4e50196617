// src/headset-emulator/headset-emulator.ts

import { Mutex } from 'async-mutex';
import { ATTRIBUTES, ATTRIBUTE_IDS, findAttributeByPath } from '../attributes/index.js';
import { encodeMessage, describeMessage, decodeMessage } from '../codec/message-codec.js';
import {
  DATA_HEADER_SIZE,
  DEFAULTS,
  FRAME_HEADER_SIZE,
  FrameType,
  HANDSHAKE_FRAME,
  UNSOLICITED_TOKEN,
} from '../constants/constants.js';
import { DecodingError, HeadsetConfigError, HeadsetError } from '../errors.js';
import { HeadsetFramer, buildFrame } from '../framers/headset-framer.js';
import Logger from '../logger.js';
import type {
  AttributeId,
  AttributeValue,
  AttributeValueMap,
  ByteStream,
  CommandMessage,
  Frame,
  LoggerInstance,
  Message,
  QueryMessage,
  ReplyMessage,
} from '../types/headset-types.js';

/** Attributes the emulated device keeps state for */
export type StoredAttributeId = Exclude<AttributeId, 'equalizerEnabled' | 'equalizerPreset'>;

export type EmulatedState = { [K in StoredAttributeId]: AttributeValueMap[K] };

export interface HeadsetEmulatorOptions {
  initialState?: Partial<EmulatedState>;
  /** Acknowledge the client's handshake (default true) */
  answerHandshake?: boolean;
  /** Delay before every reply */
  replyDelayMs?: number;
  /** Repeat the commanded value in command replies (default true) */
  echoCommandValues?: boolean;
  maxFrameSize?: number;
  loggerEnabled?: boolean;
}

const DEFAULT_STATE: EmulatedState = {
  battery: { state: 'in_use', level: 80 },
  softwareVersion: '1.0.0',
  deviceType: 1,
  noiseCancellation: false,
  specificMode: false,
  headDetection: true,
  autoConnection: true,
  equalizer: { enabled: false, presetId: 0 },
  equalizerPresets: [
    { id: 0, name: 'Flat' },
    { id: 1, name: 'Vocal' },
  ],
};

type RequestMessage = QueryMessage | CommandMessage;

function isStoredAttribute(id: AttributeId): id is StoredAttributeId {
  return id !== 'equalizerEnabled' && id !== 'equalizerPreset';
}

const STORED_ATTRIBUTE_IDS: readonly StoredAttributeId[] = ATTRIBUTE_IDS.filter(isStoredAttribute);

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function checkDelay(ms: number): number {
  if (!Number.isFinite(ms) || ms < 0) {
    throw new HeadsetConfigError(`Reply delay must be >= 0, got ${ms}`);
  }
  return ms;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * In-process stand-in for a headset on the far end of a byte stream.
 *
 * Answers the handshake, queries and commands from its own state and can
 * push notifications. Faults (slow, lost, refused or corrupted replies)
 * are switched on per path.
 */
class HeadsetEmulator {
  private state: EmulatedState;
  private stream: ByteStream | null = null;
  private readonly framer: HeadsetFramer;
  private readonly maxFrameSize: number;
  private loop: Promise<void> | null = null;
  private readonly tasks = new Set<Promise<void>>();
  private _mutex: Mutex;

  private answerHandshake: boolean;
  private readonly echoCommandValues: boolean;
  private replyDelayMs: number;
  private readonly pathDelays = new Map<string, number>();
  private readonly droppedPaths = new Set<string>();
  private readonly rejectedPaths = new Set<string>();
  private corruptReplies: number = 0;

  private loggerEnabled: boolean;
  private logger: LoggerInstance;

  /** Queries and commands in the order they arrived */
  readonly received: Message[] = [];
  handshakes: number = 0;

  /**
   * @throws EncodingError when an `initialState` value is outside its attribute's domain
   */
  constructor(options: HeadsetEmulatorOptions = {}) {
    this.state = { ...DEFAULT_STATE };
    const { initialState = {} } = options;
    for (const id of STORED_ATTRIBUTE_IDS) {
      const value = initialState[id];
      if (value !== undefined) this.assign(id, value);
    }
    this.maxFrameSize = options.maxFrameSize ?? DEFAULTS.MAX_FRAME_SIZE;
    this.framer = new HeadsetFramer(this.maxFrameSize);
    this.answerHandshake = options.answerHandshake ?? true;
    this.echoCommandValues = options.echoCommandValues ?? true;
    this.replyDelayMs = checkDelay(options.replyDelayMs ?? 0);
    this._mutex = new Mutex();

    this.loggerEnabled = !!options.loggerEnabled;
    const loggerInstance = new Logger();
    this.logger = loggerInstance.createLogger('HeadsetEmulator');
    this.logger.setLevel(this.loggerEnabled ? 'info' : 'error');
  }

  enableLogger(): void {
    if (!this.loggerEnabled) {
      this.loggerEnabled = true;
      this.logger.setLevel('info');
    }
  }

  disableLogger(): void {
    if (this.loggerEnabled) {
      this.loggerEnabled = false;
      this.logger.setLevel('error');
    }
  }

  get connected(): boolean {
    return this.stream !== null;
  }

  // !=============================================================================
  // ! Lifecycle
  // !=============================================================================

  /**
   * Starts serving the given stream end.
   * @throws HeadsetError when already attached
   */
  attach(stream: ByteStream): void {
    if (this.stream) {
      throw new HeadsetError('Emulator is already attached to a stream');
    }
    this.stream = stream;
    this.framer.reset();
    this.loop = this.serve(stream);
    this.logger.info('Attached');
  }

  /**
   * Closes the stream and waits for replies still being sent.
   */
  async detach(): Promise<void> {
    const { stream, loop } = this;
    if (!stream) return;
    await stream.close();
    if (loop) await loop;
    await Promise.all([...this.tasks]);
    this.logger.info('Detached');
  }

  // !=============================================================================
  // ! State
  // !=============================================================================

  getState(): EmulatedState {
    return { ...this.state };
  }

  setState(patch: Partial<EmulatedState>): void {
    this.state = { ...this.state, ...patch };
  }

  /**
   * @throws EncodingError when the value is outside the attribute's domain
   */
  setValue<K extends StoredAttributeId>(id: K, value: AttributeValueMap[K]): void {
    this.state[id] = ATTRIBUTES[id].validate(value);
  }

  requestsFor(path: string): Message[] {
    return this.received.filter(message => message.path === path);
  }

  // !=============================================================================
  // ! Fault injection
  // !=============================================================================

  setAnswerHandshake(answer: boolean): void {
    this.answerHandshake = answer;
  }

  /** Delays replies to `path`, or every reply when no path is given */
  setReplyDelay(ms: number, path?: string): void {
    if (path === undefined) this.replyDelayMs = checkDelay(ms);
    else this.pathDelays.set(path, checkDelay(ms));
  }

  /** Requests to `path` are processed but never answered */
  dropReplies(path: string): void {
    this.droppedPaths.add(path);
  }

  /** Requests to `path` are answered with error="true" */
  rejectPath(path: string): void {
    this.rejectedPaths.add(path);
  }

  /** The next `count` replies go out with their XML cut in half */
  corruptNextReplies(count: number = 1): void {
    this.corruptReplies = count;
  }

  clearFaults(): void {
    this.replyDelayMs = 0;
    this.pathDelays.clear();
    this.droppedPaths.clear();
    this.rejectedPaths.clear();
    this.corruptReplies = 0;
  }

  // !=============================================================================
  // ! Pushing data to the client
  // !=============================================================================

  /**
   * Sends a notification for `path`. Without a value it only announces
   * that the attribute changed.
   */
  async notify(path: string, value?: AttributeValue): Promise<void> {
    const message: Message =
      value === undefined
        ? { kind: 'notification', token: UNSOLICITED_TOKEN, path }
        : { kind: 'notification', token: UNSOLICITED_TOKEN, path, value };
    await this.write(encodeMessage(message, { maxFrameSize: this.maxFrameSize }));
  }

  /**
   * Changes a value on the device and announces it with the new value.
   */
  async pushValue<K extends StoredAttributeId>(id: K, value: AttributeValueMap[K]): Promise<void> {
    const path = ATTRIBUTES[id].getPath;
    if (!path) {
      throw new HeadsetError(`${id} has no path to notify on`);
    }
    this.setValue(id, value);
    await this.notify(path, value);
  }

  /** Sends a reply carrying an arbitrary token, as a late or stray answer would */
  async sendReply(reply: Omit<ReplyMessage, 'kind'>): Promise<void> {
    const message: Message = { kind: 'reply', ...reply };
    await this.write(encodeMessage(message, { maxFrameSize: this.maxFrameSize }));
  }

  /** Writes bytes as they are, framed or not */
  async sendRaw(bytes: Uint8Array): Promise<void> {
    await this.write(bytes);
  }

  // !=============================================================================
  // ! Serving
  // !=============================================================================

  private async serve(stream: ByteStream): Promise<void> {
    try {
      for (;;) {
        const chunk = await stream.read();
        if (chunk === null) break;
        for (const event of this.framer.push(chunk)) {
          if (event.kind === 'error') {
            this.logger.warn('Framing error', { reason: event.error.message });
            continue;
          }
          this.handleFrame(event.frame);
        }
      }
    } catch (err: unknown) {
      this.logger.warn(`Read failed: ${errorMessage(err)}`);
    } finally {
      this.stream = null;
    }
  }

  private handleFrame(frame: Frame): void {
    if (frame.type === FrameType.HANDSHAKE) {
      this.handshakes++;
      if (this.answerHandshake) this.track(this.write(HANDSHAKE_FRAME));
      return;
    }

    let message: Message;
    try {
      message = decodeMessage(frame);
    } catch (err: unknown) {
      if (!(err instanceof DecodingError)) throw err;
      this.logger.warn(`Undecodable request: ${err.message}`);
      return;
    }

    if (message.kind !== 'query' && message.kind !== 'command') {
      this.logger.warn(`Unexpected ${describeMessage(message)}`);
      return;
    }

    this.received.push(message);
    this.logger.debug(`Received ${describeMessage(message)}`);
    this.track(this.respond(message));
  }

  private async respond(message: RequestMessage): Promise<void> {
    const reply = this.process(message);
    if (this.droppedPaths.has(message.path)) {
      this.logger.info('Dropping reply', { path: message.path });
      return;
    }

    const wait = this.pathDelays.get(message.path) ?? this.replyDelayMs;
    if (wait > 0) await delay(wait);

    const frame = encodeMessage(reply, { maxFrameSize: this.maxFrameSize });
    if (this.corruptReplies > 0) {
      this.corruptReplies--;
      await this.write(truncateReply(frame));
      return;
    }
    await this.write(frame);
  }

  private process(message: RequestMessage): ReplyMessage {
    const { token, path } = message;
    if (this.rejectedPaths.has(path)) {
      return { kind: 'reply', token, path, error: true };
    }

    const match = findAttributeByPath(path);
    if (!match) {
      return { kind: 'reply', token, path, error: true };
    }
    const id = match.definition.id;

    if (message.kind === 'query') {
      return { kind: 'reply', token, path, value: this.readValue(id), error: false };
    }

    this.applyCommand(id, message.value);
    return this.echoCommandValues
      ? { kind: 'reply', token, path, value: message.value, error: false }
      : { kind: 'reply', token, path, error: false };
  }

  private readValue(id: AttributeId): AttributeValue {
    if (id === 'equalizerEnabled') return this.state.equalizer.enabled;
    if (id === 'equalizerPreset') return this.state.equalizer.presetId;
    return this.state[id];
  }

  private applyCommand(id: AttributeId, value: AttributeValue): void {
    if (id === 'equalizerEnabled') {
      const enabled = ATTRIBUTES.equalizerEnabled.validate(value);
      this.state.equalizer = { ...this.state.equalizer, enabled };
    } else if (id === 'equalizerPreset') {
      const presetId = ATTRIBUTES.equalizerPreset.validate(value);
      this.state.equalizer = { ...this.state.equalizer, presetId };
    } else {
      this.assign(id, value);
    }
    this.logger.info(`${id} set to ${JSON.stringify(value)}`);
  }

  private assign<K extends StoredAttributeId>(id: K, value: unknown): void {
    this.state[id] = ATTRIBUTES[id].validate(value);
  }

  private track(task: Promise<void>): void {
    const tracked: Promise<void> = task
      .catch((err: unknown) => {
        this.logger.error(`Failed to answer: ${errorMessage(err)}`);
      })
      .finally(() => {
        this.tasks.delete(tracked);
      });
    this.tasks.add(tracked);
  }

  private async write(data: Uint8Array): Promise<void> {
    const release = await this._mutex.acquire();
    try {
      const { stream } = this;
      if (!stream) {
        throw new HeadsetError('Emulator is not attached');
      }
      await stream.write(data);
    } finally {
      release();
    }
  }
}

/**
 * Same reply with the XML text cut in half; decoding it fails.
 */
function truncateReply(frame: Uint8Array): Uint8Array {
  const payload = frame.subarray(FRAME_HEADER_SIZE);
  const textLength = payload.length - DATA_HEADER_SIZE;
  return buildFrame(
    FrameType.DATA,
    payload.subarray(0, DATA_HEADER_SIZE + Math.floor(textLength / 2))
  );
}

export { HeadsetEmulator };
export default HeadsetEmulator;
