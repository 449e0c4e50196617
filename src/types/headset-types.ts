// src/types/headset-types.ts

import type { FrameType } from '../constants/constants.js';
import type { HeadsetError, TransportLostError } from '../errors.js';

// !=============================================================================
// ! Device attribute values
// !=============================================================================

export type BatteryState = 'in_use' | 'charging' | 'calculating';

/** Battery report. `level` is null while charging or while the device is still estimating. */
export interface BatteryStatus {
  state: BatteryState;
  level: number | null;
}

export interface EqualizerState {
  enabled: boolean;
  presetId: number;
}

export interface EqualizerPreset {
  id: number;
  name: string;
}

/** Value type of every attribute, keyed by attribute id */
export interface AttributeValueMap {
  battery: BatteryStatus;
  softwareVersion: string;
  deviceType: number;
  noiseCancellation: boolean;
  specificMode: boolean;
  headDetection: boolean;
  autoConnection: boolean;
  equalizer: EqualizerState;
  equalizerEnabled: boolean;
  equalizerPreset: number;
  equalizerPresets: EqualizerPreset[];
}

export type AttributeId = keyof AttributeValueMap;
export type AttributeValue = AttributeValueMap[AttributeId];

// !=============================================================================
// ! Frames and messages
// !=============================================================================

/** One complete unit taken off the wire. Never partial. */
export interface Frame {
  type: FrameType;
  payload: Uint8Array;
}

export type MessageKind = 'query' | 'command' | 'reply' | 'notification';

export interface QueryMessage {
  kind: 'query';
  token: number;
  path: string;
}

export interface CommandMessage {
  kind: 'command';
  token: number;
  path: string;
  value: AttributeValue;
}

export interface ReplyMessage {
  kind: 'reply';
  token: number;
  path: string;
  /** Present when the answer body carries the attribute */
  value?: AttributeValue;
  /** Device refused the request */
  error: boolean;
}

export interface NotificationMessage {
  kind: 'notification';
  token: number;
  path: string;
  value?: AttributeValue;
}

export type Message = QueryMessage | CommandMessage | ReplyMessage | NotificationMessage;

/** A request before the correlator assigns its token */
export type OutgoingMessage = Omit<QueryMessage, 'token'> | Omit<CommandMessage, 'token'>;

export type UnsolicitedMessage = ReplyMessage | NotificationMessage;

// !=============================================================================
// ! Transport
// !=============================================================================

/**
 * Already-open bidirectional byte stream to the headset.
 * `read` resolves with null once the stream has ended.
 */
export interface ByteStream {
  read(): Promise<Uint8Array | null>;
  write(data: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

export type SessionState = 'connecting' | 'ready' | 'draining' | 'closed';

export type SessionStateHandler = (state: SessionState, previous: SessionState) => void;

export type TransportLostHandler = (error: TransportLostError) => void;

export type FrameErrorHandler = (error: HeadsetError) => void;

export interface SessionOptions {
  /** Largest frame accepted from the wire, header included */
  maxFrameSize?: number;
  /** How long to wait for the handshake acknowledgement */
  handshakeTimeoutMs?: number;
}

/** Options for serial streams (RFCOMM ports show up as serial devices) */
export interface SerialStreamOptions {
  baudRate?: number;
  dataBits?: 5 | 6 | 7 | 8;
  stopBits?: 1 | 2;
  parity?: 'none' | 'even' | 'mark' | 'odd' | 'space';
}

// !=============================================================================
// ! Correlator, cache, client
// !=============================================================================

export interface SendOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface CorrelatorOptions {
  requestTimeoutMs?: number;
  maxFrameSize?: number;
  now?: () => number;
}

export type UnsolicitedHandler = (message: UnsolicitedMessage, receivedAt: number) => void;

export type DecodeErrorHandler = (error: HeadsetError, frame: Frame) => void;

export type Freshness = 'fresh' | 'stale';

export interface CachedAttribute<T> {
  value: T;
  updatedAt: number;
  freshness: Freshness;
}

export interface DeviceStateCacheOptions {
  stalenessWindowMs?: number;
  /** Per-attribute staleness windows */
  stalenessOverrides?: Partial<Record<AttributeId, number>>;
  now?: () => number;
}

export interface ReadOptions extends SendOptions {
  /** Skip the cache and always query the device */
  forceRefresh?: boolean;
}

export interface HeadsetNotification {
  path: string;
  attribute: AttributeId | null;
  value?: AttributeValue;
  /** 'reply' for answers nobody was waiting for */
  source: 'notification' | 'reply';
  receivedAt: number;
}

export type NotificationHandler = (notification: HeadsetNotification) => void;

export interface RefreshResult {
  refreshed: AttributeId[];
  failed: { id: AttributeId; error: Error }[];
}

export interface HeadsetClientOptions extends SessionOptions {
  requestTimeoutMs?: number;
  stalenessWindowMs?: number;
  stalenessOverrides?: Partial<Record<AttributeId, number>>;
  /** Retries for queries that time out. Commands are never retried. */
  queryRetries?: number;
  /** Query every readable attribute once the session is ready */
  syncOnConnect?: boolean;
  /** Re-query an attribute when the device announces it changed */
  refreshOnNotify?: boolean;
  /** Enables request/response statistics */
  diagnostics?: boolean;
  logLevel?: LogLevel;
  now?: () => number;
}

// !=============================================================================
// ! Logger
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Context printed in the log header */
export interface LogContext {
  token?: number;
  path?: string;
  kind?: string;
  responseTime?: number;
  logger?: string;
  [key: string]: string | number | boolean | undefined;
}

export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(lvl: LogLevel): void;
  pause(): void;
  resume(): void;
}

// !=============================================================================
// ! Diagnostics
// !=============================================================================

export interface DiagnosticsOptions {
  loggerName?: string;
}

export interface DiagnosticsStats {
  uptimeSeconds: number;
  totalRequests: number;
  successfulResponses: number;
  errorResponses: number;
  timeouts: number;
  cancellations: number;
  rejections: number;
  decodeErrors: number;
  frameErrors: number;
  unsolicitedMessages: number;
  averageResponseTime: number | null;
  minResponseTime: number | null;
  maxResponseTime: number | null;
  lastResponseTime: number | null;
  totalDataSent: number;
  totalDataReceived: number;
  requestsByPath: Record<string, number>;
  lastErrorMessage: string | null;
  lastErrors: string[];
}
