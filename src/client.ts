// src/client.ts

import { Mutex } from 'async-mutex';
import { ATTRIBUTES, READABLE_ATTRIBUTES, findAttributeByPath } from './attributes/index.js';
import { DeviceStateCache } from './cache/device-state-cache.js';
import type { CacheSnapshot } from './cache/device-state-cache.js';
import { DEFAULTS } from './constants/constants.js';
import { RequestCorrelator } from './correlator/request-correlator.js';
import {
  AlreadyConnectedError,
  DecodingError,
  EncodingError,
  HeadsetConfigError,
  HeadsetError,
  NotConnectedError,
  RequestCancelledError,
  RequestTimedOutError,
  TransportLostError,
} from './errors.js';
import { headsetLogger } from './logger.js';
import { TransportSession } from './transport/session.js';
import type {
  AttributeId,
  AttributeValueMap,
  BatteryStatus,
  ByteStream,
  CachedAttribute,
  DiagnosticsStats,
  EqualizerPreset,
  EqualizerState,
  HeadsetClientOptions,
  HeadsetNotification,
  LogLevel,
  NotificationHandler,
  ReadOptions,
  RefreshResult,
  SendOptions,
  SessionState,
  SessionStateHandler,
  TransportLostHandler,
  UnsolicitedMessage,
} from './types/headset-types.js';
import { Diagnostics } from './utils/diagnostics.js';

const logger = headsetLogger.createLogger('HeadsetClient');

/** Set-only attributes whose effect shows up in the equalizer state */
const EQUALIZER_PARTS = new Set<AttributeId>(['equalizerEnabled', 'equalizerPreset']);

/** One query shared by every concurrent reader of an attribute */
interface InflightQuery {
  promise: Promise<void>;
  controller: AbortController;
  /** Readers still waiting for it; the query is aborted when this drops to 0 */
  waiting: number;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Typed control surface of one headset.
 *
 * Getters answer from the cache while the value is fresh and query the
 * device otherwise. Setters send a command and cache the value the device
 * confirmed. Every method may be called concurrently.
 */
class HeadsetClient {
  private session: TransportSession | null = null;
  private correlator: RequestCorrelator | null = null;
  private readonly cache: DeviceStateCache;
  private readonly diagnostics: Diagnostics | null;
  private readonly options: HeadsetClientOptions;
  private readonly queryRetries: number;
  private readonly syncOnConnect: boolean;
  private readonly refreshOnNotify: boolean;
  private readonly now: () => number;

  private readonly inflightQueries = new Map<AttributeId, InflightQuery>();
  private readonly subscribers = new Set<NotificationHandler>();
  private sessionStateHandler: SessionStateHandler | null = null;
  private transportLostHandler: TransportLostHandler | null = null;
  private _mutex: Mutex;

  constructor(options: HeadsetClientOptions = {}) {
    const queryRetries = options.queryRetries ?? DEFAULTS.QUERY_RETRIES;
    if (!Number.isInteger(queryRetries) || queryRetries < 0) {
      throw new HeadsetConfigError(
        `queryRetries must be a non-negative integer, got ${queryRetries}`
      );
    }
    const requestTimeoutMs = options.requestTimeoutMs ?? DEFAULTS.REQUEST_TIMEOUT_MS;
    if (!(requestTimeoutMs > 0)) {
      throw new HeadsetConfigError(`requestTimeoutMs must be positive, got ${requestTimeoutMs}`);
    }

    this.options = { ...options, requestTimeoutMs };
    this.queryRetries = queryRetries;
    this.syncOnConnect = options.syncOnConnect ?? DEFAULTS.SYNC_ON_CONNECT;
    this.refreshOnNotify = options.refreshOnNotify ?? DEFAULTS.REFRESH_ON_NOTIFY;
    this.now = options.now ?? Date.now;
    this.cache = new DeviceStateCache({
      stalenessWindowMs: options.stalenessWindowMs,
      stalenessOverrides: options.stalenessOverrides,
      now: this.now,
    });
    this.diagnostics =
      (options.diagnostics ?? DEFAULTS.DIAGNOSTICS)
        ? new Diagnostics({ loggerName: 'HeadsetDiagnostics' })
        : null;
    this._mutex = new Mutex();

    if (options.logLevel) this.enableLogger(options.logLevel);
  }

  /**
   * Raises the library's log output to the given level
   */
  enableLogger(level: LogLevel = 'info'): void {
    headsetLogger.setLevel(level);
  }

  /**
   * Back to errors only
   */
  disableLogger(): void {
    headsetLogger.setLevel('error');
  }

  /** Session state; `closed` when no session was ever opened */
  get state(): SessionState {
    return this.session?.state ?? 'closed';
  }

  // !=============================================================================
  // ! Lifecycle
  // !=============================================================================

  /**
   * Opens a session over an already-connected stream and, unless disabled,
   * reads every attribute once. Failures of that first read are logged.
   * @throws AlreadyConnectedError while a previous session is still open
   * @throws HandshakeError when the device does not answer the handshake
   */
  async connect(stream: ByteStream): Promise<void> {
    const release = await this._mutex.acquire();
    try {
      if (this.session && this.session.state !== 'closed') {
        throw new AlreadyConnectedError();
      }

      this.cache.clear();
      const session = new TransportSession(stream, {
        maxFrameSize: this.options.maxFrameSize,
        handshakeTimeoutMs: this.options.handshakeTimeoutMs,
      });
      session.setStateHandler((state, previous) => this.handleSessionState(state, previous));
      session.setTransportLostHandler(error => this.handleTransportLost(error));
      session.setFrameErrorHandler(error => this.diagnostics?.recordFrameError(error));

      const correlator = new RequestCorrelator(
        session,
        {
          requestTimeoutMs: this.options.requestTimeoutMs,
          maxFrameSize: this.options.maxFrameSize,
          now: this.now,
        },
        this.diagnostics
      );
      correlator.setUnsolicitedHandler((message, receivedAt) =>
        this.handleUnsolicited(message, receivedAt)
      );

      this.session = session;
      this.correlator = correlator;

      await session.open();
      correlator.start();
      logger.info('Connected to headset');
    } finally {
      release();
    }

    if (this.syncOnConnect) {
      const { failed } = await this.refresh();
      for (const { id, error } of failed) {
        logger.warn(`Initial read of ${id} failed: ${error.message}`);
      }
    }
  }

  /**
   * Closes the session. Requests still in flight fail with `SessionClosedError`.
   */
  async disconnect(): Promise<void> {
    const release = await this._mutex.acquire();
    try {
      const { session, correlator } = this;
      if (!session) return;
      await session.close();
      if (correlator) await correlator.stop();
      logger.info('Disconnected from headset');
    } finally {
      release();
    }
  }

  setSessionStateHandler(handler: SessionStateHandler | null): void {
    this.sessionStateHandler = handler;
  }

  setTransportLostHandler(handler: TransportLostHandler | null): void {
    this.transportLostHandler = handler;
  }

  /**
   * Registers a handler for device notifications and unmatched replies.
   * @returns Function removing the handler
   */
  subscribe(handler: NotificationHandler): () => void {
    this.subscribers.add(handler);
    return () => {
      this.subscribers.delete(handler);
    };
  }

  getDiagnostics(): DiagnosticsStats | null {
    return this.diagnostics?.getStats() ?? null;
  }

  /** Cached entry without any I/O */
  getCached<K extends AttributeId>(id: K): CachedAttribute<AttributeValueMap[K]> | undefined {
    return this.cache.read(id);
  }

  getStateSnapshot(): CacheSnapshot {
    return this.cache.snapshot();
  }

  /**
   * Queries every readable attribute, bypassing the cache.
   */
  async refresh(options: SendOptions = {}): Promise<RefreshResult> {
    const results = await Promise.allSettled(
      READABLE_ATTRIBUTES.map(id => this.queryAttribute(id, options))
    );

    const result: RefreshResult = { refreshed: [], failed: [] };
    results.forEach((outcome, index) => {
      const id = READABLE_ATTRIBUTES[index];
      if (id === undefined) return;
      if (outcome.status === 'fulfilled') {
        result.refreshed.push(id);
      } else {
        const { reason } = outcome;
        const error = reason instanceof Error ? reason : new HeadsetError(String(reason));
        result.failed.push({ id, error });
      }
    });
    return result;
  }

  // !=============================================================================
  // ! Getters
  // !=============================================================================

  getBattery(options?: ReadOptions): Promise<BatteryStatus> {
    return this.read('battery', options);
  }

  /**
   * Battery percentage; null while charging or while the device is estimating
   */
  async getBatteryLevel(options?: ReadOptions): Promise<number | null> {
    const battery = await this.read('battery', options);
    return battery.level;
  }

  getSoftwareVersion(options?: ReadOptions): Promise<string> {
    return this.read('softwareVersion', options);
  }

  getDeviceType(options?: ReadOptions): Promise<number> {
    return this.read('deviceType', options);
  }

  getNoiseCancellation(options?: ReadOptions): Promise<boolean> {
    return this.read('noiseCancellation', options);
  }

  getSpecificMode(options?: ReadOptions): Promise<boolean> {
    return this.read('specificMode', options);
  }

  getHeadDetection(options?: ReadOptions): Promise<boolean> {
    return this.read('headDetection', options);
  }

  getAutoConnection(options?: ReadOptions): Promise<boolean> {
    return this.read('autoConnection', options);
  }

  getEqualizer(options?: ReadOptions): Promise<EqualizerState> {
    return this.read('equalizer', options);
  }

  getEqualizerPresets(options?: ReadOptions): Promise<EqualizerPreset[]> {
    return this.read('equalizerPresets', options);
  }

  // !=============================================================================
  // ! Setters
  // !=============================================================================

  setNoiseCancellation(enabled: boolean, options?: SendOptions): Promise<void> {
    return this.write('noiseCancellation', enabled, options);
  }

  setSpecificMode(enabled: boolean, options?: SendOptions): Promise<void> {
    return this.write('specificMode', enabled, options);
  }

  setHeadDetection(enabled: boolean, options?: SendOptions): Promise<void> {
    return this.write('headDetection', enabled, options);
  }

  setAutoConnection(enabled: boolean, options?: SendOptions): Promise<void> {
    return this.write('autoConnection', enabled, options);
  }

  setEqualizerEnabled(enabled: boolean, options?: SendOptions): Promise<void> {
    return this.write('equalizerEnabled', enabled, options);
  }

  /**
   * @param presetId - Preset id, 0-31
   * @throws EncodingError for ids outside that range
   */
  setEqualizerPreset(presetId: number, options?: SendOptions): Promise<void> {
    return this.write('equalizerPreset', presetId, options);
  }

  // !=============================================================================
  // ! Internals
  // !=============================================================================

  private requireCorrelator(): RequestCorrelator {
    if (!this.correlator || !this.session?.isReady) {
      throw new NotConnectedError(this.state);
    }
    return this.correlator;
  }

  private async read<K extends AttributeId>(
    id: K,
    options: ReadOptions = {}
  ): Promise<AttributeValueMap[K]> {
    if (!options.forceRefresh) {
      const cached = this.cache.fresh(id);
      if (cached !== undefined) return cached;
    }

    await this.queryAttribute(id, options);
    const entry = this.cache.read(id);
    if (!entry) {
      throw new DecodingError(`Device reply for ${id} carried no value`);
    }
    return entry.value;
  }

  /**
   * Queries one attribute. Concurrent callers share the request started by
   * the first one, sent with that caller's timeout. Each caller's signal
   * only ends its own wait; the request itself is aborted once every
   * waiting caller has cancelled.
   */
  private queryAttribute(id: AttributeId, options: SendOptions = {}): Promise<void> {
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new RequestCancelledError(0, ATTRIBUTES[id].getPath ?? id));
    }

    let inflight = this.inflightQueries.get(id);
    if (!inflight) {
      const controller = new AbortController();
      const promise = this.queryWithRetry(id, {
        timeoutMs: options.timeoutMs,
        signal: controller.signal,
      }).finally(() => {
        if (this.inflightQueries.get(id)?.controller === controller) {
          this.inflightQueries.delete(id);
        }
      });
      inflight = { promise, controller, waiting: 0 };
      this.inflightQueries.set(id, inflight);
    }
    return this.joinQuery(id, inflight, signal);
  }

  private joinQuery(id: AttributeId, query: InflightQuery, signal?: AbortSignal): Promise<void> {
    query.waiting++;
    if (!signal) return query.promise;

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        query.waiting--;
        if (query.waiting === 0) {
          if (this.inflightQueries.get(id) === query) this.inflightQueries.delete(id);
          query.controller.abort();
        }
        reject(new RequestCancelledError(0, ATTRIBUTES[id].getPath ?? id));
      };
      signal.addEventListener('abort', onAbort, { once: true });

      void query.promise.then(
        () => {
          signal.removeEventListener('abort', onAbort);
          resolve();
        },
        (err: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(err);
        }
      );
    });
  }

  private async queryWithRetry(id: AttributeId, options: SendOptions): Promise<void> {
    const path = ATTRIBUTES[id].getPath;
    if (!path) {
      throw new EncodingError(`${id} cannot be queried`);
    }

    for (let attempt = 0; ; attempt++) {
      try {
        const { reply, createdAt } = await this.requireCorrelator().request(
          { kind: 'query', path },
          options
        );
        if (reply.value === undefined) {
          throw new DecodingError(`Reply to ${path} carried no value`);
        }
        this.applyValue(id, reply.value, createdAt);
        return;
      } catch (err: unknown) {
        if (err instanceof RequestTimedOutError && attempt < this.queryRetries) {
          logger.warn(`Query timed out, retry ${attempt + 1}/${this.queryRetries}`, { path });
          continue;
        }
        throw err;
      }
    }
  }

  private async write<K extends AttributeId>(
    id: K,
    value: AttributeValueMap[K],
    options: SendOptions = {}
  ): Promise<void> {
    const path = ATTRIBUTES[id].setPath;
    if (!path) {
      throw new EncodingError(`${id} cannot be set`);
    }

    const { reply, createdAt } = await this.requireCorrelator().request(
      { kind: 'command', path, value },
      options
    );
    this.applyValue(id, reply.value ?? value, createdAt);
    logger.info('Command accepted', { path });
  }

  /**
   * Stores a confirmed value. The set-only equalizer parts patch the
   * cached equalizer state; with no equalizer cached yet they are kept on
   * their own and merged into the next equalizer value.
   */
  private applyValue(id: AttributeId, value: unknown, timestamp: number): void {
    if (id === 'equalizer') {
      this.storeEqualizer(ATTRIBUTES.equalizer.validate(value), timestamp);
    } else if (EQUALIZER_PARTS.has(id)) {
      this.patchEqualizer(id, value, timestamp);
    } else {
      this.store(id, value, timestamp);
    }
  }

  private store<K extends AttributeId>(id: K, value: unknown, timestamp: number): void {
    const applied = this.cache.update(id, ATTRIBUTES[id].validate(value), timestamp);
    if (!applied) {
      logger.debug(`Ignoring ${id} update older than the cached value`);
    }
  }

  /**
   * Parts confirmed no earlier than `timestamp` win over the reported state.
   */
  private storeEqualizer(reported: EqualizerState, timestamp: number): void {
    const enabled = this.cache.read('equalizerEnabled');
    const preset = this.cache.read('equalizerPreset');
    const next: EqualizerState = {
      enabled: enabled && enabled.updatedAt >= timestamp ? enabled.value : reported.enabled,
      presetId: preset && preset.updatedAt >= timestamp ? preset.value : reported.presetId,
    };
    if (this.cache.update('equalizer', next, timestamp)) {
      this.cache.remove('equalizerEnabled');
      this.cache.remove('equalizerPreset');
    } else {
      logger.debug('Ignoring equalizer update older than the cached value');
    }
  }

  private patchEqualizer(id: AttributeId, value: unknown, timestamp: number): void {
    const current = this.cache.read('equalizer');
    if (id === 'equalizerEnabled') {
      const enabled = ATTRIBUTES.equalizerEnabled.validate(value);
      if (current) this.cache.update('equalizer', { ...current.value, enabled }, timestamp);
      else this.cache.update('equalizerEnabled', enabled, timestamp);
    } else {
      const presetId = ATTRIBUTES.equalizerPreset.validate(value);
      if (current) this.cache.update('equalizer', { ...current.value, presetId }, timestamp);
      else this.cache.update('equalizerPreset', presetId, timestamp);
    }
  }

  /** Attribute to query when `id` is reported changed without a value */
  private readableFor(id: AttributeId): AttributeId | null {
    if (EQUALIZER_PARTS.has(id)) return 'equalizer';
    return ATTRIBUTES[id].getPath ? id : null;
  }

  private handleUnsolicited(message: UnsolicitedMessage, receivedAt: number): void {
    const match = findAttributeByPath(message.path);
    const attribute = match ? match.definition.id : null;

    if (attribute) {
      if (message.value !== undefined) {
        try {
          this.applyValue(attribute, message.value, receivedAt);
        } catch (err: unknown) {
          logger.warn(`Ignoring ${attribute} value: ${errorMessage(err)}`, { path: message.path });
        }
      } else {
        const readable = this.readableFor(attribute);
        if (readable) {
          this.cache.invalidate(readable);
          if (this.refreshOnNotify && message.kind === 'notification') {
            this.refreshInBackground(readable);
          }
        }
      }
    }

    const notification: HeadsetNotification = {
      path: message.path,
      attribute,
      source: message.kind,
      receivedAt,
    };
    if (message.value !== undefined) notification.value = message.value;

    for (const handler of this.subscribers) {
      try {
        handler(notification);
      } catch (err: unknown) {
        logger.error(`Notification handler failed: ${errorMessage(err)}`, { path: message.path });
      }
    }
  }

  private refreshInBackground(id: AttributeId): void {
    void this.queryAttribute(id).catch((err: unknown) => {
      logger.warn(`Refresh of ${id} after notification failed: ${errorMessage(err)}`);
    });
  }

  private handleSessionState(state: SessionState, previous: SessionState): void {
    logger.debug(`Session ${previous} → ${state}`);
    this.sessionStateHandler?.(state, previous);
  }

  private handleTransportLost(error: TransportLostError): void {
    logger.error(`Transport lost: ${error.message}`);
    this.transportLostHandler?.(error);
  }
}

export { HeadsetClient };
export default HeadsetClient;
