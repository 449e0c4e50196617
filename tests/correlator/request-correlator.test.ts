// tests/correlator/request-correlator.test.ts

import { afterEach, describe, expect, it } from 'vitest';
import {
  API_PATHS,
  FrameType,
  HANDSHAKE_FRAME,
  MessageKindCode,
} from '../../src/constants/constants.js';
import { encodeMessage } from '../../src/codec/message-codec.js';
import { RequestCorrelator } from '../../src/correlator/request-correlator.js';
import {
  DecodingError,
  DeviceRejectedError,
  EncodingError,
  HeadsetError,
  NotConnectedError,
  RequestCancelledError,
  RequestTimedOutError,
  SessionClosedError,
} from '../../src/errors.js';
import { buildFrame } from '../../src/framers/headset-framer.js';
import { HeadsetEmulator } from '../../src/headset-emulator/headset-emulator.js';
import {
  createMemoryStreamPair,
  type MemoryByteStream,
} from '../../src/headset-emulator/memory-stream.js';
import { TransportSession } from '../../src/transport/session.js';
import type {
  CorrelatorOptions,
  ReplyMessage,
  UnsolicitedMessage,
} from '../../src/types/headset-types.js';
import { Diagnostics } from '../../src/utils/diagnostics.js';
import { waitFor, wireFrame } from '../helpers.js';

interface Harness {
  session: TransportSession;
  correlator: RequestCorrelator;
  emulator: HeadsetEmulator;
  diagnostics: Diagnostics;
}

const harnesses: Harness[] = [];

async function setup(options: CorrelatorOptions = {}): Promise<Harness> {
  const { client, device } = createMemoryStreamPair();
  const emulator = new HeadsetEmulator();
  emulator.attach(device);
  const session = new TransportSession(client);
  await session.open();
  const diagnostics = new Diagnostics();
  const correlator = new RequestCorrelator(session, options, diagnostics);
  correlator.start();
  const harness = { session, correlator, emulator, diagnostics };
  harnesses.push(harness);
  return harness;
}

describe('RequestCorrelator', () => {
  afterEach(async () => {
    for (const { session, correlator, emulator } of harnesses.splice(0)) {
      await session.close();
      await correlator.stop();
      await emulator.detach();
    }
  });

  it('resolves a query with the matching reply', async () => {
    const { correlator, diagnostics } = await setup();

    const reply = await correlator.send({ kind: 'query', path: API_PATHS.BATTERY_GET });

    expect(reply).toEqual({
      kind: 'reply',
      token: 1,
      path: API_PATHS.BATTERY_GET,
      value: { state: 'in_use', level: 80 },
      error: false,
    });
    expect(correlator.pendingCount).toBe(0);
    expect(diagnostics.getStats().successfulResponses).toBe(1);
  });

  it('gives concurrent requests distinct tokens', async () => {
    const { correlator, emulator } = await setup();

    const replies = await Promise.all([
      correlator.send({ kind: 'query', path: API_PATHS.SOFTWARE_VERSION_GET }),
      correlator.send({ kind: 'query', path: API_PATHS.DEVICE_TYPE_GET }),
      correlator.send({ kind: 'command', path: API_PATHS.SPECIFIC_MODE_SET, value: true }),
    ]);

    expect(replies.map(r => r.token)).toEqual([1, 2, 3]);
    expect(replies.map(r => r.value)).toEqual(['1.0.0', 1, true]);
    expect(emulator.received.map(m => m.token)).toEqual([1, 2, 3]);
  });

  it('matches replies that arrive out of order', async () => {
    const { correlator, emulator } = await setup();
    emulator.setReplyDelay(40, API_PATHS.BATTERY_GET);
    const completed: string[] = [];

    await Promise.all([
      correlator
        .send({ kind: 'query', path: API_PATHS.BATTERY_GET })
        .then(reply => completed.push(reply.path)),
      correlator
        .send({ kind: 'query', path: API_PATHS.HEAD_DETECTION_GET })
        .then(reply => completed.push(reply.path)),
    ]);

    expect(completed).toEqual([API_PATHS.HEAD_DETECTION_GET, API_PATHS.BATTERY_GET]);
  });

  it('times out and hands a late reply to the unsolicited handler', async () => {
    const { correlator, emulator, diagnostics } = await setup();
    const unsolicited: UnsolicitedMessage[] = [];
    correlator.setUnsolicitedHandler(message => unsolicited.push(message));
    emulator.dropReplies(API_PATHS.NOISE_CANCELLATION_GET);

    await expect(
      correlator.send({ kind: 'query', path: API_PATHS.NOISE_CANCELLATION_GET }, { timeoutMs: 20 })
    ).rejects.toThrow(new RequestTimedOutError(1, API_PATHS.NOISE_CANCELLATION_GET, 20));
    expect(correlator.pendingCount).toBe(0);
    expect(diagnostics.getStats().timeouts).toBe(1);

    await emulator.sendReply({
      token: 1,
      path: API_PATHS.NOISE_CANCELLATION_GET,
      value: true,
      error: false,
    });
    await waitFor(() => unsolicited.length === 1);
    expect(unsolicited[0]).toEqual({
      kind: 'reply',
      token: 1,
      path: API_PATHS.NOISE_CANCELLATION_GET,
      value: true,
      error: false,
    });
  });

  it('surfaces a device refusal', async () => {
    const { correlator, emulator } = await setup();
    emulator.rejectPath(API_PATHS.AUTO_CONNECTION_SET);

    await expect(
      correlator.send({ kind: 'command', path: API_PATHS.AUTO_CONNECTION_SET, value: false })
    ).rejects.toBeInstanceOf(DeviceRejectedError);
  });

  it('cancels a request through its signal', async () => {
    const { correlator, emulator } = await setup();
    emulator.dropReplies(API_PATHS.EQUALIZER_GET);
    const controller = new AbortController();

    const pending = correlator.send(
      { kind: 'query', path: API_PATHS.EQUALIZER_GET },
      { signal: controller.signal }
    );
    expect(correlator.hasPending(1)).toBe(true);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(RequestCancelledError);
    expect(correlator.hasPending(1)).toBe(false);
  });

  it('does not send a request whose signal is already aborted', async () => {
    const { correlator, emulator } = await setup();
    const controller = new AbortController();
    controller.abort();

    await expect(
      correlator.send({ kind: 'query', path: API_PATHS.BATTERY_GET }, { signal: controller.signal })
    ).rejects.toBeInstanceOf(RequestCancelledError);
    expect(correlator.pendingCount).toBe(0);
    expect(emulator.received).toEqual([]);
  });

  it('does not register a request it cannot encode', async () => {
    const { correlator } = await setup();

    await expect(
      correlator.send({ kind: 'command', path: API_PATHS.EQUALIZER_PRESET_SET, value: 99 })
    ).rejects.toBeInstanceOf(EncodingError);
    expect(correlator.pendingCount).toBe(0);
  });

  it('fails pending requests when the session closes and refuses new ones', async () => {
    const { session, correlator, emulator } = await setup();
    emulator.dropReplies(API_PATHS.BATTERY_GET);

    const pending = correlator.send({ kind: 'query', path: API_PATHS.BATTERY_GET });
    const closed = expect(pending).rejects.toBeInstanceOf(SessionClosedError);
    await session.close();

    await closed;
    await expect(
      correlator.send({ kind: 'query', path: API_PATHS.BATTERY_GET })
    ).rejects.toBeInstanceOf(NotConnectedError);
    expect(correlator.pendingCount).toBe(0);
  });

  it('drops one undecodable frame and keeps the ones around it in order', async () => {
    const { correlator, emulator, diagnostics } = await setup();
    const unsolicited: UnsolicitedMessage[] = [];
    const decodeErrors: HeadsetError[] = [];
    correlator.setUnsolicitedHandler(message => unsolicited.push(message));
    correlator.setDecodeErrorHandler(error => decodeErrors.push(error));

    const notify = (enabled: boolean): Uint8Array =>
      wireFrame(
        MessageKindCode.NOTIFICATION,
        0,
        `<notify path="${API_PATHS.HEAD_DETECTION_GET}"><system>` +
          `<head_detection enabled="${String(enabled)}"/></system></notify>`
      );

    await emulator.sendRaw(notify(true));
    await emulator.sendRaw(buildFrame(FrameType.DATA, Uint8Array.of(0x03, 0x00, 0x05, 0x3c)));
    await emulator.sendRaw(notify(false));

    await waitFor(() => unsolicited.length === 2);
    expect(unsolicited.map(m => m.value)).toEqual([true, false]);
    expect(decodeErrors).toHaveLength(1);
    expect(decodeErrors[0]).toBeInstanceOf(DecodingError);
    expect(diagnostics.getStats().decodeErrors).toBe(1);
  });

  it('routes notifications to the unsolicited handler', async () => {
    const { correlator, emulator } = await setup();
    const received: UnsolicitedMessage[] = [];
    correlator.setUnsolicitedHandler(message => received.push(message));

    await emulator.notify(API_PATHS.SPECIFIC_MODE_GET, true);
    await waitFor(() => received.length === 1);

    expect(received[0]).toEqual({
      kind: 'notification',
      token: 0,
      path: API_PATHS.SPECIFIC_MODE_GET,
      value: true,
    });
  });

  it('uses the configured timeout by default', async () => {
    const { correlator, emulator } = await setup({ requestTimeoutMs: 15 });
    emulator.dropReplies(API_PATHS.DEVICE_TYPE_GET);

    await expect(
      correlator.send({ kind: 'query', path: API_PATHS.DEVICE_TYPE_GET })
    ).rejects.toThrow('Request #1 /api/system/device_type/get timed out after 15ms');
  });
});

describe('RequestCorrelator tokens', () => {
  const TOKEN_COUNT = 65535;
  const query = { kind: 'query', path: API_PATHS.SOFTWARE_VERSION_GET } as const;

  interface Filled {
    session: TransportSession;
    correlator: RequestCorrelator;
    device: MemoryByteStream;
    pending: Promise<ReplyMessage>[];
    settled: Promise<unknown>;
  }

  let filled: Filled | null = null;

  /**
   * Opens a session against a device that acknowledges the handshake and
   * then never answers, and leaves every token in flight.
   */
  async function fillTokens(): Promise<Filled> {
    const { client, device } = createMemoryStreamPair();
    const session = new TransportSession(client);
    const opening = session.open();
    await device.read();
    await device.write(HANDSHAKE_FRAME);
    await opening;

    const correlator = new RequestCorrelator(session, { requestTimeoutMs: 60_000 });
    correlator.start();

    const pending: Promise<ReplyMessage>[] = [];
    for (let i = 0; i < TOKEN_COUNT; i++) {
      pending.push(correlator.send(query));
    }
    filled = { session, correlator, device, pending, settled: Promise.allSettled(pending) };
    return filled;
  }

  afterEach(async () => {
    if (!filled) return;
    const { session, correlator, settled } = filled;
    filled = null;
    await session.close();
    await correlator.stop();
    await settled;
  });

  it('refuses a request while every token is in flight', async () => {
    const { correlator } = await fillTokens();

    expect(correlator.pendingCount).toBe(TOKEN_COUNT);
    expect(correlator.hasPending(1)).toBe(true);
    expect(correlator.hasPending(TOKEN_COUNT)).toBe(true);
    await expect(correlator.send(query)).rejects.toThrow(
      'All 65535 correlation tokens are in flight'
    );
    expect(correlator.pendingCount).toBe(TOKEN_COUNT);
  }, 30_000);

  it('wraps past 65535 and skips tokens still in flight', async () => {
    const { correlator, device, pending } = await fillTokens();

    await device.write(
      encodeMessage({ kind: 'reply', token: 7, path: query.path, value: '2.0.0', error: false })
    );
    await expect(pending[6]).resolves.toMatchObject({ token: 7, value: '2.0.0' });
    expect(correlator.hasPending(7)).toBe(false);

    const next = correlator.send(query);
    const nextOutcome = expect(next).rejects.toBeInstanceOf(SessionClosedError);
    expect(correlator.hasPending(7)).toBe(true);
    expect(correlator.pendingCount).toBe(TOKEN_COUNT);

    await filled?.session.close();
    await nextOutcome;
  }, 30_000);
});
