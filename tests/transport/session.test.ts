// tests/transport/session.test.ts

import { describe, expect, it } from 'vitest';
import { FrameType, HANDSHAKE_FRAME, MessageKindCode } from '../../src/constants/constants.js';
import {
  FrameSyncError,
  HandshakeError,
  HeadsetError,
  NotConnectedError,
  TransportLostError,
} from '../../src/errors.js';
import { createMemoryStreamPair } from '../../src/headset-emulator/memory-stream.js';
import { TransportSession } from '../../src/transport/session.js';
import type { SessionState } from '../../src/types/headset-types.js';
import { dataFrame, wireFrame } from '../helpers.js';

async function openSession(): Promise<{
  session: TransportSession;
  client: ReturnType<typeof createMemoryStreamPair>['client'];
  device: ReturnType<typeof createMemoryStreamPair>['device'];
}> {
  const { client, device } = createMemoryStreamPair();
  const session = new TransportSession(client, { handshakeTimeoutMs: 200 });
  const opening = session.open();
  await device.write(HANDSHAKE_FRAME);
  await opening;
  return { session, client, device };
}

describe('TransportSession', () => {
  it('sends the handshake and becomes ready on its acknowledgement', async () => {
    const { session, client } = await openSession();

    expect(session.state).toBe('ready');
    expect(session.isReady).toBe(true);
    expect(client.written[0]).toEqual(HANDSHAKE_FRAME);
    expect(session.getStats()).toEqual({
      state: 'ready',
      bytesSent: 3,
      bytesReceived: 3,
      bufferedBytes: 0,
    });
    await session.close();
  });

  it('fails the handshake when the device stays silent', async () => {
    const { client } = createMemoryStreamPair();
    const session = new TransportSession(client, { handshakeTimeoutMs: 20 });
    const states: SessionState[] = [];
    session.setStateHandler(state => states.push(state));

    await expect(session.open()).rejects.toThrow(
      new HandshakeError('No handshake acknowledgement within 20ms')
    );
    expect(session.state).toBe('closed');
    expect(states).toEqual(['draining', 'closed']);
  });

  it('cannot be opened twice', async () => {
    const { session } = await openSession();
    await expect(session.open()).rejects.toBeInstanceOf(HandshakeError);
    await session.close();
  });

  it('yields data frames in arrival order and skips repeated handshakes', async () => {
    const { session, device } = await openSession();
    const frames = session.frames()[Symbol.asyncIterator]();

    await device.write(wireFrame(MessageKindCode.REPLY, 1, 'a'));
    await device.write(HANDSHAKE_FRAME);
    await device.write(wireFrame(MessageKindCode.REPLY, 2, 'b'));

    expect((await frames.next()).value).toEqual(dataFrame(MessageKindCode.REPLY, 1, 'a'));
    expect((await frames.next()).value).toEqual(dataFrame(MessageKindCode.REPLY, 2, 'b'));

    await session.close();
    expect(await frames.next()).toEqual({ done: true, value: undefined });
  });

  it('writes whole frames in call order', async () => {
    const { session, client } = await openSession();
    const first = wireFrame(MessageKindCode.QUERY, 1, '/a');
    const second = wireFrame(MessageKindCode.QUERY, 2, '/b');

    await Promise.all([session.writeFrame(first), session.writeFrame(second)]);
    expect(client.written.slice(1)).toEqual([first, second]);
    await session.close();
  });

  it('refuses writes unless ready', async () => {
    const { client } = createMemoryStreamPair();
    const session = new TransportSession(client);
    await expect(session.writeFrame(HANDSHAKE_FRAME)).rejects.toThrow(
      new NotConnectedError('connecting')
    );
  });

  it('closes gracefully without reporting a lost transport', async () => {
    const { session } = await openSession();
    const states: SessionState[] = [];
    const lost: TransportLostError[] = [];
    session.setStateHandler(state => states.push(state));
    session.setTransportLostHandler(error => lost.push(error));

    await session.close();

    expect(states).toEqual(['draining', 'closed']);
    expect(lost).toEqual([]);
    await expect(session.writeFrame(HANDSHAKE_FRAME)).rejects.toBeInstanceOf(NotConnectedError);
  });

  it('reports a lost transport when the stream ends', async () => {
    const { session, device } = await openSession();
    const lost = new Promise<TransportLostError>(resolve =>
      session.setTransportLostHandler(resolve)
    );

    await device.close();

    const error = await lost;
    expect(error.message).toBe('Stream ended');
    expect(session.state).toBe('closed');
  });

  it('reports a lost transport when a read fails', async () => {
    const { session, client } = await openSession();
    const lost = new Promise<TransportLostError>(resolve =>
      session.setTransportLostHandler(resolve)
    );
    const cause = new Error('radio off');

    client.failRead(cause);

    const error = await lost;
    expect(error.message).toBe('Stream read failed: radio off');
    expect(error.cause).toBe(cause);
  });

  it('turns a failed write into a lost transport', async () => {
    const { session, client } = await openSession();
    const lost: TransportLostError[] = [];
    session.setTransportLostHandler(error => lost.push(error));
    client.failWrites(new Error('broken pipe'));

    await expect(session.writeFrame(HANDSHAKE_FRAME)).rejects.toThrow(
      new TransportLostError('Stream write failed: broken pipe')
    );
    expect(session.state).toBe('closed');
    expect(lost).toHaveLength(1);
  });

  it('recovers from garbage on the wire and reports it', async () => {
    const { session, device } = await openSession();
    const errors: HeadsetError[] = [];
    session.setFrameErrorHandler(error => errors.push(error));
    const frames = session.frames()[Symbol.asyncIterator]();

    await device.write(Uint8Array.of(0x07, 0x00, 0x01));
    await device.write(wireFrame(MessageKindCode.REPLY, 3, 'c'));

    const next = await frames.next();
    expect(next.value).toEqual({
      type: FrameType.DATA,
      payload: dataFrame(MessageKindCode.REPLY, 3, 'c').payload,
    });
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(FrameSyncError);
    await session.close();
  });
});
