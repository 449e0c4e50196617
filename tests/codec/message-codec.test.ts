// tests/codec/message-codec.test.ts

import { describe, expect, it } from 'vitest';
import { decodeMessage, describeMessage, encodeMessage } from '../../src/codec/message-codec.js';
import { API_PATHS, FrameType, MessageKindCode } from '../../src/constants/constants.js';
import { DecodingError, EncodingError } from '../../src/errors.js';
import type { Message } from '../../src/types/headset-types.js';
import { dataFrame } from '../helpers.js';

function frameOf(bytes: Uint8Array): { type: FrameType; payload: Uint8Array } {
  return { type: FrameType.DATA, payload: bytes.subarray(3) };
}

describe('encodeMessage', () => {
  it('encodes a query as header, kind, token and path', () => {
    const bytes = encodeMessage({ kind: 'query', token: 1, path: API_PATHS.BATTERY_GET });

    expect([...bytes.subarray(0, 6)]).toEqual([0x00, 0x1d, 0x80, 0x01, 0x00, 0x01]);
    expect(new TextDecoder().decode(bytes.subarray(6))).toBe('/api/system/battery/get');
  });

  it('encodes a command with its argument in the query string', () => {
    const bytes = encodeMessage({
      kind: 'command',
      token: 0x0102,
      path: API_PATHS.NOISE_CANCELLATION_SET,
      value: true,
    });

    expect([...bytes.subarray(3, 6)]).toEqual([0x02, 0x01, 0x02]);
    expect(new TextDecoder().decode(bytes.subarray(6))).toBe(
      '/api/audio/noise_cancellation/enabled/set?arg=true'
    );
  });

  it('rejects an equalizer preset outside 0-31', () => {
    expect(() =>
      encodeMessage({ kind: 'command', token: 1, path: API_PATHS.EQUALIZER_PRESET_SET, value: 32 })
    ).toThrow(EncodingError);
  });

  it('rejects a non-boolean toggle value', () => {
    expect(() =>
      encodeMessage({
        kind: 'command',
        token: 1,
        path: API_PATHS.HEAD_DETECTION_SET,
        value: 'yes',
      })
    ).toThrow(EncodingError);
  });

  it('rejects unknown paths and paths used in the wrong role', () => {
    expect(() => encodeMessage({ kind: 'query', token: 1, path: '/api/unknown/get' })).toThrow(
      'Unknown path /api/unknown/get'
    );
    expect(() =>
      encodeMessage({ kind: 'query', token: 1, path: API_PATHS.NOISE_CANCELLATION_SET })
    ).toThrow(EncodingError);
    expect(() =>
      encodeMessage({ kind: 'command', token: 1, path: API_PATHS.BATTERY_GET, value: true })
    ).toThrow(EncodingError);
  });

  it('rejects request tokens outside 1-65535', () => {
    expect(() => encodeMessage({ kind: 'query', token: 0, path: API_PATHS.BATTERY_GET })).toThrow(
      EncodingError
    );
    expect(() =>
      encodeMessage({ kind: 'query', token: 65536, path: API_PATHS.BATTERY_GET })
    ).toThrow(EncodingError);
  });

  it('rejects frames larger than the configured maximum', () => {
    expect(() =>
      encodeMessage({ kind: 'query', token: 1, path: API_PATHS.BATTERY_GET }, { maxFrameSize: 28 })
    ).toThrow('Encoded query /api/system/battery/get is 29 bytes, limit 28');
  });
});

describe('decodeMessage', () => {
  it('decodes a query', () => {
    const message = decodeMessage(dataFrame(MessageKindCode.QUERY, 4, API_PATHS.EQUALIZER_GET));
    expect(message).toEqual({ kind: 'query', token: 4, path: API_PATHS.EQUALIZER_GET });
  });

  it('decodes a command argument into the attribute value', () => {
    const message = decodeMessage(
      dataFrame(MessageKindCode.COMMAND, 9, `${API_PATHS.EQUALIZER_PRESET_SET}?arg=5`)
    );
    expect(message).toEqual({
      kind: 'command',
      token: 9,
      path: API_PATHS.EQUALIZER_PRESET_SET,
      value: 5,
    });
  });

  it('decodes a battery reply', () => {
    const text =
      '<answer path="/api/system/battery/get"><system><battery state="in_use" level="42"/>' +
      '</system></answer>';
    expect(decodeMessage(dataFrame(MessageKindCode.REPLY, 7, text))).toEqual({
      kind: 'reply',
      token: 7,
      path: API_PATHS.BATTERY_GET,
      value: { state: 'in_use', level: 42 },
      error: false,
    });
  });

  it('reads an empty battery level as calculating and charging without a level', () => {
    const calculating =
      '<answer path="/api/system/battery/get"><system><battery state="in_use" level=""/>' +
      '</system></answer>';
    const charging =
      '<answer path="/api/system/battery/get"><system><battery state="charging" level=""/>' +
      '</system></answer>';

    const first = decodeMessage(dataFrame(MessageKindCode.REPLY, 1, calculating));
    const second = decodeMessage(dataFrame(MessageKindCode.REPLY, 2, charging));

    expect(first.kind === 'reply' && first.value).toEqual({ state: 'calculating', level: null });
    expect(second.kind === 'reply' && second.value).toEqual({ state: 'charging', level: null });
  });

  it('fails on mistyped and out-of-range battery levels', () => {
    const reply = (level: string): string =>
      `<answer path="/api/system/battery/get"><system><battery state="in_use" level="${level}"/>` +
      '</system></answer>';

    expect(() => decodeMessage(dataFrame(MessageKindCode.REPLY, 1, reply('abc')))).toThrow(
      DecodingError
    );
    expect(() => decodeMessage(dataFrame(MessageKindCode.REPLY, 1, reply('101')))).toThrow(
      'Battery level out of range: 101'
    );
  });

  it('decodes an error reply without a value', () => {
    const text = '<answer path="/api/audio/noise_cancellation/enabled/set" error="true"/>';
    expect(decodeMessage(dataFrame(MessageKindCode.REPLY, 5, text))).toEqual({
      kind: 'reply',
      token: 5,
      path: API_PATHS.NOISE_CANCELLATION_SET,
      error: true,
    });
  });

  it('ignores unknown tags and attributes', () => {
    const text =
      '<answer path="/api/audio/noise_cancellation/enabled/get" extra="1">' +
      '<audio><noise_cancellation enabled="false" level="3"/><other/></audio><misc/></answer>';
    const message = decodeMessage(dataFrame(MessageKindCode.REPLY, 3, text));
    expect(message.kind === 'reply' && message.value).toBe(false);
  });

  it('decodes a notification that carries no value', () => {
    const text = '<notify path="/api/audio/noise_cancellation/enabled/get"/>';
    expect(decodeMessage(dataFrame(MessageKindCode.NOTIFICATION, 0, text))).toEqual({
      kind: 'notification',
      token: 0,
      path: API_PATHS.NOISE_CANCELLATION_GET,
    });
  });

  it('decodes the preset list in document order', () => {
    const text =
      '<answer path="/api/audio/equalizer/presets_list/get"><audio><equalizer><presets_list>' +
      '<preset id="1" name="Vocal"/><preset id="2" name="Bass"/>' +
      '</presets_list></equalizer></audio></answer>';
    const message = decodeMessage(dataFrame(MessageKindCode.REPLY, 2, text));
    expect(message.kind === 'reply' && message.value).toEqual([
      { id: 1, name: 'Vocal' },
      { id: 2, name: 'Bass' },
    ]);
  });

  it('decodes a single preset as a one-element list', () => {
    const text =
      '<answer path="/api/audio/equalizer/presets_list/get"><audio><equalizer><presets_list>' +
      '<preset id="4" name="Rock"/></presets_list></equalizer></audio></answer>';
    const message = decodeMessage(dataFrame(MessageKindCode.REPLY, 2, text));
    expect(message.kind === 'reply' && message.value).toEqual([{ id: 4, name: 'Rock' }]);
  });

  it('fails when the root element does not match the kind', () => {
    const text = '<notify path="/api/system/battery/get"/>';
    expect(() => decodeMessage(dataFrame(MessageKindCode.REPLY, 1, text))).toThrow(
      'Expected <answer> root, got <notify>'
    );
  });

  it('fails on a missing required attribute', () => {
    const text =
      '<answer path="/api/audio/equalizer/get"><audio><equalizer enabled="true"/></audio></answer>';
    expect(() => decodeMessage(dataFrame(MessageKindCode.REPLY, 1, text))).toThrow(
      'Missing required attribute "preset_id" in audio/equalizer'
    );
  });

  it('fails on malformed structure', () => {
    expect(() =>
      decodeMessage({ type: FrameType.DATA, payload: Uint8Array.of(0x03, 0x00) })
    ).toThrow('Data frame body too short: 2 bytes');
    expect(() => decodeMessage(dataFrame(0x09, 1, API_PATHS.BATTERY_GET))).toThrow(
      'Unknown message kind 0x9'
    );
    expect(() =>
      decodeMessage(dataFrame(MessageKindCode.REPLY, 1, '<answer path="/api/system/battery/get"'))
    ).toThrow(DecodingError);
    expect(() =>
      decodeMessage({ type: FrameType.DATA, payload: Uint8Array.of(0x03, 0x00, 0x01, 0xff, 0xfe) })
    ).toThrow(DecodingError);
    expect(() =>
      decodeMessage({ type: FrameType.HANDSHAKE, payload: new Uint8Array(0) })
    ).toThrow('Frame type 0x0 carries no message');
  });

  it('fails on text after the root element', () => {
    const text =
      '<answer path="/api/software/version/get"><software version="1.0.0"/></answer>trailing';
    expect(() => decodeMessage(dataFrame(MessageKindCode.REPLY, 1, text))).toThrow(
      /^Invalid XML: Text data outside of root node/
    );
  });

  it('fails on unknown paths and on requests with token 0', () => {
    expect(() => decodeMessage(dataFrame(MessageKindCode.QUERY, 1, '/api/nope/get'))).toThrow(
      'Unknown path /api/nope/get'
    );
    expect(() =>
      decodeMessage(dataFrame(MessageKindCode.QUERY, 0, API_PATHS.BATTERY_GET))
    ).toThrow('query /api/system/battery/get carries reserved token 0');
  });
});

describe('encode then decode', () => {
  const messages: Message[] = [
    {
      kind: 'reply',
      token: 4,
      path: API_PATHS.EQUALIZER_GET,
      value: { enabled: true, presetId: 3 },
      error: false,
    },
    { kind: 'reply', token: 8, path: API_PATHS.SPECIFIC_MODE_SET, error: true },
    {
      kind: 'notification',
      token: 0,
      path: API_PATHS.EQUALIZER_PRESETS_GET,
      value: [
        { id: 0, name: 'Flat' },
        { id: 7, name: 'Jazz & Soul' },
      ],
    },
    { kind: 'command', token: 65535, path: API_PATHS.AUTO_CONNECTION_SET, value: false },
  ];

  it.each(messages)('returns the original $kind', message => {
    expect(decodeMessage(frameOf(encodeMessage(message)))).toEqual(message);
  });

  it('reports a level-less in-use battery as calculating', () => {
    const bytes = encodeMessage({
      kind: 'reply',
      token: 1,
      path: API_PATHS.BATTERY_GET,
      value: { state: 'calculating', level: null },
      error: false,
    });
    const message = decodeMessage(frameOf(bytes));
    expect(message.kind === 'reply' && message.value).toEqual({
      state: 'calculating',
      level: null,
    });
  });
});

describe('describeMessage', () => {
  it('names kind, token and path', () => {
    expect(describeMessage({ kind: 'query', token: 12, path: API_PATHS.BATTERY_GET })).toBe(
      'query #12 /api/system/battery/get'
    );
  });
});
