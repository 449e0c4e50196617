// src/codec/message-codec.ts

import { Builder, parseString } from 'xml2js';
import { ATTRIBUTES, findAttributeByPath, isXmlElement } from '../attributes/index.js';
import type { PathMatch, XmlElement } from '../attributes/index.js';
import {
  DATA_HEADER_SIZE,
  DEFAULTS,
  FRAME_HEADER_SIZE,
  FrameType,
  MAX_TOKEN,
  MIN_TOKEN,
  MessageKindCode,
} from '../constants/constants.js';
import { DecodingError, EncodingError } from '../errors.js';
import { buildFrame } from '../framers/headset-framer.js';
import type {
  AttributeId,
  AttributeValue,
  Frame,
  Message,
  MessageKind,
  NotificationMessage,
  ReplyMessage,
} from '../types/headset-types.js';
import { bytesToUint16BE, concatUint8Arrays, uint16ToBytesBE } from '../utils/utils.js';

export interface EncodeOptions {
  /** Largest frame allowed on the wire, header included */
  maxFrameSize?: number;
}

const KIND_CODES: Record<MessageKind, MessageKindCode> = {
  query: MessageKindCode.QUERY,
  command: MessageKindCode.COMMAND,
  reply: MessageKindCode.REPLY,
  notification: MessageKindCode.NOTIFICATION,
};

const KINDS_BY_CODE = new Map<number, MessageKind>([
  [MessageKindCode.QUERY, 'query'],
  [MessageKindCode.COMMAND, 'command'],
  [MessageKindCode.REPLY, 'reply'],
  [MessageKindCode.NOTIFICATION, 'notification'],
]);

/** Root element of the XML document for each kind that carries one */
const ROOT_TAGS = { reply: 'answer', notification: 'notify' } as const;

const COMMAND_ARG = 'arg';

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });
const xmlBuilder = new Builder({ headless: true, renderOpts: { pretty: false } });

// !=============================================================================
// ! Attribute helpers
// !=============================================================================

function renderValue<K extends AttributeId>(id: K, value: unknown): XmlElement {
  const definition = ATTRIBUTES[id];
  return definition.toXml(definition.validate(value));
}

function renderArg<K extends AttributeId>(id: K, value: unknown): string {
  const definition = ATTRIBUTES[id];
  const validated = definition.validate(value);
  if (!definition.toArg) {
    throw new EncodingError(`${id} cannot be set`);
  }
  return definition.toArg(validated);
}

function resolvePath(
  path: string,
  role: PathMatch['role'] | null,
  fail: (msg: string) => Error
): PathMatch {
  const match = findAttributeByPath(path);
  if (!match) throw fail(`Unknown path ${path}`);
  if (role && match.role !== role) {
    throw fail(`Path ${path} cannot be used to ${role === 'get' ? 'query' : 'command'}`);
  }
  return match;
}

// !=============================================================================
// ! Encoding
// !=============================================================================

function checkToken(message: Message): void {
  const { token } = message;
  const min = message.kind === 'query' || message.kind === 'command' ? MIN_TOKEN : 0;
  if (!Number.isInteger(token) || token < min || token > MAX_TOKEN) {
    throw new EncodingError(`Token for ${message.kind} must be ${min}-${MAX_TOKEN}, got ${token}`);
  }
}

function renderDocument(message: ReplyMessage | NotificationMessage): string {
  const { definition } = resolvePath(message.path, null, msg => new EncodingError(msg));
  const attrs: Record<string, string> = { path: message.path };
  let body: XmlElement = {};

  if (message.kind === 'reply' && message.error) {
    attrs['error'] = 'true';
  } else if (message.value !== undefined) {
    body = renderValue(definition.id, message.value);
  }

  return xmlBuilder.buildObject({ [ROOT_TAGS[message.kind]]: { $: attrs, ...body } });
}

function messageText(message: Message): string {
  switch (message.kind) {
    case 'query':
      resolvePath(message.path, 'get', msg => new EncodingError(msg));
      return message.path;
    case 'command': {
      const { definition } = resolvePath(message.path, 'set', msg => new EncodingError(msg));
      const arg = renderArg(definition.id, message.value);
      return `${message.path}?${new URLSearchParams({ [COMMAND_ARG]: arg }).toString()}`;
    }
    case 'reply':
    case 'notification':
      return renderDocument(message);
  }
}

/**
 * Encodes a message into a complete data frame ready for the wire.
 * @throws EncodingError for unknown paths, bad tokens, values outside the
 * attribute's domain and frames larger than `maxFrameSize`
 */
export function encodeMessage(message: Message, options: EncodeOptions = {}): Uint8Array {
  const maxFrameSize = options.maxFrameSize ?? DEFAULTS.MAX_FRAME_SIZE;
  checkToken(message);

  const text = textEncoder.encode(messageText(message));
  const frameLength = FRAME_HEADER_SIZE + DATA_HEADER_SIZE + text.length;
  if (frameLength > maxFrameSize) {
    throw new EncodingError(
      `Encoded ${message.kind} ${message.path} is ${frameLength} bytes, limit ${maxFrameSize}`
    );
  }

  const body = concatUint8Arrays([
    Uint8Array.of(KIND_CODES[message.kind]),
    uint16ToBytesBE(message.token),
    text,
  ]);
  return buildFrame(FrameType.DATA, body);
}

// !=============================================================================
// ! Decoding
// !=============================================================================

/**
 * Parses an XML document synchronously. xml2js reports through a callback
 * that runs before `parseString` returns when `async` is off. It may call
 * back twice: with the document once the root closes, then with an error
 * for whatever follows it. Any error wins.
 */
function parseXml(text: string): unknown {
  const outcome: { settled: boolean; error: Error | null; document: unknown } = {
    settled: false,
    error: null,
    document: null,
  };

  const options = { explicitArray: false, async: false };
  try {
    parseString(text, options, (err: Error | null, parsed: unknown) => {
      if (err) {
        if (!outcome.error) outcome.error = err;
        return;
      }
      if (outcome.settled) return;
      outcome.settled = true;
      outcome.document = parsed;
    });
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DecodingError(`Invalid XML: ${reason}`);
  }

  if (outcome.error) {
    throw new DecodingError(`Invalid XML: ${outcome.error.message}`);
  }
  if (!outcome.settled || outcome.document === null || outcome.document === undefined) {
    throw new DecodingError('Empty XML document');
  }
  return outcome.document;
}

function rootElement(text: string, tag: string): XmlElement {
  const document = parseXml(text);
  if (!isXmlElement(document)) {
    throw new DecodingError('XML document has no root element');
  }
  const [rootTag] = Object.keys(document);
  if (rootTag !== tag) {
    throw new DecodingError(`Expected <${tag}> root, got <${rootTag ?? ''}>`);
  }
  const root = document[tag];
  if (isXmlElement(root)) return root;
  if (root === '') return {};
  throw new DecodingError(`<${tag}> has no attributes`);
}

function decodeText(bytes: Uint8Array): string {
  try {
    return textDecoder.decode(bytes);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DecodingError(`Invalid UTF-8 text: ${reason}`);
  }
}

function decodeCommand(token: number, text: string): Message {
  const separator = text.indexOf('?');
  if (separator < 0) {
    throw new DecodingError(`Command ${text} has no argument`);
  }
  const path = text.slice(0, separator);
  const arg = new URLSearchParams(text.slice(separator + 1)).get(COMMAND_ARG);
  if (arg === null) {
    throw new DecodingError(`Command ${path} is missing "${COMMAND_ARG}"`);
  }

  const { definition } = resolvePath(path, 'set', msg => new DecodingError(msg));
  const value: AttributeValue | undefined = definition.fromArg?.(arg);
  if (value === undefined) {
    throw new DecodingError(`${definition.id} cannot be commanded`);
  }
  return { kind: 'command', token, path, value };
}

function decodeDocument(kind: 'reply' | 'notification', token: number, text: string): Message {
  const root = rootElement(text, ROOT_TAGS[kind]);
  const path = root.$?.['path'];
  if (path === undefined) {
    throw new DecodingError(`<${ROOT_TAGS[kind]}> is missing "path"`);
  }
  const { definition } = resolvePath(path, null, msg => new DecodingError(msg));

  if (kind === 'reply') {
    const error = root.$?.['error'] === 'true';
    const value = error ? undefined : definition.parse(root);
    return value === undefined
      ? { kind, token, path, error }
      : { kind, token, path, value, error };
  }

  const value = definition.parse(root);
  return value === undefined ? { kind, token, path } : { kind, token, path, value };
}

/**
 * Decodes one data frame.
 * @throws DecodingError on malformed structure, unknown paths or mistyped values.
 * Unknown tags and attributes are ignored.
 */
export function decodeMessage(frame: Frame): Message {
  if (frame.type !== FrameType.DATA) {
    throw new DecodingError(`Frame type 0x${frame.type.toString(16)} carries no message`);
  }
  const { payload } = frame;
  if (payload.length < DATA_HEADER_SIZE) {
    throw new DecodingError(`Data frame body too short: ${payload.length} bytes`);
  }

  const kind = KINDS_BY_CODE.get(payload[0] ?? -1);
  if (!kind) {
    throw new DecodingError(`Unknown message kind 0x${(payload[0] ?? 0).toString(16)}`);
  }
  const token = bytesToUint16BE(payload, 1);
  const text = decodeText(payload.subarray(DATA_HEADER_SIZE));

  switch (kind) {
    case 'query':
    case 'command':
      if (token < MIN_TOKEN) {
        throw new DecodingError(`${kind} ${text} carries reserved token 0`);
      }
      if (kind === 'command') return decodeCommand(token, text);
      resolvePath(text, 'get', msg => new DecodingError(msg));
      return { kind, token, path: text };
    case 'reply':
    case 'notification':
      return decodeDocument(kind, token, text);
  }
}

/** Short human-readable form for logs */
export function describeMessage(message: Message): string {
  return `${message.kind} #${message.token} ${message.path}`;
}
