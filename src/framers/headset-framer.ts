// src/framers/headset-framer.ts

import {
  DEFAULTS,
  FRAME_HEADER_SIZE,
  FrameType,
  MAX_WIRE_FRAME_SIZE,
} from '../constants/constants.js';
import {
  EncodingError,
  FrameSyncError,
  FrameTooLargeError,
  HeadsetConfigError,
} from '../errors.js';
import type { Frame } from '../types/headset-types.js';
import {
  bytesToUint16BE,
  concatUint8Arrays,
  sliceUint8Array,
  uint16ToBytesBE,
} from '../utils/utils.js';

export type FramerEvent =
  | { kind: 'frame'; frame: Frame }
  | { kind: 'error'; error: FrameTooLargeError | FrameSyncError };

function isKnownFrameType(type: number | undefined): type is FrameType {
  return type === FrameType.HANDSHAKE || type === FrameType.DATA;
}

/**
 * Wraps a body into `| length u16 BE | type u8 | body |`.
 */
export function buildFrame(type: FrameType, body: Uint8Array = new Uint8Array(0)): Uint8Array {
  const length = FRAME_HEADER_SIZE + body.length;
  if (length > MAX_WIRE_FRAME_SIZE) {
    throw new EncodingError(`Frame of ${length} bytes cannot be described by a 16-bit length`);
  }
  return concatUint8Arrays([uint16ToBytesBE(length), Uint8Array.of(type), body]);
}

/**
 * Incremental frame extractor. Bytes go in as they arrive from the stream,
 * complete frames and recoverable framing errors come out in order.
 */
export class HeadsetFramer {
  private buffer: Uint8Array = new Uint8Array(0);
  /** Bytes of an oversized frame still to be thrown away */
  private skipRemaining: number = 0;
  private resyncing: boolean = false;
  private readonly maxFrameSize: number;

  constructor(maxFrameSize: number = DEFAULTS.MAX_FRAME_SIZE) {
    if (
      !Number.isInteger(maxFrameSize) ||
      maxFrameSize < FRAME_HEADER_SIZE ||
      maxFrameSize > MAX_WIRE_FRAME_SIZE
    ) {
      throw new HeadsetConfigError(
        `maxFrameSize must be an integer ${FRAME_HEADER_SIZE}-${MAX_WIRE_FRAME_SIZE}, ` +
          `got ${maxFrameSize}`
      );
    }
    this.maxFrameSize = maxFrameSize;
  }

  get bufferedBytes(): number {
    return this.buffer.length;
  }

  push(chunk: Uint8Array): FramerEvent[] {
    const events: FramerEvent[] = [];
    this.buffer = this.buffer.length === 0 ? chunk : concatUint8Arrays([this.buffer, chunk]);

    while (this.buffer.length > 0) {
      if (this.skipRemaining > 0) {
        const dropped = Math.min(this.skipRemaining, this.buffer.length);
        this.skipRemaining -= dropped;
        this.buffer = sliceUint8Array(this.buffer, dropped);
        continue;
      }

      if (this.buffer.length < FRAME_HEADER_SIZE) break;

      const length = bytesToUint16BE(this.buffer, 0);
      const type = this.buffer[2];

      if (!isKnownFrameType(type) || length < FRAME_HEADER_SIZE) {
        if (!this.resyncing) {
          this.resyncing = true;
          events.push({
            kind: 'error',
            error: new FrameSyncError(this.buffer.slice(0, FRAME_HEADER_SIZE)),
          });
        }
        this.buffer = sliceUint8Array(this.buffer, 1);
        continue;
      }
      this.resyncing = false;

      if (length > this.maxFrameSize) {
        events.push({ kind: 'error', error: new FrameTooLargeError(length, this.maxFrameSize) });
        this.skipRemaining = length;
        continue;
      }

      if (this.buffer.length < length) break;

      events.push({
        kind: 'frame',
        frame: { type, payload: this.buffer.slice(FRAME_HEADER_SIZE, length) },
      });
      this.buffer = sliceUint8Array(this.buffer, length);
    }

    if (this.buffer.length === 0) this.buffer = new Uint8Array(0);
    return events;
  }

  reset(): void {
    this.buffer = new Uint8Array(0);
    this.skipRemaining = 0;
    this.resyncing = false;
  }
}
