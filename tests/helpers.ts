// tests/helpers.ts

import { FrameType } from '../src/constants/constants.js';
import { buildFrame } from '../src/framers/headset-framer.js';
import type { Frame } from '../src/types/headset-types.js';
import { concatUint8Arrays, uint16ToBytesBE } from '../src/utils/utils.js';

const encoder = new TextEncoder();

/** Data frame as it comes out of the framer */
export function dataFrame(kind: number, token: number, text: string): Frame {
  return {
    type: FrameType.DATA,
    payload: concatUint8Arrays([
      Uint8Array.of(kind),
      uint16ToBytesBE(token),
      encoder.encode(text),
    ]),
  };
}

/** Same frame with its wire header, ready to be written to a stream */
export function wireFrame(kind: number, token: number, text: string): Uint8Array {
  return buildFrame(FrameType.DATA, dataFrame(kind, token, text).payload);
}

export async function waitFor(
  predicate: () => boolean,
  timeoutMs: number = 1000,
  intervalMs: number = 5
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise(resolve => setTimeout(resolve, intervalMs));
  }
}
