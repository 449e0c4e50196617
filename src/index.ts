// src/index.ts

export { HeadsetClient } from './client.js';
export { TransportSession } from './transport/session.js';
export type { SessionStats } from './transport/session.js';
export { FrameQueue } from './transport/frame-queue.js';
export { DuplexByteStream } from './transport/node-transports/duplex-stream.js';
export { openSerialByteStream } from './transport/node-transports/serial-stream.js';
export { RequestCorrelator } from './correlator/request-correlator.js';
export type { RequestOutcome } from './correlator/request-correlator.js';
export { DeviceStateCache } from './cache/device-state-cache.js';
export type { CacheSnapshot } from './cache/device-state-cache.js';
export { encodeMessage, decodeMessage, describeMessage } from './codec/message-codec.js';
export type { EncodeOptions } from './codec/message-codec.js';
export { HeadsetFramer, buildFrame } from './framers/headset-framer.js';
export type { FramerEvent } from './framers/headset-framer.js';
export {
  ATTRIBUTES,
  ATTRIBUTE_IDS,
  READABLE_ATTRIBUTES,
  findAttributeByPath,
} from './attributes/index.js';
export type { AttributeDefinition, PathMatch, XmlElement } from './attributes/index.js';
export { HeadsetEmulator } from './headset-emulator/headset-emulator.js';
export type {
  EmulatedState,
  HeadsetEmulatorOptions,
  StoredAttributeId,
} from './headset-emulator/headset-emulator.js';
export { MemoryByteStream, createMemoryStreamPair } from './headset-emulator/memory-stream.js';
export type { MemoryStreamPair } from './headset-emulator/memory-stream.js';
export { Diagnostics } from './utils/diagnostics.js';
export { headsetLogger } from './logger.js';
export { default as Logger } from './logger.js';
export * from './errors.js';
export * from './constants/constants.js';
export type * from './types/headset-types.js';
