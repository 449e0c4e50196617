// src/errors.ts

import { toHex } from './utils/utils.js';

/**
 * Base class for all headset control errors
 */
export class HeadsetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HeadsetError';
  }
}

// --- Codec errors ---

/**
 * A message could not be encoded (value out of domain, unknown path, oversize)
 */
export class EncodingError extends HeadsetError {
  constructor(message: string) {
    super(message);
    this.name = 'EncodingError';
  }
}

/**
 * A frame could not be decoded into a message
 */
export class DecodingError extends HeadsetError {
  constructor(message: string) {
    super(message);
    this.name = 'DecodingError';
  }
}

// --- Framing errors ---

/**
 * Declared frame length exceeds the configured maximum
 */
export class FrameTooLargeError extends HeadsetError {
  declaredLength: number;
  maxFrameSize: number;

  constructor(declaredLength: number, maxFrameSize: number) {
    super(`Frame too large: ${declaredLength} bytes exceeds maximum ${maxFrameSize} bytes`);
    this.name = 'FrameTooLargeError';
    this.declaredLength = declaredLength;
    this.maxFrameSize = maxFrameSize;
  }
}

/**
 * Bytes that do not start a valid frame; the framer scans for the next header
 */
export class FrameSyncError extends HeadsetError {
  constructor(rawHeader: Uint8Array) {
    super(`Lost frame sync at header ${toHex(rawHeader)}, resynchronizing`);
    this.name = 'FrameSyncError';
  }
}

// --- Request errors ---

/**
 * Error class for request timeout
 */
export class RequestTimedOutError extends HeadsetError {
  token: number;
  path: string;

  constructor(token: number, path: string, timeoutMs: number) {
    super(`Request #${token} ${path} timed out after ${timeoutMs}ms`);
    this.name = 'RequestTimedOutError';
    this.token = token;
    this.path = path;
  }
}

/**
 * The caller aborted the wait. The device may still act on the request.
 */
export class RequestCancelledError extends HeadsetError {
  constructor(token: number, path: string) {
    super(`Request #${token} ${path} was cancelled`);
    this.name = 'RequestCancelledError';
  }
}

/**
 * The device answered with error="true"
 */
export class DeviceRejectedError extends HeadsetError {
  path: string;

  constructor(path: string) {
    super(`Device rejected request ${path}`);
    this.name = 'DeviceRejectedError';
    this.path = path;
  }
}

// --- Session errors ---

/**
 * Error class for not connected
 */
export class NotConnectedError extends HeadsetError {
  constructor(state: string = 'closed') {
    super(`Not connected to headset (session ${state})`);
    this.name = 'NotConnectedError';
  }
}

/**
 * connect() called while a session is still open
 */
export class AlreadyConnectedError extends HeadsetError {
  constructor() {
    super('Client already has an open session; disconnect first');
    this.name = 'AlreadyConnectedError';
  }
}

/**
 * The session left the ready state while the request was in flight
 */
export class SessionClosedError extends HeadsetError {
  constructor(message: string = 'Session closed before a reply arrived') {
    super(message);
    this.name = 'SessionClosedError';
  }
}

/**
 * The device did not acknowledge the handshake
 */
export class HandshakeError extends HeadsetError {
  constructor(message: string) {
    super(message);
    this.name = 'HandshakeError';
  }
}

/**
 * The byte stream ended or failed. Terminal for the session.
 */
export class TransportLostError extends HeadsetError {
  override cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'TransportLostError';
    this.cause = cause;
  }
}

/**
 * Error class for invalid configuration
 */
export class HeadsetConfigError extends HeadsetError {
  constructor(message: string) {
    super(message);
    this.name = 'HeadsetConfigError';
  }
}
