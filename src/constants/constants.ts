// src/constants/constants.ts

/**
 * Frame types on the control channel
 */
export enum FrameType {
  HANDSHAKE = 0x00,
  DATA = 0x80,
}

/**
 * Message kinds carried in the first byte of a data frame body
 */
export enum MessageKindCode {
  QUERY = 0x01,
  COMMAND = 0x02,
  REPLY = 0x03,
  NOTIFICATION = 0x04,
}

/** length(2) + type(1) */
export const FRAME_HEADER_SIZE = 3;
/** kind(1) + token(2) */
export const DATA_HEADER_SIZE = 3;
/** Largest length a u16 length field can declare */
export const MAX_WIRE_FRAME_SIZE = 0xffff;

export const MIN_TOKEN = 1;
export const MAX_TOKEN = 0xffff;
/** Token carried by notifications; never assigned to a request */
export const UNSOLICITED_TOKEN = 0;

/** Handshake written by the client right after the stream opens */
export const HANDSHAKE_FRAME: Uint8Array = Uint8Array.of(0x00, 0x03, 0x00);

export const MIN_EQ_PRESET_ID = 0;
export const MAX_EQ_PRESET_ID = 31;

/**
 * Device API endpoints
 */
export const API_PATHS = {
  BATTERY_GET: '/api/system/battery/get',
  DEVICE_TYPE_GET: '/api/system/device_type/get',
  SOFTWARE_VERSION_GET: '/api/software/version/get',

  HEAD_DETECTION_GET: '/api/system/head_detection/enabled/get',
  HEAD_DETECTION_SET: '/api/system/head_detection/enabled/set',

  AUTO_CONNECTION_GET: '/api/system/auto_connection/enabled/get',
  AUTO_CONNECTION_SET: '/api/system/auto_connection/enabled/set',

  NOISE_CANCELLATION_GET: '/api/audio/noise_cancellation/enabled/get',
  NOISE_CANCELLATION_SET: '/api/audio/noise_cancellation/enabled/set',

  SPECIFIC_MODE_GET: '/api/audio/specific_mode/enabled/get',
  SPECIFIC_MODE_SET: '/api/audio/specific_mode/enabled/set',

  EQUALIZER_GET: '/api/audio/equalizer/get',
  EQUALIZER_PRESETS_GET: '/api/audio/equalizer/presets_list/get',
  EQUALIZER_ENABLED_SET: '/api/audio/equalizer/enabled/set',
  EQUALIZER_PRESET_SET: '/api/audio/equalizer/preset_id/set',
} as const;

export type ApiPath = (typeof API_PATHS)[keyof typeof API_PATHS];

/**
 * Default values for every tunable of the library
 */
export const DEFAULTS = {
  MAX_FRAME_SIZE: 4096,
  HANDSHAKE_TIMEOUT_MS: 2000,
  REQUEST_TIMEOUT_MS: 3000,
  STALENESS_WINDOW_MS: 30_000,
  QUERY_RETRIES: 1,
  SYNC_ON_CONNECT: true,
  REFRESH_ON_NOTIFY: true,
  DIAGNOSTICS: true,
} as const;
