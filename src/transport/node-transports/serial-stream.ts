// src/transport/node-transports/serial-stream.ts

import { SerialPort } from 'serialport';
import { HeadsetConfigError, TransportLostError } from '../../errors.js';
import { headsetLogger } from '../../logger.js';
import type { ByteStream, SerialStreamOptions } from '../../types/headset-types.js';
import { DuplexByteStream } from './duplex-stream.js';

const logger = headsetLogger.createLogger('SerialByteStream');

const SERIAL_DEFAULTS = {
  BAUD_RATE: 115200,
  DATA_BITS: 8,
  STOP_BITS: 1,
  PARITY: 'none',
} as const;

const MIN_BAUD_RATE = 300;

/**
 * Opens the serial device an RFCOMM channel is bound to
 * (`/dev/rfcomm0`, `/dev/tty.<headset>`, `COM5`) and wraps it as a `ByteStream`.
 * @throws HeadsetConfigError for invalid options
 * @throws TransportLostError when the port cannot be opened
 */
export function openSerialByteStream(
  path: string,
  options: SerialStreamOptions = {}
): Promise<ByteStream> {
  const baudRate = options.baudRate ?? SERIAL_DEFAULTS.BAUD_RATE;
  if (!path) {
    return Promise.reject(new HeadsetConfigError('Serial port path is required'));
  }
  if (!Number.isInteger(baudRate) || baudRate < MIN_BAUD_RATE) {
    return Promise.reject(new HeadsetConfigError(`Invalid baud rate: ${baudRate}`));
  }

  const port = new SerialPort({
    path,
    baudRate,
    dataBits: options.dataBits ?? SERIAL_DEFAULTS.DATA_BITS,
    stopBits: options.stopBits ?? SERIAL_DEFAULTS.STOP_BITS,
    parity: options.parity ?? SERIAL_DEFAULTS.PARITY,
    autoOpen: false,
  });

  return new Promise<ByteStream>((resolve, reject) => {
    port.open((err: Error | null) => {
      if (err) {
        if (err.message.includes('permission')) {
          reject(new TransportLostError(`Permission denied opening ${path}`, err));
        } else if (err.message.includes('busy')) {
          reject(new TransportLostError(`Serial port ${path} is busy`, err));
        } else if (err.message.includes('no such file')) {
          reject(new TransportLostError(`Serial port ${path} does not exist`, err));
        } else {
          reject(new TransportLostError(err.message, err));
        }
        return;
      }
      logger.info(`Serial port ${path} opened`, { baudRate });
      resolve(new DuplexByteStream(port));
    });
  });
}
