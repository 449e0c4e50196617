// src/attributes/device-info.ts

import { API_PATHS } from '../constants/constants.js';
import { EncodingError } from '../errors.js';
import {
  AttributeDefinition,
  XmlElement,
  childElement,
  parseIntegerText,
  requireAttribute,
  validateIntegerInRange,
} from './attribute.js';

/** `<software version="1.85"/>` */
export const softwareVersion: AttributeDefinition<'softwareVersion'> = {
  id: 'softwareVersion',
  getPath: API_PATHS.SOFTWARE_VERSION_GET,

  parse(body: XmlElement): string | undefined {
    const node = childElement(body, 'software');
    if (!node) return undefined;
    return requireAttribute(node, 'version', 'software');
  },

  toXml: (value: string): XmlElement => ({ software: { $: { version: value } } }),

  validate(value: unknown): string {
    if (typeof value !== 'string') {
      throw new EncodingError(`softwareVersion expects a string, got ${typeof value}`);
    }
    return value;
  },
};

/** `<system><device_type value="1"/></system>` */
export const deviceType: AttributeDefinition<'deviceType'> = {
  id: 'deviceType',
  getPath: API_PATHS.DEVICE_TYPE_GET,

  parse(body: XmlElement): number | undefined {
    const node = childElement(body, 'system', 'device_type');
    if (!node) return undefined;
    return parseIntegerText(requireAttribute(node, 'value', 'system/device_type'), 'device_type');
  },

  toXml: (value: number): XmlElement => ({
    system: { device_type: { $: { value: String(value) } } },
  }),

  validate: (value: unknown): number =>
    validateIntegerInRange('deviceType', value, 0, Number.MAX_SAFE_INTEGER),
};
