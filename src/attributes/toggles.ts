// src/attributes/toggles.ts

import { API_PATHS } from '../constants/constants.js';
import type { AttributeId, AttributeValueMap } from '../types/headset-types.js';
import {
  AttributeDefinition,
  XmlElement,
  childElement,
  parseBooleanText,
  requireAttribute,
  validateBoolean,
} from './attribute.js';

type ToggleId = {
  [K in AttributeId]: AttributeValueMap[K] extends boolean ? K : never;
}[AttributeId];

/**
 * On/off feature reported as `<section><element enabled="true|false"/></section>`
 * and switched with `set?arg=true|false`.
 */
function toggle<K extends ToggleId>(
  id: K,
  getPath: string | undefined,
  setPath: string,
  section: string,
  element: string
): AttributeDefinition<K, boolean> {
  const where = `${section}/${element}`;
  return {
    id,
    getPath,
    setPath,

    parse(body: XmlElement): boolean | undefined {
      const node = childElement(body, section, element);
      if (!node) return undefined;
      return parseBooleanText(requireAttribute(node, 'enabled', where), `${where}@enabled`);
    },

    toXml: (value: boolean): XmlElement => ({
      [section]: { [element]: { $: { enabled: String(value) } } },
    }),

    validate: (value: unknown): boolean => validateBoolean(id, value),
    toArg: (value: boolean): string => String(value),
    fromArg: (arg: string): boolean => parseBooleanText(arg, `${setPath} arg`),
  };
}

export const noiseCancellation = toggle(
  'noiseCancellation',
  API_PATHS.NOISE_CANCELLATION_GET,
  API_PATHS.NOISE_CANCELLATION_SET,
  'audio',
  'noise_cancellation'
);

/** Concert-hall style sound mode */
export const specificMode = toggle(
  'specificMode',
  API_PATHS.SPECIFIC_MODE_GET,
  API_PATHS.SPECIFIC_MODE_SET,
  'audio',
  'specific_mode'
);

/** Auto-pause when the headset is taken off */
export const headDetection = toggle(
  'headDetection',
  API_PATHS.HEAD_DETECTION_GET,
  API_PATHS.HEAD_DETECTION_SET,
  'system',
  'head_detection'
);

export const autoConnection = toggle(
  'autoConnection',
  API_PATHS.AUTO_CONNECTION_GET,
  API_PATHS.AUTO_CONNECTION_SET,
  'system',
  'auto_connection'
);

/** Set-only; the enabled flag is read through the equalizer attribute */
export const equalizerEnabled = toggle(
  'equalizerEnabled',
  undefined,
  API_PATHS.EQUALIZER_ENABLED_SET,
  'audio',
  'equalizer'
);
