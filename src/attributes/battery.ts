// src/attributes/battery.ts

import { API_PATHS } from '../constants/constants.js';
import { DecodingError, EncodingError } from '../errors.js';
import type { BatteryStatus } from '../types/headset-types.js';
import {
  AttributeDefinition,
  XmlElement,
  childElement,
  isRecord,
  parseIntegerText,
  requireAttribute,
  validateIntegerInRange,
} from './attribute.js';

const WHERE = 'system/battery';
const MAX_LEVEL = 100;

/**
 * Battery report: `<system><battery state="in_use|charging" level="0-100|"/></system>`.
 * An empty level while in use means the device is still estimating.
 */
export const battery: AttributeDefinition<'battery'> = {
  id: 'battery',
  getPath: API_PATHS.BATTERY_GET,

  parse(body: XmlElement): BatteryStatus | undefined {
    const node = childElement(body, 'system', 'battery');
    if (!node) return undefined;

    const state = requireAttribute(node, 'state', WHERE);
    if (state === 'charging') {
      return { state: 'charging', level: null };
    }

    const levelText = requireAttribute(node, 'level', WHERE);
    if (levelText === '') {
      return { state: 'calculating', level: null };
    }

    const level = parseIntegerText(levelText, `${WHERE}@level`);
    if (level < 0 || level > MAX_LEVEL) {
      throw new DecodingError(`Battery level out of range: ${level}`);
    }
    return { state: 'in_use', level };
  },

  toXml(value: BatteryStatus): XmlElement {
    const state = value.state === 'charging' ? 'charging' : 'in_use';
    const level = value.state === 'in_use' && value.level !== null ? String(value.level) : '';
    return { system: { battery: { $: { state, level } } } };
  },

  validate(value: unknown): BatteryStatus {
    if (!isRecord(value)) {
      throw new EncodingError(`battery expects a status object, got ${String(value)}`);
    }
    const { state, level } = value;
    if (state === 'in_use') {
      return { state, level: validateIntegerInRange('battery', level, 0, MAX_LEVEL) };
    }
    if ((state === 'charging' || state === 'calculating') && level === null) {
      return { state, level };
    }
    throw new EncodingError(
      `Invalid battery status: state=${String(state)} level=${String(level)}`
    );
  },
};
