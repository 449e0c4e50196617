// src/attributes/equalizer.ts

import { API_PATHS, MAX_EQ_PRESET_ID, MIN_EQ_PRESET_ID } from '../constants/constants.js';
import { DecodingError, EncodingError } from '../errors.js';
import type { EqualizerPreset, EqualizerState } from '../types/headset-types.js';
import {
  AttributeDefinition,
  XmlElement,
  childElement,
  childElements,
  parseBooleanText,
  isRecord,
  parseIntegerText,
  requireAttribute,
  validateBoolean,
  validateIntegerInRange,
} from './attribute.js';

const WHERE = 'audio/equalizer';

function parsePresetId(text: string, where: string): number {
  const id = parseIntegerText(text, where);
  if (id < MIN_EQ_PRESET_ID || id > MAX_EQ_PRESET_ID) {
    throw new DecodingError(`Equalizer preset id out of range: ${id}`);
  }
  return id;
}

type PresetOwner = 'equalizer' | 'equalizerPreset' | 'equalizerPresets';

function validatePresetId(id: PresetOwner, value: unknown): number {
  return validateIntegerInRange(id, value, MIN_EQ_PRESET_ID, MAX_EQ_PRESET_ID);
}

/** `<audio><equalizer enabled="true" preset_id="3"/></audio>` */
export const equalizer: AttributeDefinition<'equalizer'> = {
  id: 'equalizer',
  getPath: API_PATHS.EQUALIZER_GET,

  parse(body: XmlElement): EqualizerState | undefined {
    const node = childElement(body, 'audio', 'equalizer');
    if (!node) return undefined;
    return {
      enabled: parseBooleanText(requireAttribute(node, 'enabled', WHERE), `${WHERE}@enabled`),
      presetId: parsePresetId(requireAttribute(node, 'preset_id', WHERE), `${WHERE}@preset_id`),
    };
  },

  toXml: (value: EqualizerState): XmlElement => ({
    audio: {
      equalizer: { $: { enabled: String(value.enabled), preset_id: String(value.presetId) } },
    },
  }),

  validate(value: unknown): EqualizerState {
    if (!isRecord(value)) {
      throw new EncodingError(`equalizer expects a state object, got ${String(value)}`);
    }
    return {
      enabled: validateBoolean('equalizer', value['enabled']),
      presetId: validatePresetId('equalizer', value['presetId']),
    };
  },
};

/** Set-only; the selected preset is read through the equalizer attribute */
export const equalizerPreset: AttributeDefinition<'equalizerPreset'> = {
  id: 'equalizerPreset',
  setPath: API_PATHS.EQUALIZER_PRESET_SET,

  parse(body: XmlElement): number | undefined {
    const node = childElement(body, 'audio', 'equalizer');
    const presetId = node ? node.$?.['preset_id'] : undefined;
    if (presetId === undefined) return undefined;
    return parsePresetId(presetId, `${WHERE}@preset_id`);
  },

  toXml: (value: number): XmlElement => ({
    audio: { equalizer: { $: { preset_id: String(value) } } },
  }),

  validate: (value: unknown): number => validatePresetId('equalizerPreset', value),
  toArg: (value: number): string => String(value),
  fromArg: (arg: string): number => parsePresetId(arg, `${API_PATHS.EQUALIZER_PRESET_SET} arg`),
};

/**
 * `<audio><equalizer><presets_list><preset id="1" name="Vocal"/>…</presets_list></equalizer></audio>`
 */
export const equalizerPresets: AttributeDefinition<'equalizerPresets'> = {
  id: 'equalizerPresets',
  getPath: API_PATHS.EQUALIZER_PRESETS_GET,

  parse(body: XmlElement): EqualizerPreset[] | undefined {
    const list = childElement(body, 'audio', 'equalizer', 'presets_list');
    if (!list) return undefined;
    return childElements(list, 'preset').map(preset => ({
      id: parsePresetId(requireAttribute(preset, 'id', 'preset'), 'preset@id'),
      name: requireAttribute(preset, 'name', 'preset'),
    }));
  },

  toXml: (value: EqualizerPreset[]): XmlElement => ({
    audio: {
      equalizer: {
        presets_list: {
          preset: value.map(p => ({ $: { id: String(p.id), name: p.name } })),
        },
      },
    },
  }),

  validate(value: unknown): EqualizerPreset[] {
    if (!Array.isArray(value)) {
      throw new EncodingError(`equalizerPresets expects an array, got ${typeof value}`);
    }
    return value.map((preset: unknown) => {
      if (!isRecord(preset) || typeof preset['name'] !== 'string') {
        throw new EncodingError(`Invalid equalizer preset: ${JSON.stringify(preset)}`);
      }
      return { id: validatePresetId('equalizerPresets', preset['id']), name: preset['name'] };
    });
  },
};
