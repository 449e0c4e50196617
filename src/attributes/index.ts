// src/attributes/index.ts

import type { AttributeId } from '../types/headset-types.js';
import type { AttributeDefinition } from './attribute.js';
import { battery } from './battery.js';
import { deviceType, softwareVersion } from './device-info.js';
import { equalizer, equalizerPreset, equalizerPresets } from './equalizer.js';
import {
  autoConnection,
  equalizerEnabled,
  headDetection,
  noiseCancellation,
  specificMode,
} from './toggles.js';

export type AttributeRegistry = { readonly [K in AttributeId]: AttributeDefinition<K> };

export const ATTRIBUTES: AttributeRegistry = {
  battery,
  softwareVersion,
  deviceType,
  noiseCancellation,
  specificMode,
  headDetection,
  autoConnection,
  equalizer,
  equalizerEnabled,
  equalizerPreset,
  equalizerPresets,
};

export type AnyAttributeDefinition = AttributeRegistry[AttributeId];

export interface PathMatch {
  definition: AnyAttributeDefinition;
  role: 'get' | 'set';
}

const BY_PATH = new Map<string, PathMatch>();
for (const definition of Object.values(ATTRIBUTES)) {
  if (definition.getPath) BY_PATH.set(definition.getPath, { definition, role: 'get' });
  if (definition.setPath) BY_PATH.set(definition.setPath, { definition, role: 'set' });
}

/**
 * Resolves an API path to the attribute it reads or writes.
 */
export function findAttributeByPath(path: string): PathMatch | undefined {
  return BY_PATH.get(path);
}

/** Attributes that can be queried, in the order they are synced on connect */
export const READABLE_ATTRIBUTES: readonly AttributeId[] = [
  'softwareVersion',
  'deviceType',
  'battery',
  'noiseCancellation',
  'specificMode',
  'headDetection',
  'autoConnection',
  'equalizer',
  'equalizerPresets',
];

/** Every attribute id, readable ones first */
export const ATTRIBUTE_IDS: readonly AttributeId[] = [
  ...READABLE_ATTRIBUTES,
  'equalizerEnabled',
  'equalizerPreset',
];

export * from './attribute.js';
