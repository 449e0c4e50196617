// src/attributes/attribute.ts

import { DecodingError, EncodingError } from '../errors.js';
import type { AttributeId, AttributeValueMap } from '../types/headset-types.js';

/**
 * Element as produced by xml2js with `explicitArray: false`:
 * attributes under `$`, child elements under their tag name
 * (an array when the tag repeats).
 */
export interface XmlElement {
  $?: Record<string, string>;
  [child: string]: unknown;
}

/**
 * Everything the codec needs to know about one device attribute.
 */
export interface AttributeDefinition<K extends AttributeId, V = AttributeValueMap[K]> {
  readonly id: K;
  readonly getPath?: string;
  readonly setPath?: string;
  /**
   * Reads the value from the children of an `<answer>` or `<notify>` element.
   * Returns undefined when the body does not carry the attribute at all.
   * @throws DecodingError when the attribute is present but incomplete or mistyped
   */
  parse(body: XmlElement): V | undefined;
  /** Children of the `<answer>` element reporting this value */
  toXml(value: V): XmlElement;
  /**
   * Checks shape and domain of a value about to go on the wire.
   * @throws EncodingError when the value is outside the attribute's domain
   */
  validate(value: unknown): V;
  /** Query-string argument of a set command; absent for read-only attributes */
  toArg?(value: V): string;
  /**
   * @throws DecodingError when the argument cannot be read
   */
  fromArg?(arg: string): V;
}

export function isXmlElement(value: unknown): value is XmlElement {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * xml2js renders `<tag/>` as an empty string; treat it as an empty element.
 */
function asElement(value: unknown): XmlElement | undefined {
  if (isXmlElement(value)) return value;
  if (value === '') return {};
  return undefined;
}

/**
 * Walks down a chain of child tags, taking the first occurrence at each level.
 */
export function childElement(node: XmlElement, ...tags: string[]): XmlElement | undefined {
  let current: XmlElement | undefined = node;
  for (const tag of tags) {
    if (!current) return undefined;
    const next: unknown = current[tag];
    current = asElement(Array.isArray(next) ? next[0] : next);
  }
  return current;
}

/**
 * All occurrences of a child tag, in document order.
 */
export function childElements(node: XmlElement, tag: string): XmlElement[] {
  const value = node[tag];
  const list: unknown[] = Array.isArray(value) ? value : value === undefined ? [] : [value];
  return list.map(asElement).filter((el): el is XmlElement => el !== undefined);
}

export function attribute(node: XmlElement, name: string): string | undefined {
  return node.$?.[name];
}

export function requireAttribute(node: XmlElement, name: string, where: string): string {
  const value = attribute(node, name);
  if (value === undefined) {
    throw new DecodingError(`Missing required attribute "${name}" in ${where}`);
  }
  return value;
}

export function parseBooleanText(text: string, where: string): boolean {
  if (text === 'true') return true;
  if (text === 'false') return false;
  throw new DecodingError(`Expected true/false for ${where}, got "${text}"`);
}

export function parseIntegerText(text: string, where: string): number {
  if (!/^-?\d+$/.test(text)) {
    throw new DecodingError(`Expected an integer for ${where}, got "${text}"`);
  }
  return Number.parseInt(text, 10);
}

export function validateBoolean(id: AttributeId, value: unknown): boolean {
  if (typeof value !== 'boolean') {
    throw new EncodingError(`${id} expects a boolean, got ${typeof value} ${String(value)}`);
  }
  return value;
}

export function validateIntegerInRange(
  id: AttributeId,
  value: unknown,
  min: number,
  max: number
): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    throw new EncodingError(`${id} must be an integer ${min}-${max}, got ${String(value)}`);
  }
  return value;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
