// src/cache/device-state-cache.ts

import { ATTRIBUTE_IDS } from '../attributes/index.js';
import { DEFAULTS } from '../constants/constants.js';
import { HeadsetConfigError } from '../errors.js';
import type {
  AttributeId,
  AttributeValueMap,
  CachedAttribute,
  DeviceStateCacheOptions,
} from '../types/headset-types.js';

interface StoredAttribute<T> {
  value: T;
  updatedAt: number;
  invalidated: boolean;
}

type StoredAttributes = { [K in AttributeId]?: StoredAttribute<AttributeValueMap[K]> };

export type CacheSnapshot = { [K in AttributeId]?: CachedAttribute<AttributeValueMap[K]> };

function checkWindow(id: string, windowMs: number): number {
  if (!Number.isFinite(windowMs) || windowMs < 0) {
    throw new HeadsetConfigError(`Staleness window for ${id} must be >= 0, got ${windowMs}`);
  }
  return windowMs;
}

/**
 * Last known value of every device attribute.
 *
 * Updates are ordered by their timestamp, not by arrival: an update older
 * than what is stored is ignored, an equal one is applied. A value is
 * stale once it is older than its staleness window or has been
 * invalidated. The cache never talks to the device. Values are copied in
 * and out, so callers cannot change what is stored.
 */
export class DeviceStateCache {
  private entries: StoredAttributes = {};
  private readonly stalenessWindowMs: number;
  private readonly overrides: Partial<Record<AttributeId, number>>;
  private readonly now: () => number;

  constructor(options: DeviceStateCacheOptions = {}) {
    this.stalenessWindowMs = checkWindow(
      'all attributes',
      options.stalenessWindowMs ?? DEFAULTS.STALENESS_WINDOW_MS
    );
    this.overrides = { ...options.stalenessOverrides };
    for (const [id, windowMs] of Object.entries(this.overrides)) {
      if (windowMs !== undefined) checkWindow(id, windowMs);
    }
    this.now = options.now ?? Date.now;
  }

  /**
   * @returns true when the value was applied, false when a newer one is already stored
   */
  update<K extends AttributeId>(id: K, value: AttributeValueMap[K], timestamp: number): boolean {
    const current = this.entries[id];
    if (current && timestamp < current.updatedAt) {
      return false;
    }
    this.entries[id] = { value: structuredClone(value), updatedAt: timestamp, invalidated: false };
    return true;
  }

  read<K extends AttributeId>(id: K): CachedAttribute<AttributeValueMap[K]> | undefined {
    const entry = this.entries[id];
    if (!entry) return undefined;
    const age = this.now() - entry.updatedAt;
    const stale = entry.invalidated || age > this.windowFor(id);
    return {
      value: structuredClone(entry.value),
      updatedAt: entry.updatedAt,
      freshness: stale ? 'stale' : 'fresh',
    };
  }

  /** Value if one is stored and fresh */
  fresh<K extends AttributeId>(id: K): AttributeValueMap[K] | undefined {
    const cached = this.read(id);
    return cached?.freshness === 'fresh' ? cached.value : undefined;
  }

  has(id: AttributeId): boolean {
    return this.entries[id] !== undefined;
  }

  /**
   * Marks the value stale without dropping it; the next update of any
   * timestamp not older than the stored one makes it fresh again.
   */
  invalidate(id: AttributeId): void {
    const entry = this.entries[id];
    if (entry) entry.invalidated = true;
  }

  /** Drops the value; returns whether one was stored */
  remove(id: AttributeId): boolean {
    const stored = this.entries[id] !== undefined;
    delete this.entries[id];
    return stored;
  }

  clear(): void {
    this.entries = {};
  }

  snapshot(): CacheSnapshot {
    const out: CacheSnapshot = {};
    for (const id of ATTRIBUTE_IDS) {
      this.copyInto(out, id);
    }
    return out;
  }

  private copyInto<K extends AttributeId>(out: CacheSnapshot, id: K): void {
    const cached = this.read(id);
    if (cached) out[id] = cached;
  }

  private windowFor(id: AttributeId): number {
    return this.overrides[id] ?? this.stalenessWindowMs;
  }
}
