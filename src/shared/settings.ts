/**
 * @file    shared/settings.ts
 * @purpose Injected settings store with get/set/watch.
 * @depends events, shared/store.ts
 *
 * Reads are clamped to each setting's valid range; zero or missing values
 * fall back to the documented default.
 */

import { EventEmitter } from 'events';
import { KeyValueStore, MemoryStore } from './store';

export interface Settings {
  /** Primary poll interval, seconds (1–120, default 2) */
  pollIntervalSec: number;
  /** Companion font size in points (7–12, default 10) */
  companionFontSize: number;
  colorTheme: string;
}

export type SettingKey = keyof Settings;

export type SettingListener<K extends SettingKey> = (value: Settings[K]) => void;

const STORE_PREFIX = 'settings.';

/**
 * Clamp an integer setting. Zero, NaN and non-numbers mean "unset" and
 * resolve to the fallback.
 */
export function clampSetting(value: unknown, min: number, max: number, fallback: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value === 0) {
    return fallback;
  }
  return Math.min(Math.max(Math.round(value), min), max);
}

function normalizeTheme(value: unknown): string {
  return typeof value === 'string' && value.trim() !== '' ? value : 'default';
}

export class SettingsStore {
  private store: KeyValueStore;
  private emitter: EventEmitter = new EventEmitter();

  constructor(store: KeyValueStore = new MemoryStore()) {
    this.store = store;
  }

  get<K extends SettingKey>(key: K): Settings[K];
  get(key: SettingKey): Settings[SettingKey] {
    const raw = this.store.get(STORE_PREFIX + key);
    switch (key) {
      case 'pollIntervalSec':
        return clampSetting(raw, 1, 120, 2);
      case 'companionFontSize':
        return clampSetting(raw, 7, 12, 10);
      case 'colorTheme':
        return normalizeTheme(raw);
    }
  }

  /** Write a setting; watchers fire only when the effective value changes */
  set<K extends SettingKey>(key: K, value: Settings[K]): void {
    const before = this.get(key);
    this.store.set(STORE_PREFIX + key, value);
    const after = this.get(key);
    if (after !== before) {
      this.emitter.emit(key, after);
    }
  }

  /** Subscribe to changes of one setting; returns an unsubscribe function */
  watch<K extends SettingKey>(key: K, listener: SettingListener<K>): () => void {
    const handler = (value: Settings[K]): void => listener(value);
    this.emitter.on(key, handler);
    return () => {
      this.emitter.off(key, handler);
    };
  }

  snapshot(): Settings {
    return {
      pollIntervalSec: this.get('pollIntervalSec'),
      companionFontSize: this.get('companionFontSize'),
      colorTheme: this.get('colorTheme'),
    };
  }
}
