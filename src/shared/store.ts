/**
 * @file    shared/store.ts
 * @purpose Durable key-value storage for learned navigation state and frame caches.
 * @depends fs, path
 *
 * Values are plain JSON. Every key is independently idempotent, so writes
 * rewrite the whole file without any transaction. The primary and companion
 * may share one file under distinct keys; each write re-reads it first so
 * keys owned by the other process survive.
 */

import * as fs from 'fs';
import * as path from 'path';

export interface KeyValueStore {
  get(key: string): unknown;
  set(key: string, value: unknown): void;
  delete(key: string): void;
}

// ─────────────────────────────────────────────
// In-memory store
// ─────────────────────────────────────────────

export class MemoryStore implements KeyValueStore {
  private values: Map<string, unknown> = new Map();

  get(key: string): unknown {
    return this.values.get(key);
  }

  set(key: string, value: unknown): void {
    this.values.set(key, value);
  }

  delete(key: string): void {
    this.values.delete(key);
  }
}

// ─────────────────────────────────────────────
// JSON file store
// ─────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class JsonFileStore implements KeyValueStore {
  private filePath: string;
  private values: Record<string, unknown>;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.values = this.load();
  }

  get(key: string): unknown {
    return this.values[key];
  }

  set(key: string, value: unknown): void {
    this.update((values) => {
      values[key] = value;
    });
  }

  delete(key: string): void {
    this.update((values) => {
      delete values[key];
    });
  }

  // ─── Private ─────────────────────────────

  private update(mutate: (values: Record<string, unknown>) => void): void {
    const values = this.load();
    mutate(values);
    this.values = values;
    this.persist();
  }

  private load(): Record<string, unknown> {
    try {
      if (!fs.existsSync(this.filePath)) return {};
      const parsed: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf8'));
      return isRecord(parsed) ? parsed : {};
    } catch (err) {
      console.warn(`[Store] Ignoring unreadable state file ${this.filePath}:`, err);
      return {};
    }
  }

  private persist(): void {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      const tmp = `${this.filePath}.tmp`;
      fs.writeFileSync(tmp, JSON.stringify(this.values, null, 2));
      fs.renameSync(tmp, this.filePath);
    } catch (err) {
      console.warn(`[Store] Failed to persist ${this.filePath}:`, err);
    }
  }
}
