/**
 * @file    capture/frame-cache.ts
 * @purpose Last-known-good frame cache, so a restart shows something immediately.
 * @depends shared/store.ts, shared/schemas.ts
 */

import { Frame } from '../shared/types/frame';
import { KeyValueStore } from '../shared/store';
import { frameSchema } from '../shared/schemas';

export class FrameCache {
  private store: KeyValueStore;
  private key: string;

  constructor(store: KeyValueStore, key: string) {
    this.store = store;
    this.key = key;
  }

  load(): Frame | null {
    const parsed = frameSchema.safeParse(this.store.get(this.key));
    if (!parsed.success) return null;
    return parsed.data;
  }

  save(frame: Frame): void {
    this.store.set(this.key, frame);
  }

  clear(): void {
    this.store.delete(this.key);
  }
}
