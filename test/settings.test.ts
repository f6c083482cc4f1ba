/**
 * @file    test/settings.test.ts
 * @purpose Unit tests for the settings store, key-value stores and frame cache.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { clampSetting, SettingsStore } from '../src/shared/settings';
import { JsonFileStore, MemoryStore } from '../src/shared/store';
import { FrameCache } from '../src/capture/frame-cache';
import { makeFrame, quietConsole } from './helpers/fakes';

// ═══════════════════════════════════════════
// TESTS
// ═══════════════════════════════════════════

describe('SettingsStore', () => {
  it('should start from the documented defaults', () => {
    expect(new SettingsStore().snapshot()).toEqual({
      pollIntervalSec: 2,
      companionFontSize: 10,
      colorTheme: 'default',
    });
  });

  it('should clamp reads to each valid range', () => {
    const settings = new SettingsStore();

    settings.set('pollIntervalSec', 500);
    settings.set('companionFontSize', 3);
    expect(settings.get('pollIntervalSec')).toBe(120);
    expect(settings.get('companionFontSize')).toBe(7);

    settings.set('pollIntervalSec', 0);
    settings.set('companionFontSize', 12.6);
    expect(settings.get('pollIntervalSec')).toBe(2);
    expect(settings.get('companionFontSize')).toBe(12);
  });

  it('should treat a blank theme as the default', () => {
    const settings = new SettingsStore();

    settings.set('colorTheme', '  ');

    expect(settings.get('colorTheme')).toBe('default');
  });

  it('should notify watchers only when the effective value changes', () => {
    const settings = new SettingsStore();
    const listener = jest.fn();
    const unwatch = settings.watch('pollIntervalSec', listener);

    settings.set('pollIntervalSec', 2);
    settings.set('pollIntervalSec', 5);
    settings.set('pollIntervalSec', 5);
    unwatch();
    settings.set('pollIntervalSec', 9);

    expect(listener.mock.calls).toEqual([[5]]);
  });

  it('should read values written to the underlying store', () => {
    const store = new MemoryStore();
    store.set('settings.colorTheme', 'gruvbox');

    expect(new SettingsStore(store).get('colorTheme')).toBe('gruvbox');
  });
});

describe('clampSetting', () => {
  it('should fall back for non-numbers', () => {
    expect(clampSetting('5', 1, 10, 3)).toBe(3);
    expect(clampSetting(undefined, 1, 10, 3)).toBe(3);
    expect(clampSetting(Infinity, 1, 10, 3)).toBe(3);
  });
});

describe('JsonFileStore', () => {
  quietConsole();

  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'panesync-store-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should persist values across instances', () => {
    const file = path.join(dir, 'nested', 'state.json');
    const store = new JsonFileStore(file);

    store.set('navigation.indexBase', { main: 1 });
    store.set('scratch', true);
    store.delete('scratch');

    const reopened = new JsonFileStore(file);
    expect(reopened.get('navigation.indexBase')).toEqual({ main: 1 });
    expect(reopened.get('scratch')).toBeUndefined();
    expect(fs.existsSync(`${file}.tmp`)).toBe(false);
  });

  it('should keep keys written through another store on the same file', () => {
    const file = path.join(dir, 'state.json');
    const primary = new JsonFileStore(file);
    const companion = new JsonFileStore(file);

    primary.set('navigation.indexBase', { main: 1 });
    new FrameCache(companion, 'cache.companionFrame').save(makeFrame({ contentHash: 'c1' }));

    const reopened = new JsonFileStore(file);
    expect(reopened.get('navigation.indexBase')).toEqual({ main: 1 });
    expect(new FrameCache(reopened, 'cache.companionFrame').load()?.contentHash).toBe('c1');
    expect(companion.get('navigation.indexBase')).toEqual({ main: 1 });
  });

  it('should start empty from an unreadable file', () => {
    const file = path.join(dir, 'state.json');
    fs.writeFileSync(file, '{ not json');

    const store = new JsonFileStore(file);

    expect(store.get('anything')).toBeUndefined();
    expect(console.warn).toHaveBeenCalled();
  });

  it('should start empty from a file holding something other than an object', () => {
    const file = path.join(dir, 'state.json');
    fs.writeFileSync(file, '[1, 2, 3]');

    expect(new JsonFileStore(file).get('0')).toBeUndefined();
  });
});

describe('FrameCache', () => {
  it('should round-trip the last frame', () => {
    const cache = new FrameCache(new MemoryStore(), 'cache.primaryFrame');
    const frame = makeFrame({ contentHash: 'cached' });

    cache.save(frame);

    expect(cache.load()).toEqual(frame);
  });

  it('should ignore an entry that is not a frame', () => {
    const store = new MemoryStore();
    store.set('cache.primaryFrame', { contentHash: 'partial' });

    expect(new FrameCache(store, 'cache.primaryFrame').load()).toBeNull();
  });

  it('should clear the entry', () => {
    const cache = new FrameCache(new MemoryStore(), 'cache.primaryFrame');
    cache.save(makeFrame());

    cache.clear();

    expect(cache.load()).toBeNull();
  });
});
