/**
 * @file    test/navigation-controller.test.ts
 * @purpose Navigation against an in-process tmux-like server, driven through
 *          a real Poller.
 *
 * Test plan (must pass):
 *   - Authoritative switch is adopted without probing
 *   - Probing finds the neighbour and learns the session's index base
 *   - A learned base is tried first on the next navigation and persisted
 *   - Probing that never moves leaves the pane unchanged and restores the target
 *   - Connectivity failures abort navigation and restore the target
 *   - Session fallback selects the neighbour by name
 */

import { NavigationController, NavigationResult } from '../src/navigation/navigation-controller';
import { Poller } from '../src/polling/poller';
import { MemoryStore } from '../src/shared/store';
import { CaptureError, CaptureErrorKind } from '../src/shared/errors';
import { NavigationSource } from '../src/shared/types/frame';
import {
  FakeCaptureSource,
  FakeTmuxServer,
  flush,
  makeFrame,
  quietConsole,
} from './helpers/fakes';

// ═══════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════

function makeServer(): FakeTmuxServer {
  return new FakeTmuxServer(
    {
      main: { base: 1, names: ['editor', 'build', 'logs'] },
      work: { base: 0, names: ['api', 'db'] },
    },
    'main',
  );
}

function setup(server: FakeTmuxServer, store: MemoryStore = new MemoryStore()) {
  const poller = new Poller(server);
  const navigation = new NavigationController(poller, server, store);
  return { poller, navigation, store };
}

function switchedTo(result: NavigationResult): string | null {
  return result.status === 'switched'
    ? `${result.frame.sessionId}:${result.frame.windowIndex}`
    : null;
}

// ═══════════════════════════════════════════
// TESTS
// ═══════════════════════════════════════════

describe('NavigationController', () => {
  quietConsole();

  // ─── Authoritative ────────────────────────

  describe('authoritative switching', () => {
    it('should adopt the pane the server reports', async () => {
      const server = makeServer();
      server.switchSupported = true;
      const { navigation, poller } = setup(server);

      const result = await navigation.switchWindow(1);

      expect(result).toMatchObject({ status: 'switched', via: 'authoritative', attempts: 1 });
      expect(switchedTo(result)).toBe('main:2');
      expect(poller.getSnapshot().selectedTarget).toBe('main:2');
      expect(navigation.getState()).toMatchObject({ activeSession: 'main', activeWindowIndex: 2 });
    });

    it('should run concurrent navigations one after another', async () => {
      const server = makeServer();
      server.switchSupported = true;
      const { navigation } = setup(server);

      const results = await Promise.all([navigation.switchWindow(1), navigation.switchWindow(1)]);

      expect(results.map(switchedTo)).toEqual(['main:2', 'main:3']);
    });

    it('should switch sessions through the server', async () => {
      const server = makeServer();
      server.switchSupported = true;
      const { navigation } = setup(server);

      const result = await navigation.switchSession(1);

      expect(switchedTo(result)).toBe('work:0');
    });

    it('should emit navigated with the result', async () => {
      const server = makeServer();
      server.switchSupported = true;
      const { navigation } = setup(server);
      const onNavigated = jest.fn();
      navigation.on('navigated', onNavigated);

      const result = await navigation.switchWindow(-1);

      expect(onNavigated).toHaveBeenCalledWith(result);
      expect(switchedTo(result)).toBe('main:3');
    });
  });

  // ─── Probing ──────────────────────────────

  describe('probing fallback', () => {
    it('should skip a missing index and learn a 1-based session', async () => {
      const server = makeServer();
      const { navigation, store } = setup(server);

      // main:1 → base 0 guess main:0 (404) → base 1 guess main:3
      const result = await navigation.switchWindow(-1);

      expect(result).toMatchObject({ status: 'switched', via: 'probe', attempts: 2 });
      expect(switchedTo(result)).toBe('main:3');
      expect(server.fetchTargets).toEqual([null, 'main:0', 'main:3']);
      expect(navigation.learnedBase('main')).toBe(1);
      expect(store.get('navigation.indexBase')).toEqual({ main: 1 });
    });

    it('should try the learned base first next time', async () => {
      const server = makeServer();
      const { navigation } = setup(server);

      await navigation.switchWindow(-1);
      const result = await navigation.switchWindow(-1);

      expect(result).toMatchObject({ status: 'switched', attempts: 1 });
      expect(switchedTo(result)).toBe('main:2');
    });

    it('should restore a learned base from the store', () => {
      const store = new MemoryStore();
      store.set('navigation.indexBase', { main: 1, work: 0 });
      const { navigation } = setup(makeServer(), store);

      expect(navigation.learnedBase('main')).toBe(1);
      expect(navigation.getState().preferredIndexBaseBySession).toEqual({ main: 1, work: 0 });
    });

    it('should ignore a malformed stored base', () => {
      const store = new MemoryStore();
      store.set('navigation.indexBase', { main: 5 });
      const { navigation } = setup(makeServer(), store);

      expect(navigation.learnedBase('main')).toBeNull();
    });

    it('should report unchanged for a single-window session', async () => {
      const server = new FakeTmuxServer({ solo: { base: 0, names: ['only'] } }, 'solo');
      const { navigation } = setup(server);

      const result = await navigation.switchWindow(1);

      expect(result).toEqual({ status: 'unchanged', reason: 'only one window in session', attempts: 0 });
    });

    it('should restore the target when no candidate moves the pane', async () => {
      const source = new FakeCaptureSource(() => makeFrame());
      const navigationSource: NavigationSource = {
        switchActive: () => Promise.reject(CaptureError.fromStatus(404, 'Not Found')),
        listWindows: async () => [
          { session: 'main', index: 0, name: 'shell', active: true },
          { session: 'main', index: 1, name: 'top', active: false },
        ],
        listSessions: async () => [],
      };
      const poller = new Poller(source);
      const navigation = new NavigationController(poller, navigationSource, new MemoryStore());

      const result = await navigation.switchWindow(1);
      await flush();

      expect(result).toEqual({ status: 'unchanged', reason: 'window did not change', attempts: 2 });
      expect(source.calls).toEqual([null, 'main:1', 'main:2', null]);
      expect(poller.getSnapshot().selectedTarget).toBeNull();
      expect(navigation.learnedBase('main')).toBeNull();
    });

    it('should abort and restore the target on a connectivity failure', async () => {
      const server = makeServer();
      const { navigation, poller } = setup(server);
      await poller.fetchAndWait();
      server.failure = CaptureError.network(new Error('ECONNRESET'));

      await expect(navigation.switchWindow(1)).rejects.toMatchObject({
        kind: CaptureErrorKind.TransientNetwork,
      });
      expect(poller.getSnapshot().selectedTarget).toBeNull();
    });

    it('should pick the neighbouring session by name', async () => {
      const server = makeServer();
      const { navigation, poller } = setup(server);

      const result = await navigation.switchSession(-1);

      expect(result).toMatchObject({ status: 'switched', via: 'probe', attempts: 1 });
      expect(switchedTo(result)).toBe('work:0');
      expect(poller.getSnapshot().selectedTarget).toBe('work');
    });
  });

  // ─── Validation ───────────────────────────

  describe('validation', () => {
    it('should reject a direction other than ±1', async () => {
      const { navigation } = setup(makeServer());

      await expect(navigation.switchWindow(0)).rejects.toMatchObject({
        kind: CaptureErrorKind.InvalidRequest,
      });
    });

    it('should surface errors other than not-found from the switch call', async () => {
      const server = makeServer();
      const { navigation } = setup(server);
      await navigation.switchWindow(1);
      jest.spyOn(server, 'switchActive').mockRejectedValue(CaptureError.fromStatus(401));

      await expect(navigation.switchSession(1)).rejects.toMatchObject({
        kind: CaptureErrorKind.Unauthorized,
      });
    });
  });
});
