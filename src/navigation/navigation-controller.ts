/**
 * @file    navigation/navigation-controller.ts
 * @purpose Next/previous session and window navigation that converges on the
 *          server's real state, with a probing fallback and a learned,
 *          persisted index base per session.
 * @owner   panesync maintainers
 * @depends shared/types/frame.ts, navigation/probe-order.ts, polling/poller.ts
 *
 * Every step goes through the poller's fetch-and-wait, so callers always see
 * the just-switched frame rather than a cached one. Navigations run one at a
 * time in call order.
 */

import { EventEmitter } from 'events';
import { z } from 'zod';
import {
  Direction,
  Frame,
  IndexBase,
  NavigationSource,
  NavigationState,
  PaneIdentity,
} from '../shared/types/frame';
import {
  CaptureError,
  CaptureErrorKind,
  isConnectivityError,
  toCaptureError,
} from '../shared/errors';
import { KeyValueStore } from '../shared/store';
import { FetchAttempt } from '../polling/poller';
import { probeCandidates } from './probe-order';

// ─────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────

/** The slice of the poller navigation drives */
export interface NavigationTarget {
  selectTarget(target: string | null): void;
  fetchAndWait(): Promise<void>;
  requestFetch(): void;
  getSnapshot(): {
    readonly lastFrame: Frame | null;
    readonly lastAttempt: FetchAttempt | null;
    readonly selectedTarget: string | null;
  };
}

export type NavigationResult =
  | {
      readonly status: 'switched';
      readonly via: 'authoritative' | 'probe';
      readonly frame: Frame;
      readonly attempts: number;
    }
  | {
      readonly status: 'unchanged';
      readonly reason: string;
      readonly attempts: number;
    };

const INDEX_BASE_KEY = 'navigation.indexBase';

const indexBaseMapSchema = z.record(z.union([z.literal(0), z.literal(1)]));

export function paneTarget(session: string, windowIndex: number): string {
  return `${session}:${windowIndex}`;
}

// ─────────────────────────────────────────────
// Navigation Controller
// ─────────────────────────────────────────────

export class NavigationController extends EventEmitter {
  private poller: NavigationTarget;
  private source: NavigationSource;
  private store: KeyValueStore;

  private activeSession: string | null = null;
  private activeWindowIndex: number | null = null;
  private preferredIndexBase: Record<string, IndexBase>;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(poller: NavigationTarget, source: NavigationSource, store: KeyValueStore) {
    super();
    this.poller = poller;
    this.source = source;
    this.store = store;

    const stored = indexBaseMapSchema.safeParse(store.get(INDEX_BASE_KEY));
    this.preferredIndexBase = stored.success ? { ...stored.data } : {};
  }

  // ─── Public API ──────────────────────────

  switchWindow(direction: number): Promise<NavigationResult> {
    return this.serial(() => this.runSwitchWindow(direction));
  }

  switchSession(direction: number): Promise<NavigationResult> {
    return this.serial(() => this.runSwitchSession(direction));
  }

  getState(): NavigationState {
    return {
      activeSession: this.activeSession,
      activeWindowIndex: this.activeWindowIndex,
      preferredIndexBaseBySession: { ...this.preferredIndexBase },
    };
  }

  learnedBase(session: string): IndexBase | null {
    return this.preferredIndexBase[session] ?? null;
  }

  // ─── Private: Window Navigation ──────────

  private async runSwitchWindow(rawDirection: number): Promise<NavigationResult> {
    const direction = validateDirection(rawDirection);
    const current = await this.currentFrame();

    let pane: PaneIdentity | null;
    try {
      pane = await this.source.switchActive(direction, { kind: 'window', session: current.sessionId });
    } catch (err) {
      const error = toCaptureError(err);
      if (error.kind !== CaptureErrorKind.NotFound) throw error;
      console.log(`[Navigation] No authoritative window switch, probing ${current.sessionId}`);
      return this.finish(await this.probeWindows(current, direction));
    }

    return this.finish(await this.adopt(pane, current));
  }

  private async probeWindows(current: Frame, direction: Direction): Promise<NavigationResult> {
    const session = current.sessionId;
    const windows = await this.source.listWindows(session);
    const candidates = probeCandidates(current.windowIndex, direction, windows.length, this.learnedBase(session));
    if (candidates.length === 0) {
      return { status: 'unchanged', reason: 'only one window in session', attempts: 0 };
    }

    const previousTarget = this.poller.getSnapshot().selectedTarget;
    let attempts = 0;

    for (const candidate of candidates) {
      attempts++;
      this.poller.selectTarget(paneTarget(session, candidate.index));
      const attempt = await this.forcedFetch();

      if (!attempt.ok) {
        if (isConnectivityError(attempt.error)) {
          this.poller.selectTarget(previousTarget);
          throw attempt.error;
        }
        continue;
      }

      const observed = attempt.frame;
      if (observed.sessionId === session && observed.windowIndex !== current.windowIndex) {
        this.rememberBase(session, candidate.base);
        this.recordActive(observed);
        return { status: 'switched', via: 'probe', frame: observed, attempts };
      }
    }

    this.poller.selectTarget(previousTarget);
    this.poller.requestFetch();
    return { status: 'unchanged', reason: 'window did not change', attempts };
  }

  // ─── Private: Session Navigation ─────────

  private async runSwitchSession(rawDirection: number): Promise<NavigationResult> {
    const direction = validateDirection(rawDirection);
    const current = await this.currentFrame();

    let pane: PaneIdentity | null;
    try {
      pane = await this.source.switchActive(direction, { kind: 'session' });
    } catch (err) {
      const error = toCaptureError(err);
      if (error.kind !== CaptureErrorKind.NotFound) throw error;
      console.log('[Navigation] No authoritative session switch, selecting by name');
      return this.finish(await this.probeSessions(current, direction));
    }

    return this.finish(await this.adopt(pane, current));
  }

  private async probeSessions(current: Frame, direction: Direction): Promise<NavigationResult> {
    const names = (await this.source.listSessions()).map((s) => s.name);
    if (names.length < 2) {
      return { status: 'unchanged', reason: 'only one session', attempts: 0 };
    }

    const position = names.indexOf(current.sessionId);
    const nextPosition = position < 0
      ? (direction > 0 ? 0 : names.length - 1)
      : (position + direction + names.length) % names.length;
    const next = names[nextPosition];
    if (next === current.sessionId) {
      return { status: 'unchanged', reason: 'session did not change', attempts: 0 };
    }

    const previousTarget = this.poller.getSnapshot().selectedTarget;
    this.poller.selectTarget(next);
    const attempt = await this.forcedFetch();

    if (!attempt.ok) {
      this.poller.selectTarget(previousTarget);
      if (isConnectivityError(attempt.error)) throw attempt.error;
      return { status: 'unchanged', reason: 'session did not change', attempts: 1 };
    }
    if (attempt.frame.sessionId === current.sessionId) {
      this.poller.selectTarget(previousTarget);
      return { status: 'unchanged', reason: 'session did not change', attempts: 1 };
    }

    this.recordActive(attempt.frame);
    return { status: 'switched', via: 'probe', frame: attempt.frame, attempts: 1 };
  }

  // ─── Private: Shared Steps ───────────────

  /** The server told us where it went; follow it without guessing */
  private async adopt(pane: PaneIdentity | null, previous: Frame): Promise<NavigationResult> {
    if (pane) {
      this.poller.selectTarget(paneTarget(pane.session, pane.windowIndex));
    }
    const attempt = await this.forcedFetch();
    if (!attempt.ok) throw attempt.error;

    const observed = attempt.frame;
    this.recordActive(observed);
    if (observed.sessionId === previous.sessionId && observed.windowIndex === previous.windowIndex) {
      return { status: 'unchanged', reason: 'window did not change', attempts: 1 };
    }
    return { status: 'switched', via: 'authoritative', frame: observed, attempts: 1 };
  }

  private async forcedFetch(): Promise<FetchAttempt> {
    await this.poller.fetchAndWait();
    const attempt = this.poller.getSnapshot().lastAttempt;
    if (!attempt) {
      throw new Error('Fetch settled without recording an attempt');
    }
    return attempt;
  }

  private async currentFrame(): Promise<Frame> {
    const known = this.poller.getSnapshot().lastFrame;
    if (known) return known;

    await this.poller.fetchAndWait();
    const snapshot = this.poller.getSnapshot();
    if (snapshot.lastFrame) return snapshot.lastFrame;
    if (snapshot.lastAttempt && !snapshot.lastAttempt.ok) throw snapshot.lastAttempt.error;
    throw new CaptureError(CaptureErrorKind.TransientNetwork, 'No frame available to navigate from');
  }

  private recordActive(frame: Frame): void {
    this.activeSession = frame.sessionId;
    this.activeWindowIndex = frame.windowIndex;
  }

  private rememberBase(session: string, base: IndexBase): void {
    if (this.preferredIndexBase[session] === base) return;
    this.preferredIndexBase[session] = base;
    this.store.set(INDEX_BASE_KEY, { ...this.preferredIndexBase });
    console.log(`[Navigation] Learned ${base}-based window indices for ${session}`);
  }

  private finish(result: NavigationResult): NavigationResult {
    this.emit('navigated', result);
    return result;
  }

  private serial<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }
}

function validateDirection(direction: number): Direction {
  if (direction === 1 || direction === -1) return direction;
  throw new CaptureError(CaptureErrorKind.InvalidRequest, `Invalid direction: ${direction}`);
}
