/**
 * @file    polling/poller.ts
 * @purpose Owns the fetch schedule on the primary: coalesces fetch requests,
 *          drives the backoff counters and hands changed frames to replication.
 * @owner   panesync maintainers
 * @depends shared/types/frame.ts, polling/backoff-scheduler.ts,
 *          polling/change-detector.ts, capture/frame-cache.ts
 *
 * Key invariants:
 *   - At most one fetch in flight and at most one queued follow-up,
 *     however many callers ask
 *   - Every fetchAndWait() caller is released exactly once
 *   - A failed fetch never replaces the last good frame and never propagates
 *   - No periodic timer runs while in background
 *   - A resync never fetches outside the schedule while backing off from
 *     errors or while in background
 */

import { EventEmitter } from 'events';
import {
  BackoffConfig,
  BackoffState,
  CaptureSource,
  DEFAULT_BACKOFF_CONFIG,
  Frame,
} from '../shared/types/frame';
import { CaptureError, CaptureErrorKind, toCaptureError } from '../shared/errors';
import { SettingsStore } from '../shared/settings';
import { FrameCache } from '../capture/frame-cache';
import { computeInterval, exceedsHysteresis } from './backoff-scheduler';
import { hasChanged } from './change-detector';
import { BackgroundHost, TimerBackgroundHost } from './background-host';
import { PromptTracker } from './prompt-detector';

// ─────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────

export interface PollerConfig {
  /** Coarse wake interval requested from the host while in background (ms) */
  backgroundWakeMs: number;
  /** Overrides for the backoff constants; the base interval comes from settings */
  backoff: Partial<BackoffConfig>;
}

export const DEFAULT_POLLER_CONFIG: PollerConfig = {
  backgroundWakeMs: 5 * 60_000,
  backoff: {},
};

export interface PublishOptions {
  /** Send even if the companion already has this content */
  force?: boolean;
  commandFinished?: boolean;
}

/** Where changed frames go; implemented by ReplicationChannel */
export interface FramePublisher {
  publish(frame: Frame, options?: PublishOptions): Promise<unknown>;
}

export interface PollerDeps {
  publisher?: FramePublisher | null;
  settings?: SettingsStore;
  cache?: FrameCache | null;
  host?: BackgroundHost;
}

// ─────────────────────────────────────────────
// Snapshots
// ─────────────────────────────────────────────

export type FetchAttempt =
  | { readonly ok: true; readonly frame: Frame; readonly changed: boolean; readonly at: number }
  | { readonly ok: false; readonly error: CaptureError; readonly at: number };

export interface PollerSnapshot {
  readonly backoff: Readonly<BackoffState>;
  readonly intervalMs: number;
  readonly selectedTarget: string | null;
  readonly lastFrame: Frame | null;
  readonly lastAttempt: FetchAttempt | null;
  readonly isConnected: boolean;
  readonly errorMessage: string | null;
  readonly fetchCount: number;
}

// ─────────────────────────────────────────────
// Poller
// ─────────────────────────────────────────────

export class Poller extends EventEmitter {
  private source: CaptureSource;
  private publisher: FramePublisher | null;
  private settings: SettingsStore;
  private cache: FrameCache | null;
  private host: BackgroundHost;
  private config: PollerConfig;

  private backoff: BackoffState = {
    consecutiveUnchanged: 0,
    consecutiveErrors: 0,
    lowPowerMode: false,
    inBackground: false,
  };
  private lastHash: string = '';
  private lastFrame: Frame | null = null;
  private lastAttempt: FetchAttempt | null = null;
  private selectedTarget: string | null = null;
  private resyncRequested: boolean = false;
  private promptTracker: PromptTracker = new PromptTracker();
  private fetchCount: number = 0;

  // Coalescing state
  private inFlight: boolean = false;
  private pending: boolean = false;
  private waiters: Array<() => void> = [];

  // Scheduling state
  private running: boolean = false;
  private timer: ReturnType<typeof setInterval> | null = null;
  private currentIntervalMs: number = 0;
  private unwatchInterval: (() => void) | null = null;

  constructor(
    source: CaptureSource,
    deps: PollerDeps = {},
    config: Partial<PollerConfig> = {},
  ) {
    super();
    this.source = source;
    this.publisher = deps.publisher ?? null;
    this.settings = deps.settings ?? new SettingsStore();
    this.cache = deps.cache ?? null;
    this.host = deps.host ?? new TimerBackgroundHost();
    this.config = { ...DEFAULT_POLLER_CONFIG, ...config };
  }

  // ─── Lifecycle ───────────────────────────

  start(): void {
    if (this.running) return;
    this.running = true;

    // Show the cached frame, but leave lastHash empty so the first real
    // capture still propagates.
    const cached = this.cache?.load() ?? null;
    if (cached && !this.lastFrame) {
      this.lastFrame = cached;
      this.emit('frame', cached, false);
    }

    this.unwatchInterval = this.settings.watch('pollIntervalSec', () => this.reschedule());
    this.reschedule();
    this.requestFetch();
    this.emit('started');
    console.log(`[Poller] Started, interval ${this.currentIntervalMs}ms`);
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.backoff.inBackground = false;
    this.pending = false;
    this.clearTimer();
    this.host.cancelDeferredWake();
    this.unwatchInterval?.();
    this.unwatchInterval = null;
    this.emit('stopped');
    console.log('[Poller] Stopped');
  }

  // ─── Fetch Requests ──────────────────────

  /** Non-blocking; while a fetch is in flight this only marks a follow-up */
  requestFetch(): void {
    if (this.inFlight) {
      this.pending = true;
      return;
    }
    this.inFlight = true;
    this.runLoop().catch((err) => {
      console.error('[Poller] Fetch loop failed:', err);
    });
  }

  /** Resolves once a fetch that started after this call has settled */
  fetchAndWait(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
      this.requestFetch();
    });
  }

  /**
   * Companion lost track; the next successful fetch is published even if
   * unchanged. Fetches right away only in foreground with no errors
   * outstanding, otherwise the next timer tick or background wake does it.
   */
  requestResync(): void {
    this.resyncRequested = true;
    if (this.backoff.inBackground || this.backoff.consecutiveErrors > 0) return;
    this.requestFetch();
  }

  /** Select the capture target for subsequent fetches; null = server default */
  selectTarget(target: string | null): void {
    this.selectedTarget = target;
  }

  // ─── Execution State ─────────────────────

  enterBackground(): void {
    if (this.backoff.inBackground) return;
    this.backoff.inBackground = true;
    this.pending = false;
    this.clearTimer();
    this.scheduleBackgroundWake();
    console.log('[Poller] Entered background, periodic polling cancelled');
  }

  enterForeground(): void {
    if (!this.backoff.inBackground) return;
    this.backoff.inBackground = false;
    this.host.cancelDeferredWake();
    this.backoff.consecutiveErrors = 0;
    this.backoff.consecutiveUnchanged = 0;
    this.clearTimer();
    this.reschedule();
    this.requestFetch();
    console.log('[Poller] Returned to foreground');
  }

  setLowPowerMode(enabled: boolean): void {
    if (this.backoff.lowPowerMode === enabled) return;
    this.backoff.lowPowerMode = enabled;
    this.reschedule();
  }

  // ─── Getters ─────────────────────────────

  getSnapshot(): PollerSnapshot {
    const attempt = this.lastAttempt;
    return {
      backoff: { ...this.backoff },
      intervalMs: this.currentIntervalMs,
      selectedTarget: this.selectedTarget,
      lastFrame: this.lastFrame,
      lastAttempt: attempt,
      isConnected: attempt !== null && attempt.ok,
      errorMessage: attempt !== null && !attempt.ok ? attempt.error.message : null,
      fetchCount: this.fetchCount,
    };
  }

  /** Interval the scheduler would pick right now (ms) */
  nextInterval(): number {
    return computeInterval(this.backoff, this.backoffConfig());
  }

  // ─── Private: Coalescing Loop ────────────

  private async runLoop(): Promise<void> {
    try {
      do {
        this.pending = false;
        await this.pollOnce();
      } while (this.pending);
    } finally {
      this.inFlight = false;
      const waiters = this.waiters;
      this.waiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  private async pollOnce(): Promise<void> {
    this.fetchCount++;
    let frame: Frame;
    try {
      frame = await this.source.fetch(this.selectedTarget);
    } catch (err) {
      this.recordFailure(toCaptureError(err));
      this.reschedule();
      return;
    }

    const changed = this.recordSuccess(frame);
    await this.propagate(frame, changed);
    this.reschedule();
  }

  private recordSuccess(frame: Frame): boolean {
    const changed = hasChanged(frame.contentHash, this.lastHash);
    this.backoff.consecutiveErrors = 0;
    this.backoff.consecutiveUnchanged = changed ? 0 : this.backoff.consecutiveUnchanged + 1;
    this.lastHash = frame.contentHash;
    this.lastFrame = frame;
    this.lastAttempt = { ok: true, frame, changed, at: Date.now() };

    if (changed) {
      this.cache?.save(frame);
    }
    this.emit('frame', frame, changed);
    return changed;
  }

  private recordFailure(error: CaptureError): void {
    this.backoff.consecutiveErrors++;
    this.lastAttempt = { ok: false, error, at: Date.now() };

    switch (error.kind) {
      case CaptureErrorKind.Unauthorized:
        console.error('[Poller] Capture server rejected credentials:', error.message);
        this.emit('unauthorized', error);
        break;
      case CaptureErrorKind.ServerError:
        console.error(`[Poller] Server error ${error.status ?? '?'}: ${error.detail ?? error.message}`);
        break;
      default:
        console.warn(`[Poller] Fetch failed (${error.kind}):`, error.message);
    }
    this.emit('fetch-failed', error);
  }

  private async propagate(frame: Frame, changed: boolean): Promise<void> {
    const resync = this.resyncRequested;
    if (!changed && !resync) return;
    this.resyncRequested = false;

    const commandFinished = changed ? this.promptTracker.observe(frame.content) : false;
    if (commandFinished) {
      this.emit('command-finished', frame);
    }
    if (!this.publisher) return;

    try {
      await this.publisher.publish(frame, { force: resync, commandFinished });
    } catch (err) {
      // Eventually consistent: the next change or resync sends current state
      console.warn('[Poller] Publish failed:', err);
    }
  }

  // ─── Private: Scheduling ─────────────────

  private backoffConfig(): BackoffConfig {
    return {
      ...DEFAULT_BACKOFF_CONFIG,
      ...this.config.backoff,
      baseIntervalSec: this.settings.get('pollIntervalSec'),
    };
  }

  /** Cancel-and-recreate the periodic timer when the interval moved enough */
  private reschedule(): void {
    if (!this.running || this.backoff.inBackground) return;

    const config = this.backoffConfig();
    const next = computeInterval(this.backoff, config);
    if (this.timer !== null && !exceedsHysteresis(this.currentIntervalMs, next, config)) {
      return;
    }

    this.clearTimer();
    this.timer = setInterval(() => this.requestFetch(), next);
    this.currentIntervalMs = next;
    this.emit('interval-changed', next);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private scheduleBackgroundWake(): void {
    this.host.requestDeferredWake(this.config.backgroundWakeMs, () => {
      this.fetchAndWait()
        .then(() => {
          if (this.running && this.backoff.inBackground) {
            this.scheduleBackgroundWake();
          }
        })
        .catch((err) => {
          console.error('[Poller] Background wake failed:', err);
        });
    });
  }
}
