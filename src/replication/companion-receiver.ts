/**
 * @file    replication/companion-receiver.ts
 * @purpose Companion-side half of replication: accepts stamped payloads,
 *          renders or defers them, and keeps the primary from going quiet.
 * @owner   panesync maintainers
 * @depends events, replication/sequence.ts, replication/wire.ts,
 *          renderer/terminal-renderer.ts, shared/settings.ts
 *
 * Key invariants:
 *   - Payloads are applied in non-decreasing stamp order; stale ones are dropped
 *   - Settings always apply, even when the frame itself is a repeat
 *   - While the display is reduced only the latest frame is kept, and resuming
 *     renders exactly once
 *
 * The staleness pulse asks the primary for a refresh when nothing arrived
 * for longer than the poll interval suggests it should have.
 */

import { EventEmitter } from 'events';
import {
  CompanionDisplay,
  CompanionView,
  DisplayState,
  Frame,
  Renderer,
  ScenePhase,
  SequenceStamp,
} from '../shared/types/frame';
import {
  Transport,
  TransportEvent,
  TransportEventType,
} from '../shared/types/transport';
import { Settings, SettingKey, SettingsStore } from '../shared/settings';
import { FrameCache } from '../capture/frame-cache';
import { TerminalRenderer } from '../renderer/terminal-renderer';
import { SequenceGate } from './sequence';
import {
  companionPayloadSchema,
  PayloadKind,
  RefreshRequest,
  RenderedFrame,
  RequestKind,
  STORE_KIND_REFRESH,
  STORE_KIND_SWITCH,
  SwitchRequest,
  WireSettings,
} from './wire';

// ─────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────

export interface CompanionReceiverConfig {
  activeStaleMinMs: number;
  activePollPadMs: number;
  reducedStaleMinMs: number;
  reducedPollFactor: number;
  /** Staleness target grows by this factor per unchanged payload past the grace count */
  unchangedGrowth: number;
  unchangedGrace: number;
  maxGrowthExponent: number;
  activeStaleCapMs: number;
  reducedStaleCapMs: number;
  failureBackoffBaseMs: number;
  failureBackoffCapMs: number;
  maxFailureExponent: number;
  minPulseDelayMs: number;
  autoRefreshDebounceMs: number;
  refreshHintGapMs: Record<DisplayState, number>;
  refreshHintCap: Record<DisplayState, number>;
  switchThrottleMs: number;
  switchHintGapMs: number;
  maxUnchangedPayloads: number;
  maxRefreshFailures: number;
}

export const DEFAULT_RECEIVER_CONFIG: CompanionReceiverConfig = {
  activeStaleMinMs: 2600,
  activePollPadMs: 600,
  reducedStaleMinMs: 8000,
  reducedPollFactor: 2.5,
  unchangedGrowth: 1.8,
  unchangedGrace: 2,
  maxGrowthExponent: 3,
  activeStaleCapMs: 15_000,
  reducedStaleCapMs: 30_000,
  failureBackoffBaseMs: 5000,
  failureBackoffCapMs: 60_000,
  maxFailureExponent: 3,
  minPulseDelayMs: 1000,
  autoRefreshDebounceMs: 1000,
  refreshHintGapMs: { active: 2500, reduced: 8000, background: 12_000 },
  refreshHintCap: { active: 3, reduced: 1, background: 1 },
  switchThrottleMs: 250,
  switchHintGapMs: 350,
  maxUnchangedPayloads: 20,
  maxRefreshFailures: 6,
};

export enum ReceiveOutcome {
  Applied         = 'applied',
  Deferred        = 'deferred',
  Unchanged       = 'unchanged',
  SettingsApplied = 'settings_applied',
  Stale           = 'stale',
  Malformed       = 'malformed',
}

export interface CompanionReceiverDeps {
  renderer?: Renderer;
  settings?: SettingsStore;
  cache?: FrameCache | null;
}

export interface ReceiverSnapshot {
  readonly displayState: DisplayState;
  readonly appliedHash: string;
  readonly hasDeferred: boolean;
  readonly unchangedPayloads: number;
  readonly refreshFailures: number;
  readonly lastAccepted: SequenceStamp | null;
  readonly renderCount: number;
}

export function toFrame(rendered: RenderedFrame): Frame {
  const { lines, ...identity } = rendered;
  return { ...identity, content: lines };
}

export function toRendered(frame: Frame): RenderedFrame {
  const { content, ...identity } = frame;
  return { ...identity, lines: content.map((line) => [...line]) };
}

// ─────────────────────────────────────────────
// Companion Receiver
// ─────────────────────────────────────────────

export class CompanionReceiver extends EventEmitter {
  private transport: Transport;
  private display: CompanionDisplay;
  private renderer: Renderer;
  private settings: SettingsStore;
  private cache: FrameCache | null;
  private config: CompanionReceiverConfig;

  private gate: SequenceGate = new SequenceGate();
  private appliedHash: string = '';
  private current: RenderedFrame | null = null;
  private deferred: RenderedFrame | null = null;
  private needsRerender: boolean = false;
  private displayReduced: boolean = false;
  private scenePhase: ScenePhase = 'active';
  private renderCount: number = 0;

  // Staleness
  private running: boolean = false;
  private pulseTimer: ReturnType<typeof setTimeout> | null = null;
  private lastPayloadAt: number = 0;
  private unchangedPayloads: number = 0;
  private refreshFailures: number = 0;

  // Rate limits
  private lastAutoRefreshAt: number = -Infinity;
  private lastRefreshHintAt: number = -Infinity;
  private lastSwitchAt: number = -Infinity;
  private lastSwitchHintAt: number = -Infinity;

  constructor(
    transport: Transport,
    display: CompanionDisplay,
    deps: CompanionReceiverDeps = {},
    config: Partial<CompanionReceiverConfig> = {},
  ) {
    super();
    this.transport = transport;
    this.display = display;
    this.renderer = deps.renderer ?? new TerminalRenderer();
    this.settings = deps.settings ?? new SettingsStore();
    this.cache = deps.cache ?? null;
    this.config = { ...DEFAULT_RECEIVER_CONFIG, ...config };
  }

  // ─── Lifecycle ───────────────────────────

  start(): void {
    if (this.running) return;
    this.running = true;
    this.transport.setEventHandler((event) => this.handleTransportEvent(event));

    const cached = this.cache?.load() ?? null;
    if (cached) {
      this.current = toRendered(cached);
      this.appliedHash = cached.contentHash;
      this.show(this.current);
    }

    this.requestAutomaticRefresh('launch');
    this.schedulePulse();
    console.log('[Companion] Started');
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.clearPulse();
    this.transport.setEventHandler(null);
    console.log('[Companion] Stopped');
  }

  // ─── Inbound Payloads ────────────────────

  handlePayload(raw: unknown): ReceiveOutcome {
    const parsed = companionPayloadSchema.safeParse(raw);
    if (!parsed.success) {
      console.debug('[Companion] Dropped malformed payload');
      return ReceiveOutcome.Malformed;
    }

    const payload = parsed.data;
    if (!this.gate.accept(payload.stamp)) {
      console.debug(`[Companion] Dropped stale payload seq ${payload.stamp.seq}`);
      return ReceiveOutcome.Stale;
    }

    const settingsChanged = this.applySettings(payload.settings);

    if (payload.kind === PayloadKind.Settings) {
      if (settingsChanged) {
        if (this.displayReduced) this.needsRerender = true;
        else this.rerenderCurrent();
        this.requestAutomaticRefresh('settings');
      }
      this.schedulePulse();
      return ReceiveOutcome.SettingsApplied;
    }

    const frame = payload.frame;
    const changed = frame.contentHash !== this.latestHash();
    this.lastPayloadAt = Date.now();
    this.unchangedPayloads = changed
      ? 0
      : Math.min(this.unchangedPayloads + 1, this.config.maxUnchangedPayloads);
    this.refreshFailures = 0;
    this.schedulePulse();

    if (!changed && !settingsChanged) return ReceiveOutcome.Unchanged;

    if (payload.commandFinished) {
      this.emit('command-finished', frame);
    }
    this.cache?.save(toFrame(frame));

    if (this.displayReduced) {
      this.deferred = frame;
      this.needsRerender = this.needsRerender || settingsChanged;
      return ReceiveOutcome.Deferred;
    }

    this.apply(frame);
    return ReceiveOutcome.Applied;
  }

  // ─── Display State ───────────────────────

  setDisplayReduced(reduced: boolean): void {
    if (this.displayReduced === reduced) return;
    this.displayReduced = reduced;
    if (!reduced) this.flushDeferred();
    this.schedulePulse();
  }

  setScenePhase(phase: ScenePhase): void {
    if (this.scenePhase === phase) return;
    this.scenePhase = phase;

    switch (phase) {
      case 'active':
        this.schedulePulse();
        this.requestAutomaticRefresh('foreground');
        break;
      case 'inactive':
        this.schedulePulse();
        break;
      case 'background':
        this.clearPulse();
        break;
    }
  }

  displayState(): DisplayState {
    if (this.scenePhase === 'background') return 'background';
    return this.displayReduced ? 'reduced' : 'active';
  }

  // ─── Requests to the Primary ─────────────

  /** Manual refresh; never debounced */
  requestRefresh(): Promise<void> {
    return this.sendRefresh(false, 'manual');
  }

  /**
   * Ask the primary to navigate. Returns false when throttled. Without a live
   * link the request is queued as a hint instead.
   */
  async switchTarget(direction: number, scope: SwitchRequest['scope']): Promise<boolean> {
    const now = Date.now();
    if (now - this.lastSwitchAt < this.config.switchThrottleMs) return false;
    this.lastSwitchAt = now;

    const request: SwitchRequest = {
      kind: RequestKind.Switch,
      direction: direction >= 0 ? 1 : -1,
      scope,
      ts: now,
    };

    if (this.transport.isReachable()) {
      try {
        await this.transport.sendImmediate(request);
        return true;
      } catch (err) {
        console.warn('[Companion] Switch request failed, queueing hint:', reasonOf(err));
      }
    }
    this.queueSwitchHint(request);
    return true;
  }

  // ─── Getters ─────────────────────────────

  getSnapshot(): ReceiverSnapshot {
    return {
      displayState: this.displayState(),
      appliedHash: this.appliedHash,
      hasDeferred: this.deferred !== null,
      unchangedPayloads: this.unchangedPayloads,
      refreshFailures: this.refreshFailures,
      lastAccepted: this.gate.lastAccepted(),
      renderCount: this.renderCount,
    };
  }

  /** How long without a payload before the companion asks for one (ms) */
  stalenessTarget(): number {
    const c = this.config;
    const poll = this.settings.get('pollIntervalSec') * 1000;
    const base = this.displayReduced
      ? Math.max(c.reducedStaleMinMs, poll * c.reducedPollFactor)
      : Math.max(c.activeStaleMinMs, poll + c.activePollPadMs);

    const exponent = Math.max(0, Math.min(this.unchangedPayloads - c.unchangedGrace, c.maxGrowthExponent));
    const cap = this.displayReduced ? c.reducedStaleCapMs : c.activeStaleCapMs;
    let target = Math.min(base * c.unchangedGrowth ** exponent, cap);

    if (this.refreshFailures > 0) {
      const backoff = Math.min(
        c.failureBackoffCapMs,
        c.failureBackoffBaseMs * 2 ** Math.min(this.refreshFailures, c.maxFailureExponent),
      );
      target = Math.max(target, backoff);
    }
    return target;
  }

  // ─── Private: Rendering ──────────────────

  private latestHash(): string {
    return this.deferred?.contentHash ?? this.appliedHash;
  }

  private apply(frame: RenderedFrame): void {
    this.appliedHash = frame.contentHash;
    this.current = frame;
    this.show(frame);
  }

  private flushDeferred(): void {
    const deferred = this.deferred;
    this.deferred = null;
    if (deferred) {
      this.needsRerender = false;
      this.apply(deferred);
    } else if (this.needsRerender) {
      this.needsRerender = false;
      this.rerenderCurrent();
    }
  }

  private rerenderCurrent(): void {
    if (this.current) this.show(this.current);
  }

  private show(frame: RenderedFrame): void {
    const lines = this.renderer.render(toFrame(frame), {
      fontSize: this.settings.get('companionFontSize'),
      colorTheme: this.settings.get('colorTheme'),
    });
    const view: CompanionView = {
      lines,
      label: `${frame.sessionId}:${frame.windowName}`,
      host: frame.host,
      timestamp: frame.timestamp,
      paneId: frame.paneId,
    };
    this.renderCount++;
    this.display.show(view);
    this.emit('rendered', view);
  }

  /** Returns true when a setting that affects rendering changed */
  private applySettings(wire: WireSettings): boolean {
    let changed = false;
    if (wire.fontSize !== undefined && wire.fontSize > 0) {
      changed = this.updateSetting('companionFontSize', wire.fontSize) || changed;
    }
    if (wire.colorTheme !== undefined) {
      changed = this.updateSetting('colorTheme', wire.colorTheme) || changed;
    }
    if (wire.pollIntervalSec !== undefined && wire.pollIntervalSec > 0) {
      this.updateSetting('pollIntervalSec', wire.pollIntervalSec);
    }
    return changed;
  }

  private updateSetting<K extends SettingKey>(key: K, value: Settings[K]): boolean {
    const before = this.settings.get(key);
    this.settings.set(key, value);
    return this.settings.get(key) !== before;
  }

  // ─── Private: Refresh Requests ───────────

  private requestAutomaticRefresh(reason: string): void {
    this.sendRefresh(true, reason).catch((err) => {
      console.error('[Companion] Refresh request failed:', err);
    });
  }

  private async sendRefresh(automatic: boolean, reason: string): Promise<void> {
    const now = Date.now();
    if (automatic) {
      if (now - this.lastAutoRefreshAt < this.config.autoRefreshDebounceMs) return;
      this.lastAutoRefreshAt = now;
    }

    const request: RefreshRequest = {
      kind: RequestKind.Refresh,
      reason,
      display: this.displayState(),
      ts: now,
    };

    if (this.transport.isReachable()) {
      try {
        await this.transport.sendImmediate(request);
        this.refreshFailures = 0;
        return;
      } catch (err) {
        console.warn('[Companion] Refresh request failed, queueing hint:', reasonOf(err));
      }
    }

    if (automatic) {
      this.refreshFailures = Math.min(this.refreshFailures + 1, this.config.maxRefreshFailures);
    }
    this.queueRefreshHint(request);
  }

  private queueRefreshHint(request: RefreshRequest): void {
    const now = Date.now();
    const state = this.displayState();
    if (now - this.lastRefreshHintAt < this.config.refreshHintGapMs[state]) return;
    this.lastRefreshHintAt = now;

    if (this.transport.pendingStoreAndForward(STORE_KIND_REFRESH) >= this.config.refreshHintCap[state]) return;
    this.transport.sendStoreAndForward({ ...request, queued: true, ts: now }, STORE_KIND_REFRESH);
  }

  private queueSwitchHint(request: SwitchRequest): void {
    const now = Date.now();
    if (now - this.lastSwitchHintAt < this.config.switchHintGapMs) return;
    this.lastSwitchHintAt = now;

    // at most one switch hint in flight
    if (this.transport.pendingStoreAndForward(STORE_KIND_SWITCH) > 0) return;
    this.transport.sendStoreAndForward(request, STORE_KIND_SWITCH);
  }

  // ─── Private: Staleness Pulse ────────────

  private schedulePulse(): void {
    this.clearPulse();
    if (!this.running || this.scenePhase === 'background') return;

    const age = Date.now() - this.lastPayloadAt;
    const delay = Math.max(this.config.minPulseDelayMs, this.stalenessTarget() - age);
    this.pulseTimer = setTimeout(() => this.pulse(), delay);
  }

  private pulse(): void {
    this.pulseTimer = null;
    if (!this.running || this.scenePhase === 'background') return;

    if (Date.now() - this.lastPayloadAt >= this.stalenessTarget()) {
      this.requestAutomaticRefresh('pulse');
    }
    this.schedulePulse();
  }

  private clearPulse(): void {
    if (this.pulseTimer) {
      clearTimeout(this.pulseTimer);
      this.pulseTimer = null;
    }
  }

  // ─── Private: Transport ──────────────────

  private handleTransportEvent(event: TransportEvent): void {
    switch (event.type) {
      case TransportEventType.ReachabilityChanged:
        console.log(`[Companion] Primary ${event.reachable ? 'reachable' : 'unreachable'}`);
        if (event.reachable) this.requestAutomaticRefresh('reachable');
        this.emit('reachability-changed', event.reachable);
        break;
      case TransportEventType.ImmediateDelivered:
      case TransportEventType.StoreAndForwardDelivered:
        this.handlePayload(event.payload);
        break;
    }
  }
}

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
