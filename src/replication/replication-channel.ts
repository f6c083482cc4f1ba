/**
 * @file    replication/replication-channel.ts
 * @purpose Primary-side half of replication: renders, stamps and delivers
 *          frames and settings to the companion, and takes its requests.
 * @owner   panesync maintainers
 * @depends events, shared/types/transport.ts, replication/sequence.ts,
 *          replication/wire.ts, shared/settings.ts
 *
 * Delivery tiers:
 *   1. Immediate, when the transport reports the companion reachable
 *   2. Store-and-forward, latest-wins per kind, at most one send per gap per
 *      kind and a cap on unacknowledged sends
 *
 * A payload that does not make it through either tier is dropped; the next
 * change (or a companion refresh request) carries current state anyway.
 * Payloads are built, stamped and rendered when they are handed to the
 * transport, so a held-back frame never goes out behind a newer stamp.
 */

import { EventEmitter } from 'events';
import { DisplayState, Frame, Renderer } from '../shared/types/frame';
import {
  Transport,
  TransportEvent,
  TransportEventType,
} from '../shared/types/transport';
import { SettingsStore } from '../shared/settings';
import { PublishOptions } from '../polling/poller';
import { SequenceEmitter } from './sequence';
import {
  companionRequestSchema,
  FramePayload,
  PayloadKind,
  RequestKind,
  SettingsPayload,
  STORE_KIND_FRAME,
  STORE_KIND_SETTINGS,
  WireSettings,
} from './wire';

// ─────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────

export interface ReplicationChannelConfig {
  /** Minimum gap between store-and-forward sends of one kind (ms) */
  storeAndForwardGapMs: number;
  /** Unacknowledged store-and-forward sends allowed while the companion display is active */
  activeOutstandingCap: number;
  /** ...and while it is reduced or in background */
  reducedOutstandingCap: number;
  settingsDebounceMs: number;
}

export const DEFAULT_REPLICATION_CONFIG: ReplicationChannelConfig = {
  storeAndForwardGapMs: 1000,
  activeOutstandingCap: 3,
  reducedOutstandingCap: 1,
  settingsDebounceMs: 300,
};

export enum DeliveryOutcome {
  Immediate  = 'immediate',
  Queued     = 'queued',
  Deferred   = 'deferred',    // held back by the store-and-forward gap
  Dropped    = 'dropped',
  Suppressed = 'suppressed',  // companion already has this content
}

interface DeliveredMarker {
  hash: string;
  settingsKey: string;
}

type OutboundPayload = FramePayload | SettingsPayload;
type PayloadBuilder = () => OutboundPayload;

interface Delivery {
  outcome: DeliveryOutcome;
  /** What reached the transport; null when nothing was sent */
  payload: OutboundPayload | null;
}

// ─────────────────────────────────────────────
// Replication Channel
// ─────────────────────────────────────────────

export class ReplicationChannel extends EventEmitter {
  private transport: Transport;
  private renderer: Renderer;
  private settings: SettingsStore;
  private sequence: SequenceEmitter;
  private config: ReplicationChannelConfig;

  private lastDelivered: DeliveredMarker | null = null;
  private companionDisplay: DisplayState = 'active';
  private lastStoreSendAt: Map<string, number> = new Map();
  private heldBack: Map<string, PayloadBuilder> = new Map();
  private trailingTimers: Map<string, ReturnType<typeof setTimeout>> = new Map();
  private settingsTimer: ReturnType<typeof setTimeout> | null = null;
  private unwatchSettings: Array<() => void> = [];

  constructor(
    transport: Transport,
    renderer: Renderer,
    settings: SettingsStore,
    config: Partial<ReplicationChannelConfig> = {},
    sequence: SequenceEmitter = new SequenceEmitter(),
  ) {
    super();
    this.transport = transport;
    this.renderer = renderer;
    this.settings = settings;
    this.sequence = sequence;
    this.config = { ...DEFAULT_REPLICATION_CONFIG, ...config };
  }

  // ─── Lifecycle ───────────────────────────

  start(): void {
    this.transport.setEventHandler((event) => this.handleTransportEvent(event));
    const sync = (): void => this.syncSettings();
    this.unwatchSettings = [
      this.settings.watch('companionFontSize', sync),
      this.settings.watch('colorTheme', sync),
      this.settings.watch('pollIntervalSec', sync),
    ];
    console.log(`[Replication] Started, epoch ${this.sequence.epoch}`);
  }

  stop(): void {
    this.transport.setEventHandler(null);
    for (const unwatch of this.unwatchSettings) unwatch();
    this.unwatchSettings = [];
    for (const timer of this.trailingTimers.values()) clearTimeout(timer);
    this.trailingTimers.clear();
    this.heldBack.clear();
    if (this.settingsTimer) {
      clearTimeout(this.settingsTimer);
      this.settingsTimer = null;
    }
  }

  // ─── Public API ──────────────────────────

  async publish(frame: Frame, options: PublishOptions = {}): Promise<DeliveryOutcome> {
    const settingsKey = JSON.stringify(this.wireSettings());
    const last = this.lastDelivered;
    // a held-back frame would overwrite what the companion has, so nothing is a repeat
    const holding = this.heldBack.has(STORE_KIND_FRAME);
    if (!options.force && !holding && last && last.hash === frame.contentHash && last.settingsKey === settingsKey) {
      return DeliveryOutcome.Suppressed;
    }

    const { outcome } = await this.deliver(() => this.framePayload(frame, options), STORE_KIND_FRAME);
    this.emit('published', outcome, frame);
    return outcome;
  }

  /** Debounced settings-only payload */
  syncSettings(): void {
    if (this.settingsTimer) clearTimeout(this.settingsTimer);
    this.settingsTimer = setTimeout(() => {
      this.settingsTimer = null;
      const build = (): SettingsPayload => ({
        kind: PayloadKind.Settings,
        stamp: this.sequence.next(),
        settings: this.wireSettings(),
      });
      this.deliver(build, STORE_KIND_SETTINGS)
        .then(({ outcome, payload }) => this.emit('settings-synced', outcome, payload))
        .catch((err) => console.error('[Replication] Settings sync failed:', err));
    }, this.config.settingsDebounceMs);
  }

  /** Display state last reported by the companion */
  getCompanionDisplay(): DisplayState {
    return this.companionDisplay;
  }

  // ─── Private: Payloads ───────────────────

  private framePayload(frame: Frame, options: PublishOptions): FramePayload {
    const settings = this.wireSettings();
    const lines = this.renderer.render(frame, {
      fontSize: this.settings.get('companionFontSize'),
      colorTheme: this.settings.get('colorTheme'),
    });
    return {
      kind: PayloadKind.Frame,
      stamp: this.sequence.next(),
      settings,
      frame: {
        host: frame.host,
        timestamp: frame.timestamp,
        sessionId: frame.sessionId,
        windowIndex: frame.windowIndex,
        windowName: frame.windowName,
        paneId: frame.paneId,
        contentHash: frame.contentHash,
        lines: lines.map((line) => [...line]),
      },
      ...(options.commandFinished ? { commandFinished: true } : {}),
    };
  }

  private recordSent(payload: OutboundPayload): void {
    if (payload.kind === PayloadKind.Frame) {
      this.lastDelivered = {
        hash: payload.frame.contentHash,
        settingsKey: JSON.stringify(payload.settings),
      };
    }
  }

  // ─── Private: Delivery ───────────────────

  private async deliver(build: PayloadBuilder, kind: string): Promise<Delivery> {
    if (this.transport.isReachable()) {
      const payload = build();
      try {
        await this.transport.sendImmediate(payload);
        // anything still held back for this kind is older than what just went out
        this.heldBack.delete(kind);
        this.recordSent(payload);
        return { outcome: DeliveryOutcome.Immediate, payload };
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        console.warn(`[Replication] Immediate ${kind} send failed, using store-and-forward: ${reason}`);
      }
    }
    return this.storeAndForward(build, kind);
  }

  private storeAndForward(build: PayloadBuilder, kind: string): Delivery {
    const now = Date.now();
    const lastSent = this.lastStoreSendAt.get(kind);
    if (lastSent !== undefined && now - lastSent < this.config.storeAndForwardGapMs) {
      this.heldBack.set(kind, build);
      this.scheduleTrailing(kind, this.config.storeAndForwardGapMs - (now - lastSent));
      return { outcome: DeliveryOutcome.Deferred, payload: null };
    }

    const outstanding = this.transport.pendingStoreAndForward();
    if (outstanding >= this.outstandingCap()) {
      console.warn(`[Replication] Dropped ${kind} payload, ${outstanding} store-and-forward sends outstanding`);
      return { outcome: DeliveryOutcome.Dropped, payload: null };
    }

    const payload = build();
    this.transport.sendStoreAndForward(payload, kind);
    this.lastStoreSendAt.set(kind, now);
    this.recordSent(payload);
    return { outcome: DeliveryOutcome.Queued, payload };
  }

  /** Send the latest held-back payload of a kind once its gap has passed */
  private scheduleTrailing(kind: string, delayMs: number): void {
    if (this.trailingTimers.has(kind)) return;

    const timer = setTimeout(() => {
      this.trailingTimers.delete(kind);
      const build = this.heldBack.get(kind);
      if (!build) return;
      this.heldBack.delete(kind);
      this.deliver(build, kind)
        .then(({ outcome, payload }) => this.emit('trailing-delivered', outcome, payload))
        .catch((err) => console.error('[Replication] Trailing send failed:', err));
    }, delayMs);
    this.trailingTimers.set(kind, timer);
  }

  private outstandingCap(): number {
    return this.companionDisplay === 'active'
      ? this.config.activeOutstandingCap
      : this.config.reducedOutstandingCap;
  }

  private wireSettings(): WireSettings {
    return {
      fontSize: this.settings.get('companionFontSize'),
      colorTheme: this.settings.get('colorTheme'),
      pollIntervalSec: this.settings.get('pollIntervalSec'),
    };
  }

  // ─── Private: Inbound ────────────────────

  private handleTransportEvent(event: TransportEvent): void {
    switch (event.type) {
      case TransportEventType.ReachabilityChanged:
        console.log(`[Replication] Companion ${event.reachable ? 'reachable' : 'unreachable'}`);
        this.emit('reachability-changed', event.reachable);
        break;
      case TransportEventType.ImmediateDelivered:
      case TransportEventType.StoreAndForwardDelivered:
        this.handleRequest(event.payload);
        break;
    }
  }

  private handleRequest(raw: unknown): void {
    const parsed = companionRequestSchema.safeParse(raw);
    if (!parsed.success) {
      console.debug('[Replication] Dropped malformed companion request');
      return;
    }

    const request = parsed.data;
    switch (request.kind) {
      case RequestKind.Refresh:
        this.companionDisplay = request.display;
        this.emit('refresh-requested', request);
        break;
      case RequestKind.Switch:
        this.emit('switch-requested', request);
        break;
    }
  }
}
