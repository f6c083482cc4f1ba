/**
 * @file    relay/client.ts
 * @purpose Transport implementation over the WebSocket relay, for either the
 *          primary or the companion role.
 * @owner   panesync maintainers
 * @depends ws, uuid, relay/protocol.ts, shared/types/transport.ts
 *
 * Reconnects on its own. Outstanding store-and-forward sends are forgotten
 * when the link drops: the relay keeps at most one per kind, and receipts
 * for a previous connection never arrive.
 */

import { EventEmitter } from 'events';
import WebSocket from 'ws';
import { v4 as uuidv4 } from 'uuid';
import {
  Transport,
  TransportEvent,
  TransportEventHandler,
  TransportEventType,
} from '../shared/types/transport';
import {
  decodeMessage,
  encodeMessage,
  RelayMessage,
  RelayMessageType,
  RelayRole,
} from './protocol';

// ─────────────────────────────────────────────
// Link abstraction
// ─────────────────────────────────────────────

export interface RelayLink {
  send(data: string): void;
  close(): void;
}

export interface RelayLinkHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onClose(): void;
}

export type RelayLinkFactory = (url: string, handlers: RelayLinkHandlers) => RelayLink;

export const webSocketLinkFactory: RelayLinkFactory = (url, handlers) => {
  const ws = new WebSocket(url);
  ws.on('open', () => handlers.onOpen());
  ws.on('message', (data: WebSocket.RawData) => handlers.onMessage(data.toString()));
  ws.on('close', () => handlers.onClose());
  ws.on('error', (err) => {
    // 'close' follows and drives the reconnect
    console.warn('[RelayClient] Socket error:', err.message);
  });
  return {
    send: (data) => {
      if (ws.readyState === WebSocket.OPEN) ws.send(data);
    },
    close: () => ws.close(),
  };
};

// ─────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────

export interface RelayClientConfig {
  serverUrl: string;
  channelId: string;
  role: RelayRole;
  reconnectIntervalMs: number;
  maxReconnectAttempts: number;
  /** How long sendImmediate waits for the relay's ack */
  ackTimeoutMs: number;
}

const DEFAULT_CLIENT_CONFIG: RelayClientConfig = {
  serverUrl: 'ws://localhost:8080',
  channelId: 'default',
  role: RelayRole.Primary,
  reconnectIntervalMs: 2000,
  maxReconnectAttempts: Infinity,
  ackTimeoutMs: 5000,
};

interface PendingAck {
  resolve: () => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

// ─────────────────────────────────────────────
// Relay Client
// ─────────────────────────────────────────────

export class RelayClient extends EventEmitter implements Transport {
  private config: RelayClientConfig;
  private linkFactory: RelayLinkFactory;
  private link: RelayLink | null = null;
  private clientId: string = uuidv4();
  private joined: boolean = false;
  private peerConnected: boolean = false;
  private closing: boolean = false;
  private reconnectAttempts: number = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;

  private handler: TransportEventHandler | null = null;
  private pendingAcks: Map<string, PendingAck> = new Map();
  /** Sent store-and-forward ids awaiting a delivery receipt, with their kind */
  private outstanding: Map<string, string> = new Map();
  /** Latest store-and-forward payload per kind not yet handed to the relay */
  private unsent: Map<string, { id: string; payload: unknown }> = new Map();

  constructor(
    config: Partial<RelayClientConfig> = {},
    linkFactory: RelayLinkFactory = webSocketLinkFactory,
  ) {
    super();
    this.config = { ...DEFAULT_CLIENT_CONFIG, ...config };
    this.linkFactory = linkFactory;
  }

  // ─── Connection Lifecycle ────────────────

  connect(): void {
    this.closing = false;
    this.link = this.linkFactory(this.config.serverUrl, {
      onOpen: () => {
        this.reconnectAttempts = 0;
        this.write({
          type: RelayMessageType.Hello,
          channelId: this.config.channelId,
          role: this.config.role,
          clientId: this.clientId,
        });
      },
      onMessage: (data) => this.handleRaw(data),
      onClose: () => this.handleClose(),
    });
  }

  disconnect(): void {
    this.closing = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.link?.close();
    this.link = null;
    this.handleClose();
  }

  // ─── Transport ───────────────────────────

  isReachable(): boolean {
    return this.joined && this.peerConnected;
  }

  sendImmediate(payload: unknown): Promise<void> {
    if (!this.isReachable()) {
      return Promise.reject(new Error('Peer not reachable'));
    }

    const id = uuidv4();
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingAcks.delete(id);
        reject(new Error('Relay did not acknowledge in time'));
      }, this.config.ackTimeoutMs);
      this.pendingAcks.set(id, { resolve, reject, timer });
      this.write({ type: RelayMessageType.Immediate, id, payload });
    });
  }

  sendStoreAndForward(payload: unknown, kind: string): void {
    const id = uuidv4();
    if (!this.joined) {
      const replaced = this.unsent.get(kind);
      if (replaced) this.outstanding.delete(replaced.id);
      this.unsent.set(kind, { id, payload });
      this.outstanding.set(id, kind);
      return;
    }
    this.outstanding.set(id, kind);
    this.write({ type: RelayMessageType.StoreAndForward, id, kind, payload });
  }

  pendingStoreAndForward(kind?: string): number {
    if (kind === undefined) return this.outstanding.size;
    let count = 0;
    for (const pendingKind of this.outstanding.values()) {
      if (pendingKind === kind) count++;
    }
    return count;
  }

  setEventHandler(handler: TransportEventHandler | null): void {
    this.handler = handler;
  }

  // ─── Getters ─────────────────────────────

  isConnected(): boolean {
    return this.joined;
  }

  // ─── Private ─────────────────────────────

  private handleRaw(data: string): void {
    const msg = decodeMessage(data);
    if (!msg) {
      console.warn('[RelayClient] Invalid message from relay');
      return;
    }

    switch (msg.type) {
      case RelayMessageType.Welcome:
        this.joined = true;
        this.emit('connected');
        this.flushUnsent();
        this.setPeerConnected(msg.peerConnected);
        break;

      case RelayMessageType.PeerStatus:
        this.setPeerConnected(msg.connected);
        break;

      case RelayMessageType.Immediate:
        this.dispatch({ type: TransportEventType.ImmediateDelivered, payload: msg.payload });
        break;

      case RelayMessageType.Deliver:
        this.write({ type: RelayMessageType.Delivered, id: msg.id });
        this.dispatch({ type: TransportEventType.StoreAndForwardDelivered, payload: msg.payload });
        break;

      case RelayMessageType.Delivered:
        this.outstanding.delete(msg.id);
        break;

      case RelayMessageType.Ack:
        this.settleAck(msg.id, null);
        break;

      case RelayMessageType.Nack:
        this.settleAck(msg.id, new Error(msg.reason));
        break;

      case RelayMessageType.Error:
        console.warn(`[RelayClient] Relay reported: ${msg.message}`);
        break;

      default:
        console.warn(`[RelayClient] Unexpected message type: ${msg.type}`);
    }
  }

  private handleClose(): void {
    const wasJoined = this.joined;
    this.joined = false;
    this.setPeerConnected(false);

    for (const [id, pending] of this.pendingAcks) {
      clearTimeout(pending.timer);
      pending.reject(new Error('Relay connection closed'));
      this.pendingAcks.delete(id);
    }
    for (const [id] of this.outstanding) {
      if (!this.isUnsent(id)) this.outstanding.delete(id);
    }

    if (wasJoined) this.emit('disconnected');
    if (!this.closing) this.attemptReconnect();
  }

  private flushUnsent(): void {
    for (const [kind, entry] of this.unsent) {
      this.write({ type: RelayMessageType.StoreAndForward, id: entry.id, kind, payload: entry.payload });
    }
    this.unsent.clear();
  }

  private isUnsent(id: string): boolean {
    for (const entry of this.unsent.values()) {
      if (entry.id === id) return true;
    }
    return false;
  }

  private setPeerConnected(connected: boolean): void {
    const before = this.isReachable();
    this.peerConnected = connected;
    const after = this.isReachable();
    if (before !== after) {
      this.dispatch({ type: TransportEventType.ReachabilityChanged, reachable: after });
    }
  }

  private settleAck(id: string, error: Error | null): void {
    const pending = this.pendingAcks.get(id);
    if (!pending) return;
    this.pendingAcks.delete(id);
    clearTimeout(pending.timer);
    if (error) pending.reject(error);
    else pending.resolve();
  }

  private dispatch(event: TransportEvent): void {
    this.handler?.(event);
  }

  private write(msg: RelayMessage): void {
    if (!this.link) {
      console.warn('[RelayClient] Cannot send, not connected');
      return;
    }
    this.link.send(encodeMessage(msg));
  }

  private attemptReconnect(): void {
    if (this.reconnectTimer) return;
    if (this.reconnectAttempts >= this.config.maxReconnectAttempts) {
      this.emit('reconnect-failed');
      return;
    }

    this.reconnectAttempts++;
    this.emit('reconnecting', this.reconnectAttempts);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, this.config.reconnectIntervalMs);
  }
}
