/**
 * @file    relay/server.ts
 * @purpose WebSocket relay pairing a primary and a companion per channel.
 *          Forwards immediate messages, keeps a latest-per-kind mailbox for
 *          store-and-forward traffic and reports peer presence.
 * @owner   panesync maintainers
 * @depends ws, uuid, relay/protocol.ts
 *
 * The relay never looks inside payloads. A mailbox entry replaced by a newer
 * one of the same kind is reported back to its sender as delivered, so the
 * sender's outstanding count does not leak.
 */

import WebSocket from 'ws';
import { v4 as uuidv4 } from 'uuid';
import {
  decodeMessage,
  encodeMessage,
  otherRole,
  RelayMessage,
  RelayMessageType,
  RelayRole,
} from './protocol';

// ─────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────

interface ConnectedClient {
  id: string;
  send: (data: string) => void;
  channelId: string | null;
  role: RelayRole | null;
}

interface MailboxEntry {
  id: string;
  payload: unknown;
  senderId: string;
}

interface ManagedChannel {
  members: Record<RelayRole, string | null>;
  /** Keyed by the role that will receive, then by payload kind */
  mailbox: Record<RelayRole, Map<string, MailboxEntry>>;
}

/** One accepted connection, independent of the socket carrying it */
export interface RelayConnection {
  readonly id: string;
  receive(raw: string): void;
  close(): void;
}

// ─────────────────────────────────────────────
// Relay Server
// ─────────────────────────────────────────────

export class RelayServer {
  private wss: WebSocket.Server | null = null;
  private clients: Map<string, ConnectedClient> = new Map();
  private channels: Map<string, ManagedChannel> = new Map();
  private port: number;
  private host: string;

  constructor(port: number = 8080, host: string = '0.0.0.0') {
    this.port = port;
    this.host = host;
  }

  // ─── Lifecycle ───────────────────────────

  start(): void {
    this.wss = new WebSocket.Server({ port: this.port, host: this.host });

    this.wss.on('connection', (ws: WebSocket) => {
      const connection = this.connect((data) => {
        if (ws.readyState === WebSocket.OPEN) ws.send(data);
      });

      ws.on('message', (raw: WebSocket.RawData) => connection.receive(raw.toString()));
      ws.on('close', () => connection.close());
      ws.on('error', (err) => {
        console.error(`[Relay] Client ${connection.id} error:`, err);
      });
    });

    console.log(`[Relay] Server started on ${this.host}:${this.port}`);
  }

  stop(): void {
    this.wss?.close();
    this.wss = null;
    this.clients.clear();
    this.channels.clear();
    console.log('[Relay] Server stopped');
  }

  /** Register a connection; `send` writes one encoded message to it */
  connect(send: (data: string) => void): RelayConnection {
    const client: ConnectedClient = {
      id: uuidv4(),
      send,
      channelId: null,
      role: null,
    };
    this.clients.set(client.id, client);
    console.log(`[Relay] Client connected: ${client.id}`);

    return {
      id: client.id,
      receive: (raw) => this.handleRaw(client.id, raw),
      close: () => this.handleDisconnect(client.id),
    };
  }

  // ─── Message Handling ────────────────────

  private handleRaw(clientId: string, raw: string): void {
    const client = this.clients.get(clientId);
    if (!client) return;

    const msg = decodeMessage(raw);
    if (!msg) {
      console.warn(`[Relay] Invalid message from ${clientId}`);
      this.send(client, { type: RelayMessageType.Error, message: 'Invalid message' });
      return;
    }

    if (msg.type === RelayMessageType.Hello) {
      this.handleHello(client, msg.channelId, msg.role);
      return;
    }
    if (!client.channelId || !client.role) {
      this.send(client, { type: RelayMessageType.Error, message: 'Say hello first' });
      return;
    }

    switch (msg.type) {
      case RelayMessageType.Immediate:
        this.handleImmediate(client, msg.id, msg.payload);
        break;
      case RelayMessageType.StoreAndForward:
        this.handleStoreAndForward(client, msg.id, msg.kind, msg.payload);
        break;
      case RelayMessageType.Delivered:
        this.handleDelivered(client, msg.id);
        break;
      default:
        console.warn(`[Relay] Unexpected message type from ${clientId}: ${msg.type}`);
    }
  }

  // ─── Channel Membership ──────────────────

  private handleHello(client: ConnectedClient, channelId: string, role: RelayRole): void {
    if (client.channelId) this.leaveChannel(client);

    const channel = this.channelFor(channelId);
    const previousId = channel.members[role];
    if (previousId && previousId !== client.id) {
      // Newest connection for a role wins
      const previous = this.clients.get(previousId);
      if (previous) {
        this.send(previous, { type: RelayMessageType.Error, message: `Replaced by a newer ${role}` });
        previous.channelId = null;
        previous.role = null;
      }
    }

    channel.members[role] = client.id;
    client.channelId = channelId;
    client.role = role;

    const peer = this.peerOf(client);
    this.send(client, {
      type: RelayMessageType.Welcome,
      clientId: client.id,
      peerConnected: peer !== null,
    });
    if (peer) {
      this.send(peer, { type: RelayMessageType.PeerStatus, connected: true });
    }

    // Mail that arrived while this role was away
    for (const [kind, entry] of channel.mailbox[role]) {
      this.send(client, { type: RelayMessageType.Deliver, id: entry.id, kind, payload: entry.payload });
    }

    console.log(`[Relay] ${role} ${client.id} joined channel ${channelId}`);
  }

  private leaveChannel(client: ConnectedClient): void {
    if (!client.channelId || !client.role) return;
    const channel = this.channels.get(client.channelId);
    if (channel && channel.members[client.role] === client.id) {
      channel.members[client.role] = null;
      const peer = this.peerOf(client);
      if (peer) this.send(peer, { type: RelayMessageType.PeerStatus, connected: false });
    }
    client.channelId = null;
    client.role = null;
  }

  // ─── Relay ───────────────────────────────

  private handleImmediate(sender: ConnectedClient, id: string, payload: unknown): void {
    const peer = this.peerOf(sender);
    if (!peer) {
      this.send(sender, { type: RelayMessageType.Nack, id, reason: 'Peer not connected' });
      return;
    }
    this.send(peer, { type: RelayMessageType.Immediate, id, payload });
    this.send(sender, { type: RelayMessageType.Ack, id });
  }

  private handleStoreAndForward(sender: ConnectedClient, id: string, kind: string, payload: unknown): void {
    if (!sender.channelId || !sender.role) return;
    const channel = this.channelFor(sender.channelId);
    const targetRole = otherRole(sender.role);
    const box = channel.mailbox[targetRole];

    const superseded = box.get(kind);
    box.set(kind, { id, payload, senderId: sender.id });
    if (superseded) {
      this.notifyDelivered(superseded);
    }

    const peer = this.peerOf(sender);
    if (peer) {
      this.send(peer, { type: RelayMessageType.Deliver, id, kind, payload });
    }
  }

  /** Receipt from the recipient: drop the entry and release the sender */
  private handleDelivered(recipient: ConnectedClient, id: string): void {
    if (!recipient.channelId || !recipient.role) return;
    const channel = this.channels.get(recipient.channelId);
    if (!channel) return;

    const box = channel.mailbox[recipient.role];
    for (const [kind, entry] of box) {
      if (entry.id === id) {
        box.delete(kind);
        this.notifyDelivered(entry);
        return;
      }
    }
  }

  private notifyDelivered(entry: MailboxEntry): void {
    const sender = this.clients.get(entry.senderId);
    if (sender && sender.channelId) {
      this.send(sender, { type: RelayMessageType.Delivered, id: entry.id });
    }
  }

  // ─── Disconnect Handling ─────────────────

  private handleDisconnect(clientId: string): void {
    const client = this.clients.get(clientId);
    if (!client) return;
    this.leaveChannel(client);
    this.clients.delete(clientId);
    console.log(`[Relay] Client disconnected: ${clientId}`);
  }

  // ─── Utilities ───────────────────────────

  private channelFor(channelId: string): ManagedChannel {
    let channel = this.channels.get(channelId);
    if (!channel) {
      channel = {
        members: { [RelayRole.Primary]: null, [RelayRole.Companion]: null },
        mailbox: { [RelayRole.Primary]: new Map(), [RelayRole.Companion]: new Map() },
      };
      this.channels.set(channelId, channel);
    }
    return channel;
  }

  private peerOf(client: ConnectedClient): ConnectedClient | null {
    if (!client.channelId || !client.role) return null;
    const channel = this.channels.get(client.channelId);
    const peerId = channel?.members[otherRole(client.role)];
    return peerId ? this.clients.get(peerId) ?? null : null;
  }

  private send(client: ConnectedClient, msg: RelayMessage): void {
    client.send(encodeMessage(msg));
  }

  /** Get server stats */
  getStats(): {
    clients: number;
    channels: number;
    channelDetails: Array<{ id: string; primary: boolean; companion: boolean; pending: number }>;
  } {
    return {
      clients: this.clients.size,
      channels: this.channels.size,
      channelDetails: Array.from(this.channels.entries()).map(([id, channel]) => ({
        id,
        primary: channel.members[RelayRole.Primary] !== null,
        companion: channel.members[RelayRole.Companion] !== null,
        pending: channel.mailbox[RelayRole.Primary].size + channel.mailbox[RelayRole.Companion].size,
      })),
    };
  }
}
