/**
 * @file    test/relay.test.ts
 * @purpose Relay server and client wired through an in-process loopback link.
 *
 * Test plan (must pass):
 *   - Primary and companion see each other as reachable once both joined
 *   - Immediate messages are acked when forwarded, nacked without a peer
 *   - Store-and-forward keeps the latest payload per kind until the peer
 *     confirms, and superseded entries release their sender
 *   - The newest connection for a role replaces the older one
 *   - Peer drops flip reachability back
 */

import { RelayServer, RelayConnection } from '../src/relay/server';
import {
  RelayClient,
  RelayLink,
  RelayLinkFactory,
  RelayLinkHandlers,
} from '../src/relay/client';
import {
  decodeMessage,
  encodeMessage,
  otherRole,
  RelayMessageType,
  RelayRole,
} from '../src/relay/protocol';
import { TransportEvent, TransportEventType } from '../src/shared/types/transport';
import { flush, quietConsole } from './helpers/fakes';

// ═══════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════

/** Socket stand-in: both directions hop through the microtask queue */
class Loopback {
  readonly connections: Array<{ connection: RelayConnection; drop: () => void }> = [];
  readonly factory: RelayLinkFactory;
  private server: RelayServer;

  constructor(server: RelayServer) {
    this.server = server;
    this.factory = (_url, handlers) => this.open(handlers);
  }

  private open(handlers: RelayLinkHandlers): RelayLink {
    let open = true;
    const connection = this.server.connect((data) => {
      Promise.resolve().then(() => {
        if (open) handlers.onMessage(data);
      });
    });
    const drop = (): void => {
      if (!open) return;
      open = false;
      connection.close();
      handlers.onClose();
    };
    this.connections.push({ connection, drop });
    Promise.resolve().then(() => handlers.onOpen());

    return {
      send: (data) => {
        Promise.resolve().then(() => {
          if (open) connection.receive(data);
        });
      },
      close: () => {
        open = false;
        connection.close();
      },
    };
  }
}

function makeClient(loopback: Loopback, role: RelayRole, events: TransportEvent[] = []): RelayClient {
  const client = new RelayClient(
    { channelId: 'test-channel', role, maxReconnectAttempts: 0 },
    loopback.factory,
  );
  client.setEventHandler((event) => events.push(event));
  return client;
}

function payloadsOf(events: TransportEvent[], type: TransportEventType): unknown[] {
  const payloads: unknown[] = [];
  for (const event of events) {
    if (event.type === type && event.type !== TransportEventType.ReachabilityChanged) {
      payloads.push(event.payload);
    }
  }
  return payloads;
}

// ═══════════════════════════════════════════
// TESTS
// ═══════════════════════════════════════════

describe('Relay', () => {
  quietConsole();

  let server: RelayServer;
  let loopback: Loopback;
  let clients: RelayClient[];

  beforeEach(() => {
    server = new RelayServer();
    loopback = new Loopback(server);
    clients = [];
  });

  afterEach(() => {
    for (const client of clients) client.disconnect();
  });

  function join(role: RelayRole, events: TransportEvent[] = []): RelayClient {
    const client = makeClient(loopback, role, events);
    clients.push(client);
    client.connect();
    return client;
  }

  // ─── Presence ─────────────────────────────

  describe('presence', () => {
    it('should report the peer reachable once both roles joined', async () => {
      const primaryEvents: TransportEvent[] = [];
      const primary = join(RelayRole.Primary, primaryEvents);
      await flush();
      expect(primary.isConnected()).toBe(true);
      expect(primary.isReachable()).toBe(false);

      const companion = join(RelayRole.Companion);
      await flush();

      expect(primary.isReachable()).toBe(true);
      expect(companion.isReachable()).toBe(true);
      expect(primaryEvents).toEqual([{ type: TransportEventType.ReachabilityChanged, reachable: true }]);
    });

    it('should flip reachability when the peer drops', async () => {
      const primaryEvents: TransportEvent[] = [];
      const primary = join(RelayRole.Primary, primaryEvents);
      join(RelayRole.Companion);
      await flush();

      loopback.connections[1].drop();
      await flush();

      expect(primary.isReachable()).toBe(false);
      expect(primaryEvents[primaryEvents.length - 1]).toEqual({
        type: TransportEventType.ReachabilityChanged,
        reachable: false,
      });
    });

    it('should let the newest connection for a role win', async () => {
      const primary = join(RelayRole.Primary);
      join(RelayRole.Companion);
      await flush();

      const newerEvents: TransportEvent[] = [];
      join(RelayRole.Companion, newerEvents);
      await flush();
      await primary.sendImmediate({ n: 1 });
      await flush();

      expect(payloadsOf(newerEvents, TransportEventType.ImmediateDelivered)).toEqual([{ n: 1 }]);
      expect(console.warn).toHaveBeenCalledWith('[RelayClient] Relay reported: Replaced by a newer companion');
      expect(server.getStats().channelDetails).toEqual([
        { id: 'test-channel', primary: true, companion: true, pending: 0 },
      ]);
    });

    it('should emit reconnect-failed when reconnecting is disabled', async () => {
      const primary = join(RelayRole.Primary);
      const failed = jest.fn();
      primary.on('reconnect-failed', failed);
      await flush();

      loopback.connections[0].drop();

      expect(failed).toHaveBeenCalledTimes(1);
      expect(primary.isConnected()).toBe(false);
    });
  });

  // ─── Immediate ────────────────────────────

  describe('immediate messages', () => {
    it('should deliver and acknowledge', async () => {
      const companionEvents: TransportEvent[] = [];
      const primary = join(RelayRole.Primary);
      join(RelayRole.Companion, companionEvents);
      await flush();

      await expect(primary.sendImmediate({ frame: 'h1' })).resolves.toBeUndefined();

      expect(payloadsOf(companionEvents, TransportEventType.ImmediateDelivered)).toEqual([{ frame: 'h1' }]);
    });

    it('should reject without a reachable peer', async () => {
      const primary = join(RelayRole.Primary);
      await flush();

      await expect(primary.sendImmediate({ frame: 'h1' })).rejects.toThrow('Peer not reachable');
    });

    it('should reject pending sends when the link closes', async () => {
      const primary = join(RelayRole.Primary);
      join(RelayRole.Companion);
      await flush();

      const sent = primary.sendImmediate({ frame: 'h1' });
      primary.disconnect();

      await expect(sent).rejects.toThrow('Relay connection closed');
    });
  });

  // ─── Store-and-Forward ────────────────────

  describe('store-and-forward', () => {
    it('should keep only the latest payload per kind for an absent peer', async () => {
      const primary = join(RelayRole.Primary);
      await flush();

      primary.sendStoreAndForward({ hash: 'h1' }, 'frame');
      primary.sendStoreAndForward({ hash: 'h2' }, 'frame');
      primary.sendStoreAndForward({ theme: 'dracula' }, 'settings');
      await flush();

      // h1 was superseded, so the relay released it
      expect(primary.pendingStoreAndForward()).toBe(2);
      expect(primary.pendingStoreAndForward('frame')).toBe(1);

      const companionEvents: TransportEvent[] = [];
      join(RelayRole.Companion, companionEvents);
      await flush();

      expect(payloadsOf(companionEvents, TransportEventType.StoreAndForwardDelivered)).toEqual([
        { hash: 'h2' },
        { theme: 'dracula' },
      ]);
      expect(primary.pendingStoreAndForward()).toBe(0);
      expect(server.getStats().channelDetails[0].pending).toBe(0);
    });

    it('should hold sends made before joining and flush them on welcome', async () => {
      const companionEvents: TransportEvent[] = [];
      join(RelayRole.Companion, companionEvents);
      await flush();

      const primary = makeClient(loopback, RelayRole.Primary);
      clients.push(primary);
      primary.connect();
      primary.sendStoreAndForward({ hash: 'early-1' }, 'frame');
      primary.sendStoreAndForward({ hash: 'early-2' }, 'frame');
      expect(primary.pendingStoreAndForward()).toBe(1);

      await flush();

      expect(payloadsOf(companionEvents, TransportEventType.StoreAndForwardDelivered)).toEqual([
        { hash: 'early-2' },
      ]);
      expect(primary.pendingStoreAndForward()).toBe(0);
    });

    it('should forget outstanding sends when the connection closes', async () => {
      const primary = join(RelayRole.Primary);
      await flush();

      primary.sendStoreAndForward({ hash: 'h1' }, 'frame');
      primary.disconnect();

      expect(primary.pendingStoreAndForward()).toBe(0);
    });
  });

  // ─── Server Protocol ──────────────────────

  describe('server protocol', () => {
    it('should reply with an error to malformed input', () => {
      const sent: string[] = [];
      const connection = server.connect((data) => sent.push(data));

      connection.receive('not json');
      connection.receive(encodeMessage({ type: RelayMessageType.Delivered, id: 'x' }));

      expect(sent.map((raw) => decodeMessage(raw))).toEqual([
        { type: RelayMessageType.Error, message: 'Invalid message' },
        { type: RelayMessageType.Error, message: 'Say hello first' },
      ]);
    });

    it('should nack an immediate message without a peer', () => {
      const sent: string[] = [];
      const connection = server.connect((data) => sent.push(data));

      connection.receive(encodeMessage({
        type: RelayMessageType.Hello,
        channelId: 'solo',
        role: RelayRole.Primary,
        clientId: 'client-1',
      }));
      connection.receive(encodeMessage({ type: RelayMessageType.Immediate, id: 'm1', payload: {} }));

      expect(decodeMessage(sent[0])).toEqual({
        type: RelayMessageType.Welcome,
        clientId: connection.id,
        peerConnected: false,
      });
      expect(decodeMessage(sent[1])).toEqual({ type: RelayMessageType.Nack, id: 'm1', reason: 'Peer not connected' });
    });

    it('should pair roles', () => {
      expect(otherRole(RelayRole.Primary)).toBe(RelayRole.Companion);
      expect(otherRole(RelayRole.Companion)).toBe(RelayRole.Primary);
    });
  });
});
