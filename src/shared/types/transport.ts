/**
 * @file    types/transport.ts
 * @purpose Transport contract shared by the primary and companion halves.
 * @depends None (leaf module)
 *
 * Reachability and delivery callbacks arrive as a small closed set of events,
 * dispatched to exactly one owner handler per side.
 */

export enum TransportEventType {
  ReachabilityChanged     = 'reachability_changed',
  ImmediateDelivered      = 'immediate_delivered',
  StoreAndForwardDelivered = 'store_and_forward_delivered',
}

export type TransportEvent =
  | { readonly type: TransportEventType.ReachabilityChanged; readonly reachable: boolean }
  | { readonly type: TransportEventType.ImmediateDelivered; readonly payload: unknown }
  | { readonly type: TransportEventType.StoreAndForwardDelivered; readonly payload: unknown };

export type TransportEventHandler = (event: TransportEvent) => void;

export interface Transport {
  /** Live reachability of the peer */
  isReachable(): boolean;
  /** Low-latency send; rejects when the peer did not take the payload */
  sendImmediate(payload: unknown): Promise<void>;
  /** Best-effort, latest-wins per kind; the peer picks it up when it reconnects */
  sendStoreAndForward(payload: unknown, kind: string): void;
  /** Store-and-forward sends not yet acknowledged, optionally of one kind */
  pendingStoreAndForward(kind?: string): number;
  /** Replaces the single owner handler; null detaches */
  setEventHandler(handler: TransportEventHandler | null): void;
}
