/**
 * @file    relay/protocol.ts
 * @purpose Messages between relay clients and the relay server.
 * @depends zod
 *
 * A channel pairs one primary with one companion. Immediate messages are
 * forwarded only while the peer is connected; store-and-forward messages wait
 * in a latest-per-kind mailbox until the peer confirms delivery.
 */

import { z } from 'zod';

export enum RelayRole {
  Primary   = 'primary',
  Companion = 'companion',
}

export enum RelayMessageType {
  Hello           = 'hello',
  Welcome         = 'welcome',
  PeerStatus      = 'peer_status',
  Immediate       = 'immediate',
  Ack             = 'ack',
  Nack            = 'nack',
  StoreAndForward = 'store_and_forward',
  Deliver         = 'deliver',
  Delivered       = 'delivered',
  Error           = 'error',
}

const roleSchema = z.nativeEnum(RelayRole);

export const relayMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal(RelayMessageType.Hello),
    channelId: z.string().min(1),
    role: roleSchema,
    clientId: z.string().min(1),
  }),
  z.object({
    type: z.literal(RelayMessageType.Welcome),
    clientId: z.string(),
    peerConnected: z.boolean(),
  }),
  z.object({
    type: z.literal(RelayMessageType.PeerStatus),
    connected: z.boolean(),
  }),
  z.object({
    type: z.literal(RelayMessageType.Immediate),
    id: z.string(),
    payload: z.unknown(),
  }),
  z.object({
    type: z.literal(RelayMessageType.Ack),
    id: z.string(),
  }),
  z.object({
    type: z.literal(RelayMessageType.Nack),
    id: z.string(),
    reason: z.string(),
  }),
  z.object({
    type: z.literal(RelayMessageType.StoreAndForward),
    id: z.string(),
    kind: z.string(),
    payload: z.unknown(),
  }),
  z.object({
    type: z.literal(RelayMessageType.Deliver),
    id: z.string(),
    kind: z.string(),
    payload: z.unknown(),
  }),
  z.object({
    type: z.literal(RelayMessageType.Delivered),
    id: z.string(),
  }),
  z.object({
    type: z.literal(RelayMessageType.Error),
    message: z.string(),
  }),
]);

export type RelayMessage = z.infer<typeof relayMessageSchema>;

export function otherRole(role: RelayRole): RelayRole {
  return role === RelayRole.Primary ? RelayRole.Companion : RelayRole.Primary;
}

export function encodeMessage(message: RelayMessage): string {
  return JSON.stringify(message);
}

/** Parse and validate one frame of relay traffic; null when malformed */
export function decodeMessage(raw: string): RelayMessage | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = relayMessageSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}
