/**
 * @file    replication/wire.ts
 * @purpose Payloads exchanged between primary and companion, with their schemas.
 * @depends zod, shared/schemas.ts
 */

import { z } from 'zod';
import {
  directionSchema,
  sequenceStampSchema,
  styledLinesSchema,
} from '../shared/schemas';

export enum PayloadKind {
  Frame    = 'frame',
  Settings = 'settings',
}

export enum RequestKind {
  Refresh = 'refresh',
  Switch  = 'switch',
}

/** Store-and-forward kinds; the transport keeps only the latest per kind */
export const STORE_KIND_FRAME = 'frame';
export const STORE_KIND_SETTINGS = 'settings';
export const STORE_KIND_REFRESH = 'refresh-request';
export const STORE_KIND_SWITCH = 'switch-request';

// ─────────────────────────────────────────────
// Primary → companion
// ─────────────────────────────────────────────

export const wireSettingsSchema = z.object({
  fontSize: z.number().optional(),
  colorTheme: z.string().optional(),
  pollIntervalSec: z.number().optional(),
});

/** A frame already projected for the companion display */
export const renderedFrameSchema = z.object({
  host: z.string(),
  timestamp: z.string(),
  sessionId: z.string(),
  windowIndex: z.number().int(),
  windowName: z.string(),
  paneId: z.string(),
  contentHash: z.string(),
  lines: styledLinesSchema,
});

export const framePayloadSchema = z.object({
  kind: z.literal(PayloadKind.Frame),
  stamp: sequenceStampSchema,
  settings: wireSettingsSchema,
  frame: renderedFrameSchema,
  commandFinished: z.boolean().optional(),
});

export const settingsPayloadSchema = z.object({
  kind: z.literal(PayloadKind.Settings),
  stamp: sequenceStampSchema,
  settings: wireSettingsSchema,
});

export const companionPayloadSchema = z.discriminatedUnion('kind', [
  framePayloadSchema,
  settingsPayloadSchema,
]);

export type WireSettings = z.infer<typeof wireSettingsSchema>;
export type RenderedFrame = z.infer<typeof renderedFrameSchema>;
export type FramePayload = z.infer<typeof framePayloadSchema>;
export type SettingsPayload = z.infer<typeof settingsPayloadSchema>;
export type CompanionPayload = z.infer<typeof companionPayloadSchema>;

// ─────────────────────────────────────────────
// Companion → primary
// ─────────────────────────────────────────────

export const displayStateSchema = z.enum(['active', 'reduced', 'background']);

export const refreshRequestSchema = z.object({
  kind: z.literal(RequestKind.Refresh),
  reason: z.string(),
  display: displayStateSchema,
  queued: z.boolean().optional(),
  ts: z.number(),
});

export const switchRequestSchema = z.object({
  kind: z.literal(RequestKind.Switch),
  direction: directionSchema,
  scope: z.enum(['session', 'window']),
  ts: z.number(),
});

export const companionRequestSchema = z.discriminatedUnion('kind', [
  refreshRequestSchema,
  switchRequestSchema,
]);

export type RefreshRequest = z.infer<typeof refreshRequestSchema>;
export type SwitchRequest = z.infer<typeof switchRequestSchema>;
export type CompanionRequest = z.infer<typeof companionRequestSchema>;
