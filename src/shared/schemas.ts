/**
 * @file    shared/schemas.ts
 * @purpose Runtime validation for data that crosses a process or disk boundary.
 * @depends zod
 */

import { z } from 'zod';

export const styledRunSchema = z.object({
  t: z.string(),
  fg: z.string().optional(),
  bg: z.string().optional(),
  b: z.boolean().optional(),
  d: z.boolean().optional(),
  i: z.boolean().optional(),
  u: z.boolean().optional(),
});

export const styledLinesSchema = z.array(z.array(styledRunSchema));

export const frameSchema = z.object({
  host: z.string(),
  timestamp: z.string(),
  sessionId: z.string(),
  windowIndex: z.number().int(),
  windowName: z.string(),
  paneId: z.string(),
  contentHash: z.string(),
  content: styledLinesSchema,
});

export const sequenceStampSchema = z.object({
  epoch: z.string().min(1),
  seq: z.number().int().nonnegative(),
  wallClock: z.number().finite(),
});

export const directionSchema = z.union([z.literal(1), z.literal(-1)]);
