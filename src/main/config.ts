/**
 * @file    main/config.ts
 * @purpose Process configuration from environment variables.
 * @depends zod
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';

const envSchema = z.object({
  PANESYNC_SERVER_URL: z.string().url().default('http://127.0.0.1:8787'),
  PANESYNC_TOKEN: z.string().default(''),
  PANESYNC_RELAY_URL: z.string().url().default('ws://127.0.0.1:8080'),
  PANESYNC_CHANNEL: z.string().min(1).default('default'),
  PANESYNC_STATE_FILE: z.string().min(1).optional(),
  PANESYNC_RELAY_PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  PANESYNC_RELAY_HOST: z.string().min(1).default('0.0.0.0'),
});

export interface AppConfig {
  serverUrl: string;
  token: string;
  relayUrl: string;
  channelId: string;
  stateFile: string;
  relayPort: number;
  relayHost: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Empty strings count as unset so `VAR= panesync …` falls back to the default */
function withoutEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value.trim();
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(withoutEmpty(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }

  const vars = parsed.data;
  return {
    serverUrl: vars.PANESYNC_SERVER_URL,
    token: vars.PANESYNC_TOKEN,
    relayUrl: vars.PANESYNC_RELAY_URL,
    channelId: vars.PANESYNC_CHANNEL,
    stateFile: vars.PANESYNC_STATE_FILE ?? path.join(os.homedir(), '.panesync', 'state.json'),
    relayPort: vars.PANESYNC_RELAY_PORT,
    relayHost: vars.PANESYNC_RELAY_HOST,
  };
}
