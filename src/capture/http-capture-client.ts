/**
 * @file    capture/http-capture-client.ts
 * @purpose HTTP client for the capture server: frames, session/window
 *          listings and server-side navigation.
 * @owner   panesync maintainers
 * @depends zod, shared/errors.ts, shared/schemas.ts
 *
 * Every failure surfaces as a CaptureError so the poller and navigation can
 * tell a down link from a missing target.
 */

import { z } from 'zod';
import {
  CaptureSource,
  Direction,
  Frame,
  NavigationScope,
  NavigationSource,
  PaneIdentity,
  SessionInfo,
  WindowInfo,
} from '../shared/types/frame';
import { CaptureError, CaptureErrorKind } from '../shared/errors';
import { styledLinesSchema } from '../shared/schemas';

// ─────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────

export interface HttpCaptureClientConfig {
  serverUrl: string;
  token: string;
  /** Scrollback lines requested per capture */
  lines: number;
  timeoutMs: number;
}

export const DEFAULT_HTTP_CLIENT_CONFIG: HttpCaptureClientConfig = {
  serverUrl: 'http://127.0.0.1:8787',
  token: '',
  lines: 80,
  timeoutMs: 10_000,
};

export type FetchImpl = typeof fetch;

// ─────────────────────────────────────────────
// Response schemas
// ─────────────────────────────────────────────

const paneSchema = z.object({
  session: z.string(),
  winIndex: z.number().int(),
  winName: z.string(),
  paneId: z.string(),
});

const healthSchema = z.object({
  status: z.string(),
  hostname: z.string(),
});

const captureSchema = z.object({
  hash: z.string(),
  pane: paneSchema.nullable(),
  parsed_lines: styledLinesSchema,
  ts: z.string(),
});

const sessionsSchema = z.object({
  sessions: z.array(z.object({
    name: z.string(),
    windows: z.number().int(),
    attached: z.boolean(),
  })),
});

const windowsSchema = z.object({
  windows: z.array(z.object({
    session: z.string(),
    index: z.number().int(),
    name: z.string(),
    active: z.boolean(),
  })),
});

const switchSchema = z.object({
  ok: z.boolean(),
  pane: paneSchema.nullable().optional(),
});

const errorBodySchema = z.object({ detail: z.string() });

function toPaneIdentity(pane: z.infer<typeof paneSchema>): PaneIdentity {
  return {
    session: pane.session,
    windowIndex: pane.winIndex,
    windowName: pane.winName,
    paneId: pane.paneId,
  };
}

// ─────────────────────────────────────────────
// HTTP Capture Client
// ─────────────────────────────────────────────

export class HttpCaptureClient implements CaptureSource, NavigationSource {
  private config: HttpCaptureClientConfig;
  private fetchImpl: FetchImpl;
  private hostname: string | null = null;

  constructor(config: Partial<HttpCaptureClientConfig> = {}, fetchImpl: FetchImpl = fetch) {
    this.config = { ...DEFAULT_HTTP_CLIENT_CONFIG, ...config };
    this.config.serverUrl = this.config.serverUrl.trim().replace(/\/+$/, '');
    this.fetchImpl = fetchImpl;
  }

  // ─── CaptureSource ───────────────────────

  async fetch(target: string | null): Promise<Frame> {
    const query: Record<string, string> = { lines: String(this.config.lines) };
    if (target !== null) query.target = target;

    const body = await this.request('GET', '/capture', captureSchema, { query });
    const host = await this.host();
    const pane = body.pane;

    return {
      host,
      timestamp: body.ts,
      sessionId: pane?.session ?? '',
      windowIndex: pane?.winIndex ?? -1,
      windowName: pane?.winName ?? '',
      paneId: pane?.paneId ?? '',
      contentHash: body.hash,
      content: body.parsed_lines,
    };
  }

  // ─── NavigationSource ────────────────────

  async switchActive(direction: Direction, scope: NavigationScope): Promise<PaneIdentity | null> {
    const path = scope.kind === 'window' ? '/switch-window' : '/switch-session';
    const json = scope.kind === 'window' ? { direction, target: scope.session } : { direction };

    const body = await this.request('POST', path, switchSchema, { json });
    if (!body.ok) {
      throw new CaptureError(CaptureErrorKind.InvalidRequest, `Server declined ${path}`);
    }
    return body.pane ? toPaneIdentity(body.pane) : null;
  }

  async listWindows(session: string): Promise<WindowInfo[]> {
    const body = await this.request('GET', '/windows', windowsSchema, { query: { session } });
    return body.windows;
  }

  async listSessions(): Promise<SessionInfo[]> {
    const body = await this.request('GET', '/sessions', sessionsSchema);
    return body.sessions;
  }

  // ─── Private ─────────────────────────────

  /** Hostname from /health, fetched once; falls back to the URL's host */
  private async host(): Promise<string> {
    if (this.hostname !== null) return this.hostname;
    try {
      const health = await this.request('GET', '/health', healthSchema);
      this.hostname = health.hostname;
      return health.hostname;
    } catch (err) {
      console.warn('[CaptureClient] Health check failed, using server URL host:', err instanceof Error ? err.message : err);
      return new URL(this.config.serverUrl).hostname;
    }
  }

  private async request<T>(
    method: 'GET' | 'POST',
    path: string,
    schema: z.ZodType<T>,
    options: { query?: Record<string, string>; json?: unknown } = {},
  ): Promise<T> {
    const url = new URL(this.config.serverUrl + path);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const headers: Record<string, string> = { Authorization: `Bearer ${this.config.token}` };
    if (options.json !== undefined) headers['Content-Type'] = 'application/json';

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);
    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url.toString(), {
        method,
        headers,
        body: options.json === undefined ? undefined : JSON.stringify(options.json),
        signal: controller.signal,
      });
      text = await response.text();
    } catch (err) {
      throw CaptureError.network(err);
    } finally {
      clearTimeout(timeout);
    }

    if (response.status !== 200) {
      throw CaptureError.fromStatus(response.status, statusDetail(text));
    }

    const parsed = schema.safeParse(parseJson(text));
    if (!parsed.success) {
      throw new CaptureError(
        CaptureErrorKind.ServerError,
        `Unexpected response from ${path}`,
        { status: response.status, detail: parsed.error.message },
      );
    }
    return parsed.data;
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/** `detail` from a JSON error body, else the trimmed body text */
export function statusDetail(text: string): string | undefined {
  const parsed = errorBodySchema.safeParse(parseJson(text));
  if (parsed.success && parsed.data.detail.trim() !== '') return parsed.data.detail;
  const trimmed = text.trim();
  return trimmed === '' ? undefined : trimmed;
}
