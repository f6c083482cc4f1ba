/**
 * @file    types/frame.ts
 * @purpose Core domain types for panesync: frames, stamps, backoff and
 *          navigation state, plus the collaborator contracts around them.
 * @owner   panesync maintainers
 * @depends None (leaf module)
 */

// ─────────────────────────────────────────────
// Frame content
// ─────────────────────────────────────────────

/** One styled run of terminal text. Short keys keep the wire payload small. */
export interface StyledRun {
  readonly t: string;
  readonly fg?: string;
  readonly bg?: string;
  readonly b?: boolean;   // bold
  readonly d?: boolean;   // dim
  readonly i?: boolean;   // italic
  readonly u?: boolean;   // underline
}

export type StyledLine = readonly StyledRun[];

/** Identity of a captured pane as reported by the capture server */
export interface PaneIdentity {
  readonly session: string;
  readonly windowIndex: number;
  readonly windowName: string;
  readonly paneId: string;
}

/**
 * One captured snapshot of the remote screen. Two frames with the same
 * contentHash are content-identical whatever their metadata says.
 */
export interface Frame {
  readonly host: string;
  readonly timestamp: string;      // ISO-8601
  readonly sessionId: string;
  readonly windowIndex: number;
  readonly windowName: string;
  readonly paneId: string;
  readonly contentHash: string;
  readonly content: readonly StyledLine[];
}

// ─────────────────────────────────────────────
// Sequencing
// ─────────────────────────────────────────────

export interface SequenceStamp {
  /** Changes on every sender process start */
  readonly epoch: string;
  readonly seq: number;
  readonly wallClock: number;      // ms since epoch
}

// ─────────────────────────────────────────────
// Backoff
// ─────────────────────────────────────────────

export interface BackoffState {
  consecutiveUnchanged: number;
  consecutiveErrors: number;
  lowPowerMode: boolean;
  inBackground: boolean;
}

export interface BackoffConfig {
  /** Configured base interval, whole seconds; clamped by resolveBaseInterval */
  readonly baseIntervalSec: number;
  readonly minBaseSec: number;
  readonly maxBaseSec: number;
  readonly defaultBaseSec: number;
  readonly maxErrorExponent: number;
  readonly errorCapMs: number;
  readonly idleThreshold: number;
  readonly maxIdleExponent: number;
  readonly idleCapMs: number;
  readonly lowPowerActiveFloorMs: number;
  readonly lowPowerIdleFloorMs: number;
  /** Interval deltas at or below this never recreate the timer */
  readonly hysteresisMs: number;
}

export const DEFAULT_BACKOFF_CONFIG: BackoffConfig = {
  baseIntervalSec: 2,
  minBaseSec: 1,
  maxBaseSec: 120,
  defaultBaseSec: 2,
  maxErrorExponent: 6,
  errorCapMs: 60_000,
  idleThreshold: 6,
  maxIdleExponent: 4,
  idleCapMs: 30_000,
  lowPowerActiveFloorMs: 5_000,
  lowPowerIdleFloorMs: 15_000,
  hysteresisMs: 250,
};

// ─────────────────────────────────────────────
// Navigation
// ─────────────────────────────────────────────

export type IndexBase = 0 | 1;

export type Direction = 1 | -1;

export type NavigationScope =
  | { readonly kind: 'session' }
  | { readonly kind: 'window'; readonly session: string };

export interface NavigationState {
  readonly activeSession: string | null;
  readonly activeWindowIndex: number | null;
  readonly preferredIndexBaseBySession: Readonly<Record<string, IndexBase>>;
}

export interface WindowInfo {
  readonly session: string;
  readonly index: number;
  readonly name: string;
  readonly active: boolean;
}

export interface SessionInfo {
  readonly name: string;
  readonly windows: number;
  readonly attached: boolean;
}

// ─────────────────────────────────────────────
// Collaborators
// ─────────────────────────────────────────────

/** Fetches a frame; `null` target means the server's current default pane */
export interface CaptureSource {
  fetch(target: string | null): Promise<Frame>;
}

/**
 * Server-side navigation. switchActive rejects with a not_found CaptureError
 * when the server has no authoritative switch operation.
 */
export interface NavigationSource {
  switchActive(direction: Direction, scope: NavigationScope): Promise<PaneIdentity | null>;
  listWindows(session: string): Promise<WindowInfo[]>;
  listSessions(): Promise<SessionInfo[]>;
}

export interface DisplayConfig {
  readonly fontSize: number;
  readonly colorTheme: string;
}

/** Pure projection of a frame for a given display */
export interface Renderer {
  render(frame: Frame, config: DisplayConfig): StyledLine[];
}

// ─────────────────────────────────────────────
// Companion display
// ─────────────────────────────────────────────

export type DisplayState = 'active' | 'reduced' | 'background';

export type ScenePhase = 'active' | 'inactive' | 'background';

export interface CompanionView {
  readonly lines: StyledLine[];
  readonly label: string;          // "session:windowName"
  readonly host: string;
  readonly timestamp: string;
  readonly paneId: string;
}

export interface CompanionDisplay {
  show(view: CompanionView): void;
}
