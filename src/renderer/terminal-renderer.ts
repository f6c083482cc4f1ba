/**
 * @file    renderer/terminal-renderer.ts
 * @purpose Projects captured terminal content onto the narrow companion display.
 * @owner   panesync maintainers
 * @depends zod, shared/types/frame.ts, renderer/themes.json
 *
 * Two steps, both pure:
 *   1. Lines made mostly of border characters (pane separators, rules) are
 *      replaced by a divider that fits one display line.
 *   2. Named colours resolve to the theme's hex values (companion only; the
 *      primary keeps names so the companion can re-theme later).
 */

import { z } from 'zod';
import {
  DisplayConfig,
  Frame,
  Renderer,
  StyledLine,
  StyledRun,
} from '../shared/types/frame';
import themeData from './themes.json';

// ─────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────

export interface TerminalRendererConfig {
  /** Resolve colour names through the theme; off on the sending side */
  resolveColors: boolean;
  /** Usable display width in points */
  displayWidthPt: number;
  /** Monospace advance as a fraction of the font size */
  glyphAdvanceRatio: number;
  minFontSize: number;
  /** Lines with fewer non-space characters are never collapsed */
  minBorderChars: number;
  /** Share of non-space characters that must be border characters */
  borderRatio: number;
}

export const DEFAULT_RENDERER_CONFIG: TerminalRendererConfig = {
  resolveColors: true,
  displayWidthPt: 194,
  glyphAdvanceRatio: 0.78,
  minFontSize: 7,
  minBorderChars: 5,
  borderRatio: 0.7,
};

// ─────────────────────────────────────────────
// Themes
// ─────────────────────────────────────────────

const paletteSchema = z.object({
  black: z.string(),
  red: z.string(),
  green: z.string(),
  yellow: z.string(),
  blue: z.string(),
  magenta: z.string(),
  cyan: z.string(),
  white: z.string(),
  brBlack: z.string(),
  brRed: z.string(),
  brGreen: z.string(),
  brYellow: z.string(),
  brBlue: z.string(),
  brMagenta: z.string(),
  brCyan: z.string(),
  brWhite: z.string(),
  foreground: z.string(),
  background: z.string(),
});

export type Palette = z.infer<typeof paletteSchema>;

const THEMES: Record<string, Palette> = z.record(paletteSchema).parse(themeData);

/** Markers the capture server uses for the terminal's default colours */
const DEFAULT_FG = '_defFg';
const DEFAULT_BG = '_defBg';

const HEX_COLOR = /^#[0-9a-fA-F]{6}$/;

export function themeNames(): string[] {
  return Object.keys(THEMES);
}

export function paletteFor(theme: string): Palette {
  return THEMES[theme] ?? THEMES.default;
}

export function resolveColor(name: string | undefined, palette: Palette): string | undefined {
  if (name === undefined) return undefined;
  if (name === DEFAULT_FG) return palette.foreground;
  if (name === DEFAULT_BG) return palette.background;
  if (HEX_COLOR.test(name)) return name;

  const parsed = paletteSchema.keyof().safeParse(name);
  return parsed.success ? palette[parsed.data] : undefined;
}

// ─────────────────────────────────────────────
// Border collapsing
// ─────────────────────────────────────────────

const EXTRA_BORDER_CHARS = new Set(Array.from('-—–·.╌╍┄┅┈┉'));

export function isBorderChar(ch: string): boolean {
  const code = ch.codePointAt(0);
  if (code !== undefined && code >= 0x2500 && code <= 0x257f) return true;
  return EXTRA_BORDER_CHARS.has(ch);
}

/** Monospaced characters that fit on one companion display line */
export function charactersPerLine(
  fontSize: number,
  config: TerminalRendererConfig = DEFAULT_RENDERER_CONFIG,
): number {
  const advance = Math.max(fontSize, config.minFontSize) * config.glyphAdvanceRatio;
  return Math.floor(config.displayWidthPt / advance);
}

export function collapseBorderLine(
  line: StyledLine,
  width: number,
  config: TerminalRendererConfig = DEFAULT_RENDERER_CONFIG,
): StyledLine {
  const text = line.map((run) => run.t).join('');
  const nonSpace = Array.from(text).filter((ch) => !/\s/.test(ch));
  if (nonSpace.length < config.minBorderChars) return line;

  const frequency = new Map<string, number>();
  for (const ch of nonSpace) {
    if (isBorderChar(ch)) frequency.set(ch, (frequency.get(ch) ?? 0) + 1);
  }
  let borderCount = 0;
  let dominant = '─';
  let dominantCount = 0;
  for (const [ch, count] of frequency) {
    borderCount += count;
    if (count > dominantCount) {
      dominant = ch;
      dominantCount = count;
    }
  }
  if (borderCount / nonSpace.length <= config.borderRatio) return line;

  const divider: StyledRun = {
    t: dominant.repeat(width),
    ...pick('fg', line.find((run) => run.fg !== undefined)?.fg),
    ...pick('bg', line.find((run) => run.bg !== undefined)?.bg),
  };
  return [divider];
}

function pick<K extends 'fg' | 'bg'>(key: K, value: string | undefined): Partial<Record<K, string>> {
  if (value === undefined) return {};
  const entry: Partial<Record<K, string>> = {};
  entry[key] = value;
  return entry;
}

// ─────────────────────────────────────────────
// Renderer
// ─────────────────────────────────────────────

export class TerminalRenderer implements Renderer {
  private config: TerminalRendererConfig;

  constructor(config: Partial<TerminalRendererConfig> = {}) {
    this.config = { ...DEFAULT_RENDERER_CONFIG, ...config };
  }

  render(frame: Frame, display: DisplayConfig): StyledLine[] {
    const width = charactersPerLine(display.fontSize, this.config);
    const collapsed = frame.content.map((line) => collapseBorderLine(line, width, this.config));
    if (!this.config.resolveColors) return collapsed;

    const palette = paletteFor(display.colorTheme);
    return collapsed.map((line) => line.map((run) => themeRun(run, palette)));
  }
}

function themeRun(run: StyledRun, palette: Palette): StyledRun {
  const { fg, bg, ...rest } = run;
  const themed: StyledRun = {
    ...rest,
    ...pick('fg', resolveColor(fg, palette)),
    ...pick('bg', resolveColor(bg, palette)),
  };
  return themed;
}
