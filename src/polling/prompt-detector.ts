/**
 * @file    polling/prompt-detector.ts
 * @purpose Detect a shell prompt returning after command output, so the
 *          companion can be told a command finished.
 * @depends shared/types/frame.ts
 */

import { StyledLine } from '../shared/types/frame';

const PROMPT_ENDINGS = [' $', ' #', ' %', ' >', '❯'];
const PROMPT_CHARS = ['$', '>', '#', '%', '❯'];

export function lineText(line: StyledLine): string {
  return line.map((run) => run.t).join('');
}

export function isPromptLine(line: string): boolean {
  const trimmed = line.trim();
  if (trimmed === '') return false;

  if (PROMPT_ENDINGS.some((ending) => trimmed.endsWith(ending))) {
    return true;
  }

  // A bare prompt character, optionally followed by one more ("$", ">>")
  const chars = Array.from(trimmed);
  if (PROMPT_CHARS.includes(chars[0]) && chars.length <= 2) {
    return true;
  }

  // user@host:path$
  return trimmed.includes('@') && (trimmed.endsWith('$') || trimmed.endsWith('#'));
}

export function lastNonEmptyLine(content: readonly StyledLine[]): string {
  for (let i = content.length - 1; i >= 0; i--) {
    const text = lineText(content[i]).trim();
    if (text !== '') return text;
  }
  return '';
}

/**
 * Tracks prompt → output → prompt transitions across frames. Starts in the
 * "prompt seen" state so the first frame never reports a finished command.
 */
export class PromptTracker {
  private lastWasPrompt: boolean = true;

  /** Feed the next changed frame; true when a command just finished */
  observe(content: readonly StyledLine[]): boolean {
    const isPrompt = isPromptLine(lastNonEmptyLine(content));
    const finished = !this.lastWasPrompt && isPrompt;
    this.lastWasPrompt = isPrompt;
    return finished;
  }
}
