/**
 * @file    navigation/probe-order.ts
 * @purpose Candidate window indices for trial-and-error navigation when the
 *          server does not say whether its window indices start at 0 or 1.
 * @depends shared/types/frame.ts
 *
 * The base tried first when nothing has been learned (0) is an empirical
 * heuristic, not something the protocol lets us derive.
 */

import { Direction, IndexBase } from '../shared/types/frame';

export interface ProbeCandidate {
  readonly index: number;
  /** Base to remember for the session if this candidate works */
  readonly base: IndexBase;
}

function mod(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}

function otherBase(base: IndexBase): IndexBase {
  return base === 0 ? 1 : 0;
}

/** Neighbouring index under a given base, wrapping within the session */
export function nextIndex(
  current: number,
  direction: Direction,
  windowCount: number,
  base: IndexBase,
): number {
  return base + mod(current - base + direction, windowCount);
}

/**
 * Ordered candidates: the learned base's neighbour, the other base's
 * neighbour, then every remaining index in 0..windowCount walking in the
 * direction of travel. The current index is never a candidate and no index
 * appears twice.
 */
export function probeCandidates(
  current: number,
  direction: Direction,
  windowCount: number,
  learnedBase: IndexBase | null,
): ProbeCandidate[] {
  if (windowCount < 2) return [];

  const bases: IndexBase[] = learnedBase === null
    ? [0, 1]
    : [learnedBase, otherBase(learnedBase)];
  const seen = new Set<number>([current]);
  const candidates: ProbeCandidate[] = [];

  const push = (index: number, base: IndexBase): void => {
    if (seen.has(index)) return;
    seen.add(index);
    candidates.push({ index, base });
  };

  for (const base of bases) {
    push(nextIndex(current, direction, windowCount, base), base);
  }

  // 0..windowCount covers both a 0-based and a 1-based session
  const span = windowCount + 1;
  for (let step = 1; step <= span; step++) {
    const index = mod(current + direction * step, span);
    if (index === 0) push(index, 0);
    else if (index === windowCount) push(index, 1);
    else push(index, bases[0]);
  }

  return candidates;
}
