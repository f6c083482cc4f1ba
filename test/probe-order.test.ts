/**
 * @file    test/probe-order.test.ts
 * @purpose Unit tests for probing candidate order.
 */

import { nextIndex, probeCandidates } from '../src/navigation/probe-order';

describe('nextIndex', () => {
  it('should wrap within a 0-based session', () => {
    expect(nextIndex(2, 1, 3, 0)).toBe(0);
    expect(nextIndex(0, -1, 3, 0)).toBe(2);
  });

  it('should wrap within a 1-based session', () => {
    expect(nextIndex(3, 1, 3, 1)).toBe(1);
    expect(nextIndex(1, -1, 3, 1)).toBe(3);
  });
});

describe('probeCandidates', () => {
  it('should try base 0 first when nothing is learned', () => {
    expect(probeCandidates(0, 1, 3, null)).toEqual([
      { index: 1, base: 0 },
      { index: 2, base: 0 },
      { index: 3, base: 1 },
    ]);
  });

  it('should put the learned base first', () => {
    expect(probeCandidates(1, -1, 3, 1)).toEqual([
      { index: 3, base: 1 },
      { index: 0, base: 0 },
      { index: 2, base: 1 },
    ]);
  });

  it('should walk past the end of the range when wrapping forward', () => {
    expect(probeCandidates(3, 1, 3, 1)).toEqual([
      { index: 1, base: 1 },
      { index: 0, base: 0 },
      { index: 2, base: 1 },
    ]);
  });

  it('should never offer the current index or a duplicate', () => {
    for (let current = 0; current <= 5; current++) {
      for (const direction of [1, -1] as const) {
        const indices = probeCandidates(current, direction, 5, null).map((c) => c.index);
        expect(indices).not.toContain(current);
        expect(new Set(indices).size).toBe(indices.length);
      }
    }
  });

  it('should offer nothing for a single window', () => {
    expect(probeCandidates(0, 1, 1, null)).toEqual([]);
    expect(probeCandidates(0, 1, 0, 0)).toEqual([]);
  });
});
