/**
 * @file    test/sequence.test.ts
 * @purpose Unit tests for sequence stamp emission and acceptance.
 *
 * Test plan (must pass):
 *   - Emitter numbers stamps from 0 within one epoch
 *   - Reordered stamps are rejected, redelivered ones accepted
 *   - A sender restart (new epoch) is accepted unless its clock is behind
 */

import { SequenceEmitter, SequenceGate, isAcceptable } from '../src/replication/sequence';
import { SequenceStamp } from '../src/shared/types/frame';

// ═══════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════

function stamp(epoch: string, seq: number, wallClock: number): SequenceStamp {
  return { epoch, seq, wallClock };
}

// ═══════════════════════════════════════════
// TESTS
// ═══════════════════════════════════════════

describe('SequenceEmitter', () => {
  it('should number stamps from zero with the injected clock', () => {
    let clock = 1000;
    const emitter = new SequenceEmitter('epoch-a', () => clock);

    const first = emitter.next();
    clock = 1500;
    const second = emitter.next();

    expect(first).toEqual({ epoch: 'epoch-a', seq: 0, wallClock: 1000 });
    expect(second).toEqual({ epoch: 'epoch-a', seq: 1, wallClock: 1500 });
  });

  it('should pick a fresh epoch per instance by default', () => {
    expect(new SequenceEmitter().epoch).not.toBe(new SequenceEmitter().epoch);
  });
});

describe('SequenceGate', () => {
  it('should reject a stamp that arrives after a newer one', () => {
    const gate = new SequenceGate();

    expect(gate.accept(stamp('a', 1, 2000))).toBe(true);
    expect(gate.accept(stamp('a', 0, 1000))).toBe(false);
    expect(gate.lastAccepted()).toEqual(stamp('a', 1, 2000));
  });

  it('should accept a redelivered stamp', () => {
    const gate = new SequenceGate();

    expect(gate.accept(stamp('a', 4, 2000))).toBe(true);
    expect(gate.accept(stamp('a', 4, 2000))).toBe(true);
  });

  it('should reject a lower seq from the same epoch even with a later clock', () => {
    expect(isAcceptable(stamp('a', 2, 3000), stamp('a', 5, 2000))).toBe(false);
  });

  it('should accept a restarted sender whose seq starts over', () => {
    const gate = new SequenceGate();

    gate.accept(stamp('a', 40, 2000));

    expect(gate.accept(stamp('b', 0, 2100))).toBe(true);
    expect(gate.lastAccepted()?.epoch).toBe('b');
  });

  it('should reject any stamp whose wall clock is behind', () => {
    expect(isAcceptable(stamp('b', 0, 1999), stamp('a', 40, 2000))).toBe(false);
  });

  it('should accept anything after a reset', () => {
    const gate = new SequenceGate();
    gate.accept(stamp('a', 9, 5000));

    gate.reset();

    expect(gate.accept(stamp('a', 0, 1))).toBe(true);
  });
});
