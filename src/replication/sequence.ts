/**
 * @file    replication/sequence.ts
 * @purpose Sequence stamps: emission on the primary, acceptance on the companion.
 * @depends uuid, shared/types/frame.ts
 *
 * The two sides keep independent counters. A new epoch (sender restart)
 * resets the seq baseline so a restarted sender's first message is not
 * rejected as stale.
 */

import { v4 as uuidv4 } from 'uuid';
import { SequenceStamp } from '../shared/types/frame';

export class SequenceEmitter {
  readonly epoch: string;
  private seq: number = 0;
  private now: () => number;

  constructor(epoch: string = uuidv4(), now: () => number = Date.now) {
    this.epoch = epoch;
    this.now = now;
  }

  next(): SequenceStamp {
    const stamp: SequenceStamp = { epoch: this.epoch, seq: this.seq, wallClock: this.now() };
    this.seq++;
    return stamp;
  }
}

export class SequenceGate {
  private last: SequenceStamp | null = null;

  /** True (and remembered) when the stamp is not older than the last accepted one */
  accept(stamp: SequenceStamp): boolean {
    if (!isAcceptable(stamp, this.last)) return false;
    this.last = stamp;
    return true;
  }

  lastAccepted(): SequenceStamp | null {
    return this.last;
  }

  reset(): void {
    this.last = null;
  }
}

export function isAcceptable(stamp: SequenceStamp, last: SequenceStamp | null): boolean {
  if (!last) return true;
  if (stamp.wallClock < last.wallClock) return false;
  if (stamp.epoch !== last.epoch) return true;
  return stamp.seq >= last.seq;
}
