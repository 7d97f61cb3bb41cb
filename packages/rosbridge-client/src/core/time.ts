/**
 * ROS time stamp: whole seconds plus nanoseconds.
 */

export interface Stamp {
  secs: number;
  nsecs: number;
}

const NSECS_PER_SEC = 1_000_000_000;

export class Time implements Stamp {
  constructor(public readonly secs: number, public readonly nsecs: number) {}

  static zero(): Time {
    return new Time(0, 0);
  }

  static now(): Time {
    return Time.fromSec(Date.now() / 1000);
  }

  static fromSec(seconds: number): Time {
    const secs = Math.trunc(seconds);
    const nsecs = Math.trunc((seconds - secs) * NSECS_PER_SEC);
    return new Time(secs, nsecs);
  }

  static fromStamp(stamp: Stamp): Time {
    return new Time(stamp.secs, stamp.nsecs);
  }

  /** Total order on (secs, nsecs): negative, zero or positive. */
  static compare(a: Stamp, b: Stamp): number {
    if (a.secs !== b.secs) return a.secs < b.secs ? -1 : 1;
    if (a.nsecs !== b.nsecs) return a.nsecs < b.nsecs ? -1 : 1;
    return 0;
  }

  compare(other: Stamp): number {
    return Time.compare(this, other);
  }

  isZero(): boolean {
    return this.secs === 0 && this.nsecs === 0;
  }

  toSec(): number {
    return this.secs + this.nsecs / NSECS_PER_SEC;
  }

  toNsec(): bigint {
    return BigInt(this.secs) * BigInt(NSECS_PER_SEC) + BigInt(this.nsecs);
  }

  toJSON(): Stamp {
    return { secs: this.secs, nsecs: this.nsecs };
  }
}
