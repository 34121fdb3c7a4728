// suite/components/clock.ts

const NS_PER_MS = 1_000_000n;
const NS_PER_S = 1_000_000_000n;

/**
 * A reading of the monotonic clock, in nanoseconds.
 * Only differences between instants are meaningful.
 */
export class Instant {
  constructor(readonly nanoseconds: bigint) {}

  static now(): Instant {
    return new Instant(process.hrtime.bigint());
  }

  /** Build an instant from a millisecond offset; handy for fixtures and adapters. */
  static fromMilliseconds(ms: number): Instant {
    return new Instant(BigInt(Math.round(ms * 1_000_000)));
  }

  /** Elapsed nanoseconds from this instant to `end`; zero if `end` is earlier. */
  nanosecondsUntil(end: Instant): bigint {
    const delta = end.nanoseconds - this.nanoseconds;
    return delta > 0n ? delta : 0n;
  }
}

/** e.g. "1.234 seconds". Truncates to whole milliseconds. */
export function describeDuration(start: Instant, end: Instant): string {
  const elapsed = start.nanosecondsUntil(end);
  const seconds = elapsed / NS_PER_S;
  const millis = (elapsed % NS_PER_S) / NS_PER_MS;
  return `${seconds}.${millis.toString().padStart(3, '0')} seconds`;
}
