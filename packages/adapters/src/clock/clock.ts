import type { ClockPort } from '@weather-station/domain';

/** Wall-clock time for live operation. */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

/**
 * Clock that only moves when told to.
 * Lets window arithmetic be asserted against fixed instants.
 */
export class ManualClock implements ClockPort {
  private currentMs: number;

  constructor(start: Date | number) {
    this.currentMs = typeof start === 'number' ? start : start.getTime();
  }

  now(): Date {
    return new Date(this.currentMs);
  }

  set(at: Date): void {
    this.currentMs = at.getTime();
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }
}
