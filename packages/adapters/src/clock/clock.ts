import type { ClockPort } from '@ride-telemetry/domain';

/** Wall-clock implementation used by the running service. */
export class SystemClock implements ClockPort {
  nowSeconds(): number {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * Clock that only moves when told to. Lets elapsed-time and "ago" phrasing be
 * asserted exactly.
 */
export class ManualClock implements ClockPort {
  constructor(private currentSeconds: number) {}

  nowSeconds(): number {
    return this.currentSeconds;
  }

  set(seconds: number): void {
    this.currentSeconds = seconds;
  }

  advance(seconds: number): void {
    this.currentSeconds += seconds;
  }
}
