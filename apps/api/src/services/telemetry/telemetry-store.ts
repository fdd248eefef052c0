import type { SessionStorePort, TelemetryPoint } from '@ride-telemetry/domain';

/**
 * Ordered sample log for the current session, newest sample at the head.
 * `maxLength` of 0 leaves the log unbounded; sessions are expected to end
 * before it grows large.
 */
export class TelemetryStore {
  constructor(
    private readonly store: SessionStorePort,
    readonly maxLength: number = 0,
  ) {
    if (!Number.isInteger(maxLength) || maxLength < 0) {
      throw new RangeError(`maxLength must be a non-negative integer, got ${maxLength}`);
    }
  }

  async reset(): Promise<void> {
    await this.store.apply([{ op: 'clearSamples' }]);
  }

  /** Push and trim are committed together. */
  async append(point: TelemetryPoint): Promise<void> {
    await this.store.apply([
      { op: 'pushSample', point },
      { op: 'trimSamples', maxLength: this.maxLength },
    ]);
  }

  async latest(): Promise<TelemetryPoint | null> {
    return this.store.readHead();
  }

  /** Full materialization, newest first. */
  async range(): Promise<TelemetryPoint[]> {
    return this.store.readSamples();
  }

  async headTimestamp(): Promise<number | null> {
    const head = await this.store.readHead();
    return head?.timestamp ?? null;
  }
}
