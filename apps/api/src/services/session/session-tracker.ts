import type {
  ClockPort,
  SessionMarkers,
  SessionPhase,
  SessionStorePort,
  StoreWrite,
} from '@ride-telemetry/domain';

/**
 * Derive the lifecycle phase from stored markers.
 *
 *   no_session → powered_on (optional) → active → ended
 *
 * An end marker wins even without a start; a new start clears it.
 */
export function derivePhase(markers: SessionMarkers): SessionPhase {
  if (markers.endedAt !== null) return 'ended';
  if (markers.startedAt !== null) return 'active';
  if (markers.poweredOnAt !== null) return 'powered_on';
  return 'no_session';
}

/** Seconds from start to end, or to `now` while the session runs. */
export function sessionDuration(markers: SessionMarkers, nowSeconds: number): number | null {
  if (markers.startedAt === null) return null;
  const until = markers.endedAt ?? nowSeconds;
  return Math.max(0, until - markers.startedAt);
}

export class SessionTracker {
  constructor(
    private readonly store: SessionStorePort,
    private readonly clock: ClockPort,
  ) {}

  async powerOn(t: number): Promise<void> {
    await this.store.apply([{ op: 'setMarker', field: 'poweredOnAt', value: t }]);
  }

  /** Discards every marker and sample of the previous session. */
  async start(t: number, originAddress?: string): Promise<void> {
    const writes: StoreWrite[] = [
      { op: 'reset' },
      { op: 'setMarker', field: 'startedAt', value: t },
    ];
    if (originAddress !== undefined) {
      writes.push({ op: 'setMarker', field: 'producerAddress', value: originAddress });
    }
    await this.store.apply(writes);
  }

  /** Idempotent apart from overwriting `endedAt`. */
  async end(t: number): Promise<void> {
    await this.store.apply([
      { op: 'setMarker', field: 'endedAt', value: t },
      { op: 'clearMarker', field: 'producerAddress' },
    ]);
  }

  async markers(): Promise<SessionMarkers> {
    return this.store.readMarkers();
  }

  async phase(): Promise<SessionPhase> {
    return derivePhase(await this.store.readMarkers());
  }

  async hasStarted(): Promise<boolean> {
    return (await this.store.readMarkers()).startedAt !== null;
  }

  async hasEnded(): Promise<boolean> {
    return (await this.store.readMarkers()).endedAt !== null;
  }

  async durationSoFar(): Promise<number | null> {
    return sessionDuration(await this.store.readMarkers(), this.clock.nowSeconds());
  }

  async originAddress(): Promise<string | null> {
    return (await this.store.readMarkers()).producerAddress;
  }
}
