import type { TelemetryPoint } from './telemetry-point.js';

export type SessionPhase = 'no_session' | 'powered_on' | 'active' | 'ended';

export type SessionMarkerField = 'poweredOnAt' | 'startedAt' | 'endedAt' | 'producerAddress';

export interface SessionMarkers {
  readonly poweredOnAt: number | null;
  readonly startedAt: number | null;
  /** Cleared only by a new session start. */
  readonly endedAt: number | null;
  readonly producerAddress: string | null;
}

export interface SessionSnapshot {
  readonly markers: SessionMarkers;
  /** Newest first. */
  readonly samples: readonly TelemetryPoint[];
}

export const EMPTY_MARKERS: SessionMarkers = {
  poweredOnAt: null,
  startedAt: null,
  endedAt: null,
  producerAddress: null,
};
