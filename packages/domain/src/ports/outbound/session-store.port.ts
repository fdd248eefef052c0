import type { TelemetryPoint } from '../../entities/telemetry-point.js';
import type {
  SessionMarkerField,
  SessionMarkers,
  SessionSnapshot,
} from '../../entities/session.js';

// ---------------------------------------------------------------------------
// Writes
// ---------------------------------------------------------------------------

export type StoreWrite =
  /** Drop markers and samples. */
  | { op: 'reset' }
  | { op: 'clearSamples' }
  | { op: 'setMarker'; field: 'poweredOnAt' | 'startedAt' | 'endedAt'; value: number }
  | { op: 'setMarker'; field: 'producerAddress'; value: string }
  | { op: 'clearMarker'; field: SessionMarkerField }
  | { op: 'pushSample'; point: TelemetryPoint }
  /** Keep the newest `maxLength` samples; 0 leaves the log untouched. */
  | { op: 'trimSamples'; maxLength: number };

// ---------------------------------------------------------------------------
// Port
// ---------------------------------------------------------------------------

/**
 * Durable keyed state for the single active session.
 *
 * `apply` is all-or-nothing: readers never observe a half-applied reset or a
 * pushed sample without its trim. Failures surface as StorageUnavailableError.
 */
export interface SessionStorePort {
  readMarkers(): Promise<SessionMarkers>;
  /** Most recently appended sample. */
  readHead(): Promise<TelemetryPoint | null>;
  /** Newest first. */
  readSamples(): Promise<TelemetryPoint[]>;
  readSnapshot(): Promise<SessionSnapshot>;
  apply(writes: readonly StoreWrite[]): Promise<void>;
  ping(): Promise<boolean>;
}
