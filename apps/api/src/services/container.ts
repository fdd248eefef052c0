import type {
  ClockPort,
  IngestLogSink,
  SessionStorePort,
  SessionStreamPublisherPort,
} from '@ride-telemetry/domain';
import { SystemClock } from '@ride-telemetry/adapters';
import type { AppConfig } from '../config/env.js';
import { IngestCoordinator } from './ingest/ingest-coordinator.js';
import { SessionTracker } from './session/session-tracker.js';
import { StatsAggregator } from './stats/stats-aggregator.js';
import { TelemetryStore } from './telemetry/telemetry-store.js';

export interface Services {
  store: SessionStorePort;
  tracker: SessionTracker;
  telemetry: TelemetryStore;
  ingestion: IngestCoordinator;
  stats: StatsAggregator;
}

export interface ServiceOverrides {
  clock?: ClockPort;
  log?: IngestLogSink;
  publisher?: SessionStreamPublisherPort | null;
}

/** Wire the core services around one shared session store. */
export function buildServices(
  config: Pick<AppConfig, 'maxSeriesLength' | 'endSessionSettleMs'>,
  store: SessionStorePort,
  overrides: ServiceOverrides = {},
): Services {
  const clock = overrides.clock ?? new SystemClock();
  const tracker = new SessionTracker(store, clock);
  const telemetry = new TelemetryStore(store, config.maxSeriesLength);
  const ingestion = new IngestCoordinator(tracker, telemetry, {
    endSessionSettleMs: config.endSessionSettleMs,
    log: overrides.log,
    publisher: overrides.publisher,
  });
  const stats = new StatsAggregator(store, clock);
  return { store, tracker, telemetry, ingestion, stats };
}
