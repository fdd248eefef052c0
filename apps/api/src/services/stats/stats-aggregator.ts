import type {
  ClockPort,
  FinalSummary,
  LiveSummary,
  SessionMarkers,
  SessionQueryPort,
  SessionSeries,
  SessionSnapshot,
  SessionStorePort,
  SessionSummary,
  TelemetryPoint,
  WaitingSummary,
} from '@ride-telemetry/domain';
import { derivePhase, sessionDuration } from '../session/session-tracker.js';
import { formatAgo, formatDuration } from './format-time.js';

export const WAITING_SUMMARY: WaitingSummary = {
  status: 'waiting',
  message: 'Waiting to receive data from bike...',
};

interface ChannelStats {
  mean: number;
  max: number;
}

type NonEmpty<T> = readonly [T, ...T[]];

function isNonEmpty<T>(values: readonly T[]): values is NonEmpty<T> {
  return values.length > 0;
}

function mapNonEmpty<T, U>(values: NonEmpty<T>, fn: (value: T) => U): NonEmpty<U> {
  const [first, ...rest] = values;
  return [fn(first), ...rest.map(fn)];
}

function channelStats(values: NonEmpty<number>): ChannelStats {
  let sum = 0;
  let max = -Infinity;
  for (const value of values) {
    sum += value;
    if (value > max) max = value;
  }
  return { mean: sum / values.length, max };
}

function resistanceReadings(samples: readonly TelemetryPoint[]): number[] {
  return samples.flatMap((p) => (p.resistanceLevel === undefined ? [] : [p.resistanceLevel]));
}

function liveSummary(
  markers: SessionMarkers & { startedAt: number },
  head: TelemetryPoint,
  now: number,
): LiveSummary {
  return {
    status: 'live',
    startedAt: markers.startedAt,
    startedAgo: formatAgo(markers.startedAt, now),
    elapsedSeconds: sessionDuration(markers, now) ?? 0,
    lastUpdateAt: head.timestamp,
    speedMph: head.speedMph,
    resistanceLevel: head.resistanceLevel ?? null,
    heartRateBpm: head.heartRateBpm,
  };
}

function finalSummary(
  markers: SessionMarkers & { endedAt: number },
  samples: NonEmpty<TelemetryPoint>,
  now: number,
): FinalSummary {
  const speed = channelStats(mapNonEmpty(samples, (p) => p.speedMph));
  const heartRate = channelStats(mapNonEmpty(samples, (p) => p.heartRateBpm));
  const readings = resistanceReadings(samples);
  const resistance = isNonEmpty(readings) ? channelStats(readings) : null;
  const durationSeconds = sessionDuration(markers, now);

  return {
    status: 'final',
    startedAt: markers.startedAt,
    endedAt: markers.endedAt,
    durationSeconds,
    durationText: durationSeconds === null ? null : formatDuration(durationSeconds),
    endedAgo: formatAgo(markers.endedAt, now),
    sampleCount: samples.length,
    speedMean: speed.mean,
    speedMax: speed.max,
    resistanceMean: resistance?.mean ?? null,
    resistanceMax: resistance?.max ?? null,
    heartRateMean: heartRate.mean,
    heartRateMax: heartRate.max,
  };
}

/**
 * Pure view over one snapshot. Priority: final (ended, with samples), then
 * live (started, with samples), otherwise waiting. An ended session without
 * samples is still waiting.
 */
export function summarize(snapshot: SessionSnapshot, nowSeconds: number): SessionSummary {
  const { markers, samples } = snapshot;
  if (!isNonEmpty(samples)) return WAITING_SUMMARY;

  if (markers.endedAt !== null) {
    return finalSummary({ ...markers, endedAt: markers.endedAt }, samples, nowSeconds);
  }
  if (markers.startedAt !== null) {
    return liveSummary({ ...markers, startedAt: markers.startedAt }, samples[0], nowSeconds);
  }
  return WAITING_SUMMARY;
}

/** Oldest first; `resistance` only when some sample reports it. */
export function toSeries(newestFirst: readonly TelemetryPoint[]): SessionSeries {
  const points = [...newestFirst].reverse();
  const series: SessionSeries = {
    timestamps: points.map((p) => p.timestamp),
    speedMph: points.map((p) => p.speedMph),
    heartRateBpm: points.map((p) => p.heartRateBpm),
  };
  if (resistanceReadings(points).length === 0) return series;
  return { ...series, resistance: points.map((p) => p.resistanceLevel ?? null) };
}

/** Recomputed on every call; nothing is cached. */
export class StatsAggregator implements SessionQueryPort {
  constructor(
    private readonly store: SessionStorePort,
    private readonly clock: ClockPort,
  ) {}

  async summary(): Promise<SessionSummary> {
    return summarize(await this.store.readSnapshot(), this.clock.nowSeconds());
  }

  async series(): Promise<SessionSeries> {
    return toSeries(await this.store.readSamples());
  }

  async latest(): Promise<TelemetryPoint | null> {
    return this.store.readHead();
  }

  async isAuthorizedOrigin(callerAddress: string): Promise<boolean> {
    const markers = await this.store.readMarkers();
    return derivePhase(markers) === 'active' && markers.producerAddress === callerAddress;
  }
}
