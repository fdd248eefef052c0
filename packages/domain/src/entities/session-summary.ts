export interface WaitingSummary {
  readonly status: 'waiting';
  readonly message: string;
}

export interface LiveSummary {
  readonly status: 'live';
  readonly startedAt: number;
  readonly startedAgo: string;
  readonly elapsedSeconds: number;
  readonly lastUpdateAt: number;
  readonly speedMph: number;
  readonly resistanceLevel: number | null;
  readonly heartRateBpm: number;
}

export interface FinalSummary {
  readonly status: 'final';
  readonly startedAt: number | null;
  readonly endedAt: number;
  /** `endedAt - startedAt`; null when the end arrived without a start. */
  readonly durationSeconds: number | null;
  readonly durationText: string | null;
  readonly endedAgo: string;
  readonly sampleCount: number;
  readonly speedMean: number;
  readonly speedMax: number;
  /** Null when no retained sample carries a resistance reading. */
  readonly resistanceMean: number | null;
  readonly resistanceMax: number | null;
  readonly heartRateMean: number;
  readonly heartRateMax: number;
}

export type SessionSummary = WaitingSummary | LiveSummary | FinalSummary;

/** Oldest first, ready for charting. */
export interface SessionSeries {
  readonly timestamps: number[];
  readonly speedMph: number[];
  readonly resistance?: Array<number | null>;
  readonly heartRateBpm: number[];
}

export type ControlAuthorizationReason = 'ip_match' | 'dev_mode';

export interface ControlAuthorization {
  readonly authorized: boolean;
  readonly reason: ControlAuthorizationReason | null;
}
