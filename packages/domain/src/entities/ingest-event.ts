export type IngestEventKind = 'powered_on' | 'start_session' | 'end_session' | 'new_data';

export type IngestEvent =
  | { kind: 'powered_on'; t: number }
  | { kind: 'start_session'; t: number; originAddress?: string }
  | { kind: 'end_session'; t: number }
  | {
      kind: 'new_data';
      t: number;
      speedMph: number;
      resistanceLevel?: number;
      heartRateBpm: number;
    }
  | { kind: 'unknown'; name: string };

export type IgnoreReason = 'stale' | 'session_ended';

export type IngestOutcome =
  | { status: 'accepted'; kind: IngestEventKind; reply: string }
  | { status: 'ignored'; kind: 'new_data'; reason: IgnoreReason; reply: string }
  | { status: 'rejected'; reason: 'unknown_event'; reply: string };
