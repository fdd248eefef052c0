import type { IngestEvent, IngestOutcome } from '../../entities/ingest-event.js';

export type IngestLogEntry =
  | { kind: 'handled'; event: IngestEvent; outcome: IngestOutcome; at: Date }
  /** The body never became an event; nothing was mutated. */
  | { kind: 'malformed'; issues: string[]; at: Date };

/** Receives one record per ingest request, including the ones that fail validation. */
export interface IngestLogSink {
  record(entry: IngestLogEntry): void;
}
