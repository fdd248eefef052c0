import type { IngestEvent, IngestOutcome } from '../../entities/ingest-event.js';

export interface TelemetryIngestionPort {
  /** Decodes an untrusted request body (envelope or bare record), then handles it. */
  submit(payload: unknown): Promise<IngestOutcome>;
  handle(event: IngestEvent): Promise<IngestOutcome>;
}
