import type { IngestLogEntry, IngestLogSink } from '@ride-telemetry/domain';

export const consoleIngestLog: IngestLogSink = {
  record(entry: IngestLogEntry): void {
    if (entry.kind === 'malformed') {
      console.warn('[ingest] malformed payload', entry.issues);
      return;
    }
    const { event, outcome } = entry;
    switch (outcome.status) {
      case 'accepted':
        console.log(`[ingest] ${outcome.reply}`, JSON.stringify(event));
        break;
      case 'ignored':
        console.log(`[ingest] ignored (${outcome.reason})`, JSON.stringify(event));
        break;
      case 'rejected':
        console.warn(`[ingest] ${outcome.reply}`);
        break;
    }
  },
};
