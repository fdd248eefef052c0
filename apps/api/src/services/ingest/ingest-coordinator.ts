import { setTimeout as sleep } from 'timers/promises';
import { MalformedPayloadError } from '@ride-telemetry/domain';
import type {
  IngestEvent,
  IngestLogSink,
  IngestOutcome,
  SessionStreamPublisherPort,
  TelemetryIngestionPort,
  TelemetryPoint,
} from '@ride-telemetry/domain';
import type { SessionTracker } from '../session/session-tracker.js';
import { derivePhase } from '../session/session-tracker.js';
import type { TelemetryStore } from '../telemetry/telemetry-store.js';
import { parseIngestRecord, unwrapEnvelope } from './ingest-payload.js';
import { consoleIngestLog } from './console-ingest-log.js';

export interface IngestCoordinatorOptions {
  /** Pause after an end event before acknowledging it. */
  endSessionSettleMs?: number;
  log?: IngestLogSink;
  publisher?: SessionStreamPublisherPort | null;
}

const STALE_REPLY = 'ignored stale data';

/**
 * Single entry point for device events. Drives session transitions and commits
 * accepted samples; every handled event is reported to the log sink.
 */
export class IngestCoordinator implements TelemetryIngestionPort {
  private readonly settleMs: number;
  private readonly log: IngestLogSink;
  private readonly publisher: SessionStreamPublisherPort | null;

  constructor(
    private readonly tracker: SessionTracker,
    private readonly telemetry: TelemetryStore,
    opts: IngestCoordinatorOptions = {},
  ) {
    this.settleMs = opts.endSessionSettleMs ?? 100;
    this.log = opts.log ?? consoleIngestLog;
    this.publisher = opts.publisher ?? null;
  }

  async submit(payload: unknown): Promise<IngestOutcome> {
    let event: IngestEvent;
    try {
      event = parseIngestRecord(unwrapEnvelope(payload));
    } catch (err) {
      if (err instanceof MalformedPayloadError) {
        this.log.record({ kind: 'malformed', issues: err.issues, at: new Date() });
      }
      throw err;
    }
    return this.handle(event);
  }

  async handle(event: IngestEvent): Promise<IngestOutcome> {
    const outcome = await this.dispatch(event);
    this.log.record({ kind: 'handled', event, outcome, at: new Date() });
    if (outcome.status === 'accepted') await this.publish(event);
    return outcome;
  }

  private async dispatch(event: IngestEvent): Promise<IngestOutcome> {
    switch (event.kind) {
      case 'powered_on':
        await this.tracker.powerOn(event.t);
        return { status: 'accepted', kind: event.kind, reply: 'power on received' };

      case 'start_session':
        await this.tracker.start(event.t, event.originAddress);
        return { status: 'accepted', kind: event.kind, reply: 'started session' };

      case 'end_session':
        await this.tracker.end(event.t);
        if (this.settleMs > 0) await sleep(this.settleMs);
        return { status: 'accepted', kind: event.kind, reply: 'ended session' };

      case 'new_data': {
        // Only the head is compared: a point older than some earlier, non-head
        // entry still gets in. Consumers rely on this exact behaviour.
        const head = await this.telemetry.headTimestamp();
        if (head !== null && head > event.t) {
          return { status: 'ignored', kind: event.kind, reason: 'stale', reply: STALE_REPLY };
        }
        if (await this.tracker.hasEnded()) {
          return { status: 'ignored', kind: event.kind, reason: 'session_ended', reply: STALE_REPLY };
        }
        await this.telemetry.append(toPoint(event));
        return { status: 'accepted', kind: event.kind, reply: 'data appended' };
      }

      case 'unknown':
        return {
          status: 'rejected',
          reason: 'unknown_event',
          reply: `event '${event.name}' not understood`,
        };
    }
  }

  private async publish(event: IngestEvent): Promise<void> {
    if (!this.publisher) return;
    try {
      if (event.kind === 'new_data') {
        await this.publisher.publishSample(toPoint(event));
      } else {
        const markers = await this.tracker.markers();
        await this.publisher.publishSessionState({ phase: derivePhase(markers), markers });
      }
    } catch (err) {
      console.error('[ingest] stream publish failed', err);
    }
  }
}

function toPoint(event: Extract<IngestEvent, { kind: 'new_data' }>): TelemetryPoint {
  return {
    timestamp: event.t,
    speedMph: event.speedMph,
    ...(event.resistanceLevel === undefined ? {} : { resistanceLevel: event.resistanceLevel }),
    heartRateBpm: event.heartRateBpm,
  };
}
