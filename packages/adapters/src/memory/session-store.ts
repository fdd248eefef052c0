import { EMPTY_MARKERS } from '@ride-telemetry/domain';
import type {
  SessionMarkerField,
  SessionMarkers,
  SessionSnapshot,
  SessionStorePort,
  StoreWrite,
  TelemetryPoint,
} from '@ride-telemetry/domain';

/**
 * Process-local session store. Writes are applied synchronously, so a batch is
 * never interleaved with a read.
 */
export class InMemorySessionStore implements SessionStorePort {
  private markers: SessionMarkers = EMPTY_MARKERS;
  // Oldest first; reads reverse it.
  private samples: TelemetryPoint[] = [];

  async readMarkers(): Promise<SessionMarkers> {
    return this.markers;
  }

  async readHead(): Promise<TelemetryPoint | null> {
    return this.samples[this.samples.length - 1] ?? null;
  }

  async readSamples(): Promise<TelemetryPoint[]> {
    return [...this.samples].reverse();
  }

  async readSnapshot(): Promise<SessionSnapshot> {
    return { markers: this.markers, samples: [...this.samples].reverse() };
  }

  async apply(writes: readonly StoreWrite[]): Promise<void> {
    for (const write of writes) {
      switch (write.op) {
        case 'reset':
          this.markers = EMPTY_MARKERS;
          this.samples = [];
          break;
        case 'clearSamples':
          this.samples = [];
          break;
        case 'setMarker':
          this.markers = withMarker(this.markers, write);
          break;
        case 'clearMarker':
          this.markers = withoutMarker(this.markers, write.field);
          break;
        case 'pushSample':
          this.samples.push(write.point);
          break;
        case 'trimSamples':
          if (write.maxLength > 0 && this.samples.length > write.maxLength) {
            this.samples.splice(0, this.samples.length - write.maxLength);
          }
          break;
      }
    }
  }

  async ping(): Promise<boolean> {
    return true;
  }
}

type SetMarkerWrite = Extract<StoreWrite, { op: 'setMarker' }>;

function withMarker(markers: SessionMarkers, write: SetMarkerWrite): SessionMarkers {
  switch (write.field) {
    case 'poweredOnAt':
      return { ...markers, poweredOnAt: write.value };
    case 'startedAt':
      return { ...markers, startedAt: write.value };
    case 'endedAt':
      return { ...markers, endedAt: write.value };
    case 'producerAddress':
      return { ...markers, producerAddress: write.value };
  }
}

function withoutMarker(markers: SessionMarkers, field: SessionMarkerField): SessionMarkers {
  switch (field) {
    case 'poweredOnAt':
      return { ...markers, poweredOnAt: null };
    case 'startedAt':
      return { ...markers, startedAt: null };
    case 'endedAt':
      return { ...markers, endedAt: null };
    case 'producerAddress':
      return { ...markers, producerAddress: null };
  }
}
