import type { TelemetryPoint } from '../../entities/telemetry-point.js';
import type { SessionMarkers, SessionPhase } from '../../entities/session.js';

export interface SessionStateMessage {
  phase: SessionPhase;
  markers: SessionMarkers;
}

export interface SessionStreamPublisherPort {
  publishSample(point: TelemetryPoint): Promise<void>;
  publishSessionState(state: SessionStateMessage): Promise<void>;
}
