import type { TelemetryPoint } from '../../entities/telemetry-point.js';
import type { SessionSeries, SessionSummary } from '../../entities/session-summary.js';

export interface SessionQueryPort {
  summary(): Promise<SessionSummary>;
  series(): Promise<SessionSeries>;
  latest(): Promise<TelemetryPoint | null>;
  isAuthorizedOrigin(callerAddress: string): Promise<boolean>;
}
