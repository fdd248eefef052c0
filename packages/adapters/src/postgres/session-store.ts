import { EMPTY_MARKERS, StorageUnavailableError } from '@ride-telemetry/domain';
import type {
  SessionMarkerField,
  SessionMarkers,
  SessionSnapshot,
  SessionStorePort,
  StoreWrite,
  TelemetryPoint,
} from '@ride-telemetry/domain';
import { getPool, withClient, withTransaction } from './pool.js';
import type { DbClient, DbPool } from './pool.js';

const MARKER_COLUMNS: Record<SessionMarkerField, string> = {
  poweredOnAt: 'powered_on_at',
  startedAt: 'session_start',
  endedAt: 'session_end',
  producerAddress: 'producer_address',
};

export class PgSessionStore implements SessionStorePort {
  constructor(private readonly pool: DbPool = getPool()) {}

  async readMarkers(): Promise<SessionMarkers> {
    return this.guard(() => withClient(readMarkers, this.pool));
  }

  async readHead(): Promise<TelemetryPoint | null> {
    return this.guard(() =>
      withClient(async (client) => {
        const { rows } = await client.query(
          `SELECT ts, speed_mph, resistance, heart_bpm
           FROM ride.telemetry_samples
           ORDER BY seq DESC
           LIMIT 1`,
        );
        return rows[0] ? mapSampleRow(rows[0]) : null;
      }, this.pool),
    );
  }

  async readSamples(): Promise<TelemetryPoint[]> {
    return this.guard(() => withClient(readSamples, this.pool));
  }

  async readSnapshot(): Promise<SessionSnapshot> {
    return this.guard(() =>
      withTransaction(async (client) => {
        await client.query('SET TRANSACTION ISOLATION LEVEL REPEATABLE READ READ ONLY');
        const markers = await readMarkers(client);
        const samples = await readSamples(client);
        return { markers, samples };
      }, this.pool),
    );
  }

  async apply(writes: readonly StoreWrite[]): Promise<void> {
    if (writes.length === 0) return;
    await this.guard(() =>
      withTransaction(async (client) => {
        for (const write of writes) {
          await applyWrite(client, write);
        }
      }, this.pool),
    );
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (err) {
      console.warn('[pg-session-store] ping failed', err instanceof Error ? err.message : err);
      return false;
    }
  }

  private async guard<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new StorageUnavailableError({ cause: err });
    }
  }
}

async function readMarkers(db: DbClient): Promise<SessionMarkers> {
  const { rows } = await db.query(
    `SELECT powered_on_at, session_start, session_end, producer_address
     FROM ride.session_state
     WHERE id = 1`,
  );
  return rows[0] ? mapMarkerRow(rows[0]) : EMPTY_MARKERS;
}

async function readSamples(db: DbClient): Promise<TelemetryPoint[]> {
  const { rows } = await db.query(
    `SELECT ts, speed_mph, resistance, heart_bpm
     FROM ride.telemetry_samples
     ORDER BY seq DESC`,
  );
  return rows.map(mapSampleRow);
}

async function applyWrite(client: DbClient, write: StoreWrite): Promise<void> {
  switch (write.op) {
    case 'reset':
      await client.query('DELETE FROM ride.telemetry_samples');
      await client.query(
        `UPDATE ride.session_state
         SET powered_on_at = NULL, session_start = NULL, session_end = NULL,
             producer_address = NULL, updated_at = NOW()
         WHERE id = 1`,
      );
      return;
    case 'clearSamples':
      await client.query('DELETE FROM ride.telemetry_samples');
      return;
    case 'setMarker':
      await client.query(
        `UPDATE ride.session_state
         SET ${MARKER_COLUMNS[write.field]} = $1, updated_at = NOW()
         WHERE id = 1`,
        [write.value],
      );
      return;
    case 'clearMarker':
      await client.query(
        `UPDATE ride.session_state
         SET ${MARKER_COLUMNS[write.field]} = NULL, updated_at = NOW()
         WHERE id = 1`,
      );
      return;
    case 'pushSample':
      await client.query(
        `INSERT INTO ride.telemetry_samples (ts, speed_mph, resistance, heart_bpm)
         VALUES ($1, $2, $3, $4)`,
        [
          write.point.timestamp,
          write.point.speedMph,
          write.point.resistanceLevel ?? null,
          write.point.heartRateBpm,
        ],
      );
      return;
    case 'trimSamples':
      if (write.maxLength <= 0) return;
      await client.query(
        `DELETE FROM ride.telemetry_samples
         WHERE seq NOT IN (
           SELECT seq FROM ride.telemetry_samples ORDER BY seq DESC LIMIT $1
         )`,
        [write.maxLength],
      );
      return;
  }
}

// BIGINT columns come back from pg as strings.
function toNumberOrNull(value: unknown): number | null {
  return value === null || value === undefined ? null : Number(value);
}

function mapMarkerRow(row: Record<string, unknown>): SessionMarkers {
  const address = row['producer_address'];
  return {
    poweredOnAt: toNumberOrNull(row['powered_on_at']),
    startedAt: toNumberOrNull(row['session_start']),
    endedAt: toNumberOrNull(row['session_end']),
    producerAddress: typeof address === 'string' ? address : null,
  };
}

function mapSampleRow(row: Record<string, unknown>): TelemetryPoint {
  const resistance = toNumberOrNull(row['resistance']);
  return {
    timestamp: Number(row['ts']),
    speedMph: Number(row['speed_mph']),
    ...(resistance === null ? {} : { resistanceLevel: resistance }),
    heartRateBpm: Number(row['heart_bpm']),
  };
}
