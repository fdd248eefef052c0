/**
 * PgSessionStore against a mocked pool: verifies the SQL issued per write,
 * transaction boundaries, and row mapping. No database is contacted.
 */

import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { StorageUnavailableError } from '@ride-telemetry/domain';
import { PgSessionStore } from '../postgres/session-store.js';
import type { DbPool } from '../postgres/pool.js';

type QueryFn = (sql: string, values?: unknown[]) => Promise<{ rows: Record<string, unknown>[] }>;

const clientQuery = jest.fn<QueryFn>();
const release = jest.fn();
const poolQuery = jest.fn<QueryFn>();
const connect = jest.fn<() => Promise<unknown>>();

const pool = { query: poolQuery, connect } as unknown as DbPool;

function sqlCalls(): string[] {
  return clientQuery.mock.calls.map(([sql]) => sql.replace(/\s+/g, ' ').trim());
}

beforeEach(() => {
  jest.clearAllMocks();
  clientQuery.mockResolvedValue({ rows: [] });
  connect.mockResolvedValue({ query: clientQuery, release });
});

describe('PgSessionStore.apply', () => {
  it('runs a push and trim inside one transaction', async () => {
    const store = new PgSessionStore(pool);
    await store.apply([
      { op: 'pushSample', point: { timestamp: 100, speedMph: 12.5, heartRateBpm: 130 } },
      { op: 'trimSamples', maxLength: 3 },
    ]);

    const calls = sqlCalls();
    expect(calls[0]).toBe('BEGIN');
    expect(calls[1]).toContain('INSERT INTO ride.telemetry_samples');
    expect(clientQuery.mock.calls[1]?.[1]).toEqual([100, 12.5, null, 130]);
    expect(calls[2]).toContain('DELETE FROM ride.telemetry_samples WHERE seq NOT IN');
    expect(clientQuery.mock.calls[2]?.[1]).toEqual([3]);
    expect(calls[3]).toBe('COMMIT');
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('skips the trim statement when unbounded', async () => {
    const store = new PgSessionStore(pool);
    await store.apply([{ op: 'trimSamples', maxLength: 0 }]);
    expect(sqlCalls()).toEqual(['BEGIN', 'COMMIT']);
  });

  it('writes markers to their columns', async () => {
    const store = new PgSessionStore(pool);
    await store.apply([
      { op: 'reset' },
      { op: 'setMarker', field: 'startedAt', value: 200 },
      { op: 'setMarker', field: 'producerAddress', value: '10.0.0.7' },
    ]);

    const calls = sqlCalls();
    expect(calls[1]).toBe('DELETE FROM ride.telemetry_samples');
    expect(calls[2]).toContain('SET powered_on_at = NULL, session_start = NULL');
    expect(calls[3]).toContain('SET session_start = $1');
    expect(clientQuery.mock.calls[3]?.[1]).toEqual([200]);
    expect(calls[4]).toContain('SET producer_address = $1');
    expect(clientQuery.mock.calls[4]?.[1]).toEqual(['10.0.0.7']);
  });

  it('rolls back and reports storage unavailable when a write fails', async () => {
    clientQuery.mockImplementation(async (sql) => {
      if (sql.includes('INSERT')) throw new Error('connection reset');
      return { rows: [] };
    });
    const store = new PgSessionStore(pool);

    await expect(
      store.apply([{ op: 'pushSample', point: { timestamp: 1, speedMph: 1, heartRateBpm: 1 } }]),
    ).rejects.toBeInstanceOf(StorageUnavailableError);
    expect(sqlCalls()).toContain('ROLLBACK');
    expect(sqlCalls()).not.toContain('COMMIT');
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('issues nothing for an empty batch', async () => {
    const store = new PgSessionStore(pool);
    await store.apply([]);
    expect(connect).not.toHaveBeenCalled();
  });
});

describe('PgSessionStore reads', () => {
  it('maps BIGINT strings in the marker row', async () => {
    clientQuery.mockResolvedValueOnce({
      rows: [
        {
          powered_on_at: null,
          session_start: '100',
          session_end: '160',
          producer_address: '10.0.0.7',
        },
      ],
    });
    const store = new PgSessionStore(pool);

    expect(await store.readMarkers()).toEqual({
      poweredOnAt: null,
      startedAt: 100,
      endedAt: 160,
      producerAddress: '10.0.0.7',
    });
  });

  it('omits resistance when the column is null', async () => {
    clientQuery.mockResolvedValueOnce({
      rows: [
        { ts: '102', speed_mph: 15, resistance: 4, heart_bpm: 140 },
        { ts: '101', speed_mph: 20, resistance: null, heart_bpm: 135 },
      ],
    });
    const store = new PgSessionStore(pool);

    expect(await store.readSamples()).toEqual([
      { timestamp: 102, speedMph: 15, resistanceLevel: 4, heartRateBpm: 140 },
      { timestamp: 101, speedMph: 20, heartRateBpm: 135 },
    ]);
  });

  it('returns null head for an empty table', async () => {
    const store = new PgSessionStore(pool);
    expect(await store.readHead()).toBeNull();
  });

  it('wraps connection failures', async () => {
    connect.mockRejectedValueOnce(new Error('ECONNREFUSED'));
    const store = new PgSessionStore(pool);
    await expect(store.readMarkers()).rejects.toBeInstanceOf(StorageUnavailableError);
  });

  it('ping reports false when the database is unreachable', async () => {
    poolQuery.mockRejectedValueOnce(new Error('ECONNREFUSED'));
    const store = new PgSessionStore(pool);
    expect(await store.ping()).toBe(false);
  });
});
