import 'dotenv/config';
import { setTimeout as sleep } from 'timers/promises';
import { fetch } from 'undici';
import { RideSimulator } from './ride-simulator.js';

/**
 * Bike emitter: plays one ride against the ingest webhook the way the sensor
 * device does: power on, start, one sample per tick, end.
 *
 * Env vars:
 *   INGEST_API_KEY      shared secret (required)
 *   API_BASE_URL        Base URL of the telemetry API (default: http://localhost:3001)
 *   EMIT_INTERVAL_MS    Sample interval in ms (default: 1000)
 *   SESSION_SAMPLES     Samples before the session ends (default: 120)
 *   BIKE_IP             Origin address reported at session start (optional)
 *   REPORT_RESISTANCE   Set to "false" to emulate a bike without a resistance sensor
 */

const INGEST_API_KEY = process.env['INGEST_API_KEY'];
const API_BASE_URL = process.env['API_BASE_URL'] ?? 'http://localhost:3001';
const EMIT_INTERVAL_MS = parseInt(process.env['EMIT_INTERVAL_MS'] ?? '1000', 10);
const SESSION_SAMPLES = parseInt(process.env['SESSION_SAMPLES'] ?? '120', 10);
const BIKE_IP = process.env['BIKE_IP'];
const REPORT_RESISTANCE = process.env['REPORT_RESISTANCE'] !== 'false';

const nowSeconds = () => Math.floor(Date.now() / 1000);

async function send(record: Record<string, unknown>): Promise<void> {
  try {
    const resp = await fetch(`${API_BASE_URL}/update`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ apikey: INGEST_API_KEY, data: JSON.stringify(record) }),
    });
    const text = await resp.text();
    if (!resp.ok) {
      console.error(`[emitter] ${String(record['event'])} failed ${resp.status}: ${text}`);
      return;
    }
    console.log(`[emitter] ${String(record['event'])} → ${text}`);
  } catch (err) {
    console.error('[emitter] network error', err instanceof Error ? err.message : err);
  }
}

async function main(): Promise<void> {
  if (!INGEST_API_KEY) {
    console.error('[emitter] INGEST_API_KEY is required');
    process.exit(1);
  }

  const ride = new RideSimulator({ reportResistance: REPORT_RESISTANCE });

  await send({ event: 'powered_on', t: nowSeconds() });
  await send({ event: 'start_session', t: nowSeconds(), ...(BIKE_IP ? { ip: BIKE_IP } : {}) });

  for (let i = 0; i < SESSION_SAMPLES; i += 1) {
    await sleep(EMIT_INTERVAL_MS);
    const sample = ride.step(nowSeconds());
    await send({ ...sample });
  }

  await send({ event: 'end_session', t: nowSeconds() });
  console.log(`[emitter] ride complete (${SESSION_SAMPLES} samples)`);
}

main().catch((err) => {
  console.error('[emitter] fatal error', err);
  process.exit(1);
});
