import { z } from 'zod';
import { MalformedPayloadError } from '@ride-telemetry/domain';
import type { IngestEvent, IngestEventKind } from '@ride-telemetry/domain';

const KNOWN_EVENTS: readonly IngestEventKind[] = [
  'powered_on',
  'start_session',
  'end_session',
  'new_data',
];

// Numbers, or their decimal text.
const unixSeconds = z.union([
  z.number().int().nonnegative(),
  z.string().regex(/^\d+$/).transform(Number),
]);
const level = z.union([
  z.number().int().nonnegative(),
  z.string().regex(/^\d+$/).transform(Number),
]);
const reading = z.union([
  z.number().finite().nonnegative(),
  z.string().regex(/^\d+(\.\d+)?$/).transform(Number),
]);

const eventNameSchema = z.object({ event: z.string().min(1) });

const recordSchema = z.discriminatedUnion('event', [
  z.object({ event: z.literal('powered_on'), t: unixSeconds }),
  z.object({
    event: z.literal('start_session'),
    t: unixSeconds,
    // Blank or null means the device did not report one.
    ip: z
      .string()
      .nullish()
      .transform((ip) => (ip == null || ip.trim() === '' ? undefined : ip.trim())),
  }),
  z.object({ event: z.literal('end_session'), t: unixSeconds }),
  z.object({
    event: z.literal('new_data'),
    t: unixSeconds,
    bike_mph: reading,
    // Absent on device variants without a resistance sensor; never defaulted.
    resistance: level.nullish(),
    heart_bpm: reading,
  }),
]);

const envelopeSchema = z.object({
  apikey: z.string().optional(),
  data: z.union([z.string(), z.record(z.unknown())]),
});

function issuesOf(error: z.ZodError): string[] {
  return error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function isKnownEvent(name: string): name is IngestEventKind {
  return KNOWN_EVENTS.some((known) => known === name);
}

/**
 * Accepts either the device-cloud envelope `{ apikey, data }`, where `data` is
 * the record or its JSON text, or the bare record.
 */
export function unwrapEnvelope(body: unknown): unknown {
  const envelope = envelopeSchema.safeParse(body);
  if (!envelope.success) return body;

  const { data } = envelope.data;
  if (typeof data !== 'string') return data;
  try {
    return JSON.parse(data);
  } catch {
    throw new MalformedPayloadError(['data: not valid JSON']);
  }
}

/** Validate one wire record into a typed ingest event. */
export function parseIngestRecord(payload: unknown): IngestEvent {
  const named = eventNameSchema.safeParse(payload);
  if (!named.success) throw new MalformedPayloadError(issuesOf(named.error));
  if (!isKnownEvent(named.data.event)) return { kind: 'unknown', name: named.data.event };

  const parsed = recordSchema.safeParse(payload);
  if (!parsed.success) throw new MalformedPayloadError(issuesOf(parsed.error));

  const record = parsed.data;
  switch (record.event) {
    case 'powered_on':
      return { kind: 'powered_on', t: record.t };
    case 'start_session':
      return record.ip === undefined
        ? { kind: 'start_session', t: record.t }
        : { kind: 'start_session', t: record.t, originAddress: record.ip };
    case 'end_session':
      return { kind: 'end_session', t: record.t };
    case 'new_data':
      return {
        kind: 'new_data',
        t: record.t,
        speedMph: record.bike_mph,
        ...(record.resistance == null ? {} : { resistanceLevel: record.resistance }),
        heartRateBpm: record.heart_bpm,
      };
  }
}
