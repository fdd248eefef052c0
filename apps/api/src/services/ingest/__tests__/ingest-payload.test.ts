import { describe, it, expect } from '@jest/globals';
import { MalformedPayloadError } from '@ride-telemetry/domain';
import { parseIngestRecord, unwrapEnvelope } from '../ingest-payload.js';

describe('parseIngestRecord', () => {
  it('parses a sample with every channel', () => {
    expect(
      parseIngestRecord({ event: 'new_data', t: 1_600_000_000, bike_mph: 12.5, resistance: 4, heart_bpm: 131.5 }),
    ).toEqual({
      kind: 'new_data',
      t: 1_600_000_000,
      speedMph: 12.5,
      resistanceLevel: 4,
      heartRateBpm: 131.5,
    });
  });

  it('keeps resistance absent instead of zero', () => {
    const event = parseIngestRecord({ event: 'new_data', t: 5, bike_mph: 3, heart_bpm: 90 });
    expect(event).toEqual({ kind: 'new_data', t: 5, speedMph: 3, heartRateBpm: 90 });
    expect('resistanceLevel' in event).toBe(false);
  });

  it('treats a null resistance as absent', () => {
    const event = parseIngestRecord({ event: 'new_data', t: 5, bike_mph: 3, resistance: null, heart_bpm: 90 });
    expect('resistanceLevel' in event).toBe(false);
  });

  it('accepts numeric strings from older firmware', () => {
    expect(parseIngestRecord({ event: 'new_data', t: '42', bike_mph: '7.25', heart_bpm: '101' })).toEqual({
      kind: 'new_data',
      t: 42,
      speedMph: 7.25,
      heartRateBpm: 101,
    });
  });

  it('accepts resistance as integer text', () => {
    expect(
      parseIngestRecord({ event: 'new_data', t: '5', bike_mph: '12.5', resistance: '3', heart_bpm: '120' }),
    ).toEqual({ kind: 'new_data', t: 5, speedMph: 12.5, resistanceLevel: 3, heartRateBpm: 120 });
  });

  it.each([
    ['empty', ''],
    ['blank', '   '],
    ['null', null],
  ])('starts without an origin address when ip is %s', (_label, ip) => {
    expect(parseIngestRecord({ event: 'start_session', t: 10, ip })).toEqual({
      kind: 'start_session',
      t: 10,
    });
  });

  it('captures the origin address on start', () => {
    expect(parseIngestRecord({ event: 'start_session', t: 10, ip: '203.0.113.9' })).toEqual({
      kind: 'start_session',
      t: 10,
      originAddress: '203.0.113.9',
    });
    expect(parseIngestRecord({ event: 'start_session', t: 10 })).toEqual({ kind: 'start_session', t: 10 });
  });

  it('parses lifecycle events', () => {
    expect(parseIngestRecord({ event: 'powered_on', t: 1 })).toEqual({ kind: 'powered_on', t: 1 });
    expect(parseIngestRecord({ event: 'end_session', t: 2 })).toEqual({ kind: 'end_session', t: 2 });
  });

  it('reports unknown events without validating the rest', () => {
    expect(parseIngestRecord({ event: 'reboot' })).toEqual({ kind: 'unknown', name: 'reboot' });
  });

  it.each([
    ['missing event', { t: 1 }],
    ['non-integer timestamp', { event: 'powered_on', t: 1.5 }],
    ['missing timestamp', { event: 'end_session' }],
    ['missing heart rate', { event: 'new_data', t: 1, bike_mph: 3 }],
    ['negative speed', { event: 'new_data', t: 1, bike_mph: -1, heart_bpm: 80 }],
    ['fractional resistance', { event: 'new_data', t: 1, bike_mph: 1, resistance: 2.5, heart_bpm: 80 }],
    ['fractional resistance text', { event: 'new_data', t: 1, bike_mph: 1, resistance: '2.5', heart_bpm: 80 }],
    ['not an object', 'new_data'],
  ])('rejects %s', (_label, payload) => {
    expect(() => parseIngestRecord(payload)).toThrow(MalformedPayloadError);
  });
});

describe('unwrapEnvelope', () => {
  it('parses the JSON text in data', () => {
    expect(unwrapEnvelope({ apikey: 'test-secret', data: '{"event":"powered_on","t":3}' })).toEqual({
      event: 'powered_on',
      t: 3,
    });
  });

  it('accepts data as an object', () => {
    expect(unwrapEnvelope({ data: { event: 'end_session', t: 4 } })).toEqual({ event: 'end_session', t: 4 });
  });

  it('passes a bare record through', () => {
    const record = { event: 'end_session', t: 4 };
    expect(unwrapEnvelope(record)).toBe(record);
  });

  it('rejects data that is not JSON', () => {
    expect(() => unwrapEnvelope({ data: '{event' })).toThrow(MalformedPayloadError);
  });
});
