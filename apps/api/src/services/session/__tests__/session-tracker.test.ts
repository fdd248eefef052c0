import { describe, it, expect, beforeEach } from '@jest/globals';
import { InMemorySessionStore, ManualClock } from '@ride-telemetry/adapters';
import { SessionTracker, derivePhase, sessionDuration } from '../session-tracker.js';

describe('derivePhase', () => {
  const empty = { poweredOnAt: null, startedAt: null, endedAt: null, producerAddress: null };

  it('walks no_session → powered_on → active → ended', () => {
    expect(derivePhase(empty)).toBe('no_session');
    expect(derivePhase({ ...empty, poweredOnAt: 1 })).toBe('powered_on');
    expect(derivePhase({ ...empty, poweredOnAt: 1, startedAt: 2 })).toBe('active');
    expect(derivePhase({ ...empty, startedAt: 2, endedAt: 3 })).toBe('ended');
  });

  it('treats an end without a start as ended', () => {
    expect(derivePhase({ ...empty, endedAt: 3 })).toBe('ended');
  });
});

describe('sessionDuration', () => {
  const base = { poweredOnAt: null, producerAddress: null };

  it('is null before a start', () => {
    expect(sessionDuration({ ...base, startedAt: null, endedAt: null }, 50)).toBeNull();
  });

  it('runs to now while active and stops at the end', () => {
    expect(sessionDuration({ ...base, startedAt: 10, endedAt: null }, 50)).toBe(40);
    expect(sessionDuration({ ...base, startedAt: 10, endedAt: 30 }, 50)).toBe(20);
  });
});

describe('SessionTracker', () => {
  let store: InMemorySessionStore;
  let clock: ManualClock;
  let tracker: SessionTracker;

  beforeEach(() => {
    store = new InMemorySessionStore();
    clock = new ManualClock(1_000);
    tracker = new SessionTracker(store, clock);
  });

  it('records power-on without starting a session', async () => {
    await tracker.powerOn(900);
    expect(await tracker.phase()).toBe('powered_on');
    expect(await tracker.hasStarted()).toBe(false);
  });

  it('start discards the previous session including its samples', async () => {
    await tracker.start(100, '10.0.0.7');
    await store.apply([{ op: 'pushSample', point: { timestamp: 101, speedMph: 9, heartRateBpm: 100 } }]);
    await tracker.end(200);

    await tracker.start(300, '10.0.0.8');

    expect(await tracker.hasEnded()).toBe(false);
    expect(await tracker.phase()).toBe('active');
    expect(await tracker.originAddress()).toBe('10.0.0.8');
    expect(await store.readSamples()).toEqual([]);
    expect((await tracker.markers()).startedAt).toBe(300);
  });

  it('start without an origin address leaves it empty', async () => {
    await tracker.start(100);
    expect(await tracker.originAddress()).toBeNull();
  });

  it('end clears the producer address', async () => {
    await tracker.start(100, '10.0.0.7');
    await tracker.end(160);
    expect(await tracker.originAddress()).toBeNull();
    expect(await tracker.hasEnded()).toBe(true);
  });

  it('ending twice only overwrites endedAt', async () => {
    await tracker.start(100);
    await tracker.end(160);
    const once = await tracker.markers();
    await tracker.end(160);
    expect(await tracker.markers()).toEqual(once);
  });

  it('reports duration so far from the clock', async () => {
    expect(await tracker.durationSoFar()).toBeNull();
    await tracker.start(940);
    expect(await tracker.durationSoFar()).toBe(60);
    clock.advance(30);
    expect(await tracker.durationSoFar()).toBe(90);
    await tracker.end(1_000);
    clock.advance(500);
    expect(await tracker.durationSoFar()).toBe(60);
  });
});
