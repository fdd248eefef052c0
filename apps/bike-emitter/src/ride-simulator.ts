/**
 * Synthetic ride for the bike emitter: a small phase machine that produces
 * plausible speed, resistance and heart-rate readings once per tick.
 */

export interface NewDataRecord {
  event: 'new_data';
  t: number;
  bike_mph: number;
  resistance?: number;
  heart_bpm: number;
}

export type RidePhase = 'warmup' | 'steady' | 'sprint' | 'cooldown';

export interface RideSimulatorOptions {
  /** Returns a float in [0, 1). */
  random?: () => number;
  /** Older bikes have no resistance sensor. */
  reportResistance?: boolean;
  restingHeartRate?: number;
}

const MIN_RESISTANCE = 1;
const MAX_RESISTANCE = 8;

const round1 = (n: number) => Math.round(n * 10) / 10;

export class RideSimulator {
  private readonly random: () => number;
  private readonly reportResistance: boolean;
  private phase: RidePhase = 'warmup';
  private phaseTicks = 10;
  private speedMph = 0;
  private targetSpeed = 12;
  private resistance = 3;
  private heartRate: number;

  constructor(opts: RideSimulatorOptions = {}) {
    this.random = opts.random ?? Math.random;
    this.reportResistance = opts.reportResistance ?? true;
    this.heartRate = opts.restingHeartRate ?? 70;
  }

  get currentPhase(): RidePhase {
    return this.phase;
  }

  private nextPhase(): void {
    switch (this.phase) {
      case 'warmup':
      case 'cooldown':
        this.phase = 'steady';
        this.targetSpeed = 14 + this.random() * 6; // 14–20 mph
        this.phaseTicks = 20 + Math.floor(this.random() * 20);
        break;
      case 'steady':
        if (this.random() < 0.4) {
          this.phase = 'sprint';
          this.targetSpeed = 22 + this.random() * 6;
          this.resistance = Math.min(MAX_RESISTANCE, this.resistance + 2);
          this.phaseTicks = 5 + Math.floor(this.random() * 6);
        } else {
          this.resistance = MIN_RESISTANCE + Math.floor(this.random() * (MAX_RESISTANCE - MIN_RESISTANCE + 1));
          this.phaseTicks = 10 + Math.floor(this.random() * 10);
        }
        break;
      case 'sprint':
        this.phase = 'cooldown';
        this.targetSpeed = 9 + this.random() * 3;
        this.resistance = Math.max(MIN_RESISTANCE, this.resistance - 3);
        this.phaseTicks = 8;
        break;
    }
  }

  /** Advance one tick and produce the sample stamped with `t` (unix seconds). */
  step(t: number): NewDataRecord {
    if (this.phaseTicks <= 0) this.nextPhase();
    this.phaseTicks -= 1;

    this.speedMph += (this.targetSpeed - this.speedMph) * 0.3 + (this.random() - 0.5) * 0.8;
    this.speedMph = Math.max(0, this.speedMph);

    const effort = this.speedMph * 4 + this.resistance * 3;
    this.heartRate += (70 + effort - this.heartRate) * 0.1;

    const record: NewDataRecord = {
      event: 'new_data',
      t,
      bike_mph: round1(this.speedMph),
      heart_bpm: round1(this.heartRate),
    };
    if (this.reportResistance) record.resistance = this.resistance;
    return record;
  }
}
