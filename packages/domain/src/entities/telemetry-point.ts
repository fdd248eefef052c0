/** One sample pushed by the bike sensor. Timestamps are unix seconds. */
export interface TelemetryPoint {
  readonly timestamp: number;
  readonly speedMph: number;
  /** Only reported by device variants with a resistance sensor. */
  readonly resistanceLevel?: number;
  readonly heartRateBpm: number;
}
