export interface ClockPort {
  /** Current time in unix seconds. */
  nowSeconds(): number;
}
