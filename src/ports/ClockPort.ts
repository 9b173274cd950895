/**
 * Wall-clock source in epoch milliseconds. Everything time-dependent reads the
 * clock through this port so tests can drive time explicitly.
 */
export interface ClockPort {
  now(): number;
}
