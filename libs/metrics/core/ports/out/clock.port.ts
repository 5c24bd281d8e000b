/**
 * ClockPort - source of wall-clock time for contexts and timers.
 * Returns seconds since the Unix epoch as a float.
 */
export abstract class ClockPort {
  abstract now(): number;
}
