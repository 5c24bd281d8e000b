import { Injectable } from '@nestjs/common';
import { performance } from 'perf_hooks';
import { ClockPort } from '@metrics/out-ports';

/**
 * SystemClock - epoch seconds derived from the high-resolution monotonic timer,
 * so durations never go negative when the wall clock is adjusted.
 */
@Injectable()
export class SystemClock extends ClockPort {
  now(): number {
    return (performance.timeOrigin + performance.now()) / 1000;
  }
}
