import { ClockPort } from '@metrics/out-ports';
import { FieldMap } from './field-map';
import { ContextStateError } from './errors';
import { assertEventName } from './event-record';

export type EventSink = (name: string, fields: FieldMap) => void;

/**
 * Timer - a duration-bearing event.
 *
 * `start()` captures the start time and hands back the mutable field map;
 * `stop()` writes `name`, `start` and `duration` into it and records it.
 * A timer records exactly once, however many times it is stopped.
 */
export class Timer {
  private startedAt: number | undefined;
  private stopped = false;

  constructor(
    readonly name: string,
    readonly fields: FieldMap,
    private readonly clock: ClockPort,
    private readonly record: EventSink,
  ) {
    assertEventName(name);
  }

  get isRunning(): boolean {
    return this.startedAt !== undefined && !this.stopped;
  }

  start(): FieldMap {
    if (this.startedAt !== undefined) {
      throw new ContextStateError(`Timer "${this.name}" was already started`);
    }
    this.startedAt = this.clock.now();
    return this.fields;
  }

  stop(): void {
    if (this.startedAt === undefined) {
      throw new ContextStateError(`Timer "${this.name}" was never started`);
    }
    if (this.stopped) {
      return;
    }
    this.stopped = true;

    const start = this.startedAt;
    this.fields.name = this.name;
    this.fields.start = start;
    this.fields.duration = this.clock.now() - start;
    this.record(this.name, this.fields);
  }
}
