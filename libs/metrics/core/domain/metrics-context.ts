import { ClockPort } from '@metrics/out-ports';
import { FieldMap } from './field-map';
import { ContextRecord, EventRecord, buildEventRecord } from './event-record';
import { ContextStateError } from './errors';
import { Timer } from './timer';

/**
 * MetricsContext - one unit of work whose events are emitted as a single record.
 *
 * This is the explicit API: code holding a context records on it directly.
 * The ambient layer (ContextService / MetricsService) binds a context to the
 * current execution chain so deeper code does not need the reference.
 *
 * Lifecycle: created -> open() -> close(). Neither step may be repeated.
 */
export class MetricsContext {
  readonly events: EventRecord[] = [];
  private startedAt: number | undefined;
  private record: ContextRecord | undefined;

  constructor(
    readonly fields: FieldMap,
    private readonly clock: ClockPort,
  ) {}

  get isOpen(): boolean {
    return this.startedAt !== undefined && this.record === undefined;
  }

  get isClosed(): boolean {
    return this.record !== undefined;
  }

  get start(): number | undefined {
    return this.startedAt;
  }

  open(): FieldMap {
    if (this.startedAt !== undefined) {
      throw new ContextStateError('Metrics context was already opened');
    }
    this.startedAt = this.clock.now();
    return this.fields;
  }

  append(event: EventRecord): void {
    if (!this.isOpen) {
      throw new ContextStateError(
        `Cannot record "${event.name}" on a context that is not open`,
      );
    }
    this.events.push(event);
  }

  /**
   * Returns a copy; the appended event belongs to the context.
   */
  recordEvent(name: string, fields: FieldMap = {}): EventRecord {
    const event = buildEventRecord(name, fields, this.clock.now());
    this.append(event);
    return { ...event };
  }

  /**
   * A timer bound to this context regardless of what is ambiently active.
   * The caller starts and stops it.
   */
  timer(name: string, fields: FieldMap = {}): Timer {
    return new Timer(name, fields, this.clock, (eventName, eventFields) => {
      this.recordEvent(eventName, eventFields);
    });
  }

  close(): ContextRecord {
    if (this.startedAt === undefined) {
      throw new ContextStateError('Metrics context was never opened');
    }
    if (this.record !== undefined) {
      throw new ContextStateError('Metrics context was already closed');
    }

    const start = this.startedAt;
    const duration = this.clock.now() - start;
    this.fields.events = this.events;
    this.fields.start = start;
    this.fields.duration = duration;

    this.record = { ...this.fields, events: this.events, start, duration };
    return this.record;
  }
}
