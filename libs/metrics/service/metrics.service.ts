import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ContextRecord,
  EventRecord,
  FieldMap,
  MetricsContext,
  ScopeExit,
  Timer,
  buildEventRecord,
  describeError,
  formatForDiagnostics,
  runScoped,
  serializeRecord,
} from '@metrics/domain';
import { MetricsUseCase } from '@metrics/in-ports';
import {
  ClockPort,
  ExecutionIdentityPort,
  MetricsSinkPort,
} from '@metrics/out-ports';
import { NestingPolicy, Severity } from '@metrics/value-objects';
import { ContextService } from './context.service';

export interface MetricsStats {
  emittedContexts: number;
  droppedEvents: number;
  nestingPolicy: NestingPolicy;
}

/**
 * MetricsService - Application layer service for contexts and their events.
 *
 * Records events on the context bound by ContextService and emits one JSON
 * record per context through the sink when the context closes.
 */
@Injectable()
export class MetricsService extends MetricsUseCase {
  private readonly traceScopes: boolean;
  private emittedContexts = 0;
  private droppedEvents = 0;

  constructor(
    private readonly contextService: ContextService,
    private readonly sink: MetricsSinkPort,
    private readonly clock: ClockPort,
    private readonly identity: ExecutionIdentityPort,
    private readonly configService: ConfigService,
  ) {
    super();
    this.traceScopes = this.configService.get<boolean>(
      'metrics.traceScopes',
      true,
    );
  }

  override recordEvent(name: string, fields: FieldMap = {}): EventRecord {
    const event = buildEventRecord(name, fields, this.clock.now());
    const context = this.contextService.current();

    if (!context) {
      this.droppedEvents++;
      this.sink.emit(
        Severity.WARNING,
        `${this.identity.current()}: no context to record event: ${formatForDiagnostics(event)}`,
      );
      return event;
    }

    context.append(event);
    return { ...event };
  }

  override startTimer(name: string, fields: FieldMap = {}): Timer {
    const timer = new Timer(name, fields, this.clock, (eventName, eventFields) => {
      this.recordEvent(eventName, eventFields);
    });
    timer.start();
    return timer;
  }

  timer<T>(
    name: string,
    fields: FieldMap,
    fn: (fields: FieldMap) => Promise<T>,
  ): Promise<T>;
  timer<T>(name: string, fields: FieldMap, fn: (fields: FieldMap) => T): T;
  timer(
    name: string,
    fields: FieldMap,
    fn: (fields: FieldMap) => unknown,
  ): unknown {
    const timer = this.startTimer(name, fields);
    return runScoped(
      () => fn(timer.fields),
      () => timer.stop(),
    );
  }

  /**
   * Open a context without binding it. Under the strict policy this fails
   * before anything is created when a context is already active here.
   */
  override openContext(fields: FieldMap = {}): MetricsContext {
    const replaced = this.contextService.assertCanInstall();
    const context = new MetricsContext(fields, this.clock);
    context.open();

    this.trace(
      `${this.identity.current()}: entering new context, replacing ${
        replaced ? formatForDiagnostics(replaced.fields) : 'null'
      }`,
    );
    return context;
  }

  override bindContext<T>(context: MetricsContext, fn: () => T): T {
    return this.contextService.run(context, fn);
  }

  /**
   * Close the context and emit its record at INFO.
   *
   * A serialization failure propagates, unless the scope already failed:
   * then the scope's error wins and the failure is reported as a warning.
   */
  override closeContext(
    context: MetricsContext,
    exit: ScopeExit = { failed: false },
  ): ContextRecord {
    const record = context.close();
    try {
      let line: string;
      try {
        line = serializeRecord(record);
      } catch (error) {
        if (!exit.failed) {
          throw error;
        }
        this.sink.emit(
          Severity.WARNING,
          `${this.identity.current()}: context record dropped after failed scope: ${describeError(error)}`,
        );
        return record;
      }

      this.sink.emit(Severity.INFO, line);
      this.emittedContexts++;
      return record;
    } finally {
      this.trace(`${this.identity.current()}: leaving context`);
    }
  }

  runInContext<T>(
    fields: FieldMap,
    fn: (fields: FieldMap) => Promise<T>,
  ): Promise<T>;
  runInContext<T>(fields: FieldMap, fn: (fields: FieldMap) => T): T;
  runInContext(fields: FieldMap, fn: (fields: FieldMap) => unknown): unknown {
    const context = this.openContext(fields);
    return runScoped(
      () => this.bindContext(context, () => fn(context.fields)),
      (exit) => {
        this.closeContext(context, exit);
      },
    );
  }

  override currentFields(): FieldMap | undefined {
    return this.contextService.currentFields();
  }

  getStats(): MetricsStats {
    return {
      emittedContexts: this.emittedContexts,
      droppedEvents: this.droppedEvents,
      nestingPolicy: this.contextService.nestingPolicy,
    };
  }

  private trace(message: string): void {
    if (this.traceScopes) {
      this.sink.emit(Severity.DEBUG, message);
    }
  }
}
