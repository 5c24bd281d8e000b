import {
  ContextRecord,
  EventRecord,
  FieldMap,
  MetricsContext,
  ScopeExit,
  Timer,
} from '@metrics/domain';

/**
 * MetricsUseCase - Inbound port for recording events against the ambient context.
 *
 * Two ways to scope a context:
 * - runInContext(): one call is the unit of work (jobs, scripts, handlers).
 * - openContext() / bindContext() / closeContext(): the unit of work spans
 *   several callbacks (interceptors over observables).
 */
export abstract class MetricsUseCase {
  /**
   * Record an event on the active context. Without one, the event is
   * dropped with a warning; this never throws for a missing context.
   */
  abstract recordEvent(name: string, fields?: FieldMap): EventRecord;

  /**
   * Start a timer that records on whatever context is active when it stops.
   */
  abstract startTimer(name: string, fields?: FieldMap): Timer;

  /**
   * Time `fn`. It receives the event's field map and may add result fields.
   * The event is recorded on every exit path.
   */
  abstract timer<T>(
    name: string,
    fields: FieldMap,
    fn: (fields: FieldMap) => Promise<T>,
  ): Promise<T>;
  abstract timer<T>(
    name: string,
    fields: FieldMap,
    fn: (fields: FieldMap) => T,
  ): T;

  abstract openContext(fields?: FieldMap): MetricsContext;

  abstract bindContext<T>(context: MetricsContext, fn: () => T): T;

  abstract closeContext(context: MetricsContext, exit?: ScopeExit): ContextRecord;

  /**
   * Run `fn` as one unit of work. Exactly one record is emitted when it
   * returns, throws, or its promise settles.
   */
  abstract runInContext<T>(
    fields: FieldMap,
    fn: (fields: FieldMap) => Promise<T>,
  ): Promise<T>;
  abstract runInContext<T>(fields: FieldMap, fn: (fields: FieldMap) => T): T;

  /**
   * The live field map of the active context, if any.
   */
  abstract currentFields(): FieldMap | undefined;
}
