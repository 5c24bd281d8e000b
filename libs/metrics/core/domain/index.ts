export { FieldValue, FieldObject, FieldMap } from './field-map';
export {
  EventRecord,
  ContextRecord,
  EventRecordShape,
  assertEventName,
  buildEventRecord,
} from './event-record';
export {
  MetricsError,
  ContextAlreadyActiveError,
  ContextStateError,
  InvalidEventError,
  MetricsSerializationError,
  describeError,
} from './errors';
export { ScopeExit, isPromiseLike, runScoped } from './scope';
export { Timer, EventSink } from './timer';
export { MetricsContext } from './metrics-context';
export { serializeRecord, formatForDiagnostics } from './record-serializer';
