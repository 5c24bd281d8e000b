export {
  NO_METRICS_KEY,
  TIMED_EVENT_KEY,
  NoMetrics,
  TimedEvent,
} from './metrics-control.decorator';
export {
  MetricsFields,
  metricsFieldsFactory,
} from './metrics-fields.decorator';
