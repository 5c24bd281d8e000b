export { MetricsContextInterceptor } from './metrics-context.interceptor';
export {
  InboundRequest,
  METRICS_CONTEXT_KEY,
  RequestFieldsExtractor,
} from './extractors/request-fields.extractor';
export { withMetricsContext, MetricsHandler } from './express/with-metrics-context';
export * from './decorators';
