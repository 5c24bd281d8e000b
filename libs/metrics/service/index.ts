export { ContextService } from './context.service';
export { MetricsService, MetricsStats } from './metrics.service';
