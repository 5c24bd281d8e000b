export { MetricsUseCase } from './metrics.use-case';
