export * from './core/value-objects';
export * from './core/domain';
export * from './core/ports/in';
export * from './core/ports/out';
export * from './service';
export * from './infrastructure';
export * from './presentation';
export { MetricsModule, MetricsModuleOptions } from './metrics.module';
