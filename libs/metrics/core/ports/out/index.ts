export { ClockPort } from './clock.port';
export { ExecutionIdentityPort } from './execution-identity.port';
export { MetricsSinkPort } from './metrics-sink.port';
