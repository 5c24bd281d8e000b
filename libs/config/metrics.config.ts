import { registerAs } from '@nestjs/config';
import { NestingPolicy } from '@metrics/value-objects';

export interface MetricsConfig {
  nestingPolicy: NestingPolicy;
  loggerName: string;
  traceScopes: boolean;
  /** When set, context records are appended to this file instead of the logger. */
  logFile: string | undefined;
}

function parseNestingPolicy(value: string | undefined): NestingPolicy {
  return value === NestingPolicy.PERMISSIVE
    ? NestingPolicy.PERMISSIVE
    : NestingPolicy.STRICT;
}

/**
 * Metrics Configuration
 *
 * Read once from the environment and exposed through ConfigService
 * under the `metrics` namespace.
 */
export default registerAs(
  'metrics',
  (): MetricsConfig => ({
    nestingPolicy: parseNestingPolicy(process.env.METRICS_NESTING_POLICY),
    loggerName: process.env.METRICS_LOGGER_NAME || 'metrics',
    traceScopes: process.env.METRICS_TRACE_SCOPES !== 'false',
    logFile: process.env.METRICS_LOG_FILE || undefined,
  }),
);
