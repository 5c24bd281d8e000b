/**
 * Severities understood by a metrics sink.
 * `INFO` carries the emitted context records; `DEBUG` and `WARNING` carry diagnostics.
 */
export enum Severity {
  DEBUG = 'debug',
  INFO = 'info',
  WARNING = 'warning',
}

/**
 * How a context behaves when another one is already active on the same
 * execution chain.
 *
 * STRICT: opening a second context fails with ContextAlreadyActiveError.
 * PERMISSIVE: the new context shadows the outer one until it closes.
 */
export enum NestingPolicy {
  STRICT = 'strict',
  PERMISSIVE = 'permissive',
}

/**
 * Stable error codes for the metrics library.
 */
export enum MetricsErrorCode {
  CONTEXT_ALREADY_ACTIVE = 'CONTEXT_ALREADY_ACTIVE',
  CONTEXT_STATE = 'CONTEXT_STATE',
  INVALID_EVENT = 'INVALID_EVENT',
  SERIALIZATION_FAILURE = 'SERIALIZATION_FAILURE',
}
