import { MetricsErrorCode } from '../value-objects';

export abstract class MetricsError extends Error {
  abstract readonly code: MetricsErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised under the strict nesting policy when a context is opened while
 * another one is still active on the same execution chain.
 * Nothing has been mutated when this is thrown.
 */
export class ContextAlreadyActiveError extends MetricsError {
  readonly code = MetricsErrorCode.CONTEXT_ALREADY_ACTIVE;

  constructor(readonly thread: string) {
    super(`${thread}: a metrics context is already active`);
  }
}

/**
 * Lifecycle misuse: opening or closing a context or timer twice,
 * or appending to a context that is not open.
 */
export class ContextStateError extends MetricsError {
  readonly code = MetricsErrorCode.CONTEXT_STATE;
}

export class InvalidEventError extends MetricsError {
  readonly code = MetricsErrorCode.INVALID_EVENT;

  constructor(
    readonly eventName: unknown,
    readonly violations: string[],
  ) {
    super(`Invalid event ${String(eventName)}: ${violations.join('; ')}`);
  }
}

/**
 * A field value has no faithful JSON representation.
 * `path` points at the offending value, e.g. `$.events[0].payload`.
 */
export class MetricsSerializationError extends MetricsError {
  readonly code = MetricsErrorCode.SERIALIZATION_FAILURE;

  constructor(
    readonly path: string,
    readonly reason: string,
  ) {
    super(`Cannot serialize ${path}: ${reason}`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
