import { Severity } from '@metrics/value-objects';

/**
 * Metrics sink - receives every line the library produces.
 *
 * INFO carries one JSON context record per closed context.
 * WARNING reports dropped events, DEBUG traces context entry and exit.
 * Implementations must not block the caller.
 */
export abstract class MetricsSinkPort {
  abstract emit(severity: Severity, message: string): void;
}
