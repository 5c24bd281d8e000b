import { inspect } from 'util';
import { MetricsSerializationError } from './errors';

function assertSerializable(
  value: unknown,
  path: string,
  ancestors: Set<object>,
): void {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new MetricsSerializationError(path, `non-finite number ${value}`);
    }
    return;
  }

  if (typeof value !== 'object') {
    throw new MetricsSerializationError(path, `unsupported ${typeof value} value`);
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new MetricsSerializationError(path, 'invalid date');
    }
    return;
  }

  if (ancestors.has(value)) {
    throw new MetricsSerializationError(path, 'circular reference');
  }

  ancestors.add(value);
  if (Array.isArray(value)) {
    value.forEach((item: unknown, index) =>
      assertSerializable(item, `${path}[${index}]`, ancestors),
    );
  } else {
    const prototype: unknown = Object.getPrototypeOf(value);
    if (prototype !== Object.prototype && prototype !== null) {
      throw new MetricsSerializationError(
        path,
        `unsupported ${value.constructor?.name ?? 'object'} instance`,
      );
    }
    for (const [key, child] of Object.entries(value)) {
      assertSerializable(child, `${path}.${key}`, ancestors);
    }
  }
  ancestors.delete(value);
}

/**
 * Serialize a record to a single JSON line.
 *
 * Values JSON would silently drop or rewrite (undefined, functions, bigint,
 * NaN, class instances, cycles) fail with MetricsSerializationError instead
 * of producing a partial record.
 */
export function serializeRecord(record: object): string {
  assertSerializable(record, '$', new Set<object>());
  return JSON.stringify(record);
}

/**
 * Single-line rendering for diagnostics; never throws.
 */
export function formatForDiagnostics(value: unknown): string {
  return inspect(value, { breakLength: Infinity, depth: 4 });
}
