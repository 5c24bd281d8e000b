import {
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Min,
  ValidationError,
  validateSync,
} from 'class-validator';
import { plainToInstance } from 'class-transformer';
import { FieldMap, FieldObject } from './field-map';
import { InvalidEventError } from './errors';

/**
 * One occurrence within a context.
 * `start` and `duration` are seconds since the Unix epoch / elapsed seconds.
 */
export type EventRecord = FieldObject & {
  name: string;
  start: number;
  duration?: number;
};

/**
 * The record emitted when a context closes: the caller's fields plus the
 * collected events and the context's own timing.
 */
export interface ContextRecord extends FieldObject {
  events: EventRecord[];
  start: number;
  duration: number;
}

/**
 * Validation rules for the documented event keys. Extra caller keys are
 * not inspected here; the serializer checks them at emission.
 */
export class EventRecordShape {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  start!: number;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  duration?: number;
}

function flattenViolations(errors: ValidationError[]): string[] {
  return errors.flatMap((error) =>
    Object.values(error.constraints ?? {}).map(
      (constraint) => `${error.property}: ${constraint}`,
    ),
  );
}

export function assertEventName(name: unknown): void {
  if (typeof name !== 'string' || name.length === 0) {
    throw new InvalidEventError(name, ['name: name should not be empty']);
  }
}

/**
 * Build an event from caller fields.
 *
 * The caller's map is copied, so later changes to it never reach the
 * recorded event. `start` defaults to `now` when absent.
 */
export function buildEventRecord(
  name: string,
  fields: FieldMap,
  now: number,
): EventRecord {
  const shape = plainToInstance(EventRecordShape, {
    name,
    start: fields.start ?? now,
    duration: fields.duration,
  });

  const violations = flattenViolations(validateSync(shape));
  if (violations.length > 0) {
    throw new InvalidEventError(name, violations);
  }

  return { ...fields, name: shape.name, start: shape.start };
}
