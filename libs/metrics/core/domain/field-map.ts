/**
 * Values a caller may attach to a context or an event.
 * Everything here has a faithful JSON representation (Dates become ISO strings).
 */
export type FieldValue =
  | string
  | number
  | boolean
  | null
  | Date
  | FieldValue[]
  | FieldObject;

export interface FieldObject {
  [key: string]: FieldValue;
}

/**
 * Free-form, caller-extensible set of attributes.
 * Only the documented keys (`name`, `start`, `duration`, `events`) carry meaning.
 */
export type FieldMap = FieldObject;
