/** An optional payload field that has been set. */
export interface Present<T> {
  readonly kind: "present";
  readonly value: T;
}

/** An optional payload field that has not been set. Distinct from a field set to a falsy value. */
export interface Absent {
  readonly kind: "absent";
}

export type Field<T> = Present<T> | Absent;

const ABSENT: Absent = Object.freeze({ kind: "absent" });

export function present<T>(value: T): Present<T> {
  return { kind: "present", value };
}

export function absent(): Absent {
  return ABSENT;
}

export function isPresent<T>(field: Field<T>): field is Present<T> {
  return field.kind === "present";
}
