/**
 * Existence witnesses. A value tagged with what is known about its referent,
 * e.g. a path that has been checked (or created) and so is known to exist.
 */

export type Existing<T> = { existence: "existing"; value: T };
export type NonExisting<T> = { existence: "non_existing"; value: T };

export function assumeExisting<T>(value: T): Existing<T> {
  return { existence: "existing", value };
}

export function assumeNonExisting<T>(value: T): NonExisting<T> {
  return { existence: "non_existing", value };
}
