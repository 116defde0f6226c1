/**
 * Defaultable — types with a sensible default value.
 */
export interface Defaultable<A> {
  defaultValue(): A;
}

export const defaultNumber: Defaultable<number> = {
  defaultValue: () => 0,
};

export const defaultString: Defaultable<string> = {
  defaultValue: () => "",
};

/** The default of a type, looked up through its instance. */
export function def<A>(D: Defaultable<A>): A {
  return D.defaultValue();
}
