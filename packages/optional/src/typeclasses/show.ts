/**
 * Show Typeclass
 *
 * A "programmer-friendly" string representation of a value.
 */

export interface Show<A> {
  readonly show: (a: A) => string;
}

/**
 * Show for strings (with quotes)
 */
export const showString: Show<string> = {
  show: (s) => JSON.stringify(s),
};

export const showNumber: Show<number> = {
  show: (n) => String(n),
};

/**
 * Fallback used when no Show is given: strings are quoted, bigints carry
 * their `n` suffix, everything else goes through `String`.
 */
export const showDefault: Show<unknown> = {
  show: (a) =>
    typeof a === "string" ? JSON.stringify(a) : typeof a === "bigint" ? `${a}n` : String(a),
};
