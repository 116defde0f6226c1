/**
 * IsString Typeclass
 *
 * Types that can be built from a string literal. A function whose parameter
 * type has an `IsString` instance can be handed text without the caller
 * constructing the value by hand.
 */

export interface IsString<A> {
  fromString(text: string): A;
}

export const isStringString: IsString<string> = {
  fromString: (text) => text,
};

/**
 * Build an `IsString` for a wrapper type from the wrapped type's instance.
 *
 * @example
 * ```typescript
 * interface Name { readonly getName: string }
 * const isStringName = deriveIsString(isStringString, (getName): Name => ({ getName }));
 * isStringName.fromString("John"); // { getName: "John" }
 * ```
 */
export function deriveIsString<W, A>(IS: IsString<A>, wrap: (a: A) => W): IsString<W> {
  return {
    fromString: (text) => wrap(IS.fromString(text)),
  };
}
