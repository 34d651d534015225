/**
 * Matcher types: CharSequence, WildcardMatchFn, Realization.
 */

/** Matches zero or more subject elements. */
export const MATCH_ANY = '*';

/** Matches exactly one subject element. */
export const MATCH_ONE = '?';

/**
 * A finite, read-only sequence of elements. Strings are read per UTF-16 code
 * unit; arrays (e.g. `Array.from(text)`) per element.
 */
export type CharSequence = string | ArrayLike<string>;

export type WildcardMatchFn = (pattern: CharSequence, subject: CharSequence) => boolean;

export type Realization = 'cursor' | 'indexed';
