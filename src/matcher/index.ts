import { matchWithCursors } from './cursor-matcher.js';
import { matchWithIndices } from './indexed-matcher.js';
import type { CharSequence, Realization, WildcardMatchFn } from './types.js';

export { SequenceCursor } from './cursor.js';
export { matchWithCursors } from './cursor-matcher.js';
export { matchWithIndices } from './indexed-matcher.js';
export { MATCH_ANY, MATCH_ONE } from './types.js';
export type { CharSequence, Realization, WildcardMatchFn } from './types.js';

export const REALIZATIONS: Readonly<Record<Realization, WildcardMatchFn>> = Object.freeze({
  cursor: matchWithCursors,
  indexed: matchWithIndices,
});

export const REALIZATION_NAMES: readonly Realization[] = Object.freeze(['cursor', 'indexed']);

export function isRealization(name: string): name is Realization {
  return REALIZATION_NAMES.some((r) => r === name);
}

/**
 * Anchored wildcard match of `subject` against `pattern`.
 *
 * `*` matches any run of elements (including none), `?` exactly one; every
 * other pattern element must equal the subject element, case-sensitively.
 * Wildcards in the subject are ordinary elements.
 *
 * @example
 * matches('*issip*ss*', 'mississipissippi') // true
 * matches('ab*d', 'abc')                    // false
 * matches('**', '')                         // true
 */
export function matches(pattern: CharSequence, subject: CharSequence): boolean {
  return matchWithCursors(pattern, subject);
}
