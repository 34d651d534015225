/**
 * Wildcard matching by forward cursors.
 *
 * Two phases: a lockstep scan until the first `*`, then a scan that keeps a
 * fallback pair of cursors at the most recent `*` and retries from there on a
 * literal mismatch. Retries never reach back past that `*`.
 */

import { SequenceCursor } from './cursor.js';
import { MATCH_ANY, MATCH_ONE, type CharSequence } from './types.js';

export function matchWithCursors(pattern: CharSequence, subject: CharSequence): boolean {
  const wild = new SequenceCursor(pattern);
  const tame = new SequenceCursor(subject);

  for (;;) {
    if (tame.done()) {
      while (wild.is(MATCH_ANY)) wild.advance();
      return wild.done();
    }
    if (wild.done()) return false;

    if (wild.is(MATCH_ANY)) {
      while (wild.is(MATCH_ANY)) wild.advance();
      if (wild.done()) return true;

      if (!wild.is(MATCH_ONE)) {
        while (wild.current() !== tame.current()) {
          tame.advance();
          if (tame.done()) return false;
        }
      }
      return matchAfterWildcard(wild, tame, wild.clone(), tame.clone());
    }

    if (wild.current() !== tame.current() && !wild.is(MATCH_ONE)) return false;

    wild.advance();
    tame.advance();
  }
}

function matchAfterWildcard(
  wild: SequenceCursor,
  tame: SequenceCursor,
  wildSeq: SequenceCursor,
  tameSeq: SequenceCursor,
): boolean {
  for (;;) {
    if (wild.is(MATCH_ANY)) {
      while (wild.is(MATCH_ANY)) wild.advance();
      if (wild.done()) return true;
      if (tame.done()) return false;

      if (!wild.is(MATCH_ONE)) {
        while (wild.current() !== tame.current()) {
          tame.advance();
          if (tame.done()) return false;
        }
      }
      wildSeq.moveTo(wild);
      tameSeq.moveTo(tame);
    } else {
      if (tame.done()) return wild.done();

      if (wild.done() || (wild.current() !== tame.current() && !wild.is(MATCH_ONE))) {
        // Leading `?`s after the `*` each consume one element for good.
        while (wildSeq.is(MATCH_ONE)) {
          wildSeq.advance();
          tameSeq.advance();
        }
        wild.moveTo(wildSeq);

        for (;;) {
          tameSeq.advance();
          if (tameSeq.done()) return wild.done();
          if (!wild.done() && wild.current() === tameSeq.current()) break;
        }
        tame.moveTo(tameSeq);
      }
    }

    if (tame.done()) return wild.done();

    wild.advance();
    tame.advance();
  }
}
