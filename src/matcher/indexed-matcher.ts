/**
 * Wildcard matching by integer offsets.
 *
 * Same two-phase algorithm as `matchWithCursors`, written against explicit
 * offsets with a length check ahead of every read. The harness runs both and
 * reports any disagreement.
 */

import { MATCH_ANY, MATCH_ONE, type CharSequence } from './types.js';

export function matchWithIndices(pattern: CharSequence, subject: CharSequence): boolean {
  const wildLen = pattern.length;
  const tameLen = subject.length;
  let iWild = 0;

  // Until the first `*` both offsets move together, so one index serves.
  for (;;) {
    if (iWild >= tameLen) {
      while (iWild < wildLen && pattern[iWild] === MATCH_ANY) iWild++;
      return iWild >= wildLen;
    }
    if (iWild >= wildLen) return false;

    if (pattern[iWild] === MATCH_ANY) {
      let iTame = iWild;
      do {
        iWild++;
        if (iWild >= wildLen) return true;
      } while (pattern[iWild] === MATCH_ANY);

      if (pattern[iWild] !== MATCH_ONE) {
        while (pattern[iWild] !== subject[iTame]) {
          iTame++;
          if (iTame >= tameLen) return false;
        }
      }
      return matchAfterWildcard(pattern, subject, iWild, iTame);
    }

    if (pattern[iWild] !== subject[iWild] && pattern[iWild] !== MATCH_ONE) return false;

    iWild++;
  }
}

/**
 * Second phase. `iWild`/`iTame` double as the initial fallback pair, which
 * therefore always exists before any retry reads it.
 */
function matchAfterWildcard(
  pattern: CharSequence,
  subject: CharSequence,
  iWild: number,
  iTame: number,
): boolean {
  const wildLen = pattern.length;
  const tameLen = subject.length;
  let iWildSeq = iWild;
  let iTameSeq = iTame;

  for (;;) {
    if (iWild < wildLen && pattern[iWild] === MATCH_ANY) {
      do {
        iWild++;
        if (iWild >= wildLen) return true;
      } while (pattern[iWild] === MATCH_ANY);

      if (iTame >= tameLen) return false;

      if (pattern[iWild] !== MATCH_ONE) {
        while (pattern[iWild] !== subject[iTame]) {
          iTame++;
          if (iTame >= tameLen) return false;
        }
      }
      iWildSeq = iWild;
      iTameSeq = iTame;
    } else {
      if (iTame >= tameLen) return iWild >= wildLen;

      if (iWild >= wildLen || (pattern[iWild] !== subject[iTame] && pattern[iWild] !== MATCH_ONE)) {
        while (iWildSeq < wildLen && pattern[iWildSeq] === MATCH_ONE) {
          iWildSeq++;
          iTameSeq++;
        }
        iWild = iWildSeq;

        for (;;) {
          iTameSeq++;
          if (iTameSeq >= tameLen) return iWild >= wildLen;
          if (iWild < wildLen && pattern[iWild] === subject[iTameSeq]) break;
        }
        iTame = iTameSeq;
      }
    }

    if (iTame >= tameLen) return iWild >= wildLen;

    iWild++;
    iTame++;
  }
}
