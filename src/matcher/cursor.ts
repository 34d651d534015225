/**
 * Forward-only cursor over a CharSequence.
 */

import type { CharSequence } from './types.js';

export class SequenceCursor {
  private _seq: CharSequence;
  private _pos: number;

  constructor(seq: CharSequence, pos: number = 0) {
    this._seq = seq;
    this._pos = pos;
  }

  /** The element under the cursor, or `undefined` once the sequence is exhausted. */
  current(): string | undefined {
    return this._pos < this._seq.length ? this._seq[this._pos] : undefined;
  }

  done(): boolean {
    return this._pos >= this._seq.length;
  }

  /** Steps forward one element. A no-op once exhausted. */
  advance(): this {
    if (this._pos < this._seq.length) this._pos++;
    return this;
  }

  clone(): SequenceCursor {
    return new SequenceCursor(this._seq, this._pos);
  }

  /** Repositions onto another cursor over the same sequence. */
  moveTo(other: SequenceCursor): this {
    this._pos = other._pos;
    return this;
  }

  is(element: string): boolean {
    return this.current() === element;
  }
}
