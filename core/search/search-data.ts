/**
 * Phrase search across the buffer with cyclic navigation over matches.
 *
 * Matches on one line never overlap: after a hit the scan resumes right
 * past its end. Every matched character is re-tagged SearchResult until
 * the buffer retokenizes again.
 */

import type { TextBuffer } from '../buffer/text-buffer';
import type { Position } from '../cursor/cursor';
import { HighlightTag } from '../tokenizer/highlight-tag';

export class SearchData {
  private _results: Position[] = [];
  private _index: number = 0;
  private _phrase: string = '';

  get results(): readonly Position[] {
    return this._results;
  }

  get index(): number {
    return this._index;
  }

  get phrase(): string {
    return this._phrase;
  }

  get current(): Position | null {
    return this._results[this._index] ?? null;
  }

  /**
   * Rescan for `phrase` and return the first match. An empty phrase only
   * clears the results (and, through the retokenize, the overlay).
   */
  findResults(phrase: string, buffer: TextBuffer): Position | null {
    buffer.retokenize();

    this._phrase = phrase;
    this._results = [];
    this._index = 0;
    if (phrase.length === 0) return null;

    for (let row = 0; row < buffer.lineCount; row++) {
      let start = 0;
      let col = buffer.findPhrase(phrase, row, start);
      while (col !== null) {
        this._results.push({ x: col, y: row });
        start = col + phrase.length;
        col = buffer.findPhrase(phrase, row, start);
      }
    }

    for (const { x, y } of this._results) {
      buffer.markRange(y, x, phrase.length, HighlightTag.SearchResult);
    }

    return this._results[0] ?? null;
  }

  getNext(): Position | null {
    if (this._results.length === 0) return null;
    this._index = (this._index + 1) % this._results.length;
    return this._results[this._index];
  }

  getPrevious(): Position | null {
    if (this._results.length === 0) return null;
    const count = this._results.length;
    this._index = (this._index + count - 1) % count;
    return this._results[this._index];
  }
}
