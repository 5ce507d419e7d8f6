/**
 * Find session state: phrase being typed, cursor snapshot, match cycling.
 *
 * While open, every phrase edit rescans the buffer and jumps to the first
 * match; left and right cycle through the existing matches without
 * rescanning, up and down do nothing. Cancel puts the cursor back where
 * the session started, confirm leaves it on the current match. Either way
 * the search overlay is cleared.
 */

import type { TextBuffer } from '../core/buffer/text-buffer';
import type { Cursor, Position } from '../core/cursor/cursor';
import { SearchData } from '../core/search/search-data';
import type { InputEvent } from './editor-view-model';

export interface FindWidgetState {
  isOpen: boolean;
  phrase: string;
  matchCount: number;
  /** 1-based for display; 0 when there are no matches. */
  currentMatch: number;
}

export class FindWidgetController {
  private search: SearchData = new SearchData();
  private snapshot: Cursor | null = null;
  private _phrase: string = '';

  get isOpen(): boolean {
    return this.snapshot !== null;
  }

  get phrase(): string {
    return this._phrase;
  }

  get state(): FindWidgetState {
    const matchCount = this.search.results.length;
    return {
      isOpen: this.isOpen,
      phrase: this._phrase,
      matchCount,
      currentMatch: matchCount > 0 ? this.search.index + 1 : 0,
    };
  }

  /** Start a session, remembering where the cursor was. */
  open(cursor: Cursor): void {
    this.snapshot = cursor.clone();
    this._phrase = '';
  }

  /** Feed one input event to the open session. */
  handle(event: InputEvent, buffer: TextBuffer, cursor: Cursor): void {
    if (!this.snapshot) return;

    switch (event.kind) {
      case 'char':
        this._phrase += event.char;
        this.rescan(buffer, cursor);
        break;
      case 'backspace':
        this._phrase = this._phrase.slice(0, -1);
        this.rescan(buffer, cursor);
        break;
      case 'move':
        if (event.direction === 'left') {
          this.jump(this.search.getPrevious(), cursor);
        } else if (event.direction === 'right') {
          this.jump(this.search.getNext(), cursor);
        }
        break;
      case 'enter':
      case 'confirm':
        this.close(buffer);
        break;
      case 'cancel':
        cursor.restore(this.snapshot);
        this.close(buffer);
        break;
      default:
        break;
    }
  }

  /** End the session and drop the search overlay. */
  close(buffer: TextBuffer): void {
    this.search.findResults('', buffer);
    this.snapshot = null;
    this._phrase = '';
  }

  private rescan(buffer: TextBuffer, cursor: Cursor): void {
    this.jump(this.search.findResults(this._phrase, buffer), cursor);
  }

  private jump(match: Position | null, cursor: Cursor): void {
    if (!match) return;
    cursor.setPosition(match.x, match.y);
    cursor.changeOffset();
  }
}
