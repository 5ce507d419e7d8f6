/**
 * TextBuffer: the ordered list of lines plus the active tokenizer.
 *
 * Every mutation retokenizes the whole document afterwards, so multi-line
 * constructs (nested block comments, unterminated strings) are always
 * resolved against the full text. The buffer never holds fewer than one
 * line.
 */

import { Line } from './line';
import type { Cursor, LineMetrics } from '../cursor/cursor';
import { HighlightTag } from '../tokenizer/highlight-tag';
import type { Tokenizer } from '../tokenizer/tokenizer';
import { FileStorage, type ReadResult, type Storage } from '../storage/storage';
import { logger } from '../logger';
import type { TerminalColour } from '../../view-model/theme';

export interface TextBufferOptions {
  /** Highlighting strategy; null disables highlighting. */
  tokenizer?: Tokenizer | null;
  /** Where `open` reads from and `save` writes to. */
  storage?: Storage;
  /** Spaces a tab expands to. */
  tabWidth?: number;
}

export class TextBuffer implements LineMetrics {
  private _lines: Line[] = [Line.blank()];
  private _tokenizer: Tokenizer | null;
  private readonly storage: Storage;
  private readonly tabWidth: number;

  constructor(options: TextBufferOptions = {}) {
    this._tokenizer = options.tokenizer ?? null;
    this.storage = options.storage ?? new FileStorage();
    this.tabWidth = options.tabWidth ?? 4;
  }

  /** Build a buffer holding `text`, split the same way `load` splits. */
  static fromText(text: string, options: TextBufferOptions = {}): TextBuffer {
    const buffer = new TextBuffer(options);
    buffer.load({ ok: true, bytes: new TextEncoder().encode(text) });
    return buffer;
  }

  get lines(): readonly Line[] {
    return this._lines;
  }

  get lineCount(): number {
    return this._lines.length;
  }

  get tokenizer(): Tokenizer | null {
    return this._tokenizer;
  }

  setTokenizer(tokenizer: Tokenizer | null): void {
    this._tokenizer = tokenizer;
    this.retokenize();
  }

  /**
   * Replace the content with a read result. A failed read leaves a single
   * blank line, exactly as an empty file would.
   */
  load(result: ReadResult): void {
    if (result.ok) {
      this._lines = splitLines(new TextDecoder().decode(result.bytes)).map(text => new Line(text));
    } else {
      logger.debug('load failed, starting blank:', result.error.message);
      this._lines = [Line.blank()];
    }
    this.retokenize();
  }

  /** Load from the storage collaborator. */
  open(path: string): void {
    this.load(this.storage.read(path));
  }

  /** Reset to a single blank line. */
  reset(): void {
    this._lines = [Line.blank()];
    this.retokenize();
  }

  /**
   * Write all lines joined by `\n`. Storage failures propagate as
   * StorageError; the buffer is not touched either way.
   */
  save(path: string): void {
    const bytes = new TextEncoder().encode(this.getText());
    this.storage.write(path, bytes);
    logger.debug(`saved ${bytes.length} bytes to ${path}`);
  }

  /** Full document text, lines joined by `\n`. */
  getText(): string {
    return this._lines.map(l => l.content).join('\n');
  }

  getLine(index: number): Line | undefined {
    return this._lines[index];
  }

  /** Length of a line, 0 when the index is out of range. */
  lineLen(index: number): number {
    return this._lines[index]?.length ?? 0;
  }

  /** Insert a character at the cursor. Tabs expand to spaces. */
  insertChar(c: string, cursor: Cursor): void {
    const { x, y } = cursor.getPosition();
    const line = this._lines[cursor.lineIndex];
    if (c === '\t') {
      line.insert(x, ' '.repeat(this.tabWidth));
      cursor.setPosition(x + this.tabWidth, y);
    } else {
      line.insert(x, c);
      cursor.setPosition(x + c.length, y);
    }
    this.retokenize();
  }

  /** Split the current line at the cursor. */
  newLine(cursor: Cursor): void {
    const index = cursor.lineIndex;
    const { x, y } = cursor.getPosition();
    const rest = this._lines[index].splitAt(x);
    this._lines.splice(index + 1, 0, rest);
    this.retokenize();
    cursor.setPosition(0, y + 1);
  }

  /**
   * Backspace: delete the character before the cursor, or join the line
   * onto the previous one when at column 0.
   */
  deleteChar(cursor: Cursor): void {
    const index = cursor.lineIndex;
    const { x, y } = cursor.getPosition();
    if (x > 0) {
      this._lines[index].deleteChar(x - 1);
      cursor.setPosition(x - 1, y);
    } else if (y > 0) {
      const [removed] = this._lines.splice(index, 1);
      const previous = this._lines[index - 1];
      const joinAt = previous.length;
      previous.append(removed);
      cursor.setPosition(joinAt, y - 1);
    }
    this.retokenize();
  }

  /** Offset of `phrase` in one line at or after `start`, or null. */
  findPhrase(phrase: string, lineIndex: number, start: number): number | null {
    const line = this._lines[lineIndex];
    if (!line) return null;
    return line.findPhrase(phrase, start);
  }

  /** Recompute every line's tags from scratch. */
  retokenize(): void {
    if (!this._tokenizer) {
      for (const line of this._lines) {
        line.tags = new Array<HighlightTag>(line.length).fill(HighlightTag.Standard);
      }
      return;
    }
    const tagged = this._tokenizer.tokenize(this._lines.map(l => l.content));
    this._lines.forEach((line, i) => {
      line.tags = tagged[i];
    });
  }

  /** Overwrite the tags of a character range, clipped to the line. */
  markRange(lineIndex: number, start: number, length: number, tag: HighlightTag): void {
    const line = this._lines[lineIndex];
    if (!line) return;
    const end = Math.min(start + length, line.length);
    for (let i = start; i < end; i++) {
      line.tags[i] = tag;
    }
  }

  /** Colour for a tag; everything is `reset` while highlighting is off. */
  colour(tag: HighlightTag): TerminalColour {
    return this._tokenizer ? this._tokenizer.colour(tag) : 'reset';
  }
}

/**
 * Split on `\n`, dropping a `\r` right before a break and the empty piece
 * a final line break would leave. Always returns at least one line.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [''];
  const pieces = text.split('\n');
  const lines = pieces.map((p, i) => (i < pieces.length - 1 && p.endsWith('\r') ? p.slice(0, -1) : p));
  if (lines.length > 1 && lines[lines.length - 1] === '') lines.pop();
  return lines;
}
