/**
 * One document row: its text and a tag per character.
 *
 * Mutating methods only touch `content`; the owning buffer retokenizes
 * afterwards, which brings `tags` back in step.
 */

import { HighlightTag } from '../tokenizer/highlight-tag';

export class Line {
  content: string;
  tags: HighlightTag[];

  constructor(content: string = '') {
    this.content = content;
    this.tags = new Array<HighlightTag>(content.length).fill(HighlightTag.Standard);
  }

  static blank(): Line {
    return new Line();
  }

  get length(): number {
    return this.content.length;
  }

  insert(index: number, text: string): void {
    this.content = this.content.slice(0, index) + text + this.content.slice(index);
  }

  deleteChar(index: number): void {
    this.content = this.content.slice(0, index) + this.content.slice(index + 1);
  }

  append(other: Line): void {
    this.content += other.content;
  }

  /** Keep `[0, index)` here and return the rest as a new line. */
  splitAt(index: number): Line {
    const rest = new Line(this.content.slice(index));
    this.content = this.content.slice(0, index);
    return rest;
  }

  /** Offset of `phrase` at or after `start`, or null. */
  findPhrase(phrase: string, start: number): number | null {
    if (start > this.content.length) return null;
    const idx = this.content.indexOf(phrase, start);
    return idx === -1 ? null : idx;
  }
}
