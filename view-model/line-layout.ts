/**
 * Compute rendered lines: the visible slice of each line in the viewport,
 * split into runs of a single colour.
 */

import type { TextBuffer } from '../core/buffer/text-buffer';
import type { Line } from '../core/buffer/line';
import type { Cursor } from '../core/cursor/cursor';
import type { HighlightTag } from '../core/tokenizer/highlight-tag';
import type { TerminalColour } from './theme';

export interface ColourRun {
  text: string;
  colour: TerminalColour;
}

export interface RenderedLine {
  /** Document line index. */
  lineNumber: number;
  /** Viewport row, 0-based. */
  row: number;
  runs: ColourRun[];
}

/**
 * Compute rendered lines for every viewport row that shows a document line.
 */
export function computeRenderedLines(buffer: TextBuffer, cursor: Cursor): RenderedLine[] {
  const { width, height } = cursor.size;
  const offset = cursor.getOffset();
  const colour = (tag: HighlightTag): TerminalColour => buffer.colour(tag);
  const result: RenderedLine[] = [];

  for (let row = 0; row < height; row++) {
    const lineNumber = row + offset.y;
    const line = buffer.getLine(lineNumber);
    if (!line) break;
    result.push({
      lineNumber,
      row,
      runs: colourRuns(line, offset.x, offset.x + width, colour),
    });
  }
  return result;
}

/**
 * Split `line.content[start, end)` (clamped to the line) into maximal runs
 * sharing a colour.
 */
export function colourRuns(
  line: Line,
  start: number,
  end: number,
  colour: (tag: HighlightTag) => TerminalColour,
): ColourRun[] {
  const from = Math.min(start, line.length);
  const to = Math.min(end, line.length);
  const runs: ColourRun[] = [];

  for (let i = from; i < to; i++) {
    const tag = line.tags[i];
    const c: TerminalColour = tag === undefined ? 'reset' : colour(tag);
    const last = runs[runs.length - 1];
    if (last && last.colour === c) {
      last.text += line.content[i];
    } else {
      runs.push({ text: line.content[i], colour: c });
    }
  }
  return runs;
}
