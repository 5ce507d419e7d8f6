/**
 * Highlighting strategy attached to a buffer.
 *
 * Implementations are stateless between calls: `tokenize` always rescans
 * every line it is given.
 */

import type { HighlightTag } from './highlight-tag';
import type { TerminalColour } from '../../view-model/theme';

export interface Tokenizer {
  /** Language mode id, e.g. "rust" or "typescript". */
  readonly languageId: string;

  /**
   * Classify every character. The result holds one array per input line,
   * each exactly as long as that line.
   */
  tokenize(lines: readonly string[]): HighlightTag[][];

  /** Presentation colour for a tag. */
  colour(tag: HighlightTag): TerminalColour;
}

/**
 * Redistribute a flat tag sequence computed over `lines.join('\n') + '\n'`
 * back onto the lines. Tags at line-break positions are dropped.
 */
export function splitTagsByLine(
  lines: readonly string[],
  flat: readonly HighlightTag[],
): HighlightTag[][] {
  const result: HighlightTag[][] = [];
  let offset = 0;
  for (const line of lines) {
    result.push(flat.slice(offset, offset + line.length));
    offset += line.length + 1;
  }
  return result;
}
