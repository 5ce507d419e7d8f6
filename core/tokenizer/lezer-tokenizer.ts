/**
 * Tokenizer backed by a Lezer parse tree.
 *
 * The document is parsed as a whole, highlight tags are resolved with
 * `highlightTree`, and the resulting ranges are folded onto our tag set.
 * Characters no rule covers stay Standard.
 */

import type { Parser } from '@lezer/common';
import { highlightTree } from '@lezer/highlight';
import { HighlightTag } from './highlight-tag';
import { splitTagsByLine, type Tokenizer } from './tokenizer';
import { classToHighlightTag, lezerHighlighter, resolveTagColour } from './token-theme';
import type { EditorTheme, TerminalColour } from '../../view-model/theme';

export class LezerTokenizer implements Tokenizer {
  constructor(
    readonly languageId: string,
    private readonly parser: Parser,
    private readonly theme: EditorTheme,
  ) {}

  tokenize(lines: readonly string[]): HighlightTag[][] {
    const text = lines.map(l => l + '\n').join('');
    const flat = new Array<HighlightTag>(text.length).fill(HighlightTag.Standard);

    const tree = this.parser.parse(text);
    highlightTree(tree, lezerHighlighter, (from, to, classes) => {
      // Nested rules may emit several classes; the first one is the most specific.
      const tag = classToHighlightTag(classes.split(' ')[0]);
      for (let i = from; i < to; i++) flat[i] = tag;
    });

    return splitTagsByLine(lines, flat);
  }

  colour(tag: HighlightTag): TerminalColour {
    return resolveTagColour(tag, this.theme);
  }
}
