/**
 * Single-pass scanner over the whole buffer.
 *
 * All lines are concatenated with a line break after each one, so rules
 * that span lines (block comments, unterminated strings) see the full
 * document. The line breaks are consumed like any other character but
 * their tags are discarded when results are split back per line.
 */

import { HighlightTag } from './highlight-tag';
import { splitTagsByLine, type Tokenizer } from './tokenizer';
import type { LanguageMode } from './language-modes';
import {
  blockCommentLength,
  isBracket,
  lineCommentLength,
  numberLength,
  stringLength,
  wordLength,
} from './scanner';
import { resolveTagColour } from './token-theme';
import type { EditorTheme, TerminalColour } from '../../view-model/theme';

export class LexicalTokenizer implements Tokenizer {
  readonly languageId: string;

  constructor(
    private readonly mode: LanguageMode,
    private readonly theme: EditorTheme,
  ) {
    this.languageId = mode.id;
  }

  tokenize(lines: readonly string[]): HighlightTag[][] {
    return splitTagsByLine(lines, this.scan(lines.map(l => l + '\n').join('')));
  }

  colour(tag: HighlightTag): TerminalColour {
    return resolveTagColour(tag, this.theme);
  }

  /** Tag every character of `text`. */
  scan(text: string): HighlightTag[] {
    const result: HighlightTag[] = [];
    const push = (tag: HighlightTag, count: number): void => {
      for (let k = 0; k < count; k++) result.push(tag);
    };

    let i = 0;
    while (i < text.length) {
      const word = wordLength(text, i);
      if (word > 0) {
        const isKeyword = this.mode.keywords.has(text.slice(i, i + word));
        push(isKeyword ? HighlightTag.Keyword : HighlightTag.Identifier, word);
        i += word;
        continue;
      }

      const number = numberLength(text, i);
      if (number > 0) {
        push(HighlightTag.Number, number);
        i += number;
        continue;
      }

      const str = stringLength(text, i);
      if (str > 0) {
        push(HighlightTag.String, str);
        i += str;
        continue;
      }

      if (isBracket(text[i])) {
        push(HighlightTag.Bracket, 1);
        i++;
        continue;
      }

      // Longer candidate wins.
      const comment = Math.max(
        lineCommentLength(text, i, this.mode.lineComment),
        blockCommentLength(text, i, this.mode.blockComment.open, this.mode.blockComment.close),
      );
      if (comment > 0) {
        push(HighlightTag.Comment, comment);
        i += comment;
        continue;
      }

      push(HighlightTag.Standard, 1);
      i++;
    }
    return result;
  }
}
