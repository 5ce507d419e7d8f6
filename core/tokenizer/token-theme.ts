/**
 * Tag-to-colour mapping, and the bridge from Lezer highlight tags to our
 * HighlightTag set.
 */

import { tags, tagHighlighter } from '@lezer/highlight';
import { HighlightTag } from './highlight-tag';
import type { EditorTheme, TerminalColour } from '../../view-model/theme';

/**
 * Resolve a highlight tag to a theme colour.
 */
export function resolveTagColour(tag: HighlightTag, theme: EditorTheme): TerminalColour {
  return theme.tokens[tag];
}

/**
 * Highlighter that labels Lezer nodes with the class names understood by
 * `classToHighlightTag`. Modified tags (e.g. definition(variableName))
 * fall back to their base tag.
 */
export const lezerHighlighter = tagHighlighter([
  { tag: tags.keyword, class: 'keyword' },
  { tag: tags.self, class: 'keyword' },
  { tag: tags.null, class: 'keyword' },
  { tag: tags.bool, class: 'keyword' },
  { tag: tags.string, class: 'string' },
  { tag: tags.character, class: 'string' },
  { tag: tags.comment, class: 'comment' },
  { tag: tags.variableName, class: 'identifier' },
  { tag: tags.propertyName, class: 'identifier' },
  { tag: tags.typeName, class: 'identifier' },
  { tag: tags.className, class: 'identifier' },
  { tag: tags.labelName, class: 'identifier' },
  { tag: tags.number, class: 'number' },
  { tag: tags.paren, class: 'bracket' },
  { tag: tags.brace, class: 'bracket' },
  { tag: tags.squareBracket, class: 'bracket' },
]);

/**
 * Map a class name emitted by `lezerHighlighter` back to a HighlightTag.
 */
export function classToHighlightTag(className: string): HighlightTag {
  switch (className) {
    case 'keyword': return HighlightTag.Keyword;
    case 'string': return HighlightTag.String;
    case 'comment': return HighlightTag.Comment;
    case 'identifier': return HighlightTag.Identifier;
    case 'number': return HighlightTag.Number;
    case 'bracket': return HighlightTag.Bracket;
    default: return HighlightTag.Standard;
  }
}
