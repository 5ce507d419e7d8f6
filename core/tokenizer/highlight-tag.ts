/**
 * Lexical classification attached to every character of a line.
 */
export const HighlightTag = {
  Standard: 'standard',
  Identifier: 'identifier',
  Keyword: 'keyword',
  Number: 'number',
  Bracket: 'bracket',
  String: 'string',
  Comment: 'comment',
  SearchResult: 'searchResult',
} as const;

export type HighlightTag = (typeof HighlightTag)[keyof typeof HighlightTag];

export const ALL_HIGHLIGHT_TAGS: readonly HighlightTag[] = Object.values(HighlightTag);
