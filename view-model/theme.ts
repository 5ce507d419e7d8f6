/**
 * Theme system: terminal colours for highlight tags and editor chrome.
 */

import type { HighlightTag } from '../core/tokenizer/highlight-tag';

/** Colours a terminal display sink knows how to paint. */
export type TerminalColour =
  | 'reset'
  | 'black'
  | 'red'
  | 'darkRed'
  | 'green'
  | 'darkGreen'
  | 'yellow'
  | 'darkYellow'
  | 'blue'
  | 'darkBlue'
  | 'magenta'
  | 'darkMagenta'
  | 'cyan'
  | 'darkCyan'
  | 'white'
  | 'grey';

export type TokenThemeMapping = Record<HighlightTag, TerminalColour>;

export interface EditorTheme {
  name: string;

  // Syntax token colours
  tokens: TokenThemeMapping;

  // Editor chrome
  header: TerminalColour;
  gutter: TerminalColour;
  status: TerminalColour;
}

/** Default terminal theme. */
export const DEFAULT_THEME: EditorTheme = {
  name: 'default',

  tokens: {
    standard: 'reset',
    identifier: 'cyan',
    keyword: 'blue',
    number: 'yellow',
    bracket: 'darkYellow',
    string: 'red',
    comment: 'darkGreen',
    searchResult: 'magenta',
  },

  header: 'reset',
  gutter: 'reset',
  status: 'reset',
};

/** Only search matches stand out. */
export const MONOCHROME_THEME: EditorTheme = {
  name: 'monochrome',

  tokens: {
    standard: 'reset',
    identifier: 'reset',
    keyword: 'reset',
    number: 'reset',
    bracket: 'reset',
    string: 'reset',
    comment: 'grey',
    searchResult: 'magenta',
  },

  header: 'reset',
  gutter: 'grey',
  status: 'reset',
};

/** All built-in themes. */
export const BUILTIN_THEMES: EditorTheme[] = [DEFAULT_THEME, MONOCHROME_THEME];

/** Look up a built-in theme by name. */
export function getThemeByName(name: string): EditorTheme | undefined {
  return BUILTIN_THEMES.find(t => t.name === name);
}
