/**
 * Language modes: keyword sets and comment delimiters, extension-based
 * detection, and the tokenizer factory.
 */

import keywordSets from './keywords.json';
import type { Tokenizer } from './tokenizer';
import { LexicalTokenizer } from './lexical-tokenizer';
import { LezerTokenizer } from './lezer-tokenizer';
import { typescriptParser, javascriptParser } from './grammars/typescript';
import { DEFAULT_THEME, type EditorTheme } from '../../view-model/theme';

export interface LanguageMode {
  id: string;
  keywords: ReadonlySet<string>;
  lineComment: string;
  blockComment: { open: string; close: string };
}

/** Which tokenizer implementation backs a language mode. */
export type HighlighterEngine = 'lexical' | 'lezer';

export const PLAIN_TEXT = 'plaintext';

const KEYWORDS: Record<string, readonly string[]> = keywordSets;

const modes: Map<string, LanguageMode> = new Map(
  Object.entries(KEYWORDS).map(([id, words]) => [id, {
    id,
    keywords: new Set(words),
    lineComment: '//',
    blockComment: { open: '/*', close: '*/' },
  }]),
);

const EXTENSIONS: Record<string, string> = {
  rs: 'rust',
  ts: 'typescript', tsx: 'typescript', mts: 'typescript', cts: 'typescript',
  js: 'javascript', jsx: 'javascript', mjs: 'javascript', cjs: 'javascript',
  c: 'c', h: 'c',
  cpp: 'cpp', cxx: 'cpp', cc: 'cpp', hpp: 'cpp', hxx: 'cpp',
  go: 'go',
  txt: PLAIN_TEXT, md: PLAIN_TEXT,
};

/** Look up a language mode by id. */
export function getLanguageMode(languageId: string): LanguageMode | undefined {
  return modes.get(languageId);
}

/** Register (or replace) a language mode. */
export function registerLanguageMode(mode: LanguageMode): void {
  modes.set(mode.id, mode);
}

/** List of supported language ids, plain text excluded. */
export function getSupportedLanguages(): string[] {
  return [...modes.keys()];
}

/**
 * Guess the language from a path's extension. Unknown extensions map to
 * `fallback`.
 */
export function detectLanguage(path: string, fallback: string = PLAIN_TEXT): string {
  const name = path.split(/[\\/]/).pop() ?? '';
  const dot = name.lastIndexOf('.');
  if (dot <= 0) return fallback;
  return EXTENSIONS[name.slice(dot + 1).toLowerCase()] ?? fallback;
}

/**
 * Build the tokenizer for a language. Plain text and unknown ids yield
 * null, which disables highlighting. The Lezer engine only covers
 * TypeScript and JavaScript; other languages use the lexical scanner.
 */
export function createTokenizer(
  languageId: string,
  theme: EditorTheme = DEFAULT_THEME,
  engine: HighlighterEngine = 'lexical',
): Tokenizer | null {
  if (engine === 'lezer') {
    if (languageId === 'typescript') return new LezerTokenizer(languageId, typescriptParser, theme);
    if (languageId === 'javascript') return new LezerTokenizer(languageId, javascriptParser, theme);
  }
  const mode = modes.get(languageId);
  return mode ? new LexicalTokenizer(mode, theme) : null;
}
