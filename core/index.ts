/**
 * Core barrel export: re-exports all public APIs from core/.
 */

// Buffer
export { TextBuffer, splitLines, type TextBufferOptions } from './buffer/text-buffer';
export { Line } from './buffer/line';

// Storage
export { FileStorage, MemoryStorage, type Storage, type ReadResult } from './storage/storage';
export { StorageError, type StorageOperation } from './storage/errors';

// Cursor
export {
  Cursor,
  type CursorDirection, type Position, type ViewportSize,
  type RenderPosition, type LineMetrics,
} from './cursor/cursor';

// Tokenizer / Syntax
export { HighlightTag, ALL_HIGHLIGHT_TAGS } from './tokenizer/highlight-tag';
export { type Tokenizer, splitTagsByLine } from './tokenizer/tokenizer';
export { LexicalTokenizer } from './tokenizer/lexical-tokenizer';
export { LezerTokenizer } from './tokenizer/lezer-tokenizer';
export {
  createTokenizer, detectLanguage, getLanguageMode, registerLanguageMode,
  getSupportedLanguages, PLAIN_TEXT,
  type LanguageMode, type HighlighterEngine,
} from './tokenizer/language-modes';
export { resolveTagColour } from './tokenizer/token-theme';

// Search
export { SearchData } from './search/search-data';

// Config / logging
export { DEFAULT_CONFIG, APP_NAME, APP_VERSION, resolveConfig, type EditorConfig, type ChromeMargin } from './config';
export { logger } from './logger';
