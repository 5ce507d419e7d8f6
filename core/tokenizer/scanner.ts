/**
 * Lexical rules for the hand-written scanner.
 *
 * Each rule looks at `text` from `start` and returns the length of the run
 * it recognises there, or 0 when it does not apply.
 */

const ALPHABETIC = /\p{Alphabetic}/u;
const NUMERIC = /\p{N}/u;
const BRACKETS = '(){}[]';

export function isAlphabetic(ch: string): boolean {
  return ALPHABETIC.test(ch);
}

export function isNumeric(ch: string): boolean {
  return NUMERIC.test(ch);
}

export function isBracket(ch: string): boolean {
  return ch.length === 1 && BRACKETS.includes(ch);
}

/** Whether `sequence` occurs in `text` at `start`. */
export function matchSequence(text: string, start: number, sequence: string): boolean {
  return text.startsWith(sequence, start);
}

/** Alphabetic or `_` start, then alphanumerics or `_`. */
export function wordLength(text: string, start: number): number {
  let len = 0;
  while (start + len < text.length) {
    const c = text[start + len];
    if (isAlphabetic(c) || c === '_' || (len > 0 && isNumeric(c))) {
      len++;
    } else {
      break;
    }
  }
  return len;
}

/** Digit start, then digits with `_` or `.` allowed after the first. */
export function numberLength(text: string, start: number): number {
  let len = 0;
  while (start + len < text.length) {
    const c = text[start + len];
    if (isNumeric(c) || (len > 0 && (c === '_' || c === '.'))) {
      len++;
    } else {
      break;
    }
  }
  return len;
}

/**
 * Single- or double-quoted string. A backslash escapes the next character.
 * Without a closing quote the run extends to the end of `text`.
 */
export function stringLength(text: string, start: number): number {
  const quote = text[start];
  if (quote !== '"' && quote !== "'") return 0;

  let len = 1;
  let escaped = false;
  while (start + len < text.length) {
    const c = text[start + len];
    len++;
    if (!escaped && c === quote) break;
    escaped = c === '\\' && !escaped;
  }
  return len;
}

/** `opener` up to and including the next line break (or end of text). */
export function lineCommentLength(text: string, start: number, opener: string): number {
  if (!matchSequence(text, start, opener)) return 0;

  let len = opener.length;
  while (start + len < text.length) {
    const c = text[start + len];
    len++;
    if (c === '\n') break;
  }
  return len;
}

/**
 * Nested block comment. Every further `opener` deepens, every `closer`
 * ends one level; the run stops at the first plain character seen with
 * depth 0, or at the end of text when never closed.
 */
export function blockCommentLength(text: string, start: number, opener: string, closer: string): number {
  if (!matchSequence(text, start, opener)) return 0;

  let len = opener.length;
  let depth = 1;
  while (start + len < text.length) {
    if (matchSequence(text, start + len, opener)) {
      depth++;
      len += opener.length;
      continue;
    }
    if (matchSequence(text, start + len, closer)) {
      depth--;
      len += closer.length;
      continue;
    }
    if (depth === 0) break;
    len++;
  }
  return len;
}
