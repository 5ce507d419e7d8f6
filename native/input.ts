/**
 * Raw terminal input decoding.
 *
 * Turns a chunk read from stdin in raw mode into editor input events.
 */

import type { CursorDirection } from '../core/cursor/cursor';
import type { EditorCommand, InputEvent } from '../view-model/editor-view-model';

const ESC = '\x1b';

// Escape sequences (without the leading ESC) for the arrow keys, plain
// and with xterm modifier parameters.
const ARROW_SEQUENCES: Record<string, CursorDirection> = {
  '[A': 'up',
  '[B': 'down',
  '[C': 'right',
  '[D': 'left',
  'OA': 'up',
  'OB': 'down',
  'OC': 'right',
  'OD': 'left',
  '[1;2A': 'up',
  '[1;2B': 'down',
  '[1;2C': 'right',
  '[1;2D': 'left',
  '[1;5A': 'up',
  '[1;5B': 'down',
  '[1;5C': 'right',
  '[1;5D': 'left',
};

// Control characters bound to editor commands.
const CTRL_COMMANDS: Record<number, EditorCommand> = {
  3: 'quit',   // Ctrl+C
  6: 'find',   // Ctrl+F
  12: 'load',  // Ctrl+L
  19: 'save',  // Ctrl+S
};

/**
 * Decode one chunk of raw input. Unknown escape sequences and unbound
 * control characters are dropped.
 */
export function decodeKeys(chunk: string): InputEvent[] {
  const events: InputEvent[] = [];
  let i = 0;

  while (i < chunk.length) {
    const ch = chunk[i];

    if (ch === ESC) {
      const consumed = decodeEscape(chunk, i + 1, events);
      i += 1 + consumed;
      continue;
    }

    const code = ch.charCodeAt(0);
    if (ch === '\r' || ch === '\n') {
      events.push({ kind: 'enter' });
      // CRLF is a single Enter.
      i += ch === '\r' && chunk[i + 1] === '\n' ? 2 : 1;
      continue;
    }
    if (code === 0x7f || code === 0x08) {
      events.push({ kind: 'backspace' });
      i++;
      continue;
    }
    if (ch === '\t') {
      events.push({ kind: 'tab' });
      i++;
      continue;
    }
    if (code < 0x20) {
      const command = CTRL_COMMANDS[code];
      if (command) events.push({ kind: 'command', command });
      i++;
      continue;
    }

    const cp = chunk.codePointAt(i) ?? code;
    const char = String.fromCodePoint(cp);
    events.push({ kind: 'char', char });
    i += char.length;
  }

  return events;
}

/**
 * Decode what follows an ESC at `start`. Returns how many characters were
 * consumed after the ESC itself.
 */
function decodeEscape(chunk: string, start: number, events: InputEvent[]): number {
  const introducer = chunk[start];
  if (introducer !== '[' && introducer !== 'O') {
    events.push({ kind: 'cancel' });
    return 0;
  }

  // A sequence runs to its final byte: a letter or `~`.
  let end = start + 1;
  while (end < chunk.length && !/[A-Za-z~]/.test(chunk[end])) {
    end++;
  }
  if (end >= chunk.length) {
    // Truncated sequence: treat the ESC as a lone key press.
    events.push({ kind: 'cancel' });
    return 0;
  }

  const direction = ARROW_SEQUENCES[chunk.slice(start, end + 1)];
  if (direction) {
    events.push({ kind: 'move', direction });
  }
  return end + 1 - start;
}
