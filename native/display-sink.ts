/**
 * Display sink: the command contract the renderer paints through.
 *
 * The core never keeps a screen buffer; a refresh is one pass of
 * `moveTo`/`print` commands. Implementations can be swapped at runtime
 * (recording for tests, ANSI for a real terminal).
 */

import type { TerminalColour } from '../view-model/theme';

export interface DisplaySink {
  /** Blank the whole screen. */
  clear(): void;
  /** Place the output position, 0-based. */
  moveTo(column: number, row: number): void;
  /** Print a run of characters in one colour. */
  print(text: string, colour: TerminalColour): void;
  showCursor(): void;
  hideCursor(): void;
  /** Push everything queued so far to the terminal. */
  flush(): void;
}

export type SinkCommand =
  | { op: 'clear' }
  | { op: 'moveTo'; column: number; row: number }
  | { op: 'print'; text: string; colour: TerminalColour }
  | { op: 'showCursor' }
  | { op: 'hideCursor' }
  | { op: 'flush' };

/**
 * Sink that records every command for verification.
 */
export class RecordingDisplaySink implements DisplaySink {
  readonly commands: SinkCommand[] = [];

  clear(): void {
    this.commands.push({ op: 'clear' });
  }

  moveTo(column: number, row: number): void {
    this.commands.push({ op: 'moveTo', column, row });
  }

  print(text: string, colour: TerminalColour): void {
    this.commands.push({ op: 'print', text, colour });
  }

  showCursor(): void {
    this.commands.push({ op: 'showCursor' });
  }

  hideCursor(): void {
    this.commands.push({ op: 'hideCursor' });
  }

  flush(): void {
    this.commands.push({ op: 'flush' });
  }

  /** Clear recorded commands. */
  reset(): void {
    this.commands.length = 0;
  }

  /** Get commands of one kind. */
  getCommands<K extends SinkCommand['op']>(op: K): Extract<SinkCommand, { op: K }>[] {
    return this.commands.filter((c): c is Extract<SinkCommand, { op: K }> => c.op === op);
  }

  /**
   * Replay the commands onto a blank grid and return its rows with
   * trailing spaces trimmed.
   */
  screen(columns: number, rows: number): string[] {
    const grid: string[][] = Array.from({ length: rows }, () => new Array<string>(columns).fill(' '));
    let column = 0;
    let row = 0;
    for (const command of this.commands) {
      if (command.op === 'clear') {
        for (const line of grid) line.fill(' ');
      } else if (command.op === 'moveTo') {
        column = command.column;
        row = command.row;
      } else if (command.op === 'print') {
        for (const ch of command.text) {
          if (row < rows && column < columns) grid[row][column] = ch;
          column++;
        }
      }
    }
    return grid.map(line => line.join('').trimEnd());
  }
}

const CSI = '\x1b[';

const FOREGROUND: Record<TerminalColour, string> = {
  reset: `${CSI}39m`,
  black: `${CSI}38;5;0m`,
  darkRed: `${CSI}38;5;1m`,
  darkGreen: `${CSI}38;5;2m`,
  darkYellow: `${CSI}38;5;3m`,
  darkBlue: `${CSI}38;5;4m`,
  darkMagenta: `${CSI}38;5;5m`,
  darkCyan: `${CSI}38;5;6m`,
  grey: `${CSI}38;5;7m`,
  red: `${CSI}38;5;9m`,
  green: `${CSI}38;5;10m`,
  yellow: `${CSI}38;5;11m`,
  blue: `${CSI}38;5;12m`,
  magenta: `${CSI}38;5;13m`,
  cyan: `${CSI}38;5;14m`,
  white: `${CSI}38;5;15m`,
};

/** Minimal writable surface, satisfied by process.stdout. */
export interface TextOutput {
  write(chunk: string): unknown;
}

/**
 * Sink that queues ANSI escape sequences and writes them on `flush`.
 */
export class AnsiDisplaySink implements DisplaySink {
  private pending: string = '';

  constructor(private readonly out: TextOutput) {}

  clear(): void {
    this.pending += `${CSI}2J`;
  }

  moveTo(column: number, row: number): void {
    // Terminal coordinates are 1-indexed, row first.
    this.pending += `${CSI}${row + 1};${column + 1}H`;
  }

  print(text: string, colour: TerminalColour): void {
    if (text.length === 0) return;
    if (colour === 'reset') {
      this.pending += text;
    } else {
      this.pending += `${FOREGROUND[colour]}${text}${FOREGROUND.reset}`;
    }
  }

  showCursor(): void {
    this.pending += `${CSI}?25h`;
  }

  hideCursor(): void {
    this.pending += `${CSI}?25l`;
  }

  flush(): void {
    if (this.pending.length === 0) return;
    this.out.write(this.pending);
    this.pending = '';
  }
}
