/**
 * Main ViewModel: the editing surface between input events and the core.
 *
 * Each call to `handle` consumes exactly one input event and performs at
 * most one buffer/cursor/search operation, then re-contains the cursor in
 * the viewport and notifies listeners so the renderer can refresh.
 */

import { TextBuffer } from '../core/buffer/text-buffer';
import { Cursor, type CursorDirection, type ViewportSize } from '../core/cursor/cursor';
import { APP_NAME, APP_VERSION, resolveConfig, type EditorConfig } from '../core/config';
import { createTokenizer, detectLanguage, type HighlighterEngine } from '../core/tokenizer/language-modes';
import { StorageError } from '../core/storage/errors';
import type { Storage } from '../core/storage/storage';
import { logger } from '../core/logger';
import { FindWidgetController } from './find-widget';
import { PathPromptController, type PathPromptResult } from './path-prompt';
import { computeRenderedLines, type RenderedLine } from './line-layout';
import { DEFAULT_THEME, type EditorTheme } from './theme';

export type EditorCommand = 'save' | 'load' | 'find' | 'quit';

export type InputEvent =
  | { kind: 'char'; char: string }
  | { kind: 'move'; direction: CursorDirection }
  | { kind: 'enter' }
  | { kind: 'backspace' }
  | { kind: 'tab' }
  | { kind: 'confirm' }
  | { kind: 'cancel' }
  | { kind: 'command'; command: EditorCommand };

export interface EditorViewModelOptions {
  /** Terminal width in columns. */
  columns: number;
  /** Terminal height in rows. */
  rows: number;
  config?: Partial<EditorConfig>;
  storage?: Storage;
  theme?: EditorTheme;
  /** Highlighting implementation; the lexical scanner unless set. */
  engine?: HighlighterEngine;
  /** File to open right away. */
  fileName?: string;
}

export const QUIT_PROMPT = 'Press Ctrl-C again to confirm quit. Press Esc to cancel';

type ChangeListener = () => void;

export class EditorViewModel {
  readonly config: EditorConfig;
  readonly buffer: TextBuffer;
  readonly cursor: Cursor;
  readonly find: FindWidgetController;
  readonly prompt: PathPromptController;

  private _theme: EditorTheme;
  private _engine: HighlighterEngine;
  private _columns: number;
  private _rows: number;
  private _fileName: string | null = null;
  private _dirty: boolean = false;
  private _statusMessage: string | null = null;
  private _quitPending: boolean = false;
  private _running: boolean = true;
  private _listeners: ChangeListener[] = [];

  constructor(options: EditorViewModelOptions) {
    this.config = resolveConfig(options.config);
    logger.setDebug(this.config.debug);

    this._theme = options.theme ?? DEFAULT_THEME;
    this._engine = options.engine ?? 'lexical';
    this._columns = options.columns;
    this._rows = options.rows;

    this.buffer = new TextBuffer({
      storage: options.storage,
      tabWidth: this.config.tabWidth,
      tokenizer: createTokenizer(this.config.defaultLanguage, this._theme, this._engine),
    });
    this.cursor = new Cursor(this.viewportSize());
    this.find = new FindWidgetController();
    this.prompt = new PathPromptController();

    if (options.fileName !== undefined) {
      this.open(options.fileName);
    }
  }

  get fileName(): string | null { return this._fileName; }
  get isDirty(): boolean { return this._dirty; }
  get isRunning(): boolean { return this._running; }
  get columns(): number { return this._columns; }
  get rows(): number { return this._rows; }
  get theme(): EditorTheme { return this._theme; }

  /** Title row: dirty marker, file name, editor name and version. */
  get header(): string {
    const name = this._fileName ?? 'Untitled';
    const title = `${this._dirty ? '*' : ''}${name} -- ${APP_NAME} -- ${APP_VERSION}`;
    return title.slice(0, this._columns);
  }

  /** Bottom row: find or path prompt, explicit message, or cursor summary. */
  get status(): string {
    if (this.find.isOpen) {
      return `Find: ${this.find.phrase}`;
    }
    if (this.prompt.isOpen) {
      return this.prompt.label;
    }
    if (this._statusMessage !== null) {
      return this._statusMessage;
    }
    return `Cursor: ${this.cursor.x}, ${this.cursor.y} -- ${this.buffer.lineCount} lines`;
  }

  get renderedLines(): RenderedLine[] {
    return computeRenderedLines(this.buffer, this.cursor);
  }

  /** Register a change listener. Returns an unsubscribe function. */
  onChange(listener: ChangeListener): () => void {
    this._listeners.push(listener);
    return () => {
      const idx = this._listeners.indexOf(listener);
      if (idx >= 0) this._listeners.splice(idx, 1);
    };
  }

  /** Consume one input event. */
  handle(event: InputEvent): void {
    if (this.find.isOpen) {
      this.find.handle(event, this.buffer, this.cursor);
    } else if (this.prompt.isOpen) {
      const accepted = this.prompt.handle(event);
      if (accepted) this.applyPath(accepted);
    } else if (this._quitPending) {
      this.handleQuitConfirmation(event);
    } else {
      this._statusMessage = null;
      this.dispatch(event);
      this.cursor.changeOffset();
    }
    this.notifyChange();
  }

  /** Load a file, resetting the cursor and choosing a language mode. */
  open(path: string): void {
    this._fileName = path;
    this.cursor.reset();
    const languageId = detectLanguage(path, this.config.defaultLanguage);
    this.buffer.setTokenizer(createTokenizer(languageId, this._theme, this._engine));
    this.buffer.open(path);
    this._dirty = false;
    logger.info(`opened ${path} as ${languageId}`);
    this.notifyChange();
  }

  /**
   * Save to the current file name. Storage failures are reported in the
   * status line and leave the dirty flag set.
   */
  save(): boolean {
    if (this._fileName === null) {
      this._statusMessage = 'No file name; nothing saved';
      return false;
    }
    try {
      this.buffer.save(this._fileName);
    } catch (err) {
      if (err instanceof StorageError) {
        logger.warn(err.message);
        this._statusMessage = `Save failed: ${err.message}`;
        return false;
      }
      throw err;
    }
    this._dirty = false;
    this._statusMessage = `Saved ${this._fileName}`;
    return true;
  }

  /** Update the terminal size; the viewport loses the chrome. */
  resize(columns: number, rows: number): void {
    this._columns = columns;
    this._rows = rows;
    this.cursor.resize(this.viewportSize());
    this.cursor.changeOffset();
    this.notifyChange();
  }

  private dispatch(event: InputEvent): void {
    switch (event.kind) {
      case 'char':
        this.buffer.insertChar(event.char, this.cursor);
        this._dirty = true;
        break;
      case 'tab':
        this.buffer.insertChar('\t', this.cursor);
        this._dirty = true;
        break;
      case 'enter':
        this.buffer.newLine(this.cursor);
        this._dirty = true;
        break;
      case 'backspace':
        this.buffer.deleteChar(this.cursor);
        this._dirty = true;
        break;
      case 'move':
        this.cursor.move(event.direction, this.buffer);
        break;
      case 'command':
        this.runCommand(event.command);
        break;
      case 'confirm':
      case 'cancel':
        break;
    }
  }

  private runCommand(command: EditorCommand): void {
    switch (command) {
      case 'save':
      case 'load':
        this.prompt.open(command, this._fileName ?? '');
        break;
      case 'find':
        this.find.open(this.cursor);
        break;
      case 'quit':
        this._quitPending = true;
        this._statusMessage = QUIT_PROMPT;
        break;
    }
  }

  private applyPath({ purpose, path }: PathPromptResult): void {
    if (purpose === 'load') {
      this.open(path);
      return;
    }
    if (path !== this._fileName) {
      this._fileName = path;
      const languageId = detectLanguage(path, this.config.defaultLanguage);
      this.buffer.setTokenizer(createTokenizer(languageId, this._theme, this._engine));
    }
    this.save();
  }

  private handleQuitConfirmation(event: InputEvent): void {
    if (event.kind === 'command' && event.command === 'quit') {
      this._running = false;
      this._quitPending = false;
    } else if (event.kind === 'cancel') {
      this._quitPending = false;
      this._statusMessage = null;
    }
  }

  private viewportSize(): ViewportSize {
    return {
      width: this._columns - this.config.chromeMargin.x,
      height: this._rows - this.config.reservedRows,
    };
  }

  private notifyChange(): void {
    for (const listener of this._listeners) {
      listener();
    }
  }
}
