/**
 * Path prompt for the save and load commands.
 *
 * The prompt starts with the current file name already filled in. Enter
 * accepts a non-empty path; cancel, or accepting an empty one, closes the
 * prompt without a result.
 */

import type { InputEvent } from './editor-view-model';

export type PathPromptPurpose = 'save' | 'load';

export interface PathPromptResult {
  purpose: PathPromptPurpose;
  path: string;
}

const LABELS: Record<PathPromptPurpose, string> = {
  save: 'Enter a path to save to:',
  load: 'Enter a path to load:',
};

export class PathPromptController {
  private _purpose: PathPromptPurpose | null = null;
  private _input: string = '';

  get isOpen(): boolean {
    return this._purpose !== null;
  }

  get purpose(): PathPromptPurpose | null {
    return this._purpose;
  }

  get input(): string {
    return this._input;
  }

  /** Status-line text, e.g. `Enter a path to save to: notes.rs`. */
  get label(): string {
    return this._purpose ? `${LABELS[this._purpose]} ${this._input}` : '';
  }

  open(purpose: PathPromptPurpose, initial: string): void {
    this._purpose = purpose;
    this._input = initial;
  }

  /** Feed one event; returns the accepted path when the prompt closes with one. */
  handle(event: InputEvent): PathPromptResult | null {
    const purpose = this._purpose;
    if (!purpose) return null;

    switch (event.kind) {
      case 'char':
        this._input += event.char;
        return null;
      case 'backspace':
        this._input = this._input.slice(0, -1);
        return null;
      case 'enter':
      case 'confirm': {
        const path = this._input;
        this.close();
        return path.length > 0 ? { purpose, path } : null;
      }
      case 'cancel':
        this.close();
        return null;
      default:
        return null;
    }
  }

  close(): void {
    this._purpose = null;
    this._input = '';
  }
}
