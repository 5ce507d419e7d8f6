/**
 * RenderCoordinator: bridges EditorViewModel to a display sink.
 *
 * Screen layout, top to bottom: header row, a blank separator, the text
 * area (each row starts with a `~` gutter, text begins at the chrome
 * margin), and the status row. The hardware cursor goes last, at the
 * viewport position plus the margin.
 */

import type { DisplaySink } from './display-sink';
import type { EditorViewModel } from '../view-model/editor-view-model';

export class RenderCoordinator {
  private _sink: DisplaySink;
  private _viewModel: EditorViewModel | null = null;
  private _unsubscribe: (() => void) | null = null;
  private _frames: number = 0;

  constructor(sink: DisplaySink) {
    this._sink = sink;
  }

  /** Number of completed refreshes. */
  get frames(): number {
    return this._frames;
  }

  /**
   * Attach to an EditorViewModel and refresh on every change.
   */
  attach(viewModel: EditorViewModel): void {
    this.detach();
    this._viewModel = viewModel;
    this._unsubscribe = viewModel.onChange(() => {
      this.refresh();
    });
    this.refresh();
  }

  /**
   * Detach from the current ViewModel.
   */
  detach(): void {
    if (this._unsubscribe) {
      this._unsubscribe();
      this._unsubscribe = null;
    }
    this._viewModel = null;
  }

  /**
   * Emit one full frame.
   */
  refresh(): void {
    const vm = this._viewModel;
    if (!vm) return;
    const sink = this._sink;
    const theme = vm.theme;
    const margin = vm.config.chromeMargin;

    sink.hideCursor();
    sink.clear();

    sink.moveTo(0, 0);
    sink.print(vm.header, theme.header);

    const lines = vm.renderedLines;
    for (let row = margin.y; row < vm.rows - 1; row++) {
      sink.moveTo(0, row);
      sink.print('~', theme.gutter);

      const line = lines[row - margin.y];
      if (!line) continue;
      sink.moveTo(margin.x, row);
      for (const run of line.runs) {
        sink.print(run.text, run.colour);
      }
    }

    sink.moveTo(0, vm.rows - 1);
    sink.print(vm.status, theme.status);

    const pos = vm.cursor.getRenderPosition();
    sink.moveTo(pos.column + margin.x, pos.row + margin.y);
    sink.showCursor();
    sink.flush();
    this._frames++;
  }

  destroy(): void {
    this.detach();
    this._sink.clear();
    this._sink.moveTo(0, 0);
    this._sink.showCursor();
    this._sink.flush();
  }
}
