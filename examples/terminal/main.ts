/**
 * Terminal keel example.
 *
 * Puts stdin in raw mode, decodes key presses into input events, and
 * paints through an ANSI display sink. Pass a path to open it.
 *
 *   npm start -- notes.rs
 */

import { EditorViewModel } from '../../view-model/editor-view-model';
import { AnsiDisplaySink } from '../../native/display-sink';
import { RenderCoordinator } from '../../native/render-coordinator';
import { decodeKeys } from '../../native/input';

const viewModel = new EditorViewModel({
  columns: process.stdout.columns || 80,
  rows: process.stdout.rows || 24,
  fileName: process.argv[2],
});

const coordinator = new RenderCoordinator(new AnsiDisplaySink(process.stdout));
coordinator.attach(viewModel);

function shutdown(): void {
  coordinator.destroy();
  if (process.stdin.isTTY) {
    process.stdin.setRawMode(false);
  }
  process.stdin.pause();
}

if (process.stdin.isTTY) {
  process.stdin.setRawMode(true);
}
process.stdin.setEncoding('utf8');
process.stdin.resume();

process.stdin.on('data', (data: string) => {
  for (const event of decodeKeys(data)) {
    viewModel.handle(event);
    if (!viewModel.isRunning) {
      shutdown();
      return;
    }
  }
});

process.stdout.on('resize', () => {
  viewModel.resize(process.stdout.columns || 80, process.stdout.rows || 24);
});
