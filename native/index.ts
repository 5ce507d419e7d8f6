/**
 * Native barrel export: re-exports all public APIs from native/.
 */

// Display sink
export {
  type DisplaySink,
  type SinkCommand,
  type TextOutput,
  RecordingDisplaySink,
  AnsiDisplaySink,
} from './display-sink';

// Render Coordinator
export { RenderCoordinator } from './render-coordinator';

// Terminal input
export { decodeKeys } from './input';
