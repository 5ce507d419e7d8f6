/**
 * Console logger with a debug toggle.
 *
 * `debug`, `info` and `warn` are silent unless debug output is enabled;
 * `error` always prints.
 */

let debugOutputEnabled = false;

export function debug(...args: unknown[]): void {
  if (debugOutputEnabled) {
    console.debug('[keel]', ...args);
  }
}

export function info(...args: unknown[]): void {
  if (debugOutputEnabled) {
    console.info('[keel]', ...args);
  }
}

export function warn(...args: unknown[]): void {
  if (debugOutputEnabled) {
    console.warn('[keel]', ...args);
  }
}

export function error(...args: unknown[]): void {
  console.error('[keel]', ...args);
}

/** Enable or disable debug output. */
export function setDebug(enable: boolean): void {
  debugOutputEnabled = enable;
}

export function isDebugEnabled(): boolean {
  return debugOutputEnabled;
}

export const logger = { debug, info, warn, error, setDebug, isDebugEnabled };
