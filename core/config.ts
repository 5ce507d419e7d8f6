/**
 * Editor configuration: defaults, overrides and environment.
 */

export interface ChromeMargin {
  /** Columns left of the text area (gutter). */
  x: number;
  /** Rows above the text area (header + separator). */
  y: number;
}

export interface EditorConfig {
  /** Spaces inserted for a tab. */
  tabWidth: number;
  /** Offset added to viewport coordinates when painting. */
  chromeMargin: ChromeMargin;
  /** Rows not available to text: header, separator, status line. */
  reservedRows: number;
  /** Language mode used when a file extension is unknown or absent. */
  defaultLanguage: string;
  /** Enables debug logging. */
  debug: boolean;
}

export const APP_NAME = 'keel';
export const APP_VERSION = '0.1.0';

export const DEFAULT_CONFIG: EditorConfig = {
  tabWidth: 4,
  chromeMargin: { x: 2, y: 2 },
  reservedRows: 3,
  defaultLanguage: 'plaintext',
  debug: false,
};

/**
 * Merge defaults, explicit overrides and environment variables
 * (`KEEL_DEBUG`, `KEEL_TAB_WIDTH`). Overrides win over the environment.
 */
export function resolveConfig(
  overrides: Partial<EditorConfig> = {},
  env: Record<string, string | undefined> = process.env,
): EditorConfig {
  const fromEnv: Partial<EditorConfig> = {};

  const debugFlag = env.KEEL_DEBUG;
  if (debugFlag !== undefined) {
    fromEnv.debug = debugFlag === '1' || debugFlag.toLowerCase() === 'true';
  }

  const tabWidth = Number.parseInt(env.KEEL_TAB_WIDTH ?? '', 10);
  if (Number.isInteger(tabWidth) && tabWidth > 0) {
    fromEnv.tabWidth = tabWidth;
  }

  return {
    ...DEFAULT_CONFIG,
    ...fromEnv,
    ...overrides,
    chromeMargin: { ...DEFAULT_CONFIG.chromeMargin, ...overrides.chromeMargin },
  };
}
