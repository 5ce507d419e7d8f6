import { afterEach, describe, expect, test, vi } from 'vitest';
import { DEFAULT_CONFIG, resolveConfig } from '../core/config';
import { logger } from '../core/logger';
import { StorageError } from '../core/storage/errors';
import { ALL_HIGHLIGHT_TAGS } from '../core/tokenizer/highlight-tag';
import { BUILTIN_THEMES, getThemeByName, MONOCHROME_THEME } from '../view-model/theme';

describe('resolveConfig', () => {
  test('defaults without overrides or environment', () => {
    expect(resolveConfig({}, {})).toEqual(DEFAULT_CONFIG);
  });

  test('reads the debug flag from the environment', () => {
    expect(resolveConfig({}, { KEEL_DEBUG: '1' }).debug).toBe(true);
    expect(resolveConfig({}, { KEEL_DEBUG: 'TRUE' }).debug).toBe(true);
    expect(resolveConfig({}, { KEEL_DEBUG: '0' }).debug).toBe(false);
  });

  test('reads a positive tab width from the environment', () => {
    expect(resolveConfig({}, { KEEL_TAB_WIDTH: '8' }).tabWidth).toBe(8);
    expect(resolveConfig({}, { KEEL_TAB_WIDTH: 'wide' }).tabWidth).toBe(4);
    expect(resolveConfig({}, { KEEL_TAB_WIDTH: '0' }).tabWidth).toBe(4);
  });

  test('overrides win over the environment', () => {
    expect(resolveConfig({ tabWidth: 2 }, { KEEL_TAB_WIDTH: '8' }).tabWidth).toBe(2);
  });

  test('margin overrides leave the defaults untouched', () => {
    const config = resolveConfig({ chromeMargin: { x: 5, y: 1 } }, {});
    expect(config.chromeMargin).toEqual({ x: 5, y: 1 });
    expect(DEFAULT_CONFIG.chromeMargin).toEqual({ x: 2, y: 2 });
  });
});

describe('logger', () => {
  afterEach(() => {
    logger.setDebug(false);
    vi.restoreAllMocks();
  });

  test('debug output is off by default', () => {
    const spy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    logger.debug('hidden');
    expect(spy).not.toHaveBeenCalled();
  });

  test('debug output can be enabled', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    logger.setDebug(true);
    expect(logger.isDebugEnabled()).toBe(true);
    logger.warn('careful', 3);
    expect(spy).toHaveBeenCalledWith('[keel]', 'careful', 3);
  });

  test('errors always print', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    logger.error('boom');
    expect(spy).toHaveBeenCalledWith('[keel]', 'boom');
  });
});

describe('StorageError', () => {
  test('names the operation, path and cause', () => {
    const cause = new Error('disk full');
    const err = new StorageError('write', 'out.txt', cause);
    expect(err.message).toBe('Could not write out.txt: disk full');
    expect(err.name).toBe('StorageError');
    expect(err.operation).toBe('write');
    expect(err.path).toBe('out.txt');
    expect(err.cause).toBe(cause);
  });
});

describe('themes', () => {
  test('built-in themes are found by name', () => {
    expect(getThemeByName('monochrome')).toBe(MONOCHROME_THEME);
    expect(getThemeByName('neon')).toBeUndefined();
  });

  test('every theme colours every highlight tag', () => {
    for (const theme of BUILTIN_THEMES) {
      expect(Object.keys(theme.tokens).sort()).toEqual([...ALL_HIGHLIGHT_TAGS].sort());
    }
  });
});
