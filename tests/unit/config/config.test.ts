import { describe, expect, it } from 'vitest';
import {
  ConfigError,
  configFromEnv,
  DEFAULT_POSTLOAD_DISPATCH_TYPES,
  DEFAULT_PRELOAD_DISPATCH_TYPES,
  resolveConfig,
} from '../../../src/config/index.js';

describe('resolveConfig', () => {
  it('applies defaults', () => {
    expect(resolveConfig()).toEqual({
      preloadDispatchTypes: [...DEFAULT_PRELOAD_DISPATCH_TYPES],
      postloadDispatchTypes: [...DEFAULT_POSTLOAD_DISPATCH_TYPES],
      debug: false,
      caseSensitive: false,
      showInternalActions: false,
      logLevel: 'info',
    });
  });

  it('keeps given values', () => {
    const config = resolveConfig({ preloadDispatchTypes: ['Path', '+Health'], debug: true });

    expect(config.preloadDispatchTypes).toEqual(['Path', '+Health']);
    expect(config.debug).toBe(true);
  });

  it('rejects malformed dispatch type names', () => {
    expect(() => resolveConfig({ postloadDispatchTypes: ['not a type'] })).toThrow(ConfigError);
  });

  it('lists every issue', () => {
    try {
      resolveConfig({ preloadDispatchTypes: [''] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof ConfigError && error.issues[0]).toMatch(/^preloadDispatchTypes\.0: /);
    }
  });
});

describe('configFromEnv', () => {
  it('reads JUNCTION_* variables', () => {
    const config = configFromEnv({
      JUNCTION_PRELOAD: 'Index, Path ,',
      JUNCTION_POSTLOAD: '',
      JUNCTION_DEBUG: '1',
      JUNCTION_CASE_SENSITIVE: 'true',
      JUNCTION_SHOW_INTERNAL_ACTIONS: 'no',
      JUNCTION_LOG_LEVEL: 'warn',
    });

    expect(config).toEqual({
      preloadDispatchTypes: ['Index', 'Path'],
      postloadDispatchTypes: [],
      debug: true,
      caseSensitive: true,
      showInternalActions: false,
      logLevel: 'warn',
    });
  });

  it('falls back to defaults for unset variables', () => {
    expect(configFromEnv({})).toEqual(resolveConfig());
  });

  it('rejects unknown log levels', () => {
    expect(() => configFromEnv({ JUNCTION_LOG_LEVEL: 'loud' })).toThrow(
      'Invalid dispatcher configuration: logLevel: unknown level "loud"'
    );
  });
});
