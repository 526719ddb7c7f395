import { describe, expect, test } from 'vitest';
import { getDbPath, loadConfig } from '../src/config.ts';
import { ConfigError, ExitCode } from '../src/utils/errors.ts';

describe('loadConfig', () => {
  test('requires NAVMARK_DATA', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({})).toThrow('Need to set NAVMARK_DATA environment variable.');
    expect(() => loadConfig({ NAVMARK_DATA: '' })).toThrow(ConfigError);
  });

  test('configuration errors carry their exit code', () => {
    try {
      loadConfig({});
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect(err instanceof ConfigError && err.exitCode).toBe(ExitCode.Config);
    }
  });

  test('uses the defaults', () => {
    expect(loadConfig({ NAVMARK_DATA: '/data' })).toEqual({
      dataDir: '/data',
      discountFactor: 0.99,
      maxAge: 2_592_000,
      maxChoices: 10,
      debug: false,
    });
  });

  test('reads overrides', () => {
    const config = loadConfig({
      NAVMARK_DATA: '/data',
      NAVMARK_DISCOUNT_FACTOR: '0.9',
      NAVMARK_MAX_AGE: '3600',
      NAVMARK_MAX_CHOICES: '5',
      NAVMARK_DEBUG: '1',
    });
    expect(config.discountFactor).toBe(0.9);
    expect(config.maxAge).toBe(3600);
    expect(config.maxChoices).toBe(5);
    expect(config.debug).toBe(true);
  });

  test('empty overrides fall back to the defaults', () => {
    expect(loadConfig({ NAVMARK_DATA: '/data', NAVMARK_MAX_CHOICES: '' }).maxChoices).toBe(10);
  });

  test('rejects invalid overrides', () => {
    expect(() => loadConfig({ NAVMARK_DATA: '/data', NAVMARK_DISCOUNT_FACTOR: '1.5' })).toThrow(
      'Invalid NAVMARK_DISCOUNT_FACTOR: must be at most 1',
    );
    expect(() => loadConfig({ NAVMARK_DATA: '/data', NAVMARK_MAX_CHOICES: '2.5' })).toThrow(
      'Invalid NAVMARK_MAX_CHOICES: must be an integer',
    );
    expect(() => loadConfig({ NAVMARK_DATA: '/data', NAVMARK_MAX_AGE: 'soon' })).toThrow(ConfigError);
  });
});

describe('getDbPath', () => {
  test('places navigate.json in the data directory', () => {
    expect(getDbPath({ dataDir: '/data' })).toBe('/data/navigate.json');
  });
});
