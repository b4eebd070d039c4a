import { join } from 'node:path';

import { describe, expect, test } from 'vitest';

import { loadConfig } from '../../src/config.js';

describe('loadConfig', () => {
  test('applies defaults for an empty environment', () => {
    const config = loadConfig({});
    expect(config).toEqual({
      registryUrl: 'http://homeassistant.local:8123',
      registryToken: undefined,
      requestTimeoutMs: 30_000,
      connectTimeoutMs: 10_000,
      dataDir: './data',
      rulesPath: join('./data', 'rules.json'),
      fallbackAreaName: 'Unassigned',
      safeMode: 'read_write',
      requireConfirm: true,
      logLevel: 'info',
      logPretty: false,
      journalMaxEntries: 2_000,
      journalPersistPath: undefined
    });
  });

  test('reads overrides and clamps numbers', () => {
    const config = loadConfig({
      HOUSEKEEPER_REGISTRY_URL: ' http://ha.local:8123/ ',
      HOUSEKEEPER_REGISTRY_TOKEN: 'test-secret',
      HOUSEKEEPER_REQUEST_TIMEOUT_MS: '50',
      HOUSEKEEPER_DATA_DIR: '/var/lib/housekeeper',
      HOUSEKEEPER_FALLBACK_AREA_NAME: 'Unsorted',
      HOUSEKEEPER_SAFE_MODE: 'READ_ONLY',
      HOUSEKEEPER_REQUIRE_CONFIRM: 'no',
      HOUSEKEEPER_JOURNAL_MAX_ENTRIES: 'lots'
    });

    expect(config.registryUrl).toBe('http://ha.local:8123');
    expect(config.registryToken).toBe('test-secret');
    expect(config.requestTimeoutMs).toBe(500);
    expect(config.rulesPath).toBe(join('/var/lib/housekeeper', 'rules.json'));
    expect(config.fallbackAreaName).toBe('Unsorted');
    expect(config.safeMode).toBe('read_only');
    expect(config.requireConfirm).toBe(false);
    expect(config.journalMaxEntries).toBe(2_000);
  });

  test('falls back to the supervisor token', () => {
    expect(loadConfig({ SUPERVISOR_TOKEN: 'test-secret' }).registryToken).toBe('test-secret');
  });

  test('strips credentials from the registry url', () => {
    const config = loadConfig({ HOUSEKEEPER_REGISTRY_URL: 'http://user:pw@ha.local:8123/?access_token=test-secret' });
    expect(config.registryUrl).toBe('http://ha.local:8123');
  });

  test('rejects an unparseable registry url', () => {
    expect(() => loadConfig({ HOUSEKEEPER_REGISTRY_URL: 'not a url' })).toThrow(
      'Invalid HOUSEKEEPER_REGISTRY_URL: not a url'
    );
  });
});
