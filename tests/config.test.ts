import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { loadConfig } from '../src/config.js';
import { ConfigError } from '../src/utils/errors.js';

describe('loadConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('reads settings from env vars with the default GET timeout', () => {
    const config = loadConfig({
      env: {
        MATTERMOST_URL: 'http://mm.test',
        MATTERMOST_TOKEN: 'test-token',
        MATTERMOST_CHANNEL_ID: 'chan-1',
      },
    });

    expect(config).toEqual({
      baseUrl: 'http://mm.test',
      token: 'test-token',
      channelId: 'chan-1',
      getTimeoutMs: 10_000,
    });
  });

  it('coerces the GET timeout from the environment', () => {
    const config = loadConfig({
      env: {
        MATTERMOST_URL: 'http://mm.test',
        MATTERMOST_TOKEN: 'test-token',
        MATTERMOST_CHANNEL_ID: 'chan-1',
        MATTERMOST_GET_TIMEOUT_MS: '2500',
      },
    });

    expect(config.getTimeoutMs).toBe(2500);
  });

  it('names the missing fields', () => {
    expect(() => loadConfig({ env: { MATTERMOST_URL: 'http://mm.test' } })).toThrow(
      'Invalid Mattermost config: token, channelId',
    );
  });

  it('rejects a base URL that is not a URL', () => {
    const load = () =>
      loadConfig({ env: { MATTERMOST_URL: 'not a url', MATTERMOST_TOKEN: 't', MATTERMOST_CHANNEL_ID: 'c' } });

    expect(load).toThrow(ConfigError);
    expect(load).toThrow('Invalid Mattermost config: baseUrl');
  });

  it('loads .env from the working directory only when called', () => {
    const dir = mkdtempSync(join(tmpdir(), 'mm-dotenv-'));
    try {
      writeFileSync(
        join(dir, '.env'),
        'MATTERMOST_URL=http://dotenv.test\nMATTERMOST_TOKEN=test-token\nMATTERMOST_CHANNEL_ID=dotenv-chan\n',
      );
      vi.spyOn(process, 'cwd').mockReturnValue(dir);
      vi.stubEnv('MATTERMOST_URL', '');
      vi.stubEnv('MATTERMOST_TOKEN', '');
      vi.stubEnv('MATTERMOST_CHANNEL_ID', '');
      delete process.env.MATTERMOST_URL;
      delete process.env.MATTERMOST_TOKEN;
      delete process.env.MATTERMOST_CHANNEL_ID;

      const config = loadConfig();

      expect(config.baseUrl).toBe('http://dotenv.test');
      expect(config.channelId).toBe('dotenv-chan');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
