import { afterEach, describe, expect, it, vi } from 'vitest';
import { getConfig, reloadConfig } from './config.js';

describe('config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    reloadConfig();
  });

  it('derives the sort file from the data path', () => {
    vi.stubEnv('DATA_PATH', '/srv/vfs');
    vi.stubEnv('SORT_FILE', '');
    reloadConfig();

    expect(getConfig().sortFile).toBe('/srv/vfs/sorting.txt');
  });

  it('reads numbers and switches from the environment', () => {
    vi.stubEnv('REFRESH_INTERVAL', '60');
    vi.stubEnv('PAGE_SIZE', '100');
    vi.stubEnv('INVALID_REGEX', 'fail');
    vi.stubEnv('WATCH_SORT_FILE', 'false');
    vi.stubEnv('REALDEBRID_API_KEY', 'test-secret');
    vi.stubEnv('DEBUG', 'true');
    reloadConfig();

    const config = getConfig();
    expect(config.refreshInterval).toBe(60);
    expect(config.pageSize).toBe(100);
    expect(config.invalidRegex).toBe('fail');
    expect(config.watchSortFile).toBe(false);
    expect(config.realdebrid.apiKey).toBe('test-secret');
    expect(config.debug).toBe(true);
  });

  it('falls back to skipping invalid regexes', () => {
    vi.stubEnv('INVALID_REGEX', 'whatever');
    reloadConfig();

    expect(getConfig().invalidRegex).toBe('skip');
  });

  it('caches until reloaded', () => {
    vi.stubEnv('PORT', '9000');
    reloadConfig();
    vi.stubEnv('PORT', '9001');

    expect(getConfig().port).toBe(9000);
    reloadConfig();
    expect(getConfig().port).toBe(9001);
  });
});
