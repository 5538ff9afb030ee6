import { describe, it, expect } from 'vitest';
import path from 'path';
import { ConfigPaths } from '../src/utils/ConfigPaths.js';

describe('ConfigPaths.getConfigDir', () => {
  it('follows each platform convention', () => {
    expect(ConfigPaths.getConfigDir('linux', '/home/test')).toBe(path.join('/home/test', '.config', 'top-n-spotify'));
    expect(ConfigPaths.getConfigDir('darwin', '/Users/test')).toBe(path.join('/Users/test', 'Library', 'Application Support', 'top-n-spotify'));
    expect(ConfigPaths.getConfigDir('win32', 'C:/Users/test')).toBe(path.join('C:/Users/test', 'AppData', 'Roaming', 'top-n-spotify'));
  });

  it('keeps the token cache and logs inside the config directory', () => {
    expect(ConfigPaths.getTokenCachePath()).toBe(path.join(ConfigPaths.getConfigDir(), 'token-cache.json'));
    expect(ConfigPaths.getLogsDir()).toBe(path.join(ConfigPaths.getConfigDir(), 'logs'));
  });
});
