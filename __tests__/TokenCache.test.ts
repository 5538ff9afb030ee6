import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { TokenCache, isStoredToken } from '../src/auth/TokenCache.js';
import type { StoredToken } from '../src/models/Auth.js';

const TOKEN: StoredToken = {
  accessToken: 'test-access',
  refreshToken: 'test-refresh',
  expiresAt: 1_700_000_000_000,
  scope: 'user-read-private playlist-modify-public',
  tokenType: 'Bearer'
};

describe('TokenCache', () => {
  let tmpDir: string;
  let cachePath: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'top-n-cache-'));
    cachePath = path.join(tmpDir, 'nested', 'token-cache.json');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('returns null when there is no cache file', async () => {
    expect(await new TokenCache(cachePath).read()).toBeNull();
  });

  it('writes the token creating missing directories and reads it back', async () => {
    const cache = new TokenCache(cachePath);

    await cache.write(TOKEN);

    expect(await cache.read()).toEqual(TOKEN);
    expect(JSON.parse(await fs.readFile(cachePath, 'utf8'))).toEqual(TOKEN);
  });

  it('ignores corrupt or foreign content', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    await fs.mkdir(path.dirname(cachePath), { recursive: true });
    const cache = new TokenCache(cachePath);

    await fs.writeFile(cachePath, '{not json');
    expect(await cache.read()).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);

    await fs.writeFile(cachePath, JSON.stringify({ access_token: 'x' }));
    expect(await cache.read()).toBeNull();
  });

  it('clears the cache even when it does not exist', async () => {
    const cache = new TokenCache(cachePath);
    await cache.clear();

    await cache.write(TOKEN);
    await cache.clear();

    expect(await cache.read()).toBeNull();
  });
});

describe('isStoredToken', () => {
  it('accepts tokens without refresh token', () => {
    const { refreshToken: _, ...withoutRefresh } = TOKEN;
    expect(isStoredToken(withoutRefresh)).toBe(true);
  });

  it('rejects values with the wrong field types', () => {
    expect(isStoredToken({ ...TOKEN, expiresAt: '2024-01-01' })).toBe(false);
    expect(isStoredToken({ ...TOKEN, refreshToken: 42 })).toBe(false);
    expect(isStoredToken(null)).toBe(false);
  });
});
