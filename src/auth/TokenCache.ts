import { promises as fs } from 'fs';
import path from 'path';
import type { StoredToken } from '../models/Auth.js';
import { ConfigPaths } from '../utils/ConfigPaths.js';

export function isStoredToken(value: unknown): value is StoredToken {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return 'accessToken' in value && typeof value.accessToken === 'string'
    && 'expiresAt' in value && typeof value.expiresAt === 'number'
    && 'scope' in value && typeof value.scope === 'string'
    && 'tokenType' in value && typeof value.tokenType === 'string'
    && (!('refreshToken' in value) || value.refreshToken === undefined || typeof value.refreshToken === 'string');
}

/**
 * Archivo JSON donde queda el token de Spotify entre ejecuciones
 */
export class TokenCache {
  constructor(private readonly filePath: string = ConfigPaths.getTokenCachePath()) {}

  /**
   * Devuelve null si no hay archivo o si el contenido no es un token válido
   */
  async read(): Promise<StoredToken | null> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch {
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      return isStoredToken(parsed) ? parsed : null;
    } catch {
      console.warn(`⚠️ Cache de token corrupto en ${this.filePath}, se ignorará`);
      return null;
    }
  }

  async write(token: StoredToken): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(token, null, 2), { encoding: 'utf8', mode: 0o600 });
  }

  async clear(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
  }
}
