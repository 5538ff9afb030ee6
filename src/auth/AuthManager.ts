import axios, { type AxiosInstance } from 'axios';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { exec } from 'child_process';
import type { Credentials, StoredToken } from '../models/Auth.js';
import type { SpotifyTokenResponse } from '../models/SpotifyTypes.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import {
  ManejadorErrores,
  CONFIGURACION_REINTENTO_PREDETERMINADA,
  type ConfiguracionReintento,
  ErrorAutenticacion
} from '../utils/ErrorHandler.js';
import { OAuthServer, type OAuthResult } from './OAuthServer.js';
import { TokenCache } from './TokenCache.js';

export interface AuthManagerOptions {
  tokenCache?: TokenCache;
  httpClient?: AxiosInstance;
  reintentos?: ConfiguracionReintento;
  oauthTimeout?: number;
  openBrowser?: (url: string) => void;
  promptForRedirect?: (authUrl: string) => Promise<string>;
}

const SCOPE_DESCRIPTIONS: Record<string, string> = {
  'user-read-private': 'Leer la información de tu perfil (país)',
  'playlist-modify-public': 'Crear y modificar tus playlists públicas',
  'playlist-modify-private': 'Crear y modificar tus playlists privadas'
};

/**
 * Obtiene un token de usuario de Spotify: primero desde el cache, después
 * refrescándolo y, si no queda otra, con el flujo de código de autorización.
 */
export class AuthManager {
  private readonly tokenCache: TokenCache;
  private readonly client: AxiosInstance;
  private readonly manejadorErrores: ManejadorErrores;
  private readonly oauthTimeout: number;
  private readonly openBrowser: (url: string) => void;
  private readonly promptForRedirect: (authUrl: string) => Promise<string>;

  constructor(options: AuthManagerOptions = {}) {
    this.tokenCache = options.tokenCache ?? new TokenCache();
    this.client = options.httpClient ?? axios.create({
      baseURL: 'https://accounts.spotify.com',
      timeout: DEFAULT_CONFIG.REQUEST_TIMEOUT
    });
    this.manejadorErrores = new ManejadorErrores(options.reintentos ?? CONFIGURACION_REINTENTO_PREDETERMINADA);
    this.oauthTimeout = options.oauthTimeout ?? DEFAULT_CONFIG.OAUTH_TIMEOUT;
    this.openBrowser = options.openBrowser ?? openInBrowser;
    this.promptForRedirect = options.promptForRedirect ?? askForRedirectUrl;
  }

  async getAccessToken(credentials: Credentials, scopes: readonly string[] = DEFAULT_CONFIG.SCOPES): Promise<string> {
    const cached = await this.tokenCache.read();

    if (cached && this.coversScopes(cached, scopes)) {
      if (!this.isExpired(cached)) {
        return cached.accessToken;
      }

      if (cached.refreshToken) {
        try {
          return await this.refreshAccessToken(credentials, cached);
        } catch (error) {
          // Solo un refresh token rechazado invalida el cache; un corte de red no
          if (!(error instanceof ErrorAutenticacion)) {
            throw error;
          }
          console.warn(chalk.yellow(`⚠️ Spotify rechazó el token guardado (${error.message}). Se pedirá autorización de nuevo.`));
          await this.tokenCache.clear();
        }
      }
    }

    return this.authorizeUser(credentials, scopes);
  }

  /**
   * Flujo de código de autorización con verificación de state
   */
  async authorizeUser(credentials: Credentials, scopes: readonly string[]): Promise<string> {
    try {
      const state = OAuthServer.generateState();
      const authUrl = this.buildAuthorizationUrl(credentials, scopes, state);

      console.log('\n🎵 Autorización de Usuario de Spotify Requerida');
      console.log('═══════════════════════════════════════');
      console.log('Para crear la playlist en tu cuenta necesitás autorizar esta aplicación.');
      console.log('\n📋 Permisos solicitados:');
      scopes.forEach(scope => {
        console.log(`  • ${SCOPE_DESCRIPTIONS[scope] ?? scope}`);
      });

      let result: OAuthResult;
      if (OAuthServer.isLoopback(credentials.redirectUri)) {
        console.log('\n🌐 Abriendo navegador para autorización...');
        console.log(`Si el navegador no se abre automáticamente, visitá: ${authUrl}`);
        console.log(`\n⏳ Esperando autorización (tiempo límite: ${Math.round(this.oauthTimeout / 60000)} minutos)...`);

        const oauthServer = new OAuthServer(credentials.redirectUri);
        result = await oauthServer.waitForCallback(this.oauthTimeout, () => this.openBrowser(authUrl));
      } else {
        console.log(`\n🌐 Abrí esta URL en tu navegador y autorizá la aplicación: ${authUrl}`);
        this.openBrowser(authUrl);
        const redirectedUrl = await this.promptForRedirect(authUrl);
        result = OAuthServer.parseCallbackUrl(redirectedUrl);
      }

      if (result.error) {
        throw new ErrorAutenticacion(`La autorización falló: ${result.error}${result.error_description ? ` - ${result.error_description}` : ''}`);
      }

      if (!result.code) {
        throw new ErrorAutenticacion('No se recibió código de autorización');
      }

      if (result.state !== state) {
        throw new ErrorAutenticacion('Parámetro state inválido - posible ataque CSRF');
      }

      console.log('✅ ¡Autorización exitosa! Intercambiando código por token...');

      const token = await this.exchangeCodeForToken(credentials, result.code, scopes);
      await this.saveToken(token);
      return token.accessToken;

    } catch (error) {
      console.error('❌ La autorización de usuario de Spotify falló:', error instanceof Error ? error.message : error);
      throw error;
    }
  }

  buildAuthorizationUrl(credentials: Credentials, scopes: readonly string[], state: string): string {
    const params = new URLSearchParams({
      response_type: 'code',
      client_id: credentials.clientId,
      scope: scopes.join(' '),
      redirect_uri: credentials.redirectUri,
      state: state
    });

    return `https://accounts.spotify.com/authorize?${params.toString()}`;
  }

  private async exchangeCodeForToken(credentials: Credentials, code: string, scopes: readonly string[]): Promise<StoredToken> {
    const data = await this.requestToken(credentials, new URLSearchParams({
      grant_type: 'authorization_code',
      code: code,
      redirect_uri: credentials.redirectUri
    }), 'exchangeCodeForToken');

    return this.toStoredToken(data, scopes.join(' '));
  }

  /**
   * Refrescar el token usando el refresh token guardado
   */
  async refreshAccessToken(credentials: Credentials, current: StoredToken): Promise<string> {
    if (!current.refreshToken) {
      throw new ErrorAutenticacion('No hay refresh token de Spotify disponible. Por favor re-autenticá.');
    }

    const data = await this.requestToken(credentials, new URLSearchParams({
      grant_type: 'refresh_token',
      refresh_token: current.refreshToken
    }), 'refreshAccessToken');

    // Spotify no siempre devuelve un refresh token nuevo
    const token = this.toStoredToken(data, current.scope, current.refreshToken);
    await this.saveToken(token);

    console.log('✅ ¡Token de Spotify refrescado exitosamente!');
    return token.accessToken;
  }

  private async requestToken(credentials: Credentials, body: URLSearchParams, operation: string): Promise<SpotifyTokenResponse> {
    const basic = Buffer.from(`${credentials.clientId}:${credentials.clientSecret}`).toString('base64');

    return this.manejadorErrores.ejecutarConReintento(async () => {
      const response = await this.client.post<SpotifyTokenResponse>('/api/token', body.toString(), {
        headers: {
          'Authorization': `Basic ${basic}`,
          'Content-Type': 'application/x-www-form-urlencoded'
        }
      });
      return response.data;
    }, operation);
  }

  private toStoredToken(data: SpotifyTokenResponse, fallbackScope: string, fallbackRefreshToken?: string): StoredToken {
    return {
      accessToken: data.access_token,
      refreshToken: data.refresh_token ?? fallbackRefreshToken,
      expiresAt: Date.now() + data.expires_in * 1000,
      scope: data.scope ?? fallbackScope,
      tokenType: data.token_type
    };
  }

  private async saveToken(token: StoredToken): Promise<void> {
    await this.tokenCache.write(token);
  }

  private coversScopes(token: StoredToken, scopes: readonly string[]): boolean {
    const granted = token.scope.split(/\s+/);
    return scopes.every(scope => granted.includes(scope));
  }

  private isExpired(token: StoredToken): boolean {
    return token.expiresAt - Date.now() < DEFAULT_CONFIG.TOKEN_EXPIRY_MARGIN;
  }
}

/**
 * Abrir navegador en la URL de autorización
 */
function openInBrowser(url: string): void {
  let command: string;

  switch (process.platform) {
    case 'darwin':
      command = `open "${url}"`;
      break;
    case 'win32':
      command = `start "" "${url}"`;
      break;
    default:
      command = `xdg-open "${url}"`;
      break;
  }

  exec(command, (error) => {
    if (error) {
      console.warn('No se pudo abrir el navegador automáticamente. Por favor abrí la URL manualmente.');
    }
  });
}

async function askForRedirectUrl(): Promise<string> {
  const { redirectedUrl } = await inquirer.prompt<{ redirectedUrl: string }>([
    {
      type: 'input',
      name: 'redirectedUrl',
      message: 'Pegá la URL completa a la que te redirigió Spotify:',
      validate: (input: string) => input.includes('code=') || input.includes('error=') || 'La URL no trae ni code ni error'
    }
  ]);
  return redirectedUrl;
}
