import http from 'http';
import crypto from 'crypto';
import chalk from 'chalk';
import { ErrorAutenticacion, ErrorConfiguracion } from '../utils/ErrorHandler.js';


export interface OAuthResult {
  code?: string;
  state?: string;
  error?: string;
  error_description?: string;
}

const LOOPBACK_HOSTS = ['127.0.0.1', 'localhost', '[::1]'];

const escapeHtml = (value: string): string =>
  value.replace(/[&<>"']/g, char => `&#${char.charCodeAt(0)};`);

const page = (title: string, ...lines: string[]): string => `
  <html>
    <head><title>${title}</title></head>
    <body>
      <h1>${title}</h1>
      ${lines.map(line => `<p>${line}</p>`).join('\n      ')}
    </body>
  </html>
`;

/**
 * Servidor temporal que recibe el callback del flujo de código de autorización.
 * Escucha en el host, puerto y ruta de la Redirect URI configurada.
 */
export class OAuthServer {
  private server: http.Server | null = null;
  private readonly host: string;
  private readonly port: number;
  private readonly callbackPath: string;

  constructor(private readonly redirectUri: string) {
    const url = new URL(redirectUri);
    this.host = url.hostname.replace(/^\[|\]$/g, '');
    this.port = url.port ? Number(url.port) : 80;
    this.callbackPath = url.pathname;
  }

  /**
   * Solo se puede levantar el servidor si Spotify redirige a esta misma máquina
   */
  static isLoopback(redirectUri: string): boolean {
    try {
      const url = new URL(redirectUri);
      return url.protocol === 'http:' && LOOPBACK_HOSTS.includes(url.hostname);
    } catch {
      return false;
    }
  }

  static generateState(): string {
    return crypto.randomBytes(16).toString('hex');
  }

  /**
   * Extraer code/state (o error) de la URL a la que redirigió Spotify
   */
  static parseCallbackUrl(rawUrl: string): OAuthResult {
    const params = new URL(rawUrl.trim(), 'http://127.0.0.1').searchParams;
    const error = params.get('error');
    const code = params.get('code');

    if (error) {
      return {
        error,
        error_description: params.get('error_description') ?? undefined
      };
    }

    if (code) {
      return {
        code,
        state: params.get('state') ?? undefined
      };
    }

    return {
      error: 'invalid_request',
      error_description: 'No se recibió código de autorización'
    };
  }

  /**
   * Iniciar servidor temporal y esperar callback OAuth
   */
  async waitForCallback(timeoutMs: number = 120000, onListening?: () => void): Promise<OAuthResult> {
    return new Promise((resolve, reject) => {
      let resolved = false;

      const timeout = setTimeout(() => {
        if (!resolved) {
          resolved = true;
          this.stopServer();
          reject(new ErrorAutenticacion('La autorización OAuth expiró'));
        }
      }, timeoutMs);

      this.server = http.createServer((req, res) => {
        if (resolved) {
          res.writeHead(404, { 'Content-Type': 'text/html', 'Connection': 'close' });
          res.end(page('No Encontrado', 'La autorización ya terminó.'));
          return;
        }

        const requestUrl = new URL(req.url ?? '/', this.redirectUri);

        if (requestUrl.pathname !== this.callbackPath) {
          res.writeHead(404, { 'Content-Type': 'text/html', 'Connection': 'close' });
          res.end(page('No Encontrado', 'Esperando callback OAuth...'));
          return;
        }

        resolved = true;
        clearTimeout(timeout);

        const result = OAuthServer.parseCallbackUrl(requestUrl.toString());

        if (result.code) {
          res.writeHead(200, { 'Content-Type': 'text/html', 'Connection': 'close' });
          res.end(page(
            '¡Autorización Exitosa!',
            'Podés cerrar esta ventana y volver a la terminal.'
          ));
        } else {
          res.writeHead(400, { 'Content-Type': 'text/html', 'Connection': 'close' });
          res.end(page(
            'Autorización Fallida',
            `Error: ${escapeHtml(result.error ?? 'desconocido')}`,
            `Descripción: ${escapeHtml(result.error_description ?? 'Error desconocido')}`,
            'Podés cerrar esta ventana.'
          ));
        }

        this.stopServer();
        resolve(result);
      });

      this.server.on('error', (err: NodeJS.ErrnoException) => {
        if (!resolved) {
          resolved = true;
          clearTimeout(timeout);
          this.server = null;

          if (err.code === 'EADDRINUSE') {
            reject(new ErrorConfiguracion(`El puerto ${this.port} ya está en uso por otro programa. Cerralo o cambiá el puerto de ${this.redirectUri} (en el .env y en el Dashboard de Spotify).`));
          } else {
            reject(new ErrorConfiguracion(`Error del servidor OAuth: ${err.message}`));
          }
        }
      });

      this.server.listen(this.port, this.host, () => {
        console.log(chalk.gray(`Servidor OAuth ejecutándose en ${this.redirectUri}`));
        onListening?.();
      });
    });
  }

  /**
   * Detener el servidor temporal
   */
  stopServer(): void {
    if (this.server) {
      this.server.close();
      this.server = null;
    }
  }
}
