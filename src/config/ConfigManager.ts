import { promises as fs } from 'fs';
import dotenv from 'dotenv';
import type { Credentials } from '../models/Auth.js';
import { ErrorConfiguracion } from '../utils/ErrorHandler.js';
import { DEFAULT_CONFIG, ENV_VARS } from './defaults.js';

export interface ValidationResult {
  isValid: boolean;
  missingFields: string[];
  errors: string[];
}

export type Environment = Record<string, string | undefined>;

const REQUIRED_FIELDS = [ENV_VARS.CLIENT_ID, ENV_VARS.CLIENT_SECRET, ENV_VARS.REDIRECT_URI];

const ENV_TEMPLATE = `# Credenciales de la API de Spotify para top-n-spotify
# Obtené tus credenciales en: https://developer.spotify.com/dashboard
${ENV_VARS.CLIENT_ID}=your_spotify_client_id_here
${ENV_VARS.CLIENT_SECRET}=your_spotify_client_secret_here

# La misma URI tiene que estar registrada en el Dashboard de Spotify
${ENV_VARS.REDIRECT_URI}=${DEFAULT_CONFIG.REDIRECT_URI}
`;

export class ConfigManager {
  /**
   * Carga el archivo .env en process.env sin pisar variables ya definidas
   */
  loadEnvFile(filePath: string = DEFAULT_CONFIG.ENV_FILE): boolean {
    const result = dotenv.config({ path: filePath });
    return result.error === undefined;
  }

  async checkEnvFileExistsAsync(filePath: string = DEFAULT_CONFIG.ENV_FILE): Promise<boolean> {
    try {
      await fs.access(filePath, fs.constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Crea un .env de ejemplo si todavía no existe
   */
  async createEnvTemplate(filePath: string = DEFAULT_CONFIG.ENV_FILE): Promise<string> {
    if (await this.checkEnvFileExistsAsync(filePath)) {
      return filePath;
    }

    try {
      await fs.writeFile(filePath, ENV_TEMPLATE, 'utf8');
      return filePath;
    } catch (error) {
      throw new Error(`Error al crear el template de credenciales: ${error instanceof Error ? error.message : 'Error desconocido'}`);
    }
  }


  validateEnvironment(env: Environment = process.env): ValidationResult {
    const result: ValidationResult = {
      isValid: true,
      missingFields: [],
      errors: []
    };

    for (const field of REQUIRED_FIELDS) {
      const value = env[field]?.trim() ?? '';
      const isPlaceholder = value.includes('your_') || value.includes('_here') || value === '';

      if (isPlaceholder) {
        result.missingFields.push(field);
        result.isValid = false;
      }
    }

    if (result.missingFields.length > 0) {
      result.errors.push(`Faltan credenciales o están vacías: ${result.missingFields.join(', ')}`);
    }

    const redirectUri = env[ENV_VARS.REDIRECT_URI]?.trim();
    if (redirectUri && !result.missingFields.includes(ENV_VARS.REDIRECT_URI) && !this.isHttpUrl(redirectUri)) {
      result.isValid = false;
      result.errors.push(`${ENV_VARS.REDIRECT_URI} no es una URL http(s) válida: ${redirectUri}`);
    }

    return result;
  }

  /**
   * Devuelve las credenciales validadas o lanza ErrorConfiguracion
   */
  loadCredentials(env: Environment = process.env): Credentials {
    const validation = this.validateEnvironment(env);
    if (!validation.isValid) {
      throw new ErrorConfiguracion(`Credenciales inválidas: ${validation.errors.join('; ')}`);
    }

    return {
      clientId: env[ENV_VARS.CLIENT_ID]?.trim() ?? '',
      clientSecret: env[ENV_VARS.CLIENT_SECRET]?.trim() ?? '',
      redirectUri: env[ENV_VARS.REDIRECT_URI]?.trim() ?? ''
    };
  }

  private isHttpUrl(value: string): boolean {
    try {
      const url = new URL(value);
      return url.protocol === 'http:' || url.protocol === 'https:';
    } catch {
      return false;
    }
  }
}
