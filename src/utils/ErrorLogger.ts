import { AxiosError } from 'axios';
import { promises as fs } from 'fs';
import path from 'path';
import { ConfigPaths } from './ConfigPaths.js';

export interface ErrorLogEntry {
  timestamp: string;
  method: string;
  url: string;
  fullUrl: string;
  statusCode: number;
  statusText: string;
  params?: unknown;
  requestData?: unknown;
  responseData?: unknown;
  errorMessage: string;
  context?: string;
}

const MAX_ENTRIES = 100;

export class ErrorLogger {
  static logDir = ConfigPaths.getLogsDir();
  static logFile = 'spotify-errors.json';

  /**
   * Registrar un error 4xx de la API con información detallada
   */
  static async logApiError(error: AxiosError, context?: string): Promise<void> {
    const status = error.response?.status;
    if (!error.response || status === undefined || status < 400 || status >= 500) {
      return;
    }

    try {
      await fs.mkdir(this.logDir, { recursive: true });

      const logEntry: ErrorLogEntry = {
        timestamp: new Date().toISOString(),
        method: error.config?.method?.toUpperCase() || 'UNKNOWN',
        url: error.config?.url || 'UNKNOWN',
        fullUrl: this.buildFullUrl(error),
        statusCode: status,
        statusText: error.response.statusText,
        params: error.config?.params,
        requestData: error.config?.data ? this.safeParseJSON(error.config.data) : undefined,
        responseData: error.response.data,
        errorMessage: error.message,
        context
      };

      await this.writeLogEntry(logEntry);

      console.log(`📝 Error ${status} registrado en: ${this.getLogPath()}`);

    } catch (logError) {
      console.error('❌ Error al registrar el error:', logError);
    }
  }

  static getLogPath(): string {
    return path.join(this.logDir, this.logFile);
  }

  /**
   * Construir la URL completa desde la configuración de axios
   */
  private static buildFullUrl(error: AxiosError): string {
    const baseURL = error.config?.baseURL || '';
    const url = error.config?.url || '';
    const params: unknown = error.config?.params;

    let fullUrl = `${baseURL}${url}`;

    if (typeof params === 'object' && params !== null) {
      const searchParams = new URLSearchParams();
      Object.entries(params).forEach(([key, value]) => {
        searchParams.append(key, String(value));
      });
      fullUrl += `?${searchParams.toString()}`;
    }

    return fullUrl;
  }

  private static safeParseJSON(data: unknown): unknown {
    if (typeof data === 'string') {
      try {
        return JSON.parse(data);
      } catch {
        return data;
      }
    }
    return data;
  }

  private static async readEntries(): Promise<ErrorLogEntry[]> {
    try {
      const data = await fs.readFile(this.getLogPath(), 'utf-8');
      const parsed: unknown = JSON.parse(data);
      return Array.isArray(parsed) ? parsed : [];
    } catch {
      // El archivo no existe o es inválido
      return [];
    }
  }

  private static async writeLogEntry(logEntry: ErrorLogEntry): Promise<void> {
    let existingLogs = await this.readEntries();

    existingLogs.push(logEntry);

    // Mantener solo las últimas entradas
    if (existingLogs.length > MAX_ENTRIES) {
      existingLogs = existingLogs.slice(-MAX_ENTRIES);
    }

    await fs.writeFile(this.getLogPath(), JSON.stringify(existingLogs, null, 2), 'utf-8');
  }
}
