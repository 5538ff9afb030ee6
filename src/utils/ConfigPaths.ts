import os from 'os';
import path from 'path';

/**
 * Utilidad para manejar rutas de configuración del sistema
 */
export class ConfigPaths {
    private static readonly APP_NAME = 'top-n-spotify';

    /**
     * Obtiene la ruta del directorio de configuración de la aplicación
     */
    static getConfigDir(platform: NodeJS.Platform = os.platform(), homeDir: string = os.homedir()): string {
        switch (platform) {
            case 'win32':
                return path.join(homeDir, 'AppData', 'Roaming', this.APP_NAME);
            case 'darwin':
                return path.join(homeDir, 'Library', 'Application Support', this.APP_NAME);
            default: // Linux y otros Unix
                return path.join(homeDir, '.config', this.APP_NAME);
        }
    }

    /**
     * Archivo donde se guarda el token de Spotify entre ejecuciones
     */
    static getTokenCachePath(): string {
        return path.join(this.getConfigDir(), 'token-cache.json');
    }

    static getLogsDir(): string {
        return path.join(this.getConfigDir(), 'logs');
    }
}
